import cloneDeep from 'clone-deep';
import { isAddress, getAddress } from 'ethers';
import {
  Address,
  BondId,
  BondIntent,
  BondState,
  CallContext,
  LedgerConfig,
  LedgerState,
  Notification,
  PoolId,
  Revertible,
  Settlement,
} from './common.js';
import { BURN_ADDRESS, MAX_SLASH, UNBOND_DELAY, ZERO_ADDRESS } from './constants.js';
import { LedgerError } from './errors.js';
import { bondIdOf, samePool, toAddress, toIntent, toPoolId } from './identity.js';
import { add, div, mul, sub } from './math.js';
import { safeTransfer, safeTransferFrom, TokenRegistry } from './token.js';

/**
 * Share of amount left after the pool went from slashedAtStart to
 * livePoints. Multiplies before dividing.
 */
function proRata(amount: bigint, livePoints: bigint, slashedAtStart: bigint): bigint {
  return div(mul(amount, sub(MAX_SLASH, livePoints)), sub(MAX_SLASH, slashedAtStart));
}

/**
 * Owns the cumulative slash points of every pool.
 */
class SlashRegistry {
  // Model handle
  m: Ledger;

  constructor(model: Ledger) {
    this.m = model;
  }

  /**
   * @returns slash points of the pool, 0 if it was never slashed
   */
  slashPoints = (poolId: PoolId): bigint => {
    return this.m.state.slashPoints[toPoolId(poolId)] ?? 0n;
  };

  /**
   * Raise the slash points of a pool. Bonds are not touched, their
   * withdraw amount is recomputed from the live total on exit.
   * @param ctx caller must be the authority
   * @param poolId pool to slash
   * @param points points to add to the pool total
   * @returns the new total
   */
  slash = (ctx: CallContext, poolId: PoolId, points: bigint): bigint => {
    if (ctx.caller !== this.m.config.authority) {
      throw new LedgerError('NotAuthorized', undefined, { caller: ctx.caller });
    }
    const p = toPoolId(poolId);
    const newTotal = add(this.slashPoints(p), points);
    if (MAX_SLASH < newTotal) {
      throw new LedgerError('PointsTooHigh', undefined, { poolId: p, newTotal });
    }
    this.m.state.slashPoints[p] = newTotal;
    this.m.emit({ kind: 'SlashApplied', poolId: p, newTotal, time: ctx.now });
    return newTotal;
  };
}

/**
 * Owns per bond state and computes what a bond is worth on exit.
 */
class BondLedger {
  // Model handle
  m: Ledger;

  constructor(model: Ledger) {
    this.m = model;
  }

  bond = (id: BondId): BondState | undefined => {
    return this.m.state.bonds[id];
  };

  isActive = (id: BondId): boolean => {
    return this.bond(id)?.active === true;
  };

  /**
   * amount * (MAX_SLASH - live points) / (MAX_SLASH - slashedAtStart)
   *
   * slashedAtStart < MAX_SLASH for every stored bond, so the divisor
   * is non zero.
   */
  calcWithdrawAmount = (
    amount: bigint,
    poolId: PoolId,
    slashedAtStart: bigint,
  ): bigint => {
    const live = this.m.slashRegistry.slashPoints(poolId);
    return proRata(amount, live, slashedAtStart);
  };

  /**
   * Withdraw amount of the bond addressed by (owner, intent) if it
   * were settled now, 0 if there is no such active bond.
   */
  getWithdrawAmount = (owner: Address, intent: BondIntent): bigint => {
    const i = toIntent(intent);
    const bond = this.bond(this.m.bondIdOf(owner, i));
    if (bond === undefined || !bond.active) {
      return 0n;
    }
    return this.calcWithdrawAmount(i.amount, i.poolId, bond.slashedAtStart);
  };

  addBond = (ctx: CallContext, intent: BondIntent): BondId => {
    return this.add(ctx, toIntent(intent));
  };

  /**
   * Start the unbonding delay. Can only be done once per bond.
   * @returns the unlock time
   */
  requestUnbond = (ctx: CallContext, intent: BondIntent): number => {
    const i = toIntent(intent);
    const id = this.m.bondIdOf(ctx.caller, i);
    const bond = this.bond(id);
    if (bond === undefined || !bond.active || bond.willUnlock !== 0) {
      throw new LedgerError('BondNotActive', undefined, { bondId: id });
    }
    bond.willUnlock = ctx.now + UNBOND_DELAY;
    this.m.emit({
      kind: 'UnbondRequested',
      owner: ctx.caller,
      bondId: id,
      willUnlock: bond.willUnlock,
      time: ctx.now,
    });
    return bond.willUnlock;
  };

  /**
   * Finalize an unbond once the unlock time has strictly passed.
   */
  unbond = (ctx: CallContext, intent: BondIntent): Settlement => {
    const i = toIntent(intent);
    const id = this.m.bondIdOf(ctx.caller, i);
    const bond = this.bond(id);
    if (
      bond === undefined ||
      !bond.active ||
      bond.willUnlock === 0 ||
      ctx.now <= bond.willUnlock
    ) {
      throw new LedgerError('BondNotUnlocked', undefined, {
        bondId: id,
        willUnlock: bond?.willUnlock ?? 0,
        now: ctx.now,
      });
    }
    return this.settle(ctx, id, i, bond);
  };

  /**
   * Settle an active bond immediately and open a new one in the same
   * pool. Allowed while an unbond request is pending. The new amount
   * must cover what the old bond is worth, otherwise the caller could
   * shed an incurred slash by re-bonding at a fresh snapshot.
   */
  replaceBond = (
    ctx: CallContext,
    oldIntent: BondIntent,
    newIntent: BondIntent,
  ): { settled: Settlement; bondId: BondId } => {
    const o = toIntent(oldIntent);
    const n = toIntent(newIntent);
    const id = this.m.bondIdOf(ctx.caller, o);
    const bond = this.bond(id);
    if (bond === undefined || !bond.active) {
      throw new LedgerError('BondNotActive', undefined, { bondId: id });
    }
    if (!samePool(o.poolId, n.poolId)) {
      throw new LedgerError('PoolIdMismatch', undefined, {
        old: o.poolId,
        new: n.poolId,
      });
    }
    const owed = this.calcWithdrawAmount(o.amount, o.poolId, bond.slashedAtStart);
    if (n.amount < owed) {
      throw new LedgerError('NewBondTooSmall', undefined, {
        amount: n.amount,
        required: owed,
      });
    }
    const settled = this.settle(ctx, id, o, bond);
    return { settled, bondId: this.add(ctx, n) };
  };

  private add = (ctx: CallContext, i: BondIntent): BondId => {
    const id = this.m.bondIdOf(ctx.caller, i);
    if (this.isActive(id)) {
      throw new LedgerError('BondAlreadyActive', undefined, { bondId: id });
    }
    const slashedAtStart = this.m.slashRegistry.slashPoints(i.poolId);
    if (MAX_SLASH <= slashedAtStart) {
      throw new LedgerError('PoolFullySlashed', undefined, { poolId: i.poolId });
    }
    this.m.state.bonds[id] = { active: true, slashedAtStart, willUnlock: 0 };
    safeTransferFrom(
      this.m.tokens,
      this.m.config.token,
      this.m.config.instance,
      ctx.caller,
      this.m.config.instance,
      i.amount,
    );
    this.m.emit({
      kind: 'BondAdded',
      owner: ctx.caller,
      amount: i.amount,
      poolId: i.poolId,
      nonce: i.nonce,
      slashedAtStart,
      time: ctx.now,
    });
    return id;
  };

  private settle = (
    ctx: CallContext,
    id: BondId,
    i: BondIntent,
    bond: BondState,
  ): Settlement => {
    const payout = this.calcWithdrawAmount(i.amount, i.poolId, bond.slashedAtStart);
    const burned = sub(i.amount, payout);
    delete this.m.state.bonds[id];
    const { tokens, config } = this.m;
    safeTransfer(tokens, config.token, config.instance, ctx.caller, payout);
    if (0n < burned) {
      safeTransfer(tokens, config.token, config.instance, BURN_ADDRESS, burned);
    }
    this.m.emit({
      kind: 'Unbonded',
      owner: ctx.caller,
      bondId: id,
      payout,
      burned,
      time: ctx.now,
    });
    return { bondId: id, payout, burned };
  };
}

type LedgerCheckpoint = {
  state: LedgerState;
  logLength: number;
};

function configAddress(name: string, a: string): Address {
  if (!isAddress(a) || getAddress(a) === ZERO_ADDRESS) {
    throw new LedgerError('InvalidConfig', `${name} must be a non zero address`, {
      [name]: a,
    });
  }
  return getAddress(a);
}

/**
 * The ledger: immutable configuration, the two state tables, the
 * notification log, and the components operating on them.
 *
 * Every public operation validates before it mutates, and is
 * wrapped so that a failure part way (e.g. in the transfer
 * primitive) discards all of its writes to ledger state and to
 * the balances of registered tokens.
 */
class Ledger implements Revertible<LedgerCheckpoint> {
  config: LedgerConfig;
  tokens: TokenRegistry;
  state: LedgerState;
  // append-only, in operation order
  log: Notification[] = [];
  slashRegistry: SlashRegistry;
  bonds: BondLedger;

  constructor(
    config: LedgerConfig,
    tokens: TokenRegistry,
    state: LedgerState = { slashPoints: {}, bonds: {} },
  ) {
    this.config = Object.freeze({
      instance: configAddress('instance', config.instance),
      token: configAddress('token', config.token),
      authority: configAddress('authority', config.authority),
    });
    this.tokens = tokens;
    this.state = cloneDeep(state);
    this.slashRegistry = new SlashRegistry(this);
    this.bonds = new BondLedger(this);
  }

  emit = (n: Notification) => {
    this.log.push(n);
  };

  bondIdOf = (owner: Address, intent: BondIntent): BondId => {
    return bondIdOf(this.config.instance, owner, intent);
  };

  checkpoint = (): LedgerCheckpoint => {
    return { state: cloneDeep(this.state), logLength: this.log.length };
  };

  restore = (checkpoint: LedgerCheckpoint) => {
    this.state = cloneDeep(checkpoint.state);
    this.log.length = checkpoint.logLength;
  };

  // restores registered token balances along with ledger state
  private transact = <T>(ctx: CallContext, op: (ctx: CallContext) => T): T => {
    const checkpoint = this.checkpoint();
    const tokens = this.tokens
      .participants()
      .map((p) => ({ p, c: p.checkpoint() }));
    try {
      return op({ caller: toAddress(ctx.caller), now: ctx.now });
    } catch (e) {
      tokens.forEach(({ p, c }) => p.restore(c));
      this.restore(checkpoint);
      throw e;
    }
  };

  slash = (ctx: CallContext, poolId: PoolId, points: bigint): bigint => {
    return this.transact(ctx, (c) => this.slashRegistry.slash(c, poolId, points));
  };

  addBond = (ctx: CallContext, intent: BondIntent): BondId => {
    return this.transact(ctx, (c) => this.bonds.addBond(c, intent));
  };

  requestUnbond = (ctx: CallContext, intent: BondIntent): number => {
    return this.transact(ctx, (c) => this.bonds.requestUnbond(c, intent));
  };

  unbond = (ctx: CallContext, intent: BondIntent): Settlement => {
    return this.transact(ctx, (c) => this.bonds.unbond(c, intent));
  };

  replaceBond = (
    ctx: CallContext,
    oldIntent: BondIntent,
    newIntent: BondIntent,
  ): { settled: Settlement; bondId: BondId } => {
    return this.transact(ctx, (c) =>
      this.bonds.replaceBond(c, oldIntent, newIntent),
    );
  };

  getSlashPoints = (poolId: PoolId): bigint => {
    return this.slashRegistry.slashPoints(poolId);
  };

  getWithdrawAmount = (owner: Address, intent: BondIntent): bigint => {
    return this.bonds.getWithdrawAmount(owner, intent);
  };

  /**
   * @returns a copy of the state of the bond addressed by
   * (owner, intent), undefined if there is none
   */
  getBond = (owner: Address, intent: BondIntent): BondState | undefined => {
    const bond = this.bonds.bond(this.bondIdOf(owner, intent));
    return bond === undefined ? undefined : { ...bond };
  };
}

export { proRata, SlashRegistry, BondLedger, LedgerCheckpoint, Ledger };
