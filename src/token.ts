import cloneDeep from 'clone-deep';
import { Address, Revertible } from './common.js';
import { LedgerErrorCode, LedgerError } from './errors.js';
import { MAX_UINT256, ZERO_ADDRESS } from './constants.js';
import { toAddress } from './identity.js';
import { add, sub } from './math.js';

/**
 * The transfer primitive as seen by the ledger. Implementations
 * may signal success by returning true or by returning nothing,
 * and may signal failure by throwing or by returning false.
 */
interface TokenLike {
  balanceOf(account: Address): bigint;
  transfer(caller: Address, to: Address, amount: bigint): boolean | void;
  transferFrom(
    caller: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): boolean | void;
}

/**
 * Maps token addresses to implementations.
 */
class TokenRegistry {
  private tokens = new Map<Address, TokenLike>();

  register = (address: Address, token: TokenLike) => {
    this.tokens.set(toAddress(address), token);
  };

  get = (address: Address): TokenLike => {
    const token = this.tokens.get(toAddress(address));
    if (token === undefined) {
      throw new LedgerError('TransferFailed', 'unknown token', {
        token: address,
      });
    }
    return token;
  };

  /**
   * Registered tokens that can be checkpointed and restored.
   */
  participants = (): Revertible[] => {
    return [...this.tokens.values()].filter(isRevertible);
  };
}

function isRevertible(t: TokenLike): t is TokenLike & Revertible {
  return (
    'checkpoint' in t &&
    typeof t.checkpoint === 'function' &&
    'restore' in t &&
    typeof t.restore === 'function'
  );
}

/**
 * Moves amount of token from caller to `to`. Fails the enclosing
 * operation unless the token reports success.
 */
function safeTransfer(
  tokens: TokenRegistry,
  token: Address,
  caller: Address,
  to: Address,
  amount: bigint,
) {
  const ok = tokens.get(token).transfer(caller, to, amount);
  if (ok === false) {
    throw new LedgerError('TransferFailed', 'transfer returned false', {
      token,
      to,
      amount,
    });
  }
}

/**
 * Moves amount of token from `from` to `to`, spending caller's
 * allowance. Fails the enclosing operation unless the token
 * reports success.
 */
function safeTransferFrom(
  tokens: TokenRegistry,
  token: Address,
  caller: Address,
  from: Address,
  to: Address,
  amount: bigint,
) {
  const ok = tokens.get(token).transferFrom(caller, from, to, amount);
  if (ok === false) {
    throw new LedgerError('TransferFailed', 'transferFrom returned false', {
      token,
      from,
      to,
      amount,
    });
  }
}

/**
 * How a MockToken reports the outcome of a transfer.
 *  - standard: returns true, throws on failure
 *  - silent: returns nothing, throws on failure
 *  - boolean: returns true, returns false on failure
 */
type SignalMode = 'standard' | 'silent' | 'boolean';

interface MockTokenOptions {
  signal?: SignalMode;
  // reject transfers whose recipient is the zero address
  refuseZeroAddress?: boolean;
}

type TokenCheckpoint = {
  balances: Record<Address, bigint>;
  allowances: Record<Address, Record<Address, bigint>>;
  totalSupply: bigint;
};

/**
 * In process ERC-20 stand in.
 */
class MockToken implements TokenLike, Revertible<TokenCheckpoint> {
  balances: Record<Address, bigint> = {};
  // owner -> spender -> remaining allowance
  allowances: Record<Address, Record<Address, bigint>> = {};
  totalSupply = 0n;
  signal: SignalMode;
  refuseZeroAddress: boolean;

  constructor({ signal = 'standard', refuseZeroAddress = true }: MockTokenOptions = {}) {
    this.signal = signal;
    this.refuseZeroAddress = refuseZeroAddress;
  }

  balanceOf = (account: Address): bigint => {
    return this.balances[toAddress(account)] ?? 0n;
  };

  allowance = (owner: Address, spender: Address): bigint => {
    return this.allowances[toAddress(owner)]?.[toAddress(spender)] ?? 0n;
  };

  mint = (to: Address, amount: bigint) => {
    const a = toAddress(to);
    this.totalSupply = add(this.totalSupply, amount);
    this.balances[a] = add(this.balanceOf(a), amount);
  };

  approve = (owner: Address, spender: Address, amount: bigint): boolean => {
    const o = toAddress(owner);
    this.allowances[o] = { ...this.allowances[o], [toAddress(spender)]: amount };
    return true;
  };

  transfer = (caller: Address, to: Address, amount: bigint): boolean | void => {
    return this.move(toAddress(caller), toAddress(to), amount);
  };

  transferFrom = (
    caller: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): boolean | void => {
    const spender = toAddress(caller);
    const owner = toAddress(from);
    if (spender === owner) {
      return this.move(owner, toAddress(to), amount);
    }
    const allowed = this.allowance(owner, spender);
    if (allowed < amount) {
      return this.fail('InsufficientAllowance', { owner, spender, amount });
    }
    const outcome = this.move(owner, toAddress(to), amount);
    // infinite approvals are never spent
    if (outcome !== false && allowed !== MAX_UINT256) {
      this.allowances[owner] = {
        ...this.allowances[owner],
        [spender]: sub(allowed, amount),
      };
    }
    return outcome;
  };

  checkpoint = (): TokenCheckpoint => {
    return cloneDeep({
      balances: this.balances,
      allowances: this.allowances,
      totalSupply: this.totalSupply,
    });
  };

  restore = (checkpoint: TokenCheckpoint) => {
    const c = cloneDeep(checkpoint);
    this.balances = c.balances;
    this.allowances = c.allowances;
    this.totalSupply = c.totalSupply;
  };

  private move = (from: Address, to: Address, amount: bigint): boolean | void => {
    if (this.refuseZeroAddress && to === ZERO_ADDRESS) {
      return this.fail('TransferToZeroAddress', { from, amount });
    }
    const balance = this.balanceOf(from);
    if (balance < amount) {
      return this.fail('InsufficientBalance', { from, balance, amount });
    }
    this.balances[from] = sub(balance, amount);
    this.balances[to] = add(this.balanceOf(to), amount);
    return this.succeed();
  };

  private succeed = (): boolean | void => {
    if (this.signal === 'silent') {
      return;
    }
    return true;
  };

  private fail = (code: LedgerErrorCode, details: Record<string, unknown>): false => {
    if (this.signal === 'boolean') {
      return false;
    }
    throw new LedgerError(code, undefined, details);
  };
}

export {
  TokenLike,
  TokenRegistry,
  safeTransfer,
  safeTransferFrom,
  SignalMode,
  MockTokenOptions,
  TokenCheckpoint,
  MockToken,
};
