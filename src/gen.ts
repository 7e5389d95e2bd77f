import * as path from 'path';
import _ from 'underscore';
import timeSpan from 'time-span';
import cloneDeep from 'clone-deep';
import {
  Action,
  Address,
  BondId,
  BondIntent,
  BondState,
  Consequence,
  InvariantSnapshot,
  LiveBond,
  ModelInitState,
  TraceAction,
} from './common.js';
import {
  ACCOUNTS,
  AUTHORITY,
  AUTHORITY_PROBABILITY,
  BOND_AMOUNTS,
  Event,
  LEDGER,
  MAX_SLASH,
  MAX_UINT256,
  MODEL_INIT_STATE,
  NONCES,
  POOLS,
  SLASH_POINTS,
  TIME_STEPS,
  TOKEN,
} from './constants.js';
import { Environment } from './environment.js';
import { LedgerErrorCode, isLedgerError } from './errors.js';
import { toAddress, toIntent } from './identity.js';
import { Ledger } from './model.js';
import { History, violatedProperties } from './properties.js';
import { MockToken, TokenRegistry } from './token.js';
import { dumpTrace, forceMakeEmptyDir, logEventData, readTraces } from './traceUtil.js';

// Number of actions to execute against each model instance
const NUM_ACTIONS = 200;
// Probability that an unbond or replace addresses a bond known to be live
const LIVE_TARGET_PROBABILITY = 0.8;
// Probability that a replacement stays in the pool of the old bond
const SAME_POOL_PROBABILITY = 0.9;

const KINDS: Action['kind'][] = [
  'Slash',
  'AddBond',
  'RequestUnbond',
  'Unbond',
  'ReplaceBond',
  'AdvanceTime',
];

function pick<T>(xs: readonly T[]): T {
  return xs[_.random(0, xs.length - 1)];
}

/**
 * A ledger together with its environment and token, plus the
 * bookkeeping the properties need.
 */
class World {
  env: Environment;
  token: MockToken;
  ledger: Ledger;
  // bonds known to be active
  live: Record<BondId, LiveBond> = {};
  // every id a bond was ever added at
  used = new Set<BondId>();
  hist: History;
  events: Event[];

  constructor(hist: History, events: Event[], state: ModelInitState) {
    this.hist = hist;
    this.events = events;
    this.env = new Environment(state.t);
    this.token = new MockToken();
    Object.entries(state.balances).forEach(([account, amount]) => {
      this.token.mint(account, amount);
      this.token.approve(account, LEDGER, MAX_UINT256);
    });
    const tokens = new TokenRegistry();
    tokens.register(TOKEN, this.token);
    this.ledger = new Ledger(
      { instance: LEDGER, token: TOKEN, authority: AUTHORITY },
      tokens,
      state.ledger,
    );
    this.env.register(this.ledger);
    this.env.register(this.token);
    this.hist.record(this.invariantSnapshot());
  }

  invariantSnapshot = (): InvariantSnapshot => {
    return cloneDeep({
      t: this.env.now,
      slashPoints: this.ledger.state.slashPoints,
      bonds: this.ledger.state.bonds,
      live: this.live,
      balances: this.token.balances,
      totalSupply: this.token.totalSupply,
    });
  };

  track = (id: BondId, owner: Address, intent: BondIntent) => {
    if (this.used.has(id)) {
      this.events.push(Event.ADD_BOND_REUSED_ID);
    }
    this.used.add(id);
    this.live[id] = { owner: toAddress(owner), intent: toIntent(intent) };
  };

  untrack = (id: BondId) => {
    delete this.live[id];
  };
}

class ActionGenerator {
  world;

  constructor(world: World) {
    this.world = world;
  }

  intent = (): BondIntent => {
    return {
      amount: pick(BOND_AMOUNTS),
      poolId: pick(POOLS),
      nonce: pick(NONCES),
    };
  };

  /**
   * Mostly a live bond, so that the exit paths are exercised,
   * sometimes an arbitrary one.
   */
  target = (): LiveBond => {
    const live = _.values(this.world.live);
    if (0 < live.length && Math.random() < LIVE_TARGET_PROBABILITY) {
      return pick(live);
    }
    return { owner: pick(ACCOUNTS), intent: this.intent() };
  };

  create = (): Action => {
    const kind = pick(KINDS);
    switch (kind) {
      case 'Slash':
        return {
          kind,
          caller:
            Math.random() < AUTHORITY_PROBABILITY ? AUTHORITY : pick(ACCOUNTS),
          poolId: pick(POOLS),
          points: pick(SLASH_POINTS),
        };
      case 'AddBond':
        return { kind, caller: pick(ACCOUNTS), intent: this.intent() };
      case 'RequestUnbond':
      case 'Unbond': {
        const { owner, intent } = this.target();
        return { kind, caller: owner, intent };
      }
      case 'ReplaceBond': {
        const { owner, intent } = this.target();
        const next = this.intent();
        return {
          kind,
          caller: owner,
          oldIntent: intent,
          newIntent:
            Math.random() < SAME_POOL_PROBABILITY
              ? { ...next, poolId: intent.poolId }
              : next,
        };
      }
      case 'AdvanceTime':
        return { kind, seconds: pick(TIME_STEPS) };
    }
  };

  /**
   * Prevent generating traces which spend most of their actions
   * against fully slashed pools.
   * @param a action
   */
  valid = (a: Action): boolean => {
    if (a.kind === 'Slash') {
      return POOLS.some((p) => this.world.ledger.getSlashPoints(p) < MAX_SLASH);
    }
    return true;
  };

  /**
   * @returns A valid model action.
   */
  get = (): Action => {
    /* eslint no-constant-condition: 1*/
    while (true) {
      // Ok because some action is always valid
      const a = this.create();
      if (this.valid(a)) {
        return a;
      }
    }
  };
}

/**
 * Semantic events for an action the ledger rejected.
 * @param a the rejected action
 * @param code the rejection
 * @param existing the addressed bond before the action, if any
 */
function rejectionEvents(
  a: Action,
  code: LedgerErrorCode,
  existing: BondState | undefined,
): Event[] {
  switch (code) {
    case 'NotAuthorized':
      return [Event.SLASH_NOT_AUTHORIZED];
    case 'PointsTooHigh':
      return [Event.SLASH_POINTS_TOO_HIGH];
    case 'BondAlreadyActive':
      return [
        a.kind === 'ReplaceBond'
          ? Event.REPLACE_BOND_ALREADY_ACTIVE
          : Event.BOND_ALREADY_ACTIVE,
      ];
    case 'PoolFullySlashed':
      return [Event.POOL_FULLY_SLASHED];
    case 'BondNotActive':
      if (a.kind === 'ReplaceBond') {
        return [Event.REPLACE_BOND_NOT_ACTIVE];
      }
      return [
        existing !== undefined && existing.willUnlock !== 0
          ? Event.REQUEST_UNBOND_TWICE
          : Event.REQUEST_UNBOND_NOT_ACTIVE,
      ];
    case 'BondNotUnlocked':
      return [
        existing !== undefined && existing.willUnlock !== 0
          ? Event.UNBOND_BEFORE_UNLOCK
          : Event.UNBOND_NOT_REQUESTED,
      ];
    case 'PoolIdMismatch':
      return [Event.REPLACE_BOND_POOL_MISMATCH];
    case 'NewBondTooSmall':
      return [Event.REPLACE_BOND_TOO_SMALL];
    case 'TransferFailed':
    case 'InsufficientBalance':
    case 'InsufficientAllowance':
    case 'TransferToZeroAddress':
      return [Event.TRANSFER_FAILED];
    default:
      return [];
  }
}

/**
 * Executes a ledger operation through the environment, updating the
 * tracked live bonds and recording semantic events on success.
 * @returns the operation's return value
 */
function execute(world: World, a: Exclude<Action, { kind: 'AdvanceTime' }>): unknown {
  const { env, ledger, events } = world;
  switch (a.kind) {
    case 'Slash': {
      const total = env.execute(a.caller, (ctx) =>
        ledger.slash(ctx, a.poolId, a.points),
      );
      events.push(Event.SLASH);
      if (total === MAX_SLASH) {
        events.push(Event.SLASH_TO_MAX);
      }
      const p = a.poolId.toLowerCase();
      if (_.values(world.live).some((b) => b.intent.poolId === p)) {
        events.push(Event.SLASH_WITH_ACTIVE_BONDS);
      }
      return total;
    }
    case 'AddBond': {
      const id = env.execute(a.caller, (ctx) => ledger.addBond(ctx, a.intent));
      events.push(Event.ADD_BOND);
      if (0n < ledger.getSlashPoints(a.intent.poolId)) {
        events.push(Event.ADD_BOND_INTO_SLASHED_POOL);
      }
      world.track(id, a.caller, a.intent);
      return id;
    }
    case 'RequestUnbond': {
      const willUnlock = env.execute(a.caller, (ctx) =>
        ledger.requestUnbond(ctx, a.intent),
      );
      events.push(Event.REQUEST_UNBOND);
      return willUnlock;
    }
    case 'Unbond': {
      const settled = env.execute(a.caller, (ctx) => ledger.unbond(ctx, a.intent));
      if (settled.burned === 0n) {
        events.push(Event.UNBOND_WITHOUT_BURN);
      } else if (settled.payout === 0n) {
        events.push(Event.UNBOND_FULLY_BURNED);
      } else {
        events.push(Event.UNBOND_WITH_BURN);
      }
      world.untrack(settled.bondId);
      return settled;
    }
    case 'ReplaceBond': {
      const pending = ledger.getBond(a.caller, a.oldIntent)?.willUnlock ?? 0;
      const replaced = env.execute(a.caller, (ctx) =>
        ledger.replaceBond(ctx, a.oldIntent, a.newIntent),
      );
      events.push(Event.REPLACE_BOND);
      if (pending !== 0) {
        events.push(Event.REPLACE_BOND_WHILE_UNBONDING);
      }
      if (0n < replaced.settled.burned) {
        events.push(Event.REPLACE_BOND_WITH_BURN);
      }
      world.untrack(replaced.settled.bondId);
      world.track(replaced.bondId, a.caller, a.newIntent);
      return replaced;
    }
  }
}

/**
 * Executes an action against the model, thereby updating the model state.
 * Rejections by the ledger are part of the model's behavior and are
 * recorded in the consequence; any other error is a bug and propagates.
 * @param world The model instance
 * @param action The action to be executed against the model
 */
function doAction(world: World, action: Action): Consequence {
  if (action.kind === 'AdvanceTime') {
    world.env.advance(action.seconds);
    return { ok: true, t: world.env.now };
  }
  const addressed =
    action.kind === 'ReplaceBond'
      ? action.oldIntent
      : action.kind === 'Slash'
        ? undefined
        : action.intent;
  const existing =
    addressed === undefined
      ? undefined
      : world.ledger.getBond(action.caller, addressed);
  try {
    const result = execute(world, action);
    return { ok: true, t: world.env.now, result };
  } catch (e) {
    if (!isLedgerError(e)) {
      throw e;
    }
    world.events.push(...rejectionEvents(action, e.code, existing));
    return { ok: false, t: world.env.now, error: e.code };
  }
}

interface GenOptions {
  // Duration to generate traces.
  seconds: number;
  // If true, will check properties and only write trace if a
  // property is violated.
  checkProperties: boolean;
  // Directory to output traces in json format
  dir?: string;
  numActions?: number;
}

/**
 * Generates traces by repeatedly creating new model instances
 * and executing randomly generated actions against them.
 * The trace consists of the actions taken and their consequences,
 * together with the semantic events that occurred.
 * @returns every event emitted during generation
 */
function gen({
  seconds,
  checkProperties,
  dir = 'traces/',
  numActions = NUM_ACTIONS,
}: GenOptions): Event[] {
  // Compute millis run time
  const runTimeMillis = seconds * 1000;
  let elapsedMillis = 0;
  forceMakeEmptyDir(dir);
  let i = 0;
  // Track the model events that occur during the generation process
  // this data is used to check that all events are emitted by some
  // trace.
  const allEvents: Event[] = [];
  while (elapsedMillis < runTimeMillis) {
    i += 1;
    const end = timeSpan();
    ////////////////////////
    const hist = new History();
    // Store all events emitted during trace execution
    const events: Event[] = [];
    const world = new World(hist, events, cloneDeep(MODEL_INIT_STATE));
    const actionGenerator = new ActionGenerator(world);
    const actions: TraceAction[] = [];
    for (let j = 0; j < numActions; j++) {
      const a = actionGenerator.get();
      const consequence = doAction(world, a);
      actions.push({
        ix: j,
        // Store the action taken
        action: a,
        // Store the consequence of the action for model comparison
        consequence: cloneDeep(consequence),
      });
      hist.record(world.invariantSnapshot());
      if (checkProperties) {
        // Checking properties is flagged because it is computationally
        // expensive.
        const violated = violatedProperties(hist);
        if (0 < violated.length) {
          const fn = path.join(dir, `trace_${i}.json`);
          dumpTrace(fn, actions, events);
          throw new Error(
            `${violated.join(', ')} property failure, trace written to ${fn}.`,
          );
        }
      }
    }
    if (!checkProperties) {
      // Write the trace to file, along with metadata.
      dumpTrace(path.join(dir, `trace_${i}.json`), actions, events);
    }
    // Accumulate all events
    allEvents.push(...events);
    ////////////////////////
    elapsedMillis += end.rounded();
    // Log progress stats
    if (i % 100 === 0) {
      console.log(
        `done ${i}, actions per second ${
          (i * numActions) / (elapsedMillis / 1000)
        }`,
      );
    }
  }
  logEventData(allEvents);
  return allEvents;
}

/**
 * Replays a list of actions against a new model instance.
 * The model is deterministic, thus a fixed list of actions always
 * results in the same behavior and model states. Any action whose
 * consequence differs from the recorded one is logged.
 * @param actions
 * @returns the actions with their replayed consequences
 */
function replay(actions: TraceAction[]): TraceAction[] {
  const hist = new History();
  const events: Event[] = [];
  const world = new World(hist, events, cloneDeep(MODEL_INIT_STATE));
  return actions.map((a, ix) => {
    const consequence = doAction(world, a.action);
    hist.record(world.invariantSnapshot());
    if (!_.isEqual(consequence, a.consequence)) {
      console.log(`diverged at action ${ix}`, a.action, consequence);
    }
    return { ix, action: a.action, consequence };
  });
}

/**
 * @param fn filename of the file containing the json traces
 * @param ix the index of the trace in the json
 * @param numActions The number of actions to replay from the trace.
 */
function replayFile(fn: string, ix: number, numActions: number): TraceAction[] {
  const trace = readTraces(fn)[ix];
  if (trace === undefined) {
    throw new Error(`${fn} has no trace at index ${ix}`);
  }
  return replay(trace.actions.slice(0, numActions));
}

export {
  World,
  ActionGenerator,
  rejectionEvents,
  doAction,
  GenOptions,
  gen,
  replay,
  replayFile,
};
