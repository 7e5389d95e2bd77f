/**
 * 20 byte account address, 0x-prefixed, in checksum form.
 */
type Address = string;

/**
 * 32 byte opaque pool identifier, 0x-prefixed hex.
 * The ledger only ever compares pool ids for equality.
 */
type PoolId = string;

/**
 * 32 byte bond identifier, see identity.ts.
 */
type BondId = string;

/**
 * Caller supplied description of a bond. Never stored as is,
 * it is hashed together with the owner into a BondId.
 */
interface BondIntent {
  amount: bigint;
  poolId: PoolId;
  nonce: bigint;
}

/**
 * Per bond state, keyed by BondId.
 */
interface BondState {
  active: boolean;
  // slash points of the pool at the time the bond was added
  slashedAtStart: bigint;
  // unix seconds, 0 if no unbonding was requested
  willUnlock: number;
}

/**
 * Immutable ledger configuration, fixed at construction.
 */
interface LedgerConfig {
  // identity of this ledger instance, mixed into every BondId
  // and used as the custody account for bonded tokens
  instance: Address;
  // token custodied by the ledger
  token: Address;
  // sole account allowed to slash
  authority: Address;
}

/**
 * Mutable ledger tables. Plain records so that a deep clone
 * is a full checkpoint.
 */
interface LedgerState {
  slashPoints: Record<PoolId, bigint>;
  bonds: Record<BondId, BondState>;
}

/**
 * Caller identity and authoritative time of one operation,
 * supplied by the environment.
 */
interface CallContext {
  caller: Address;
  now: number;
}

type SlashApplied = {
  kind: 'SlashApplied';
  poolId: PoolId;
  newTotal: bigint;
  time: number;
};

type BondAdded = {
  kind: 'BondAdded';
  owner: Address;
  amount: bigint;
  poolId: PoolId;
  nonce: bigint;
  slashedAtStart: bigint;
  time: number;
};

type UnbondRequested = {
  kind: 'UnbondRequested';
  owner: Address;
  bondId: BondId;
  willUnlock: number;
  time: number;
};

type Unbonded = {
  kind: 'Unbonded';
  owner: Address;
  bondId: BondId;
  payout: bigint;
  burned: bigint;
  time: number;
};

/**
 * Append-only notification log entries, consumed off-chain.
 */
type Notification = SlashApplied | BondAdded | UnbondRequested | Unbonded;

/**
 * Result of settling a bond.
 */
interface Settlement {
  bondId: BondId;
  payout: bigint;
  burned: bigint;
}

/**
 * Participant in an atomic operation. The environment takes a
 * checkpoint before each operation and restores it on failure.
 */
interface Revertible<T = unknown> {
  checkpoint(): T;
  restore(checkpoint: T): void;
}

type Slash = {
  kind: 'Slash';
  caller: Address;
  poolId: PoolId;
  points: bigint;
};

type AddBond = {
  kind: 'AddBond';
  caller: Address;
  intent: BondIntent;
};

type RequestUnbond = {
  kind: 'RequestUnbond';
  caller: Address;
  intent: BondIntent;
};

type Unbond = {
  kind: 'Unbond';
  caller: Address;
  intent: BondIntent;
};

type ReplaceBond = {
  kind: 'ReplaceBond';
  caller: Address;
  oldIntent: BondIntent;
  newIntent: BondIntent;
};

type AdvanceTime = {
  kind: 'AdvanceTime';
  seconds: number;
};

type Action =
  | Slash
  | AddBond
  | RequestUnbond
  | Unbond
  | ReplaceBond
  | AdvanceTime;

/**
 * What happened when an action was executed against the model.
 * Either the operation committed, or it was rejected with an
 * error code and left no trace in state.
 */
type Consequence =
  | { ok: true; t: number; result?: unknown }
  | { ok: false; t: number; error: string };

interface TraceAction {
  ix: number;
  action: Action;
  consequence: Consequence;
}

/**
 * A bond the trace generator knows to be live, with the
 * information needed to address it again.
 */
interface LiveBond {
  owner: Address;
  intent: BondIntent;
}

/**
 * Snapshot of everything the properties need, taken after
 * every action.
 */
type InvariantSnapshot = {
  t: number;
  slashPoints: Record<PoolId, bigint>;
  bonds: Record<BondId, BondState>;
  live: Record<BondId, LiveBond>;
  balances: Record<Address, bigint>;
  totalSupply: bigint;
};

/**
 * See model.ts for field docstrings
 */
type ModelInitState = {
  t: number;
  ledger: LedgerState;
  balances: Record<Address, bigint>;
};

export {
  Address,
  PoolId,
  BondId,
  BondIntent,
  BondState,
  LedgerConfig,
  LedgerState,
  CallContext,
  SlashApplied,
  BondAdded,
  UnbondRequested,
  Unbonded,
  Notification,
  Settlement,
  Revertible,
  Slash,
  AddBond,
  RequestUnbond,
  Unbond,
  ReplaceBond,
  AdvanceTime,
  Action,
  Consequence,
  TraceAction,
  LiveBond,
  InvariantSnapshot,
  ModelInitState,
};
