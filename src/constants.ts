import { MaxUint256, ZeroAddress } from 'ethers';
import { Address, ModelInitState, PoolId } from './common.js';

// Slash points of a fully (100%) slashed pool.
const MAX_SLASH = 10n ** 18n;
// Delay between requesting an unbond and being able to finalize it.
const UNBOND_DELAY = 30 * 24 * 60 * 60;
// Receives the slashed part of a bond on exit. Must not be the zero
// address: some tokens refuse transfers to it.
const BURN_ADDRESS: Address = '0x000000000000000000000000000000000000dEaD';
const ZERO_ADDRESS: Address = ZeroAddress;
const MAX_UINT256 = MaxUint256;

/*
 * Model exploration parameters. The account, pool, amount and nonce
 * spaces are kept small so that bond id collisions, duplicate adds
 * and rejected operations happen often.
 */

const LEDGER: Address = '0x5555555555555555555555555555555555555555';
const TOKEN: Address = '0x7777777777777777777777777777777777777777';
const AUTHORITY: Address = '0x9999999999999999999999999999999999999999';
const ACCOUNTS: Address[] = [
  '0x1111111111111111111111111111111111111111',
  '0x2222222222222222222222222222222222222222',
  '0x3333333333333333333333333333333333333333',
];
const POOLS: PoolId[] = [`0x${'aa'.repeat(32)}`, `0x${'bb'.repeat(32)}`];
const BOND_AMOUNTS = [1000n, 2500n, 4000n];
const NONCES = [0n, 1n];
const SLASH_POINTS = [
  10n ** 16n,
  10n ** 17n,
  2n * 10n ** 17n,
  5n * 10n ** 17n,
  MAX_SLASH,
];
// Candidate clock advances, chosen to land on both sides of the
// unlock instant.
const TIME_STEPS = [1, 60 * 60, UNBOND_DELAY - 1, UNBOND_DELAY, UNBOND_DELAY + 1];
// Initial token balance of the accounts. Large enough to allow many
// bonds per trace, except for the last account, which runs out and
// exercises transfer failures.
const INITIAL_BALANCE = 10n ** 9n;
const SMALL_BALANCE = 5000n;
// Probability that a generated action is issued by the authority
// rather than by a random account.
const AUTHORITY_PROBABILITY = 0.8;
const START_TIME = 1_700_000_000;

const MODEL_INIT_STATE: ModelInitState = {
  t: START_TIME,
  ledger: {
    slashPoints: {},
    bonds: {},
  },
  balances: Object.fromEntries(
    ACCOUNTS.map((a, i): [Address, bigint] => [
      a,
      i === ACCOUNTS.length - 1 ? SMALL_BALANCE : INITIAL_BALANCE,
    ]),
  ),
};

/*
 * Used to track various semantic events that occur during model exploration.
 */
enum Event {
  SLASH = 'slash',
  SLASH_TO_MAX = 'slash_to_max',
  SLASH_NOT_AUTHORIZED = 'slash_not_authorized',
  SLASH_POINTS_TOO_HIGH = 'slash_points_too_high',
  SLASH_WITH_ACTIVE_BONDS = 'slash_with_active_bonds',
  ADD_BOND = 'add_bond',
  ADD_BOND_INTO_SLASHED_POOL = 'add_bond_into_slashed_pool',
  ADD_BOND_REUSED_ID = 'add_bond_reused_id',
  BOND_ALREADY_ACTIVE = 'bond_already_active',
  POOL_FULLY_SLASHED = 'pool_fully_slashed',
  REQUEST_UNBOND = 'request_unbond',
  REQUEST_UNBOND_TWICE = 'request_unbond_twice',
  REQUEST_UNBOND_NOT_ACTIVE = 'request_unbond_not_active',
  UNBOND_NOT_REQUESTED = 'unbond_not_requested',
  UNBOND_BEFORE_UNLOCK = 'unbond_before_unlock',
  UNBOND_WITHOUT_BURN = 'unbond_without_burn',
  UNBOND_WITH_BURN = 'unbond_with_burn',
  UNBOND_FULLY_BURNED = 'unbond_fully_burned',
  REPLACE_BOND = 'replace_bond',
  REPLACE_BOND_WHILE_UNBONDING = 'replace_bond_while_unbonding',
  REPLACE_BOND_WITH_BURN = 'replace_bond_with_burn',
  REPLACE_BOND_NOT_ACTIVE = 'replace_bond_not_active',
  REPLACE_BOND_POOL_MISMATCH = 'replace_bond_pool_mismatch',
  REPLACE_BOND_TOO_SMALL = 'replace_bond_too_small',
  REPLACE_BOND_ALREADY_ACTIVE = 'replace_bond_already_active',
  TRANSFER_FAILED = 'transfer_failed',
}

export {
  MAX_SLASH,
  UNBOND_DELAY,
  BURN_ADDRESS,
  ZERO_ADDRESS,
  MAX_UINT256,
  LEDGER,
  TOKEN,
  AUTHORITY,
  ACCOUNTS,
  POOLS,
  BOND_AMOUNTS,
  NONCES,
  SLASH_POINTS,
  TIME_STEPS,
  INITIAL_BALANCE,
  SMALL_BALANCE,
  AUTHORITY_PROBABILITY,
  START_TIME,
  Event,
  MODEL_INIT_STATE,
};
