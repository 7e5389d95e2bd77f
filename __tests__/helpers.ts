import { Address, CallContext } from '../src/common.js';
import {
  ACCOUNTS,
  AUTHORITY,
  LEDGER,
  MAX_UINT256,
  POOLS,
  START_TIME,
  TOKEN,
} from '../src/constants.js';
import { Environment } from '../src/environment.js';
import { isLedgerError } from '../src/errors.js';
import { Ledger } from '../src/model.js';
import { MockToken, MockTokenOptions, TokenRegistry } from '../src/token.js';

const ALICE = ACCOUNTS[0];
const BOB = ACCOUNTS[1];
const POOL = POOLS[0];
const OTHER_POOL = POOLS[1];
const FUNDS = 1_000_000n;

/**
 * A ledger in an environment, with ALICE and BOB funded and
 * having approved the ledger.
 */
function setup(options?: MockTokenOptions) {
  const env = new Environment(START_TIME);
  const token = new MockToken(options);
  [ALICE, BOB].forEach((a) => {
    token.mint(a, FUNDS);
    token.approve(a, LEDGER, MAX_UINT256);
  });
  const tokens = new TokenRegistry();
  tokens.register(TOKEN, token);
  const ledger = new Ledger(
    { instance: LEDGER, token: TOKEN, authority: AUTHORITY },
    tokens,
  );
  env.register(ledger);
  env.register(token);
  const call = <T>(caller: Address, op: (ctx: CallContext) => T): T =>
    env.execute(caller, op);
  return { env, token, ledger, call };
}

/**
 * @returns the code of the LedgerError f throws, undefined if it
 * does not throw one
 */
function codeOf(f: () => unknown): string | undefined {
  try {
    f();
  } catch (e) {
    if (isLedgerError(e)) {
      return e.code;
    }
    throw e;
  }
  return undefined;
}

export { ALICE, BOB, POOL, OTHER_POOL, FUNDS, setup, codeOf };
