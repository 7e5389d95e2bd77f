import { Address, CallContext, Revertible } from './common.js';
import { LedgerError } from './errors.js';
import { toAddress } from './identity.js';

/**
 * Stands in for the execution environment around the ledger.
 * Supplies caller identity and the clock, serializes operations
 * and makes each one all-or-nothing across every registered
 * participant.
 */
class Environment {
  // seconds, never decreases
  now: number;
  private participants: Revertible[] = [];
  private executing = false;

  constructor(now: number) {
    this.now = now;
  }

  /**
   * Include p in the checkpoint/restore of every operation.
   */
  register = (p: Revertible) => {
    this.participants.push(p);
  };

  advance = (seconds: number) => {
    this.warpTo(this.now + seconds);
  };

  warpTo = (t: number) => {
    if (t < this.now) {
      throw new LedgerError('ClockWentBackwards', undefined, {
        now: this.now,
        t,
      });
    }
    this.now = t;
  };

  /**
   * Run op as caller at the current time. If op throws, every
   * participant is restored to its state before the call and the
   * error is rethrown unchanged.
   */
  execute = <T>(caller: Address, op: (ctx: CallContext) => T): T => {
    if (this.executing) {
      throw new LedgerError('Reentrancy');
    }
    const checkpoints = this.participants.map((p) => p.checkpoint());
    this.executing = true;
    try {
      return op({ caller: toAddress(caller), now: this.now });
    } catch (e) {
      this.participants.forEach((p, i) => p.restore(checkpoints[i]));
      throw e;
    } finally {
      this.executing = false;
    }
  };
}

export { Environment };
