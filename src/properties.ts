import _ from 'underscore';
import { InvariantSnapshot } from './common.js';
import { LEDGER, MAX_SLASH } from './constants.js';
import { proRata } from './model.js';

/**
 * Snapshots of the model, one per executed action, in order.
 */
class History {
  snapshots: InvariantSnapshot[] = [];

  /**
   * Mark state as observed after an action.
   * @param invariantSnapshot a snapshot owned by the history
   */
  record = (invariantSnapshot: InvariantSnapshot) => {
    this.snapshots.push(invariantSnapshot);
  };
}

function sum(arr: bigint[]): bigint {
  return arr.reduce((sum: bigint, x: bigint) => sum + x, 0n);
}

function points(s: InvariantSnapshot, poolId: string): bigint {
  return s.slashPoints[poolId] ?? 0n;
}

/**
 * Slash points of every pool never decrease and never exceed
 * MAX_SLASH.
 *
 * @param hist A history of snapshots.
 * @returns Is the property satisfied?
 */
function slashPointsMonotoneAndCapped(hist: History): boolean {
  const capped = hist.snapshots.every((s) =>
    _.values(s.slashPoints).every((x) => 0n <= x && x <= MAX_SLASH),
  );
  if (!capped) {
    return false;
  }
  for (let i = 1; i < hist.snapshots.length; i++) {
    const prev = hist.snapshots[i - 1];
    const cur = hist.snapshots[i];
    for (const poolId of _.keys(prev.slashPoints)) {
      if (points(cur, poolId) < points(prev, poolId)) {
        return false;
      }
    }
  }
  return true;
}

/**
 * Every active bond snapshotted a pool that was not fully slashed,
 * and never more points than the pool has now.
 */
function snapshotNeverExceedsLive(hist: History): boolean {
  return hist.snapshots.every((s) =>
    Object.entries(s.live).every(([id, { intent }]) => {
      const bond = s.bonds[id];
      return (
        bond !== undefined &&
        bond.active &&
        bond.slashedAtStart < MAX_SLASH &&
        bond.slashedAtStart <= points(s, intent.poolId)
      );
    }),
  );
}

/**
 * No active bond is ever worth more than it locked, and a bond
 * whose pool was not slashed since it was added is worth exactly
 * what it locked.
 */
function withdrawNeverExceedsAmount(hist: History): boolean {
  return hist.snapshots.every((s) =>
    Object.entries(s.live).every(([id, { intent }]) => {
      const bond = s.bonds[id];
      if (bond === undefined) {
        return false;
      }
      const live = points(s, intent.poolId);
      const w = proRata(intent.amount, live, bond.slashedAtStart);
      if (live === bond.slashedAtStart) {
        return w === intent.amount;
      }
      return w <= intent.amount;
    }),
  );
}

/**
 * The ledger holds exactly the sum of the amounts of the live bonds,
 * and the set of live bonds is exactly the set of stored bonds.
 */
function custodyMatchesLiveBonds(hist: History): boolean {
  return hist.snapshots.every((s) => {
    const stored = _.keys(s.bonds).sort();
    const live = _.keys(s.live).sort();
    if (!_.isEqual(stored, live)) {
      return false;
    }
    const custody = s.balances[LEDGER] ?? 0n;
    return custody === sum(_.values(s.live).map((b) => b.intent.amount));
  });
}

/**
 * Tokens are only ever moved, never created or destroyed. Slashed
 * value goes to the burn address, it does not disappear.
 */
function fundsConserved(hist: History): boolean {
  if (hist.snapshots.length === 0) {
    return true;
  }
  const supply = hist.snapshots[0].totalSupply;
  return hist.snapshots.every(
    (s) => s.totalSupply === supply && sum(_.values(s.balances)) === supply,
  );
}

const PROPERTIES: Record<string, (hist: History) => boolean> = {
  slashPointsMonotoneAndCapped,
  snapshotNeverExceedsLive,
  withdrawNeverExceedsAmount,
  custodyMatchesLiveBonds,
  fundsConserved,
};

/**
 * @returns names of the properties the history violates
 */
function violatedProperties(hist: History): string[] {
  return _.keys(PROPERTIES).filter((name) => !PROPERTIES[name](hist));
}

export {
  History,
  slashPointsMonotoneAndCapped,
  snapshotNeverExceedsLive,
  withdrawNeverExceedsAmount,
  custodyMatchesLiveBonds,
  fundsConserved,
  PROPERTIES,
  violatedProperties,
};
