import { AbiCoder, getAddress, isAddress, isHexString, keccak256 } from 'ethers';
import { Address, BondId, BondIntent, PoolId } from './common.js';
import { LedgerError } from './errors.js';
import { isUint256 } from './math.js';

const BOND_ID_TYPES = ['address', 'address', 'uint256', 'bytes32', 'uint256'];

/**
 * @param a candidate address
 * @returns a in checksum form
 * @throws InvalidIntent if a is not a 20 byte hex address
 */
function toAddress(a: string): Address {
  if (!isAddress(a)) {
    throw new LedgerError('InvalidIntent', 'malformed address', { address: a });
  }
  return getAddress(a);
}

/**
 * Pool ids are uninterpreted, so the only normalisation is case.
 */
function toPoolId(p: string): PoolId {
  if (!isHexString(p, 32)) {
    throw new LedgerError('InvalidIntent', 'pool id is not 32 bytes', {
      poolId: p,
    });
  }
  return p.toLowerCase();
}

/**
 * Validates an intent and returns a normalised copy.
 */
function toIntent(intent: BondIntent): BondIntent {
  if (!isUint256(intent.amount)) {
    throw new LedgerError('InvalidIntent', 'amount out of range', {
      amount: intent.amount,
    });
  }
  if (!isUint256(intent.nonce)) {
    throw new LedgerError('InvalidIntent', 'nonce out of range', {
      nonce: intent.nonce,
    });
  }
  return {
    amount: intent.amount,
    poolId: toPoolId(intent.poolId),
    nonce: intent.nonce,
  };
}

/**
 * Derives the identifier of a bond.
 *
 * The id is keccak256 over the ABI encoding of
 * (instance, owner, amount, poolId, nonce), so the same owner
 * submitting the same intent to the same ledger always addresses
 * the same bond, and two ledgers never share ids.
 *
 * @param instance identity of the ledger
 * @param owner account owning the bond
 * @param intent the bond intent
 */
function bondIdOf(instance: Address, owner: Address, intent: BondIntent): BondId {
  const i = toIntent(intent);
  const encoded = AbiCoder.defaultAbiCoder().encode(BOND_ID_TYPES, [
    toAddress(instance),
    toAddress(owner),
    i.amount,
    i.poolId,
    i.nonce,
  ]);
  return keccak256(encoded);
}

function samePool(a: PoolId, b: PoolId): boolean {
  return toPoolId(a) === toPoolId(b);
}

export { toAddress, toPoolId, toIntent, bondIdOf, samePool };
