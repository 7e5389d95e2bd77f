import { AbiCoder, keccak256 } from 'ethers';
import { bondIdOf, samePool, toAddress, toIntent, toPoolId } from '../src/identity.js';
import { LEDGER } from '../src/constants.js';
import { ALICE, BOB, POOL, OTHER_POOL, codeOf } from './helpers.js';

const intent = { amount: 1000n, poolId: POOL, nonce: 0n };

describe('bond identity', () => {
  it('is keccak256 of the abi encoded tuple', () => {
    const expected = keccak256(
      AbiCoder.defaultAbiCoder().encode(
        ['address', 'address', 'uint256', 'bytes32', 'uint256'],
        [LEDGER, ALICE, 1000n, POOL, 0n],
      ),
    );
    expect(bondIdOf(LEDGER, ALICE, intent)).toBe(expected);
  });

  it('is deterministic', () => {
    expect(bondIdOf(LEDGER, ALICE, { ...intent })).toBe(
      bondIdOf(LEDGER, ALICE, intent),
    );
  });

  it('differs in every field of the tuple', () => {
    const id = bondIdOf(LEDGER, ALICE, intent);
    expect(bondIdOf(BOB, ALICE, intent)).not.toBe(id);
    expect(bondIdOf(LEDGER, BOB, intent)).not.toBe(id);
    expect(bondIdOf(LEDGER, ALICE, { ...intent, amount: 1001n })).not.toBe(id);
    expect(bondIdOf(LEDGER, ALICE, { ...intent, poolId: OTHER_POOL })).not.toBe(id);
    expect(bondIdOf(LEDGER, ALICE, { ...intent, nonce: 1n })).not.toBe(id);
  });

  it('ignores the case of addresses and pool ids', () => {
    const upper = `0x${POOL.slice(2).toUpperCase()}`;
    expect(
      bondIdOf(LEDGER, '0x000000000000000000000000000000000000dead', {
        ...intent,
        poolId: upper,
      }),
    ).toBe(
      bondIdOf(LEDGER, '0x000000000000000000000000000000000000dEaD', intent),
    );
  });

  it('rejects malformed input', () => {
    expect(codeOf(() => bondIdOf(LEDGER, '0x1234', intent))).toBe('InvalidIntent');
    expect(
      codeOf(() => bondIdOf(LEDGER, ALICE, { ...intent, poolId: '0xaa' })),
    ).toBe('InvalidIntent');
    expect(
      codeOf(() => bondIdOf(LEDGER, ALICE, { ...intent, amount: -1n })),
    ).toBe('InvalidIntent');
    expect(
      codeOf(() => bondIdOf(LEDGER, ALICE, { ...intent, nonce: 2n ** 256n })),
    ).toBe('InvalidIntent');
  });
});

describe('normalisation', () => {
  it('checksums addresses', () => {
    expect(toAddress('0x000000000000000000000000000000000000dead')).toBe(
      '0x000000000000000000000000000000000000dEaD',
    );
  });

  it('lower cases pool ids', () => {
    expect(toPoolId(`0x${'AB'.repeat(32)}`)).toBe(`0x${'ab'.repeat(32)}`);
    expect(samePool(`0x${'AB'.repeat(32)}`, `0x${'ab'.repeat(32)}`)).toBe(true);
    expect(samePool(POOL, OTHER_POOL)).toBe(false);
  });

  it('returns a normalised copy of an intent', () => {
    const raw = { amount: 5n, poolId: `0x${'CC'.repeat(32)}`, nonce: 7n };
    expect(toIntent(raw)).toEqual({
      amount: 5n,
      poolId: `0x${'cc'.repeat(32)}`,
      nonce: 7n,
    });
    expect(raw.poolId).toBe(`0x${'CC'.repeat(32)}`);
  });
});
