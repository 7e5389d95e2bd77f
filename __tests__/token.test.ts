import { MAX_UINT256, TOKEN, ZERO_ADDRESS } from '../src/constants.js';
import {
  MockToken,
  TokenRegistry,
  safeTransfer,
  safeTransferFrom,
} from '../src/token.js';
import { ALICE, BOB, codeOf } from './helpers.js';

const SPENDER = '0x4444444444444444444444444444444444444444';

function funded(token: MockToken) {
  token.mint(ALICE, 100n);
  return token;
}

function registry(token: MockToken) {
  const tokens = new TokenRegistry();
  tokens.register(TOKEN, token);
  return tokens;
}

describe('MockToken', () => {
  it('moves balances on transfer', () => {
    const token = funded(new MockToken());
    expect(token.transfer(ALICE, BOB, 30n)).toBe(true);
    expect(token.balanceOf(ALICE)).toBe(70n);
    expect(token.balanceOf(BOB)).toBe(30n);
    expect(token.totalSupply).toBe(100n);
  });

  it('signals by the configured convention', () => {
    const silent = funded(new MockToken({ signal: 'silent' }));
    expect(silent.transfer(ALICE, BOB, 1n)).toBeUndefined();
    expect(silent.balanceOf(BOB)).toBe(1n);

    const boolean = funded(new MockToken({ signal: 'boolean' }));
    expect(boolean.transfer(ALICE, BOB, 101n)).toBe(false);
    expect(boolean.balanceOf(ALICE)).toBe(100n);

    const standard = funded(new MockToken());
    expect(codeOf(() => standard.transfer(ALICE, BOB, 101n))).toBe(
      'InsufficientBalance',
    );
  });

  it('refuses the zero address unless told otherwise', () => {
    const strict = funded(new MockToken());
    expect(codeOf(() => strict.transfer(ALICE, ZERO_ADDRESS, 1n))).toBe(
      'TransferToZeroAddress',
    );
    const lax = funded(new MockToken({ refuseZeroAddress: false }));
    expect(lax.transfer(ALICE, ZERO_ADDRESS, 1n)).toBe(true);
    expect(lax.balanceOf(ZERO_ADDRESS)).toBe(1n);
  });

  it('spends allowances', () => {
    const token = funded(new MockToken());
    token.approve(ALICE, SPENDER, 50n);
    expect(token.transferFrom(SPENDER, ALICE, BOB, 20n)).toBe(true);
    expect(token.allowance(ALICE, SPENDER)).toBe(30n);
    expect(codeOf(() => token.transferFrom(SPENDER, ALICE, BOB, 31n))).toBe(
      'InsufficientAllowance',
    );
  });

  it('never spends an infinite allowance', () => {
    const token = funded(new MockToken());
    token.approve(ALICE, SPENDER, MAX_UINT256);
    token.transferFrom(SPENDER, ALICE, BOB, 20n);
    expect(token.allowance(ALICE, SPENDER)).toBe(MAX_UINT256);
  });

  it('keeps the allowance when a move fails', () => {
    const token = funded(new MockToken({ signal: 'boolean' }));
    token.approve(ALICE, SPENDER, 500n);
    expect(token.transferFrom(SPENDER, ALICE, BOB, 200n)).toBe(false);
    expect(token.allowance(ALICE, SPENDER)).toBe(500n);
  });

  it('lets owners move their own tokens without allowance', () => {
    const token = funded(new MockToken());
    expect(token.transferFrom(ALICE, ALICE, BOB, 10n)).toBe(true);
    expect(token.balanceOf(BOB)).toBe(10n);
  });

  it('restores a checkpoint', () => {
    const token = funded(new MockToken());
    const checkpoint = token.checkpoint();
    token.transfer(ALICE, BOB, 40n);
    token.mint(BOB, 5n);
    token.restore(checkpoint);
    expect(token.balanceOf(ALICE)).toBe(100n);
    expect(token.balanceOf(BOB)).toBe(0n);
    expect(token.totalSupply).toBe(100n);
  });
});

describe('safe transfers', () => {
  it('accept tokens that return nothing', () => {
    const token = funded(new MockToken({ signal: 'silent' }));
    safeTransfer(registry(token), TOKEN, ALICE, BOB, 10n);
    expect(token.balanceOf(BOB)).toBe(10n);
  });

  it('turn a false return into TransferFailed', () => {
    const tokens = registry(funded(new MockToken({ signal: 'boolean' })));
    expect(codeOf(() => safeTransfer(tokens, TOKEN, ALICE, BOB, 101n))).toBe(
      'TransferFailed',
    );
    expect(
      codeOf(() => safeTransferFrom(tokens, TOKEN, SPENDER, ALICE, BOB, 1n)),
    ).toBe('TransferFailed');
  });

  it('propagate errors thrown by the token', () => {
    const tokens = registry(funded(new MockToken()));
    expect(codeOf(() => safeTransfer(tokens, TOKEN, ALICE, BOB, 101n))).toBe(
      'InsufficientBalance',
    );
  });

  it('fail for an unknown token', () => {
    expect(
      codeOf(() => safeTransfer(new TokenRegistry(), TOKEN, ALICE, BOB, 1n)),
    ).toBe('TransferFailed');
  });
});

describe('TokenRegistry', () => {
  it('lists only the tokens that can be rolled back', () => {
    const token = new MockToken();
    const tokens = registry(token);
    tokens.register(SPENDER, {
      balanceOf: () => 0n,
      transfer: () => true,
      transferFrom: () => true,
    });
    expect(tokens.participants()).toEqual([token]);
  });
});
