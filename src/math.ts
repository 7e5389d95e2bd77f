import { MaxUint256 } from 'ethers';
import { LedgerError } from './errors.js';

/**
 * Checked arithmetic over uint256. Every operand and result
 * must lie in [0, 2^256 - 1], anything else aborts.
 */

function check(x: bigint, op: string): bigint {
  if (x < 0n) {
    throw new LedgerError('ArithmeticUnderflow', op, { value: x });
  }
  if (MaxUint256 < x) {
    throw new LedgerError('ArithmeticOverflow', op, { value: x });
  }
  return x;
}

function add(a: bigint, b: bigint): bigint {
  return check(check(a, 'add') + check(b, 'add'), 'add');
}

function sub(a: bigint, b: bigint): bigint {
  return check(check(a, 'sub') - check(b, 'sub'), 'sub');
}

function mul(a: bigint, b: bigint): bigint {
  return check(check(a, 'mul') * check(b, 'mul'), 'mul');
}

/**
 * Integer division, rounding toward zero.
 */
function div(a: bigint, b: bigint): bigint {
  if (check(b, 'div') === 0n) {
    throw new LedgerError('DivisionByZero', 'div');
  }
  return check(a, 'div') / b;
}

/**
 * @returns true iff x is a valid uint256
 */
function isUint256(x: bigint): boolean {
  return 0n <= x && x <= MaxUint256;
}

export { add, sub, mul, div, isUint256 };
