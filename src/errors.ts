/**
 * Every way a ledger operation can be rejected. A rejected
 * operation leaves no change in state.
 */
type LedgerErrorCode =
  // slash called by anyone but the authority
  | 'NotAuthorized'
  // slash would take a pool past MAX_SLASH
  | 'PointsTooHigh'
  | 'BondAlreadyActive'
  | 'PoolFullySlashed'
  | 'BondNotActive'
  | 'BondNotUnlocked'
  | 'PoolIdMismatch'
  | 'NewBondTooSmall'
  // raised by the transfer primitive
  | 'TransferFailed'
  | 'InsufficientBalance'
  | 'InsufficientAllowance'
  | 'TransferToZeroAddress'
  // raised by checked arithmetic
  | 'ArithmeticOverflow'
  | 'ArithmeticUnderflow'
  | 'DivisionByZero'
  // malformed input
  | 'InvalidIntent'
  | 'InvalidConfig'
  // raised by the execution environment
  | 'ClockWentBackwards'
  | 'Reentrancy';

type ErrorDetails = Record<string, unknown>;

class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly details: ErrorDetails | undefined;

  constructor(code: LedgerErrorCode, message?: string, details?: ErrorDetails) {
    super(message === undefined ? code : `${code}: ${message}`);
    this.name = 'LedgerError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Narrows e to a LedgerError, optionally with the given code.
 */
function isLedgerError(e: unknown, code?: LedgerErrorCode): e is LedgerError {
  return e instanceof LedgerError && (code === undefined || e.code === code);
}

export { LedgerErrorCode, ErrorDetails, LedgerError, isLedgerError };
