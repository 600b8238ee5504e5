/**
 * TenureError: the single error class raised by the ledger, the role engine
 * and the vault facade.
 *
 * Every failure a caller can observe carries one `code` from a closed set. All
 * codes are terminal for the call: nothing has been committed when one is thrown.
 */

export type TenureErrorCode =
  | "ZeroAmount"
  | "InvalidLockPeriod"
  | "InvalidIndex"
  | "InvalidAccount"
  | "LockNotExpired"
  | "AlreadyWithdrawn"
  | "TransferFailed";

/**
 * `validation`: bad input, or an index that addresses no record.
 * `state`: the record is not in a state that allows the transition.
 * `external`: the currency rail refused; the call was rolled back.
 */
export type TenureErrorCategory = "validation" | "state" | "external";

const CATEGORY: Record<TenureErrorCode, TenureErrorCategory> = {
  ZeroAmount: "validation",
  InvalidLockPeriod: "validation",
  InvalidIndex: "validation",
  InvalidAccount: "validation",
  LockNotExpired: "state",
  AlreadyWithdrawn: "state",
  TransferFailed: "external",
};

export class TenureError extends Error {
  readonly code: TenureErrorCode;
  readonly category: TenureErrorCategory;

  constructor(code: TenureErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TenureError";
    this.code = code;
    this.category = CATEGORY[code];
    Object.setPrototypeOf(this, TenureError.prototype);
  }

  override toString(): string {
    return `TenureError(${this.code}): ${this.message}`;
  }

  static is(err: unknown, code?: TenureErrorCode): err is TenureError {
    return err instanceof TenureError && (code === undefined || err.code === code);
  }
}
