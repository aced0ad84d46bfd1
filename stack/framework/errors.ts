export type DecryptionFailure =
  | "malformed-token"
  | "truncated-token"
  | "authentication-failed"
  | "invalid-utf8";

export type BudgetErrorCode =
  | "duplicate-name"
  | "budget-not-found"
  | "item-not-found"
  | "invalid-name"
  | "invalid-amount";

// Key missing-but-unreadable, corrupt or unwritable. Fatal at startup.
export class KeyIOError extends Error {
  constructor(
    public readonly location: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Key store at ${location}: ${reason}`, options);
    this.name = "KeyIOError";
  }
}

// Recoverable, per field. Never carries plaintext.
export class DecryptionError extends Error {
  constructor(
    public readonly reason: DecryptionFailure,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Decryption failed (${reason}): ${detail}`, options);
    this.name = "DecryptionError";
  }
}

export class BudgetError extends Error {
  constructor(
    public readonly code: BudgetErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "BudgetError";
  }
}

export function isBudgetError(error: unknown, code?: BudgetErrorCode): error is BudgetError {
  return error instanceof BudgetError && (code === undefined || error.code === code);
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
