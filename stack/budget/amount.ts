import { BudgetError } from "../framework/errors.js";
import { type Result, ok, err } from "../framework/result.js";

const AMOUNT_PATTERN = /^(?<sign>-)?(?<whole>\d+)(?:\.(?<fraction>\d{1,2}))?$/u;

/** Parses a decimal amount such as "3.50" or "-12" into integer cents. */
export function parseAmount(text: string): Result<number, BudgetError> {
  const match = AMOUNT_PATTERN.exec(text.trim());
  if (!match?.groups) {
    return err(
      new BudgetError("invalid-amount", `Invalid amount "${text}" — expected a number like 12.34`),
    );
  }
  const { sign, whole = "0", fraction = "" } = match.groups;
  const cents = Number(whole) * 100 + Number(fraction.padEnd(2, "0"));
  if (!Number.isSafeInteger(cents)) {
    return err(new BudgetError("invalid-amount", `Amount "${text}" is out of range`));
  }
  return ok(sign === undefined || cents === 0 ? cents : -cents);
}

export function formatCents(cents: number | bigint): string {
  const value = BigInt(cents);
  const abs = value < 0n ? -value : value;
  const fraction = (abs % 100n).toString().padStart(2, "0");
  return `${value < 0n ? "-" : ""}${(abs / 100n).toString()}.${fraction}`;
}

/** Canonical stored form of a user-entered amount. Throws BudgetError("invalid-amount"). */
export function normalizeAmount(text: string): string {
  const parsed = parseAmount(text);
  if (!parsed.ok) throw parsed.error;
  return formatCents(parsed.value);
}
