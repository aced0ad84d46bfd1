import { BudgetError, DecryptionError } from "../../framework/errors.js";
import type { PrefixLogger } from "../../framework/logging.js";
import { type Result, ok, err } from "../../framework/result.js";
import type { FieldCipher } from "../../secure/field-cipher.js";
import { parseAmount } from "../amount.js";
import type { BudgetDb } from "../db.js";
import { type Budget, getBudget } from "./budgets.js";
import { listItemTokens } from "./items.js";

// The token did not decrypt, or it did and the plaintext is not an amount
type AmountFailure = DecryptionError | BudgetError;

interface StatementRow {
  id: number;
  description: Result<string, DecryptionError>;
  /** Amount in cents. */
  amount: Result<number, AmountFailure>;
}

interface Statement {
  budget: Budget;
  rows: StatementRow[];
  /** Sum of every row whose amount decrypted and parsed; unbounded, so never rounded. */
  totalCents: bigint;
}

function decryptAmount(cipher: FieldCipher, token: string): Result<number, AmountFailure> {
  const text = cipher.decrypt(token);
  if (!text.ok) return text;
  const cents = parseAmount(text.value);
  if (!cents.ok) {
    // parseAmount's message quotes its input, which here is decrypted plaintext
    return err(new BudgetError("invalid-amount", "Stored amount is not a number"));
  }
  return ok(cents.value);
}

function failureReason(error: AmountFailure): string {
  return error instanceof DecryptionError ? error.reason : error.code;
}

/**
 * Decrypts every item of a budget. A field that fails to decrypt becomes a
 * failed Result on its own row; the rest of the statement is unaffected.
 */
function readStatement(
  db: BudgetDb,
  cipher: FieldCipher,
  budgetId: number,
  logger: PrefixLogger,
): Statement {
  const budget = getBudget(db, budgetId);
  let totalCents = 0n;

  const rows = listItemTokens(db, budgetId).map((item): StatementRow => {
    const description = cipher.decrypt(item.descriptionToken);
    const amount = decryptAmount(cipher, item.amountToken);

    if (!description.ok) {
      logger.warn("Item description unreadable", { item: item.id, reason: description.error.reason });
    }
    if (amount.ok) {
      totalCents += BigInt(amount.value);
    } else {
      logger.warn("Item amount unreadable", { item: item.id, reason: failureReason(amount.error) });
    }
    return { id: item.id, description, amount };
  });

  return { budget, rows, totalCents };
}

export { type StatementRow, type Statement, readStatement };
