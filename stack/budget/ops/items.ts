import { BudgetError } from "../../framework/errors.js";
import type { FieldCipher } from "../../secure/field-cipher.js";
import { normalizeAmount } from "../amount.js";
import { type BudgetDb, withSavepoint } from "../db.js";
import { itemRowSchema, parseRows } from "../rows.js";
import { getBudget } from "./budgets.js";

interface ItemFields {
  description: string;
  amount: string;
}

/** An item as persisted: both fields are opaque tokens. */
interface StoredItem {
  id: number;
  budgetId: number;
  descriptionToken: string;
  amountToken: string;
}

function encryptFields(cipher: FieldCipher, fields: ItemFields): [string, string] {
  const amount = normalizeAmount(fields.amount);
  return [cipher.encrypt(fields.description), cipher.encrypt(amount)];
}

function requireOwnedItem(db: BudgetDb, budgetId: number, itemId: number): void {
  const row = db.prepare("SELECT 1 FROM items WHERE id = ? AND budget_id = ?").get(itemId, budgetId);
  if (!row) {
    throw new BudgetError(
      "item-not-found",
      `Item ${itemId.toString()} not found in budget ${budgetId.toString()}`,
    );
  }
}

function addItem(db: BudgetDb, cipher: FieldCipher, budgetId: number, fields: ItemFields): number {
  const [description, amount] = encryptFields(cipher, fields);
  return withSavepoint(db, "add_item", () => {
    getBudget(db, budgetId);
    const result = db
      .prepare("INSERT INTO items (budget_id, description, amount) VALUES (?, ?, ?)")
      .run(budgetId, description, amount);
    return Number(result.lastInsertRowid);
  });
}

function listItemTokens(db: BudgetDb, budgetId: number): StoredItem[] {
  const rows = db
    .prepare("SELECT id, budget_id, description, amount FROM items WHERE budget_id = ? ORDER BY id")
    .all(budgetId);
  return parseRows(itemRowSchema, rows, "items").map((row) => ({
    id: row.id,
    budgetId: row.budget_id,
    descriptionToken: row.description,
    amountToken: row.amount,
  }));
}

function updateItem(
  db: BudgetDb,
  cipher: FieldCipher,
  budgetId: number,
  itemId: number,
  fields: ItemFields,
): void {
  const [description, amount] = encryptFields(cipher, fields);
  withSavepoint(db, "update_item", () => {
    requireOwnedItem(db, budgetId, itemId);
    db.prepare("UPDATE items SET description = ?, amount = ? WHERE id = ?").run(
      description,
      amount,
      itemId,
    );
  });
}

function removeItem(db: BudgetDb, budgetId: number, itemId: number): void {
  const result = db
    .prepare("DELETE FROM items WHERE id = ? AND budget_id = ?")
    .run(itemId, budgetId);
  if (result.changes === 0) {
    throw new BudgetError(
      "item-not-found",
      `Item ${itemId.toString()} not found in budget ${budgetId.toString()}`,
    );
  }
}

export {
  type ItemFields,
  type StoredItem,
  addItem,
  listItemTokens,
  updateItem,
  removeItem,
};
