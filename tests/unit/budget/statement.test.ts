import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import { formatCents } from "../../../stack/budget/amount.js";
import { openBudgetDb } from "../../../stack/budget/core.js";
import type { BudgetDb } from "../../../stack/budget/db.js";
import { createBudget } from "../../../stack/budget/ops/budgets.js";
import { addItem, listItemTokens } from "../../../stack/budget/ops/items.js";
import { readStatement } from "../../../stack/budget/ops/statement.js";
import { BudgetError } from "../../../stack/framework/errors.js";
import { FieldCipher } from "../../../stack/secure/field-cipher.js";
import { fileKeyLocation, loadOrCreateSecret } from "../../../stack/secure/keystore.js";
import { KEY_A, KEY_B, openTestDb } from "../../fixtures/budget-db.js";
import { captureLogger, makeTempDir, noopLogger } from "../../fixtures/test-helpers.js";

let dir: string;
let cleanup: () => void;
let db: BudgetDb;

beforeEach(() => {
  ({ dir, cleanup } = makeTempDir("budget-statement-"));
  db = openTestDb(dir);
});

afterEach(() => {
  db.close();
  cleanup();
});

function corruptToken(itemId: number, column: "description" | "amount"): void {
  const row: unknown = db.prepare(`SELECT ${column} AS token FROM items WHERE id = ?`).get(itemId);
  if (typeof row !== "object" || row === null || !("token" in row) || typeof row.token !== "string") {
    throw new Error("token missing");
  }
  const bytes = Buffer.from(row.token, "base64");
  bytes[bytes.length - 1] = (bytes[bytes.length - 1] ?? 0) ^ 0xff;
  db.prepare(`UPDATE items SET ${column} = ? WHERE id = ?`).run(bytes.toString("base64"), itemId);
}

describe("readStatement", () => {
  it("decrypts a budget after the process reopens the same key and database", () => {
    const keyPath = join(dir, "budget_key.key");
    const dbPath = join(dir, "reopen.db");

    const first = openBudgetDb(dbPath);
    const cipher = new FieldCipher(loadOrCreateSecret(fileKeyLocation(keyPath), noopLogger));
    const budgetId = createBudget(first, "Groceries");
    addItem(first, cipher, budgetId, { description: "Milk", amount: "3.50" });
    first.close();

    const reopened = openBudgetDb(dbPath);
    try {
      const reloaded = new FieldCipher(loadOrCreateSecret(fileKeyLocation(keyPath), noopLogger));
      const statement = readStatement(reopened, reloaded, budgetId, noopLogger);

      expect(statement.budget).toEqual({ id: budgetId, name: "Groceries" });
      expect(statement.rows).toHaveLength(1);
      expect(statement.rows[0]?.description).toEqual({ ok: true, value: "Milk" });
      expect(statement.rows[0]?.amount).toEqual({ ok: true, value: 350 });
      expect(statement.totalCents).toBe(350n);
    } finally {
      reopened.close();
    }
  });

  it("marks a corrupted row and leaves the others intact", () => {
    const cipher = new FieldCipher(KEY_A);
    const budgetId = createBudget(db, "Groceries");
    const milk = addItem(db, cipher, budgetId, { description: "Milk", amount: "3.50" });
    const bread = addItem(db, cipher, budgetId, { description: "Bread", amount: "2.25" });
    const eggs = addItem(db, cipher, budgetId, { description: "Eggs", amount: "4.10" });
    corruptToken(bread, "description");
    corruptToken(bread, "amount");

    const { logger, lines } = captureLogger();
    const statement = readStatement(db, cipher, budgetId, logger);

    const [milkRow, breadRow, eggsRow] = statement.rows;
    expect(milkRow).toEqual({
      id: milk,
      description: { ok: true, value: "Milk" },
      amount: { ok: true, value: 350 },
    });
    expect(eggsRow).toEqual({
      id: eggs,
      description: { ok: true, value: "Eggs" },
      amount: { ok: true, value: 410 },
    });
    expect(breadRow?.description.ok).toBe(false);
    expect(breadRow?.amount.ok).toBe(false);
    expect(statement.totalCents).toBe(760n);
    expect(lines).toEqual([
      `⚠ [test] Item description unreadable → item=${bread.toString()}, reason=authentication-failed`,
      `⚠ [test] Item amount unreadable → item=${bread.toString()}, reason=authentication-failed`,
    ]);
  });

  it("excludes a row written under a different key", () => {
    const budgetId = createBudget(db, "Mixed");
    addItem(db, new FieldCipher(KEY_A), budgetId, { description: "ours", amount: "1.00" });
    addItem(db, new FieldCipher(KEY_B), budgetId, { description: "theirs", amount: "9.00" });

    const statement = readStatement(db, new FieldCipher(KEY_A), budgetId, noopLogger);

    expect(statement.rows.map((row) => row.description.ok)).toEqual([true, false]);
    expect(statement.totalCents).toBe(100n);
  });

  it("flags an amount that decrypts but is not a number", () => {
    const cipher = new FieldCipher(KEY_A);
    const budgetId = createBudget(db, "Legacy");
    const id = addItem(db, cipher, budgetId, { description: "old row", amount: "0" });
    db.prepare("UPDATE items SET amount = ? WHERE id = ?").run(cipher.encrypt("twelve"), id);
    addItem(db, cipher, budgetId, { description: "new row", amount: "5" });

    const statement = readStatement(db, cipher, budgetId, noopLogger);
    const amount = statement.rows[0]?.amount;

    expect(amount?.ok).toBe(false);
    if (amount && !amount.ok) {
      expect(amount.error).toBeInstanceOf(BudgetError);
      expect(amount.error.message).toBe("Stored amount is not a number");
    }
    expect(statement.rows[0]?.description).toEqual({ ok: true, value: "old row" });
    expect(statement.totalCents).toBe(500n);
  });

  it("sums amounts exactly in cents", () => {
    const cipher = new FieldCipher(KEY_A);
    const budgetId = createBudget(db, "Cents");
    for (const amount of ["0.10", "0.20", "0.30", "-0.05"]) {
      addItem(db, cipher, budgetId, { description: "x", amount });
    }
    expect(readStatement(db, cipher, budgetId, noopLogger).totalCents).toBe(55n);
  });

  it("keeps the total exact beyond the safe integer range", () => {
    const cipher = new FieldCipher(KEY_A);
    const budgetId = createBudget(db, "Large");
    for (let i = 0; i < 3; i++) {
      addItem(db, cipher, budgetId, { description: "max", amount: "90071992547409.91" });
    }

    const statement = readStatement(db, cipher, budgetId, noopLogger);

    expect(statement.totalCents).toBe(27021597764222973n);
    expect(formatCents(statement.totalCents)).toBe("270215977642229.73");
  });

  it("returns an empty statement for a budget without items", () => {
    const budgetId = createBudget(db, "Empty");
    const statement = readStatement(db, new FieldCipher(KEY_A), budgetId, noopLogger);
    expect(statement.rows).toEqual([]);
    expect(statement.totalCents).toBe(0n);
    expect(listItemTokens(db, budgetId)).toEqual([]);
  });

  it("throws for an unknown budget", () => {
    expect(() => readStatement(db, new FieldCipher(KEY_A), 42, noopLogger)).toThrow(
      "Budget not found: 42",
    );
  });
});
