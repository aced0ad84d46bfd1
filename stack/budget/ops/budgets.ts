import { BudgetError } from "../../framework/errors.js";
import { type BudgetDb, isUniqueViolation } from "../db.js";
import { budgetRowSchema, parseRow, parseRows } from "../rows.js";

interface Budget {
  id: number;
  name: string;
}

function requireName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new BudgetError("invalid-name", "Budget name must not be empty");
  }
  return trimmed;
}

function duplicateName(name: string, cause?: unknown): BudgetError {
  return new BudgetError("duplicate-name", `Budget already exists: "${name}"`, { cause });
}

function createBudget(db: BudgetDb, name: string): number {
  const budgetName = requireName(name);
  const existing = db.prepare("SELECT 1 FROM budgets WHERE name = ?").get(budgetName);
  if (existing) throw duplicateName(budgetName);

  try {
    const result = db.prepare("INSERT INTO budgets (name) VALUES (?)").run(budgetName);
    return Number(result.lastInsertRowid);
  } catch (cause) {
    if (isUniqueViolation(cause)) throw duplicateName(budgetName, cause);
    throw cause;
  }
}

function listBudgets(db: BudgetDb): Budget[] {
  const rows = db.prepare("SELECT id, name FROM budgets ORDER BY id").all();
  return parseRows(budgetRowSchema, rows, "budgets");
}

function getBudget(db: BudgetDb, id: number): Budget {
  const row = db.prepare("SELECT id, name FROM budgets WHERE id = ?").get(id);
  if (!row) throw new BudgetError("budget-not-found", `Budget not found: ${id.toString()}`);
  return parseRow(budgetRowSchema, row, "budgets");
}

function renameBudget(db: BudgetDb, id: number, newName: string): void {
  const budgetName = requireName(newName);
  getBudget(db, id);

  const conflict = db
    .prepare("SELECT 1 FROM budgets WHERE name = ? AND id != ?")
    .get(budgetName, id);
  if (conflict) throw duplicateName(budgetName);

  try {
    db.prepare("UPDATE budgets SET name = ? WHERE id = ?").run(budgetName, id);
  } catch (cause) {
    if (isUniqueViolation(cause)) throw duplicateName(budgetName, cause);
    throw cause;
  }
}

// Items go with it via ON DELETE CASCADE
function removeBudget(db: BudgetDb, id: number): void {
  const result = db.prepare("DELETE FROM budgets WHERE id = ?").run(id);
  if (result.changes === 0) {
    throw new BudgetError("budget-not-found", `Budget not found: ${id.toString()}`);
  }
}

export { type Budget, createBudget, listBudgets, getBudget, renameBudget, removeBudget };
