import { formatCents } from "../amount.js";
import type { Budget } from "../ops/budgets.js";
import type { Statement } from "../ops/statement.js";

const DESCRIPTION_ERROR = "[Decryption Error]";
const AMOUNT_ERROR = "Error";
const DESCRIPTION_WIDTH = 30;
const RULE = "-".repeat(50);

// Decrypted text is arbitrary: keep each row on one line and inside its column
function fitDescription(text: string): string {
  const flat = text.replace(/\p{Cc}/gu, " ");
  return flat.length > DESCRIPTION_WIDTH ? `${flat.slice(0, DESCRIPTION_WIDTH - 1)}…` : flat;
}

function tableLine(id: string, description: string, amount: string): string {
  return `${id.padEnd(4)} | ${description.padEnd(DESCRIPTION_WIDTH)} | ${amount.padStart(10)}`;
}

function renderStatement(statement: Statement): string[] {
  const lines = [tableLine("ID", "Description", "Amount"), RULE];
  for (const row of statement.rows) {
    const description = row.description.ok
      ? fitDescription(row.description.value)
      : DESCRIPTION_ERROR;
    const amount = row.amount.ok ? formatCents(row.amount.value) : AMOUNT_ERROR;
    lines.push(tableLine(row.id.toString(), description, amount));
  }
  lines.push(RULE, tableLine("", "TOTAL", formatCents(statement.totalCents)));
  return lines;
}

function renderBudgetList(budgets: Budget[]): string[] {
  return budgets.map((budget) => `ID: ${budget.id.toString()} | Name: ${budget.name}`);
}

export { DESCRIPTION_ERROR, AMOUNT_ERROR, renderStatement, renderBudgetList };
