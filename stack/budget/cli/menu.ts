import { isBudgetError } from "../../framework/errors.js";
import type { PrefixLogger } from "../../framework/logging.js";
import type { FieldCipher } from "../../secure/field-cipher.js";
import type { BudgetDb } from "../db.js";
import {
  type Budget,
  createBudget,
  listBudgets,
  renameBudget,
  removeBudget,
} from "../ops/budgets.js";
import { addItem, updateItem, removeItem } from "../ops/items.js";
import { readStatement } from "../ops/statement.js";
import type { Prompter } from "./prompt.js";
import { renderBudgetList, renderStatement } from "./render.js";

interface MenuContext {
  db: BudgetDb;
  cipher: FieldCipher;
  prompter: Prompter;
  print: (line: string) => void;
  logger: PrefixLogger;
}

// "eof" unwinds every loop once input has ended
type MenuExit = "back" | "eof";

interface Command {
  action: string;
  arg: string | undefined;
}

function parseCommand(answer: string): Command | null {
  const [action, arg] = answer.trim().split(/\s+/u);
  if (!action) return null;
  return { action: action.toUpperCase(), arg };
}

function parseId(arg: string): number | null {
  return /^\d+$/u.test(arg) ? Number(arg) : null;
}

// User mistakes (duplicate name, bad amount, …) are reported and the loop carries on
function attempt(ctx: MenuContext, fn: () => void, success: string): void {
  try {
    fn();
    ctx.print(success);
  } catch (error) {
    if (!isBudgetError(error)) throw error;
    ctx.print(`Error: ${error.message}`);
  }
}

async function askItemFields(
  ctx: MenuContext,
  prefix: string,
): Promise<{ description: string; amount: string } | null> {
  const description = await ctx.prompter.ask(`${prefix}Description: `);
  if (description === null) return null;
  const amount = await ctx.prompter.ask(`${prefix}Amount: `);
  if (amount === null) return null;
  return { description, amount };
}

async function manageBudget(ctx: MenuContext, budget: Budget): Promise<MenuExit> {
  for (;;) {
    ctx.print("");
    ctx.print(`>>> Managing: ${budget.name} <<<`);
    const statement = readStatement(ctx.db, ctx.cipher, budget.id, ctx.logger);
    for (const line of renderStatement(statement)) ctx.print(line);

    ctx.print("");
    ctx.print("Actions: [A]dd Item, [E]dit Item ID, [D]elete Item ID, [B]ack");
    const answer = await ctx.prompter.ask("Command: ");
    if (answer === null) return "eof";
    const command = parseCommand(answer);
    if (!command) continue;

    if (command.action === "B") return "back";

    if (command.action === "A") {
      const fields = await askItemFields(ctx, "");
      if (!fields) return "eof";
      attempt(ctx, () => addItem(ctx.db, ctx.cipher, budget.id, fields), "Item added.");
      continue;
    }

    if (command.action !== "E" && command.action !== "D") {
      ctx.print("Unknown action.");
      continue;
    }
    if (command.arg === undefined) {
      ctx.print("Please provide an Item ID.");
      continue;
    }
    const itemId = parseId(command.arg);
    if (itemId === null) {
      ctx.print("Invalid ID format.");
      continue;
    }
    if (!statement.rows.some((row) => row.id === itemId)) {
      ctx.print("Item ID not found in this budget.");
      continue;
    }

    if (command.action === "E") {
      const fields = await askItemFields(ctx, "New ");
      if (!fields) return "eof";
      attempt(
        ctx,
        () => {
          updateItem(ctx.db, ctx.cipher, budget.id, itemId, fields);
        },
        "Item updated.",
      );
    } else {
      attempt(
        ctx,
        () => {
          removeItem(ctx.db, budget.id, itemId);
        },
        "Item deleted.",
      );
    }
  }
}

async function manageBudgets(ctx: MenuContext): Promise<MenuExit> {
  for (;;) {
    const budgets = listBudgets(ctx.db);
    ctx.print("");
    if (budgets.length === 0) {
      ctx.print("No budgets found.");
      return "back";
    }

    ctx.print("--- Available Budgets ---");
    for (const line of renderBudgetList(budgets)) ctx.print(line);
    ctx.print("-------------------------");
    ctx.print("Actions: [O]pen ID, [R]ename ID, [D]elete ID, [B]ack");

    const answer = await ctx.prompter.ask("Command (e.g., 'O 1'): ");
    if (answer === null) return "eof";
    const command = parseCommand(answer);
    if (!command) continue;

    if (command.action === "B") return "back";
    if (!["O", "R", "D"].includes(command.action)) {
      ctx.print("Unknown action.");
      continue;
    }
    if (command.arg === undefined) {
      ctx.print("Please provide an ID (e.g., 'O 5').");
      continue;
    }
    const budgetId = parseId(command.arg);
    if (budgetId === null) {
      ctx.print("Invalid input.");
      continue;
    }
    const budget = budgets.find((candidate) => candidate.id === budgetId);
    if (!budget) {
      ctx.print("Invalid Budget ID.");
      continue;
    }

    if (command.action === "O") {
      if ((await manageBudget(ctx, budget)) === "eof") return "eof";
    } else if (command.action === "R") {
      const newName = await ctx.prompter.ask(`Rename '${budget.name}' to: `);
      if (newName === null) return "eof";
      attempt(
        ctx,
        () => {
          renameBudget(ctx.db, budget.id, newName);
        },
        "Budget renamed.",
      );
    } else {
      const confirm = await ctx.prompter.ask(
        `Are you sure you want to DELETE '${budget.name}' and ALL its encrypted items? (y/n): `,
      );
      if (confirm === null) return "eof";
      if (confirm.trim().toLowerCase() === "y") {
        attempt(
          ctx,
          () => {
            removeBudget(ctx.db, budget.id);
          },
          "Budget deleted.",
        );
      } else {
        ctx.print("Cancelled.");
      }
    }
  }
}

async function runMainMenu(ctx: MenuContext): Promise<void> {
  for (;;) {
    ctx.print("");
    ctx.print("=== Encrypted Budget Manager ===");
    ctx.print("1. Create New Budget");
    ctx.print("2. Manage Existing Budgets (Open/Rename/Delete)");
    ctx.print("3. Exit");

    const choice = await ctx.prompter.ask("Select option: ");
    if (choice === null || choice.trim() === "3") break;

    if (choice.trim() === "1") {
      const name = await ctx.prompter.ask("Enter unique budget name: ");
      if (name === null) break;
      attempt(
        ctx,
        () => {
          createBudget(ctx.db, name);
        },
        `Budget '${name.trim()}' created.`,
      );
    } else if (choice.trim() === "2") {
      if ((await manageBudgets(ctx)) === "eof") break;
    } else {
      ctx.print("Unknown option.");
    }
  }
  ctx.print("Goodbye.");
}

export { type MenuContext, runMainMenu };
