import "dotenv/config";
import { loadConfig } from "../../framework/config.js";
import { toErrorMessage } from "../../framework/errors.js";
import { createPrefixLogger } from "../../framework/logging.js";
import { listBudgets } from "../ops/budgets.js";
import { readStatement } from "../ops/statement.js";
import { requireArg, requireId } from "./args.js";
import { runMainMenu } from "./menu.js";
import { createLinePrompter } from "./prompt.js";
import { renderBudgetList, renderStatement } from "./render.js";
import { withBudgetSession } from "./session.js";

function usage(): never {
  console.log(`Usage: npm run budget -- <command> [args]

Commands:
  menu                  Interactive budget manager (default)
  list                  List budgets
  show <budget-id>      Print a budget's decrypted items and total
  help                  Show this message

Environment:
  BUDGET_DB_PATH        SQLite database (default: secure_budgets.db)
  BUDGET_KEY_PATH       Encryption key file (default: budget_key.key)`);
  process.exit(0);
}

const print = (line: string): void => {
  console.log(line);
};

async function main(): Promise<void> {
  const [command = "menu", ...commandArgs] = process.argv.slice(2);
  if (command === "help" || command === "--help") {
    usage();
  }

  const config = loadConfig();
  const logger = createPrefixLogger("budget", undefined, { color: config.color });

  switch (command) {
    case "menu":
      await withBudgetSession(config, logger, async ({ db, cipher }) => {
        const prompter = createLinePrompter();
        try {
          await runMainMenu({ db, cipher, prompter, print, logger });
        } finally {
          prompter.close();
        }
      });
      break;
    case "list":
      await withBudgetSession(config, logger, ({ db }) => {
        const budgets = listBudgets(db);
        if (budgets.length === 0) {
          print("No budgets found.");
          return;
        }
        for (const line of renderBudgetList(budgets)) print(line);
      });
      break;
    case "show": {
      const rawId = commandArgs[0];
      requireArg(rawId, "show <budget-id>");
      const budgetId = requireId(rawId, "budget-id");
      await withBudgetSession(config, logger, ({ db, cipher }) => {
        const statement = readStatement(db, cipher, budgetId, logger);
        print(`>>> ${statement.budget.name} <<<`);
        for (const line of renderStatement(statement)) print(line);
      });
      break;
    }
    default:
      console.error(`Unknown command: ${command}`);
      process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(`Error: ${toErrorMessage(error)}`);
  process.exit(1);
});
