import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

// stack/framework/ → project root (dist/framework/ → project root when built)
const ROOT = resolve(fileURLToPath(new URL(".", import.meta.url)), "../..");

export const DEFAULT_DB_FILE = "secure_budgets.db";
export const DEFAULT_KEY_FILE = "budget_key.key";

const envSchema = z.object({
  BUDGET_DB_PATH: z.string().trim().min(1, "must not be empty").optional(),
  BUDGET_KEY_PATH: z.string().trim().min(1, "must not be empty").optional(),
  NO_COLOR: z.string().optional(),
});

export interface BudgetConfig {
  dbPath: string;
  keyPath: string;
  color: boolean;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  root: string = ROOT,
): BudgetConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new Error(`Invalid configuration — ${problems.join("; ")}`);
  }
  const { BUDGET_DB_PATH, BUDGET_KEY_PATH, NO_COLOR } = parsed.data;
  return {
    dbPath: resolve(root, BUDGET_DB_PATH ?? DEFAULT_DB_FILE),
    keyPath: resolve(root, BUDGET_KEY_PATH ?? DEFAULT_KEY_FILE),
    color: NO_COLOR === undefined,
  };
}
