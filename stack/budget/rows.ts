import { z } from "zod";

const budgetRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
});

const itemRowSchema = z.object({
  id: z.number().int(),
  budget_id: z.number().int(),
  description: z.string(),
  amount: z.string(),
});

function parseRow<T>(schema: z.ZodType<T>, row: unknown, table: string): T {
  const parsed = schema.safeParse(row);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new Error(`Unexpected row shape in "${table}" (fields: ${fields})`);
  }
  return parsed.data;
}

function parseRows<T>(schema: z.ZodType<T>, rows: unknown[], table: string): T[] {
  return rows.map((row) => parseRow(schema, row, table));
}

export {
  budgetRowSchema,
  itemRowSchema,
  parseRow,
  parseRows,
};
