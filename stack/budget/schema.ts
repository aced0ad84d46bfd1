const SCHEMA = `
  CREATE TABLE IF NOT EXISTS budgets (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE
  ) STRICT;

  CREATE TABLE IF NOT EXISTS items (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    budget_id INTEGER NOT NULL REFERENCES budgets(id) ON DELETE CASCADE,
    description TEXT NOT NULL,
    amount TEXT NOT NULL
  ) STRICT;

  CREATE INDEX IF NOT EXISTS items_budget_id ON items(budget_id);
`;

export { SCHEMA };
