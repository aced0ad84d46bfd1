import type Database from "better-sqlite3";

type BudgetDb = Database.Database;

/** Fn must be synchronous — async callbacks will corrupt the savepoint boundary. */
function withSavepoint<T>(db: BudgetDb, name: string, fn: () => T): T {
  if (!/^\w+$/u.test(name)) {
    throw new Error(`Invalid savepoint name: "${name}"`);
  }
  db.exec(`SAVEPOINT ${name}`);
  try {
    const result = fn();
    if (result instanceof Promise) {
      throw new Error(`Savepoint "${name}" callback must be synchronous — got a Promise`);
    }
    db.exec(`RELEASE ${name}`);
    return result;
  } catch (error) {
    db.exec(`ROLLBACK TO ${name}`);
    db.exec(`RELEASE ${name}`);
    throw error;
  }
}

function errorCode(cause: unknown): string | undefined {
  return cause !== null && typeof cause === "object" && "code" in cause
    ? String(cause.code)
    : undefined;
}

function isUniqueViolation(cause: unknown): boolean {
  return errorCode(cause) === "SQLITE_CONSTRAINT_UNIQUE";
}

export { type BudgetDb, withSavepoint, errorCode, isUniqueViolation };
