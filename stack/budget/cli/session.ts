import type { BudgetConfig } from "../../framework/config.js";
import type { PrefixLogger } from "../../framework/logging.js";
import { FieldCipher } from "../../secure/field-cipher.js";
import { fileKeyLocation, loadOrCreateSecret } from "../../secure/keystore.js";
import { withBudgetDb } from "../core.js";
import type { BudgetDb } from "../db.js";

interface BudgetSession {
  db: BudgetDb;
  cipher: FieldCipher;
  logger: PrefixLogger;
}

/**
 * Loads the key (fatal on KeyIOError) and opens the database, then hands both
 * to `fn`. The database is closed when `fn` settles.
 */
async function withBudgetSession<T>(
  config: BudgetConfig,
  logger: PrefixLogger,
  fn: (session: BudgetSession) => T | Promise<T>,
): Promise<T> {
  const secret = loadOrCreateSecret(fileKeyLocation(config.keyPath), logger.child("key"));
  const cipher = new FieldCipher(secret);
  return withBudgetDb(config.dbPath, (db) => fn({ db, cipher, logger }));
}

export { type BudgetSession, withBudgetSession };
