import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, readFileSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { KeyIOError } from "../../../stack/framework/errors.js";
import { unwrap } from "../../../stack/framework/result.js";
import { FieldCipher } from "../../../stack/secure/field-cipher.js";
import { fileKeyLocation, loadOrCreateSecret } from "../../../stack/secure/keystore.js";
import {
  captureLogger,
  makeTempDir,
  memoryKeyLocation,
  noopLogger,
} from "../../fixtures/test-helpers.js";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/gu, "\\$&");
}

describe("loadOrCreateSecret (memory location)", () => {
  it("generates, persists and announces a key when none exists", () => {
    const location = memoryKeyLocation();
    const { logger, lines } = captureLogger();

    const secret = loadOrCreateSecret(location, logger);

    expect(secret.length).toBe(32);
    expect(location.creates).toBe(1);
    expect(Buffer.from(location.stored() ?? []).equals(secret)).toBe(true);
    expect(lines).toEqual(["⚠ [test] New encryption key generated → memory://test-key"]);
  });

  it("returns the persisted key unchanged on later loads", () => {
    const location = memoryKeyLocation();
    const first = loadOrCreateSecret(location, noopLogger);
    const { logger, lines } = captureLogger();
    const second = loadOrCreateSecret(location, logger);

    expect(second.equals(first)).toBe(true);
    expect(location.creates).toBe(1);
    expect(lines).toEqual([]);
  });

  it("fails with KeyIOError when the stored key has the wrong length", () => {
    const location = memoryKeyLocation(new Uint8Array(31));
    expect(() => loadOrCreateSecret(location, noopLogger)).toThrow(
      "Key store at memory://test-key: corrupt — expected 32 bytes, got 31",
    );
  });

  it("fails with KeyIOError when the key cannot be read", () => {
    const location = { ...memoryKeyLocation(), exists: () => true };
    expect(() => loadOrCreateSecret(location, noopLogger)).toThrow(KeyIOError);
  });

  it("fails with KeyIOError when the new key cannot be written", () => {
    const location = {
      ...memoryKeyLocation(),
      create: () => {
        throw new Error("ENOSPC: no space left on device");
      },
    };
    const { logger, lines } = captureLogger();
    expect(() => loadOrCreateSecret(location, logger)).toThrow(
      "Key store at memory://test-key: unwritable (ENOSPC: no space left on device)",
    );
    expect(lines).toEqual([]);
  });
});

describe("loadOrCreateSecret (file location)", () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir("budget-key-"));
  });

  afterEach(() => {
    cleanup();
  });

  it("writes a 32-byte key file readable only by the owner", () => {
    const path = join(dir, "keys", "budget_key.key");
    const secret = loadOrCreateSecret(fileKeyLocation(path), noopLogger);

    expect(existsSync(path)).toBe(true);
    expect(readFileSync(path).equals(secret)).toBe(true);
    if (process.platform !== "win32") {
      expect(statSync(path).mode & 0o777).toBe(0o600);
    }
  });

  it("reloads the same key across sequential runs", () => {
    const path = join(dir, "budget_key.key");
    const first = loadOrCreateSecret(fileKeyLocation(path), noopLogger);
    const second = loadOrCreateSecret(fileKeyLocation(path), noopLogger);
    expect(second.equals(first)).toBe(true);
  });

  it("keeps tokens decryptable across reloads", () => {
    const path = join(dir, "budget_key.key");
    const token = new FieldCipher(loadOrCreateSecret(fileKeyLocation(path), noopLogger)).encrypt(
      "Milk",
    );
    const reloaded = new FieldCipher(loadOrCreateSecret(fileKeyLocation(path), noopLogger));
    expect(unwrap(reloaded.decrypt(token))).toBe("Milk");
  });

  it("refuses a corrupt key file instead of replacing it", () => {
    const path = join(dir, "budget_key.key");
    writeFileSync(path, "too short");
    expect(() => loadOrCreateSecret(fileKeyLocation(path), noopLogger)).toThrow(KeyIOError);
    expect(readFileSync(path, "utf8")).toBe("too short");
  });

  it("never overwrites an existing file on create", () => {
    const path = join(dir, "budget_key.key");
    writeFileSync(path, Buffer.alloc(32, 1));
    expect(() => {
      fileKeyLocation(path).create(Buffer.alloc(32, 2));
    }).toThrow(/EEXIST/u);
    expect(readFileSync(path).equals(Buffer.alloc(32, 1))).toBe(true);
  });

  it("reports a key path that cannot be created as KeyIOError", () => {
    // a regular file sits where a parent directory should be; fails even with root privileges
    writeFileSync(join(dir, "blocker"), "");
    const path = join(dir, "blocker", "keys", "budget_key.key");

    expect(() => loadOrCreateSecret(fileKeyLocation(path), noopLogger)).toThrow(
      new RegExp(`^Key store at ${escapeRegExp(path)}: unwritable \\(`, "u"),
    );
    expect(existsSync(path)).toBe(false);
  });
});
