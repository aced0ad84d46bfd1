import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  rmSync,
  writeSync,
} from "node:fs";
import { dirname } from "node:path";
import { KeyIOError, toErrorMessage } from "../framework/errors.js";
import type { PrefixLogger } from "../framework/logging.js";
import { KEY_LENGTH, generateKey } from "./crypto.js";

/** A single named durable location holding the raw secret. */
export interface KeyLocation {
  describe: () => string;
  exists: () => boolean;
  read: () => Uint8Array;
  /** Create-if-absent. Must never overwrite an existing secret. */
  create: (bytes: Uint8Array) => void;
}

function writeFully(fd: number, bytes: Uint8Array): void {
  let offset = 0;
  while (offset < bytes.length) {
    const written = writeSync(fd, bytes, offset, bytes.length - offset);
    if (written <= 0) {
      throw new Error(`short write (${offset.toString()} of ${bytes.length.toString()} bytes)`);
    }
    offset += written;
  }
}

export function fileKeyLocation(path: string): KeyLocation {
  return {
    describe: () => path,
    exists: () => existsSync(path),
    read: () => readFileSync(path),
    create: (bytes) => {
      mkdirSync(dirname(path), { recursive: true });
      // "wx" fails with EEXIST rather than clobbering a key another run just wrote
      const fd = openSync(path, "wx", 0o600);
      let complete = false;
      try {
        writeFully(fd, bytes);
        fsyncSync(fd);
        complete = true;
      } finally {
        closeSync(fd);
        // a partial key would read back as corrupt on every later run
        if (!complete) rmSync(path, { force: true });
      }
    },
  };
}

function readExisting(location: KeyLocation): Buffer {
  let bytes: Uint8Array;
  try {
    bytes = location.read();
  } catch (cause) {
    throw new KeyIOError(location.describe(), `unreadable (${toErrorMessage(cause)})`, { cause });
  }
  if (bytes.length !== KEY_LENGTH) {
    throw new KeyIOError(
      location.describe(),
      `corrupt — expected ${KEY_LENGTH.toString()} bytes, got ${bytes.length.toString()}`,
    );
  }
  return Buffer.from(bytes);
}

/**
 * Returns the deployment's secret, generating and persisting it on first run.
 *
 * A freshly generated key is announced on the logger: any tokens written under
 * an earlier key are undecryptable from here on.
 */
export function loadOrCreateSecret(location: KeyLocation, logger: PrefixLogger): Buffer {
  if (location.exists()) {
    return readExisting(location);
  }

  const secret = generateKey();
  try {
    location.create(secret);
  } catch (cause) {
    throw new KeyIOError(location.describe(), `unwritable (${toErrorMessage(cause)})`, { cause });
  }
  logger.warn("New encryption key generated", { location: location.describe() });
  return secret;
}
