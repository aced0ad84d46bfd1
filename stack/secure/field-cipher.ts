import { DecryptionError, KeyIOError } from "../framework/errors.js";
import { type Result, ok, err } from "../framework/result.js";
import { KEY_LENGTH, aesEncrypt, aesDecrypt, packToken, unpackToken } from "./crypto.js";

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Authenticated encryption of individual text fields.
 *
 * Holds only the immutable secret; calls share no other state. Every
 * `encrypt` draws its own random nonce.
 */
export class FieldCipher {
  readonly #key: Buffer;

  constructor(secret: Uint8Array) {
    if (secret.length !== KEY_LENGTH) {
      throw new KeyIOError(
        "in-memory secret",
        `expected a ${KEY_LENGTH.toString()}-byte secret, got ${secret.length.toString()}`,
      );
    }
    this.#key = Buffer.from(secret);
  }

  encrypt(plaintext: string): string {
    return packToken(aesEncrypt(this.#key, Buffer.from(plaintext, "utf8")));
  }

  decrypt(token: string): Result<string, DecryptionError> {
    const unpacked = unpackToken(token);
    if (!unpacked.ok) {
      return err(new DecryptionError(unpacked.reason, unpacked.detail));
    }

    let plain: Buffer;
    try {
      plain = aesDecrypt(this.#key, unpacked.parts);
    } catch (cause) {
      return err(
        new DecryptionError(
          "authentication-failed",
          "auth tag mismatch — token corrupted or encrypted under a different key",
          { cause },
        ),
      );
    }

    try {
      return ok(utf8.decode(plain));
    } catch (cause) {
      return err(new DecryptionError("invalid-utf8", "plaintext is not valid UTF-8", { cause }));
    }
  }
}
