import { randomBytes, createCipheriv, createDecipheriv } from "node:crypto";

// ── Constants ──

const ALGORITHM = "aes-256-gcm";
const KEY_LENGTH = 32;
const NONCE_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const MIN_TOKEN_LENGTH = NONCE_LENGTH + AUTH_TAG_LENGTH;

// ── Encrypted data shape ──

interface EncryptedParts {
  nonce: Buffer;
  ciphertext: Buffer;
  authTag: Buffer;
}

// ── Low-level crypto ──

function generateKey(): Buffer {
  return randomBytes(KEY_LENGTH);
}

function aesEncrypt(key: Uint8Array, plaintext: Uint8Array): EncryptedParts {
  const nonce = randomBytes(NONCE_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: AUTH_TAG_LENGTH });
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  const authTag = cipher.getAuthTag();
  return { nonce, ciphertext, authTag };
}

/** Throws when the auth tag does not verify. */
function aesDecrypt(key: Uint8Array, parts: EncryptedParts): Buffer {
  const decipher = createDecipheriv(ALGORITHM, key, parts.nonce, {
    authTagLength: AUTH_TAG_LENGTH,
  });
  decipher.setAuthTag(parts.authTag);
  return Buffer.concat([decipher.update(parts.ciphertext), decipher.final()]);
}

// ── Token packing ──
// Layout: nonce(12) ‖ ciphertext ‖ tag(16), standard base64 with padding.

function packToken(parts: EncryptedParts): string {
  return Buffer.concat([parts.nonce, parts.ciphertext, parts.authTag]).toString("base64");
}

type UnpackedToken =
  | { ok: true; parts: EncryptedParts }
  | { ok: false; reason: "malformed-token" | "truncated-token"; detail: string };

function unpackToken(token: string): UnpackedToken {
  // Buffer.from silently skips characters outside the alphabet and ignores
  // trailing pad bits, so only a canonical round trip proves the token intact.
  const blob = Buffer.from(token, "base64");
  if (blob.toString("base64") !== token) {
    return { ok: false, reason: "malformed-token", detail: "token is not canonical base64" };
  }
  if (blob.length < MIN_TOKEN_LENGTH) {
    return {
      ok: false,
      reason: "truncated-token",
      detail: `expected at least ${MIN_TOKEN_LENGTH.toString()} bytes, got ${blob.length.toString()}`,
    };
  }
  return {
    ok: true,
    parts: {
      nonce: blob.subarray(0, NONCE_LENGTH),
      ciphertext: blob.subarray(NONCE_LENGTH, blob.length - AUTH_TAG_LENGTH),
      authTag: blob.subarray(blob.length - AUTH_TAG_LENGTH),
    },
  };
}

export {
  KEY_LENGTH,
  NONCE_LENGTH,
  AUTH_TAG_LENGTH,
  MIN_TOKEN_LENGTH,
  type EncryptedParts,
  type UnpackedToken,
  generateKey,
  aesEncrypt,
  aesDecrypt,
  packToken,
  unpackToken,
};
