// src/auth/credentials.ts
import crypto from "crypto";

const KEY_LENGTH = 64;
const SALT_BYTES = 16;
const PREFIX = "scrypt";

function scrypt(secret: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    crypto.scrypt(secret, salt, KEY_LENGTH, (err, derived) => {
      if (err) reject(err);
      else resolve(derived);
    });
  });
}

/**
 * One-way digest of a password: `scrypt$<salt>$<hash>`, both base64url.
 */
export async function hashPassword(plaintext: string): Promise<string> {
  const salt = crypto.randomBytes(SALT_BYTES);
  const derived = await scrypt(plaintext, salt);
  return [PREFIX, salt.toString("base64url"), derived.toString("base64url")].join("$");
}

/**
 * Well-formed digest no password matches. Checking against it costs the same
 * scrypt run as a real check.
 */
export const DECOY_DIGEST = [
  PREFIX,
  Buffer.alloc(SALT_BYTES).toString("base64url"),
  Buffer.alloc(KEY_LENGTH).toString("base64url"),
].join("$");

export async function verifyPassword(digest: string, plaintext: string): Promise<boolean> {
  const parts = digest.split("$");
  if (parts.length !== 3 || parts[0] !== PREFIX) return false;

  const salt = Buffer.from(parts[1], "base64url");
  const expected = Buffer.from(parts[2], "base64url");
  if (salt.length === 0 || expected.length !== KEY_LENGTH) return false;

  const actual = await scrypt(plaintext, salt);
  return crypto.timingSafeEqual(actual, expected);
}
