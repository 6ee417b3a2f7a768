import crypto from "crypto";

const KEY_LENGTH = 64;
const SALT_BYTES = 16;

/**
 * Hash format: `scrypt:<salt hex>:<derived key hex>`.
 * Store the result in AUTH_PASSWORD_HASH; the plain password never is.
 */
export function hashPassword(password: string, salt: Buffer = crypto.randomBytes(SALT_BYTES)): string {
  const key = crypto.scryptSync(password, salt, KEY_LENGTH);
  return `scrypt:${salt.toString("hex")}:${key.toString("hex")}`;
}

export function verifyPassword(password: string, stored: string): boolean {
  const parts = stored.split(":");
  if (parts.length !== 3 || parts[0] !== "scrypt") return false;

  const salt = Buffer.from(parts[1], "hex");
  const expected = Buffer.from(parts[2], "hex");
  if (salt.length === 0 || expected.length === 0) return false;

  const actual = crypto.scryptSync(password, salt, expected.length);
  return crypto.timingSafeEqual(actual, expected);
}
