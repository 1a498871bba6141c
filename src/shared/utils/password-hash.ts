import { createHash, timingSafeEqual } from 'node:crypto';

const HEX_SHA256 = /^[0-9a-f]{64}$/;

/** Hex SHA-256 of the password, the format stored in config.password_hash. */
export function hashPassword(password: string): string {
  return createHash('sha256').update(password, 'utf8').digest('hex');
}

/** Constant-time comparison of a candidate password against a stored hash. */
export function passwordMatches(candidate: string, storedHash: string): boolean {
  if (!HEX_SHA256.test(storedHash)) return false;
  const expected = Buffer.from(storedHash, 'hex');
  const actual = createHash('sha256').update(candidate, 'utf8').digest();
  return timingSafeEqual(expected, actual);
}
