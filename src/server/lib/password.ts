import { compare, hash } from "bcryptjs";

export const BCRYPT_ROUNDS = 12;

// Compared against when the email is unknown so a failed login costs the
// same time whether or not the account exists. Computed on first use.
let dummyHash: Promise<string> | undefined;

export function hashPassword(password: string, rounds: number = BCRYPT_ROUNDS): Promise<string> {
  return hash(password, rounds);
}

/**
 * Check a password against a stored hash. With no stored hash the password is
 * compared against a dummy hash and the result is always false.
 */
export async function verifyPassword(password: string, passwordHash: string | undefined): Promise<boolean> {
  if (!passwordHash) {
    dummyHash ??= hashPassword("customify-dummy-password");
    await compare(password, await dummyHash);
    return false;
  }
  return compare(password, passwordHash);
}
