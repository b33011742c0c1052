import bcrypt from 'bcryptjs';
import { getConfig } from './config';

let dummyHash: Promise<string> | null = null;

/**
 * Hashes a plaintext password using bcrypt at the configured cost.
 * @param password Plaintext password.
 * @returns Promise resolving to hashed password.
 */
export async function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, getConfig().bcryptRounds);
}

/**
 * Checks a plaintext password against a stored hash. When no hash is given
 * (unknown account) a throwaway hash is compared instead, so the response
 * time does not reveal whether the email exists.
 * @param password Plaintext password.
 * @param hash Stored bcrypt hash, or null for an unknown account.
 * @returns Promise resolving to true only for a real, matching hash.
 */
export async function verifyPassword(password: string, hash: string | null): Promise<boolean> {
  if (hash === null) {
    dummyHash ??= hashPassword('not-a-real-password');
    await bcrypt.compare(password, await dummyHash);
    return false;
  }
  return bcrypt.compare(password, hash);
}
