import * as bcrypt from 'bcrypt';

export const BCRYPT_SALT_ROUNDS = 12;

export function hashPassword(plain: string): Promise<string> {
  return bcrypt.hash(plain, BCRYPT_SALT_ROUNDS);
}

/**
 * Compares against a hash when one exists. With no hash (unknown email) a
 * throwaway hash is still computed so both paths cost about the same.
 */
export async function verifyPassword(
  plain: string,
  hash: string | undefined,
): Promise<boolean> {
  if (!hash) {
    await bcrypt.hash(plain, BCRYPT_SALT_ROUNDS);
    return false;
  }
  return bcrypt.compare(plain, hash);
}
