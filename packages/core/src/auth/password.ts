import argon2 from "argon2";

// ============================================
// Password Hashing — argon2id
// ============================================

const HASH_OPTIONS = {
  type: argon2.argon2id,
  memoryCost: 65536, // 64MB
  timeCost: 3,
  parallelism: 4,
} as const;

/**
 * Hash a password using argon2id.
 */
export async function hashPassword(password: string): Promise<string> {
  return argon2.hash(password, HASH_OPTIONS);
}

/**
 * Verify a password against a stored hash.
 * A malformed hash never matches.
 */
export async function verifyPassword(
  password: string,
  hash: string
): Promise<boolean> {
  try {
    return await argon2.verify(hash, password);
  } catch (err) {
    console.error("Password hash could not be verified:", err);
    return false;
  }
}

// Verified against when the username is unknown, so a miss costs as much as a hit
let dummyHash: Promise<string> | null = null;

export function getDummyHash(): Promise<string> {
  dummyHash ??= hashPassword("rigtrack-timing-placeholder-1");
  return dummyHash;
}
