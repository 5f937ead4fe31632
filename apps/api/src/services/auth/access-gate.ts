/**
 * Password hashing and verification for the query API's single account.
 * Uses bcrypt for the stored hash.
 */
import { createHash, timingSafeEqual } from 'node:crypto';
import bcrypt from 'bcrypt';
import { describeError, type AccessGatePort } from '@sensorgrid/domain';

export const BCRYPT_ROUNDS = 12;

// $2a$ / $2b$ / $2y$, two-digit cost, 22 salt + 31 hash characters
const BCRYPT_HASH = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;

export type PasswordVerifier = (password: string, passwordHash: string) => Promise<boolean>;

export async function hashPassword(password: string, rounds: number = BCRYPT_ROUNDS): Promise<string> {
  return await bcrypt.hash(password, rounds);
}

export function isBcryptHash(encoded: string): boolean {
  return BCRYPT_HASH.test(encoded);
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

export interface BcryptAccessGateOptions {
  username: string;
  passwordHash: string;
  verify?: PasswordVerifier;
}

/**
 * Single-account gate. The password is always checked against the stored
 * hash, whatever username was supplied, and usernames are compared by digest
 * in constant time, so an unknown user and a wrong password cost the same and
 * answer the same `false`.
 */
export class BcryptAccessGate implements AccessGatePort {
  private readonly usernameDigest: Buffer;
  private readonly passwordHash: string;
  private readonly verify: PasswordVerifier;

  constructor(options: BcryptAccessGateOptions) {
    if (!isBcryptHash(options.passwordHash)) {
      throw new Error('ACCESS_PASSWORD_HASH is not a bcrypt hash');
    }
    this.passwordHash = options.passwordHash;
    this.usernameDigest = digest(options.username);
    this.verify = options.verify ?? ((password, hash) => bcrypt.compare(password, hash));
  }

  async authenticate(username: string, password: string): Promise<boolean> {
    try {
      const passwordMatches = await this.verify(password, this.passwordHash);
      const userMatches = timingSafeEqual(digest(username), this.usernameDigest);
      return userMatches && passwordMatches;
    } catch (err) {
      console.error(`[access-gate] authentication check failed: ${describeError(err)}`);
      return false;
    }
  }
}
