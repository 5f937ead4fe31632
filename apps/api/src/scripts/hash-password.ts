/**
 * Prints an ACCESS_PASSWORD_HASH value for the given password.
 *
 *   npm run hash-password -- <password>
 */
import { hashPassword } from '../services/auth/access-gate.js';

async function main(): Promise<void> {
  const password = process.argv[2];
  if (!password) {
    console.error('usage: hash-password <password>');
    process.exit(1);
  }
  console.log(await hashPassword(password));
}

main().catch((err: unknown) => {
  console.error('[hash-password] failed:', err);
  process.exit(1);
});
