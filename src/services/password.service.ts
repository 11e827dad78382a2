import { createHash } from 'crypto';
import { compare, hash } from 'bcryptjs';

/**
 * Password hashing
 *
 * Passwords are SHA-256 digested before bcrypt so inputs longer than bcrypt's
 * 72-byte limit are not silently truncated.
 */
export class PasswordService {
  constructor(private rounds: number) {}

  async hash(password: string): Promise<string> {
    return hash(prehash(password), this.rounds);
  }

  async verify(password: string, passwordHash: string): Promise<boolean> {
    return compare(prehash(password), passwordHash);
  }
}

function prehash(password: string): string {
  return createHash('sha256').update(password, 'utf8').digest('hex');
}
