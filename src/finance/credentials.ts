import { createHash, randomBytes, scryptSync, timingSafeEqual } from 'node:crypto';
import type { FinanceContext } from '../context.js';
import { FinanceError } from '../domain/errors.js';
import type { Session, User } from '../domain/types.js';
import { findUserByName, insertUser, updateUserPassword } from '../db/repo.js';

const SCRYPT_PREFIX = 'scrypt';
const KEY_LENGTH = 32;
const LEGACY_SHA256_RE = /^[0-9a-f]{64}$/;

/** Salted scrypt digest, stored as scrypt:<salt hex>:<hash hex> */
export function hashPassword(password: string, salt: Buffer = randomBytes(16)): string {
  const hash = scryptSync(password, salt, KEY_LENGTH);
  return `${SCRYPT_PREFIX}:${salt.toString('hex')}:${hash.toString('hex')}`;
}

function safeEqual(a: Buffer, b: Buffer): boolean {
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Check a password against a stored digest.
 * Older databases hold unsalted SHA-256 hex digests; those still verify.
 */
export function verifyPassword(password: string, stored: string): boolean {
  const parts = stored.split(':');
  if (parts.length === 3 && parts[0] === SCRYPT_PREFIX) {
    const salt = Buffer.from(parts[1], 'hex');
    const expected = Buffer.from(parts[2], 'hex');
    return safeEqual(scryptSync(password, salt, expected.length || KEY_LENGTH), expected);
  }
  if (LEGACY_SHA256_RE.test(stored)) {
    const digest = createHash('sha256').update(password).digest();
    return safeEqual(digest, Buffer.from(stored, 'hex'));
  }
  return false;
}

export function isLegacyDigest(stored: string): boolean {
  return LEGACY_SHA256_RE.test(stored);
}

export function registerUser(ctx: FinanceContext, username: string, password: string): User {
  const name = username.trim();
  if (!name || !password) {
    throw new FinanceError('InvalidInput', 'Username and password cannot be empty.');
  }
  if (findUserByName(ctx.db, name)) {
    throw new FinanceError('DuplicateUser', 'Username already exists. Please choose a different one.');
  }
  const id = insertUser(ctx.db, name, hashPassword(password));
  return { id, username: name };
}

export function authenticate(ctx: FinanceContext, username: string, password: string): Session {
  const row = findUserByName(ctx.db, username.trim());
  if (!row || !verifyPassword(password, row.password)) {
    throw new FinanceError('InvalidCredentials', 'Invalid username or password.');
  }
  if (isLegacyDigest(row.password)) {
    updateUserPassword(ctx.db, row.id, hashPassword(password));
    ctx.log.log(`[Auth] Upgraded password digest for user ${row.id}`);
  }
  return { userId: row.id, username: row.username };
}

export function requireSession(session: Session | null | undefined): Session {
  if (!session) {
    throw new FinanceError('NotAuthenticated', 'Please log in first.');
  }
  return session;
}
