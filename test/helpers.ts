import { vi } from 'vitest';
import { createContext, type FinanceContext } from '../src/context.js';
import { openDatabase } from '../src/db/database.js';
import { registerUser, authenticate } from '../src/finance/credentials.js';
import type { Session } from '../src/domain/types.js';

/** 2026-10-19 14:30:00 local time */
export const NOW = new Date(2026, 9, 19, 14, 30, 0);

export function makeLog() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export interface TestContext {
  ctx: FinanceContext;
  log: ReturnType<typeof makeLog>;
  setNow: (date: Date) => void;
}

/** Fresh in-memory database with a controllable clock */
export function makeContext(now: Date = NOW): TestContext {
  const log = makeLog();
  const db = openDatabase(':memory:', log);
  let current = now;
  const ctx = createContext(db, { now: () => current, log });
  return {
    ctx,
    log,
    setNow: (date) => {
      current = date;
    },
  };
}

export function signUp(ctx: FinanceContext, username: string, password = 'test-password'): Session {
  registerUser(ctx, username, password);
  return authenticate(ctx, username, password);
}

/** The error a call throws, or undefined when it returns */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
