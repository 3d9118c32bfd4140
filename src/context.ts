import type Database from 'better-sqlite3';

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

/** Everything an operation needs besides its arguments */
export interface FinanceContext {
  db: Database.Database;
  now: () => Date;
  log: Logger;
}

export function createContext(
  db: Database.Database,
  overrides: Partial<Omit<FinanceContext, 'db'>> = {},
): FinanceContext {
  return {
    db,
    now: overrides.now ?? (() => new Date()),
    log: overrides.log ?? console,
  };
}
