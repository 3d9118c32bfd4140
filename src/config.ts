import { z } from 'zod/v4';
import { parseWith } from './domain/schemas.js';

export interface AppConfig {
  dbPath: string;
  apiPort: number;
  /** Restore budgets into the month/year recorded in the backup instead of the current one */
  restoreKeepsBudgetPeriod: boolean;
}

const EnvSchema = z.object({
  FINANCE_DB_PATH: z.string().min(1).default('finance.db'),
  FINANCE_API_PORT: z.coerce.number().int().min(1).max(65535).default(8787),
  FINANCE_RESTORE_KEEP_BUDGET_PERIOD: z.enum(['true', 'false']).default('false'),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = parseWith(EnvSchema, env, 'environment');
  return {
    dbPath: parsed.FINANCE_DB_PATH,
    apiPort: parsed.FINANCE_API_PORT,
    restoreKeepsBudgetPeriod: parsed.FINANCE_RESTORE_KEEP_BUDGET_PERIOD === 'true',
  };
}
