import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';
import { thrown } from './helpers.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      dbPath: 'finance.db',
      apiPort: 8787,
      restoreKeepsBudgetPeriod: false,
    });
  });

  it('reads overrides from the environment', () => {
    expect(
      loadConfig({
        FINANCE_DB_PATH: '/tmp/ledger.db',
        FINANCE_API_PORT: '9000',
        FINANCE_RESTORE_KEEP_BUDGET_PERIOD: 'true',
      }),
    ).toEqual({ dbPath: '/tmp/ledger.db', apiPort: 9000, restoreKeepsBudgetPeriod: true });
  });

  it('rejects a port that is not a number', () => {
    const error = thrown(() => loadConfig({ FINANCE_API_PORT: 'eighty' }));
    expect(error).toMatchObject({ code: 'InvalidInput' });
  });

  it('rejects an unknown flag value', () => {
    expect(thrown(() => loadConfig({ FINANCE_RESTORE_KEEP_BUDGET_PERIOD: 'yes' }))).toMatchObject({
      code: 'InvalidInput',
    });
  });
});
