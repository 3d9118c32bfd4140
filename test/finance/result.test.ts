import { describe, it, expect } from 'vitest';
import { runOperation } from '../../src/finance/result.js';
import { FinanceError } from '../../src/domain/errors.js';
import { makeLog } from '../helpers.js';

describe('runOperation', () => {
  it('wraps a value with its success message', async () => {
    const result = await runOperation(() => 42, (n) => `got ${n}`, makeLog());
    expect(result).toEqual({ ok: true, value: 42, message: 'got 42' });
  });

  it('awaits async operations', async () => {
    const result = await runOperation(async () => 'done', (s) => s, makeLog());
    expect(result).toEqual({ ok: true, value: 'done', message: 'done' });
  });

  it('reports a FinanceError as a structured failure', async () => {
    const log = makeLog();
    const result = await runOperation(
      () => {
        throw new FinanceError('NotFound', 'Transaction not found.');
      },
      () => 'unreachable',
      log,
    );
    expect(result).toEqual({ ok: false, code: 'NotFound', message: 'Transaction not found.' });
    expect(log.error).not.toHaveBeenCalled();
  });

  it('logs and classifies anything else as StorageFailure', async () => {
    const log = makeLog();
    const boom = new Error('disk on fire');
    const result = await runOperation(
      async () => {
        throw boom;
      },
      () => 'unreachable',
      log,
    );
    expect(result).toEqual({ ok: false, code: 'StorageFailure', message: 'Unexpected error: disk on fire' });
    expect(log.error).toHaveBeenCalledWith('[App] Unexpected error:', boom);
  });
});
