import type { Logger } from '../context.js';
import { isFinanceError, type FinanceErrorCode } from '../domain/errors.js';

export type OperationResult<T> =
  | { ok: true; value: T; message: string }
  | { ok: false; code: FinanceErrorCode; message: string };

/**
 * Call boundary for the outer surfaces: runs an operation and reports
 * success or failure as data. Never throws.
 */
export async function runOperation<T>(
  fn: () => T | Promise<T>,
  describe: (value: T) => string,
  log: Logger = console,
): Promise<OperationResult<T>> {
  try {
    const value = await fn();
    return { ok: true, value, message: describe(value) };
  } catch (error) {
    if (isFinanceError(error)) {
      return { ok: false, code: error.code, message: error.message };
    }
    log.error('[App] Unexpected error:', error);
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, code: 'StorageFailure', message: `Unexpected error: ${reason}` };
  }
}
