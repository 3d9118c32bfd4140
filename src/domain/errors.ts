export type FinanceErrorCode =
  | 'InvalidInput'
  | 'DuplicateUser'
  | 'InvalidCredentials'
  | 'NotAuthenticated'
  | 'InvalidAmount'
  | 'InvalidKind'
  | 'NotFound'
  | 'NoOpUpdate'
  | 'InvalidPeriod'
  | 'OwnershipMismatch'
  | 'StorageFailure';

export class FinanceError extends Error {
  readonly code: FinanceErrorCode;

  constructor(code: FinanceErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FinanceError';
    this.code = code;
  }
}

export function isFinanceError(error: unknown): error is FinanceError {
  return error instanceof FinanceError;
}
