import { FinanceError } from '../domain/errors.js';
import { TX_TYPES, type TxType } from '../domain/types.js';
import { isLedgerDate } from '../domain/computations.js';

export function assertTxType(value: string): TxType {
  const match = TX_TYPES.find((t) => t === value);
  if (!match) {
    throw new FinanceError('InvalidKind', "Transaction type must be 'income' or 'expense'.");
  }
  return match;
}

export function assertPositiveAmount(amount: number, message = 'Amount must be positive.'): number {
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new FinanceError('InvalidAmount', message);
  }
  return amount;
}

export function assertCategory(category: string): string {
  const name = category.trim();
  if (!name) {
    throw new FinanceError('InvalidInput', 'Category cannot be empty.');
  }
  return name;
}

export function assertLedgerDate(value: string, label: string): string {
  if (!isLedgerDate(value)) {
    throw new FinanceError('InvalidInput', `${label} must be YYYY-MM-DD or YYYY-MM-DD HH:MM:SS.`);
  }
  return value;
}
