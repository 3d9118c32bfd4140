/**
 * Domain types for the ledger.
 * Pure data: no DB, no IO.
 */

export type TxType = 'income' | 'expense';

export const TX_TYPES: readonly TxType[] = ['income', 'expense'];

export type ReportPeriod = 'monthly' | 'yearly';

export const REPORT_PERIODS: readonly ReportPeriod[] = ['monthly', 'yearly'];

export interface User {
  id: number;
  username: string;
}

/** The authenticated identity every ledger operation runs under */
export interface Session {
  userId: number;
  username: string;
}

export interface Transaction {
  id: number;
  userId: number;
  type: TxType;
  amount: number;              // always > 0; the type carries the sign
  category: string;
  description: string;
  date: string;                // YYYY-MM-DD HH:MM:SS, local time
}

export interface TransactionInput {
  type: TxType;
  amount: number;
  category: string;
  description?: string;
}

/** Fields an update may touch. Absent slots are left as they are. */
export interface TransactionPatch {
  amount?: number;
  category?: string;
  description?: string;
}

export interface TransactionFilter {
  startDate?: string;          // YYYY-MM-DD[ HH:MM:SS], inclusive
  endDate?: string;            // YYYY-MM-DD[ HH:MM:SS], inclusive
  category?: string;
  type?: TxType;
}

/** Monthly spending ceiling for one category */
export interface Budget {
  id: number;
  userId: number;
  category: string;
  amount: number;
  month: number;               // 1–12
  year: number;
}

export interface BudgetCheck {
  exceeded: boolean;
  category: string;
  budget: number | null;       // null when no budget is set this month
  spent: number;
}

export interface DateRange {
  start: string;               // YYYY-MM-DD
  end: string;                 // YYYY-MM-DD
}

export interface CategoryTotal {
  category: string;
  spent: number;
}

export interface TransactionSummary {
  totalIncome: number;
  totalExpenses: number;
  net: number;
}

export interface Report {
  period: ReportPeriod;
  startDate: string;
  endDate: string;
  totalIncome: number;
  totalExpenses: number;
  savings: number;
  categoryExpenses: CategoryTotal[];
}

export interface AddTransactionResult {
  transaction: Transaction;
  budget: BudgetCheck | null;  // null for income
}
