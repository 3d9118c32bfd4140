/**
 * Pure domain computations.
 * No DB, no IO: only data in, data out.
 */
import type {
  Transaction,
  TxType,
  DateRange,
  CategoryTotal,
  TransactionSummary,
  Report,
  ReportPeriod,
  BudgetCheck,
} from './types.js';

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const TIMESTAMP_RE = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatMoney(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

/** YYYY-MM-DD in local time */
export function formatDate(now: Date): string {
  return `${now.getFullYear()}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())}`;
}

/** The ledger's timestamp format: YYYY-MM-DD HH:MM:SS in local time */
export function formatTimestamp(now: Date): string {
  return `${formatDate(now)} ${pad2(now.getHours())}:${pad2(now.getMinutes())}:${pad2(now.getSeconds())}`;
}

/** YYYYMMDD_HHMMSS, for file names */
export function compactTimestamp(now: Date): string {
  return formatTimestamp(now).replace(/-/g, '').replace(/:/g, '').replace(' ', '_');
}

/** True for the two formats ledger dates are compared in */
export function isLedgerDate(value: string): boolean {
  return DATE_RE.test(value) || TIMESTAMP_RE.test(value);
}

/**
 * Upper bound for a lexicographic date comparison.
 * A bare day has to cover every timestamp on that day.
 */
export function inclusiveEndBound(end: string): string {
  return DATE_RE.test(end) ? `${end} 23:59:59` : end;
}

export function monthOf(now: Date): { month: number; year: number } {
  return { month: now.getMonth() + 1, year: now.getFullYear() };
}

/** First of the month up to today */
export function monthToDate(now: Date): DateRange {
  return {
    start: `${now.getFullYear()}-${pad2(now.getMonth() + 1)}-01`,
    end: formatDate(now),
  };
}

/** Jan 1 up to today */
export function yearToDate(now: Date): DateRange {
  return { start: `${now.getFullYear()}-01-01`, end: formatDate(now) };
}

export function periodRange(period: ReportPeriod, now: Date): DateRange {
  return period === 'monthly' ? monthToDate(now) : yearToDate(now);
}

export function ofType(txns: Transaction[], type: TxType): Transaction[] {
  return txns.filter((t) => t.type === type);
}

export function totalAmount(txns: Transaction[]): number {
  return txns.reduce((sum, t) => sum + t.amount, 0);
}

/** Expense totals per category, largest first */
export function categoryBreakdown(txns: Transaction[]): CategoryTotal[] {
  const map = new Map<string, number>();
  for (const t of ofType(txns, 'expense')) {
    map.set(t.category, (map.get(t.category) ?? 0) + t.amount);
  }
  return Array.from(map.entries())
    .map(([category, spent]) => ({ category, spent }))
    .sort((a, b) => b.spent - a.spent);
}

/** Totals shown under a transaction listing */
export function summarizeTransactions(txns: Transaction[]): TransactionSummary {
  const totalIncome = totalAmount(ofType(txns, 'income'));
  const totalExpenses = totalAmount(ofType(txns, 'expense'));
  return { totalIncome, totalExpenses, net: totalIncome - totalExpenses };
}

/**
 * Income/expense report over an already-filtered transaction set.
 * totalExpenses is summed from the category totals so the breakdown
 * always adds up to it exactly.
 */
export function buildReport(period: ReportPeriod, range: DateRange, txns: Transaction[]): Report {
  const categoryExpenses = categoryBreakdown(txns);
  const totalIncome = totalAmount(ofType(txns, 'income'));
  const totalExpenses = categoryExpenses.reduce((sum, c) => sum + c.spent, 0);
  return {
    period,
    startDate: range.start,
    endDate: range.end,
    totalIncome,
    totalExpenses,
    savings: totalIncome - totalExpenses,
    categoryExpenses,
  };
}

/** Compare month-to-date spending in a category against its ceiling */
export function evaluateBudget(
  category: string,
  budget: number | null,
  monthExpenses: Transaction[],
): BudgetCheck {
  if (budget === null) {
    return { exceeded: false, category, budget: null, spent: 0 };
  }
  const spent = totalAmount(monthExpenses.filter((t) => t.type === 'expense' && t.category === category));
  return { exceeded: spent > budget, category, budget, spent };
}
