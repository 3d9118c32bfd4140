import { formatMoney } from '../domain/computations.js';
import type { Budget, Report, Transaction, TransactionSummary } from '../domain/types.js';

const RULE_WIDE = '-'.repeat(80);
const RULE_NARROW = '-'.repeat(40);

// ANSI colors (disabled if not TTY)
export interface Palette {
  green: (s: string) => string;
  red: (s: string) => string;
  bold: (s: string) => string;
}

export function createPalette(enabled: boolean): Palette {
  const wrap = (code: number) => (s: string) => (enabled ? `\x1b[${code}m${s}\x1b[0m` : s);
  return { green: wrap(32), red: wrap(31), bold: wrap(1) };
}

export const MENU = [
  '',
  '=== Personal Finance Manager ===',
  '1. Register',
  '2. Login',
  '3. Add Income',
  '4. Add Expense',
  '5. View Transactions',
  '6. Update Transaction',
  '7. Delete Transaction',
  '8. Generate Report',
  '9. Set Budget',
  '10. View Budgets',
  '11. Backup Data',
  '12. Restore Data',
  '13. Logout',
  '14. Exit',
  '================================',
].join('\n');

export function formatTransaction(t: Transaction): string {
  return `ID: ${t.id} | ${t.date} | ${t.type.toUpperCase()} | ${formatMoney(t.amount)} | ${t.category} | ${t.description}`;
}

export function formatTransactionList(txns: Transaction[], summary: TransactionSummary): string[] {
  return [
    '',
    'Transactions:',
    RULE_WIDE,
    ...txns.map(formatTransaction),
    RULE_WIDE,
    `Total Income: ${formatMoney(summary.totalIncome)} | Total Expense: ${formatMoney(summary.totalExpenses)} | ` +
      `Net: ${formatMoney(summary.net)}`,
  ];
}

export function formatReport(report: Report): string[] {
  const lines = [
    '',
    `--- Financial Report (${report.period}) ---`,
    `Period: ${report.startDate} to ${report.endDate}`,
    `Total Income: ${formatMoney(report.totalIncome)}`,
    `Total Expenses: ${formatMoney(report.totalExpenses)}`,
    `Savings: ${formatMoney(report.savings)}`,
  ];
  if (report.categoryExpenses.length > 0) {
    lines.push('', 'Expenses by Category:');
    for (const c of report.categoryExpenses) {
      lines.push(`  ${c.category}: ${formatMoney(c.spent)}`);
    }
  }
  return lines;
}

export function formatBudgets(budgets: Budget[]): string[] {
  return [
    '',
    'Current Budgets:',
    RULE_NARROW,
    ...budgets.map((b) => `${b.category}: ${formatMoney(b.amount)}`),
    RULE_NARROW,
  ];
}

/** "October 2026" */
export function monthLabel(month: number, year: number): string {
  const name = new Date(year, month - 1, 1).toLocaleString('en-US', { month: 'long' });
  return `${name} ${year}`;
}
