import type { FinanceContext } from '../context.js';
import { FinanceError } from '../domain/errors.js';
import { buildReport, periodRange } from '../domain/computations.js';
import { REPORT_PERIODS, type Report, type ReportPeriod, type Session } from '../domain/types.js';
import { selectTransactions } from '../db/repo.js';

function toPeriod(value: string): ReportPeriod {
  const period = REPORT_PERIODS.find((p) => p === value);
  if (!period) {
    throw new FinanceError('InvalidPeriod', "Invalid period. Use 'monthly' or 'yearly'.");
  }
  return period;
}

/** Income, expenses, savings and per-category spend from the start of the month or year to today */
export function generateReport(ctx: FinanceContext, session: Session, period: string): Report {
  const resolved = toPeriod(period);
  const range = periodRange(resolved, ctx.now());
  const txns = selectTransactions(ctx.db, session.userId, { startDate: range.start, endDate: range.end });
  return buildReport(resolved, range, txns);
}
