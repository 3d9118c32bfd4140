import type { FinanceContext } from '../context.js';
import { evaluateBudget, monthOf, monthToDate } from '../domain/computations.js';
import type { Budget, BudgetCheck, Session } from '../domain/types.js';
import { findBudget, selectBudgets, selectTransactions, upsertBudget } from '../db/repo.js';
import { assertCategory, assertPositiveAmount } from './validation.js';

/** Set (or replace) this month's ceiling for a category */
export function setBudget(ctx: FinanceContext, session: Session, category: string, amount: number): Budget {
  assertPositiveAmount(amount, 'Budget amount must be positive.');
  const name = assertCategory(category);
  return upsertBudget(ctx.db, session.userId, { category: name, amount, ...monthOf(ctx.now()) });
}

/** Budgets for the current month only */
export function listBudgets(ctx: FinanceContext, session: Session): Budget[] {
  const { month, year } = monthOf(ctx.now());
  return selectBudgets(ctx.db, session.userId, month, year);
}

/**
 * Advisory check: has month-to-date spending in a category gone over its ceiling?
 * Read-only; never blocks the transaction that triggered it.
 */
export function checkBudgetExceeded(ctx: FinanceContext, session: Session, category: string): BudgetCheck {
  const now = ctx.now();
  const { month, year } = monthOf(now);
  const budget = findBudget(ctx.db, session.userId, category, month, year);
  if (!budget) {
    return evaluateBudget(category, null, []);
  }

  const range = monthToDate(now);
  const expenses = selectTransactions(ctx.db, session.userId, {
    startDate: range.start,
    endDate: range.end,
    category,
    type: 'expense',
  });
  return evaluateBudget(category, budget.amount, expenses);
}
