/**
 * Transaction ledger: add, update, delete and filtered listing of a user's
 * income and expense records.
 */
import type { FinanceContext } from '../context.js';
import { FinanceError, isFinanceError } from '../domain/errors.js';
import { formatMoney, formatTimestamp } from '../domain/computations.js';
import type {
  AddTransactionResult,
  BudgetCheck,
  Session,
  Transaction,
  TransactionFilter,
  TransactionInput,
  TransactionPatch,
} from '../domain/types.js';
import {
  deleteTransactionRow,
  getTransaction,
  insertTransaction,
  selectTransactions,
  updateTransactionRow,
} from '../db/repo.js';
import { checkBudgetExceeded } from './budgets.js';
import { assertCategory, assertLedgerDate, assertPositiveAmount, assertTxType } from './validation.js';

/** Input as it arrives from a prompt or request body, before the type is checked */
export interface AddTransactionRequest extends Omit<TransactionInput, 'type'> {
  type: string;
}

export interface TransactionQuery extends Omit<TransactionFilter, 'type'> {
  type?: string;
}

function runBudgetCheck(ctx: FinanceContext, session: Session, category: string): BudgetCheck | null {
  try {
    const check = checkBudgetExceeded(ctx, session, category);
    if (check.exceeded && check.budget !== null) {
      ctx.log.warn(
        `[Budget] Warning: You have exceeded your budget for ${category}! ` +
          `Budget: ${formatMoney(check.budget)}, Spent: ${formatMoney(check.spent)}`,
      );
    }
    return check;
  } catch (error) {
    // The transaction is already stored; a failed advisory check must not undo that.
    if (!isFinanceError(error)) throw error;
    ctx.log.error(`[Budget] Error checking budget: ${error.message}`);
    return null;
  }
}

export function addTransaction(
  ctx: FinanceContext,
  session: Session,
  input: AddTransactionRequest,
): AddTransactionResult {
  const type = assertTxType(input.type);
  const amount = assertPositiveAmount(input.amount);
  const category = assertCategory(input.category);

  const transaction = insertTransaction(ctx.db, {
    userId: session.userId,
    type,
    amount,
    category,
    description: input.description ?? '',
    date: formatTimestamp(ctx.now()),
  });

  const budget = type === 'expense' ? runBudgetCheck(ctx, session, category) : null;
  return { transaction, budget };
}

/** Apply only the fields present in the patch; everything else keeps its stored value */
export function updateTransaction(
  ctx: FinanceContext,
  session: Session,
  id: number,
  patch: TransactionPatch,
): Transaction {
  if (patch.amount === undefined && patch.category === undefined && patch.description === undefined) {
    throw new FinanceError('NoOpUpdate', 'No updates provided.');
  }
  if (patch.amount !== undefined) assertPositiveAmount(patch.amount);
  const category = patch.category !== undefined ? assertCategory(patch.category) : undefined;

  const existing = getTransaction(ctx.db, session.userId, id);
  if (!existing) {
    throw new FinanceError('NotFound', "Transaction not found or you don't have permission to update it.");
  }

  const updated: Transaction = {
    ...existing,
    amount: patch.amount ?? existing.amount,
    category: category ?? existing.category,
    description: patch.description ?? existing.description,
  };
  const changes = updateTransactionRow(ctx.db, session.userId, id, updated);
  if (changes === 0) {
    throw new FinanceError('NotFound', "Transaction not found or you don't have permission to update it.");
  }
  return updated;
}

export function deleteTransaction(ctx: FinanceContext, session: Session, id: number): void {
  if (deleteTransactionRow(ctx.db, session.userId, id) === 0) {
    throw new FinanceError('NotFound', "Transaction not found or you don't have permission to delete it.");
  }
}

/** Most recent first. Date bounds are inclusive; a bare YYYY-MM-DD end covers the whole day. */
export function queryTransactions(
  ctx: FinanceContext,
  session: Session,
  query: TransactionQuery = {},
): Transaction[] {
  const filter: TransactionFilter = {
    startDate: query.startDate ? assertLedgerDate(query.startDate, 'Start date') : undefined,
    endDate: query.endDate ? assertLedgerDate(query.endDate, 'End date') : undefined,
    category: query.category || undefined,
    type: query.type ? assertTxType(query.type) : undefined,
  };
  return selectTransactions(ctx.db, session.userId, filter);
}
