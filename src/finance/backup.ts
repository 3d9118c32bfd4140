/**
 * JSON backup and restore of one user's transactions and current budgets.
 *
 * Restore is destructive: the user's rows are wiped and replaced by the
 * document's contents in a single SQLite transaction.
 */
import { readFile, writeFile } from 'node:fs/promises';
import type { FinanceContext } from '../context.js';
import { FinanceError } from '../domain/errors.js';
import { compactTimestamp, formatTimestamp, monthOf } from '../domain/computations.js';
import { BackupDocumentSchema, parseWith, type BackupBudget, type BackupDocument } from '../domain/schemas.js';
import type { Session } from '../domain/types.js';
import {
  deleteAllBudgets,
  deleteAllTransactions,
  insertTransaction,
  selectBudgets,
  selectTransactions,
  upsertBudget,
} from '../db/repo.js';

export interface RestoreOptions {
  /**
   * Keep the month/year a budget was recorded under. Off by default: restored
   * budgets land in the current month, as they always have.
   */
  preserveBudgetPeriod?: boolean;
}

export interface RestoreSummary {
  transactions: number;
  budgets: number;
}

export function defaultBackupFileName(now: Date): string {
  return `finance_backup_${compactTimestamp(now)}.json`;
}

export function createBackup(ctx: FinanceContext, session: Session): BackupDocument {
  const now = ctx.now();
  const { month, year } = monthOf(now);
  const transactions = selectTransactions(ctx.db, session.userId);
  const budgets = selectBudgets(ctx.db, session.userId, month, year);

  return {
    user_id: session.userId,
    backup_date: formatTimestamp(now),
    transactions: transactions.map((t) => ({
      id: t.id,
      type: t.type,
      amount: t.amount,
      category: t.category,
      description: t.description,
      date: t.date,
    })),
    budgets: budgets.map((b) => ({
      category: b.category,
      amount: b.amount,
      month: b.month,
      year: b.year,
    })),
  };
}

function budgetPeriod(
  budget: BackupBudget,
  current: { month: number; year: number },
  preserve: boolean,
): { month: number; year: number } {
  if (preserve && budget.month !== undefined && budget.year !== undefined) {
    return { month: budget.month, year: budget.year };
  }
  return current;
}

export function restoreBackup(
  ctx: FinanceContext,
  session: Session,
  document: unknown,
  options: RestoreOptions = {},
): RestoreSummary {
  const doc = parseWith(BackupDocumentSchema, document, 'backup document');
  if (doc.user_id !== session.userId) {
    throw new FinanceError('OwnershipMismatch', 'Backup file does not belong to the current user.');
  }

  const current = monthOf(ctx.now());
  const preserve = options.preserveBudgetPeriod ?? false;

  const replaceAll = ctx.db.transaction(() => {
    deleteAllTransactions(ctx.db, session.userId);
    deleteAllBudgets(ctx.db, session.userId);

    // Oldest first, so new ids keep their order among equal timestamps
    const chronological = [...doc.transactions].sort(
      (a, b) => a.date.localeCompare(b.date) || (a.id ?? 0) - (b.id ?? 0),
    );
    for (const t of chronological) {
      insertTransaction(ctx.db, {
        userId: session.userId,
        type: t.type,
        amount: t.amount,
        category: t.category,
        description: t.description ?? '',
        date: t.date,
      });
    }

    for (const b of doc.budgets) {
      upsertBudget(ctx.db, session.userId, {
        category: b.category,
        amount: b.amount,
        ...budgetPeriod(b, current, preserve),
      });
    }
  });
  replaceAll();

  ctx.log.log(
    `[Backup] Restored ${doc.transactions.length} transactions and ${doc.budgets.length} budgets for user ${session.userId}`,
  );
  return { transactions: doc.transactions.length, budgets: doc.budgets.length };
}

export async function writeBackupFile(path: string, document: BackupDocument): Promise<void> {
  try {
    await writeFile(path, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FinanceError('StorageFailure', `Error creating backup: ${reason}`, { cause: error });
  }
}

/** Reads and parses the file; the shape is checked by restoreBackup */
export async function readBackupFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new FinanceError('NotFound', 'Backup file not found.', { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new FinanceError('StorageFailure', `Error reading backup: ${reason}`, { cause: error });
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new FinanceError('InvalidInput', 'Backup file is not valid JSON.', { cause: error });
  }
}
