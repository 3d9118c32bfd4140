/**
 * Repository layer: every SQL statement the app runs lives here.
 *
 * All reads and writes are scoped by user_id; callers never see rows owned
 * by someone else. SQLite failures surface as StorageFailure.
 */
import Database from 'better-sqlite3';
import { FinanceError } from '../domain/errors.js';
import { inclusiveEndBound } from '../domain/computations.js';
import type { Budget, Transaction, TransactionFilter, TxType } from '../domain/types.js';

type Db = Database.Database;

// --- Row shapes (column names as stored) ---

export interface UserRow {
  id: number;
  username: string;
  password: string;
}

interface TransactionRow {
  id: number;
  user_id: number;
  type: string;
  amount: number;
  category: string;
  description: string | null;
  date: string;
}

interface BudgetRow {
  id: number;
  user_id: number;
  category: string;
  amount: number;
  month: number;
  year: number;
}

export interface NewTransactionRow {
  userId: number;
  type: TxType;
  amount: number;
  category: string;
  description: string;
  date: string;
}

function guard<T>(action: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof Database.SqliteError) {
      throw new FinanceError('StorageFailure', `Failed to ${action}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

function toTxType(value: string): TxType {
  if (value === 'income' || value === 'expense') return value;
  throw new FinanceError('StorageFailure', `Unexpected transaction type in storage: ${value}`);
}

function toTransaction(row: TransactionRow): Transaction {
  return {
    id: row.id,
    userId: row.user_id,
    type: toTxType(row.type),
    amount: row.amount,
    category: row.category,
    description: row.description ?? '',
    date: row.date,
  };
}

function toBudget(row: BudgetRow): Budget {
  return {
    id: row.id,
    userId: row.user_id,
    category: row.category,
    amount: row.amount,
    month: row.month,
    year: row.year,
  };
}

// --- Users ---

export function findUserByName(db: Db, username: string): UserRow | undefined {
  return guard('look up user', () =>
    db.prepare<[string], UserRow>('SELECT id, username, password FROM users WHERE username = ?').get(username),
  );
}

export function insertUser(db: Db, username: string, digest: string): number {
  return guard('create user', () => {
    try {
      const result = db.prepare<[string, string]>('INSERT INTO users (username, password) VALUES (?, ?)').run(username, digest);
      return Number(result.lastInsertRowid);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new FinanceError('DuplicateUser', 'Username already exists. Please choose a different one.', { cause: error });
      }
      throw error;
    }
  });
}

export function updateUserPassword(db: Db, userId: number, digest: string): void {
  guard('update password', () => {
    db.prepare<[string, number]>('UPDATE users SET password = ? WHERE id = ?').run(digest, userId);
  });
}

// --- Transactions ---

const TXN_COLUMNS = 'id, user_id, type, amount, category, description, date';

export function insertTransaction(db: Db, row: NewTransactionRow): Transaction {
  return guard('add transaction', () => {
    const result = db
      .prepare<[number, string, number, string, string, string]>(
        `INSERT INTO transactions (user_id, type, amount, category, description, date)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(row.userId, row.type, row.amount, row.category, row.description, row.date);
    return { id: Number(result.lastInsertRowid), ...row };
  });
}

export function getTransaction(db: Db, userId: number, id: number): Transaction | undefined {
  return guard('read transaction', () => {
    const row = db
      .prepare<[number, number], TransactionRow>(`SELECT ${TXN_COLUMNS} FROM transactions WHERE id = ? AND user_id = ?`)
      .get(id, userId);
    return row ? toTransaction(row) : undefined;
  });
}

/** Returns the number of rows changed (0 when the id is not the user's) */
export function updateTransactionRow(
  db: Db,
  userId: number,
  id: number,
  fields: { amount: number; category: string; description: string },
): number {
  return guard('update transaction', () =>
    db
      .prepare<[number, string, string, number, number]>(
        'UPDATE transactions SET amount = ?, category = ?, description = ? WHERE id = ? AND user_id = ?',
      )
      .run(fields.amount, fields.category, fields.description, id, userId).changes,
  );
}

export function deleteTransactionRow(db: Db, userId: number, id: number): number {
  return guard('delete transaction', () =>
    db.prepare<[number, number]>('DELETE FROM transactions WHERE id = ? AND user_id = ?').run(id, userId).changes,
  );
}

export function selectTransactions(db: Db, userId: number, filter: TransactionFilter = {}): Transaction[] {
  const conditions = ['user_id = ?'];
  const params: (string | number)[] = [userId];

  if (filter.startDate) {
    conditions.push('date >= ?');
    params.push(filter.startDate);
  }
  if (filter.endDate) {
    conditions.push('date <= ?');
    params.push(inclusiveEndBound(filter.endDate));
  }
  if (filter.category) {
    conditions.push('category = ?');
    params.push(filter.category);
  }
  if (filter.type) {
    conditions.push('type = ?');
    params.push(filter.type);
  }

  return guard('list transactions', () =>
    db
      .prepare<(string | number)[], TransactionRow>(
        `SELECT ${TXN_COLUMNS} FROM transactions
         WHERE ${conditions.join(' AND ')}
         ORDER BY date DESC, id DESC`,
      )
      .all(...params)
      .map(toTransaction),
  );
}

export function deleteAllTransactions(db: Db, userId: number): number {
  return guard('clear transactions', () =>
    db.prepare<[number]>('DELETE FROM transactions WHERE user_id = ?').run(userId).changes,
  );
}

// --- Budgets ---

export function upsertBudget(
  db: Db,
  userId: number,
  budget: { category: string; amount: number; month: number; year: number },
): Budget {
  return guard('set budget', () => {
    db.prepare<[number, string, number, number, number]>(`
      INSERT INTO budgets (user_id, category, amount, month, year)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(user_id, category, month, year) DO UPDATE SET
        amount = excluded.amount
    `).run(userId, budget.category, budget.amount, budget.month, budget.year);

    const row = db
      .prepare<[number, string, number, number], BudgetRow>(
        'SELECT * FROM budgets WHERE user_id = ? AND category = ? AND month = ? AND year = ?',
      )
      .get(userId, budget.category, budget.month, budget.year);
    if (!row) {
      throw new FinanceError('StorageFailure', `Budget for ${budget.category} was not stored`);
    }
    return toBudget(row);
  });
}

export function findBudget(
  db: Db,
  userId: number,
  category: string,
  month: number,
  year: number,
): Budget | undefined {
  return guard('read budget', () => {
    const row = db
      .prepare<[number, string, number, number], BudgetRow>(
        'SELECT * FROM budgets WHERE user_id = ? AND category = ? AND month = ? AND year = ?',
      )
      .get(userId, category, month, year);
    return row ? toBudget(row) : undefined;
  });
}

export function selectBudgets(db: Db, userId: number, month: number, year: number): Budget[] {
  return guard('list budgets', () =>
    db
      .prepare<[number, number, number], BudgetRow>(
        'SELECT * FROM budgets WHERE user_id = ? AND month = ? AND year = ? ORDER BY category ASC',
      )
      .all(userId, month, year)
      .map(toBudget),
  );
}

export function deleteAllBudgets(db: Db, userId: number): number {
  return guard('clear budgets', () =>
    db.prepare<[number]>('DELETE FROM budgets WHERE user_id = ?').run(userId).changes,
  );
}
