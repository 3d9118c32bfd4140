/**
 * SQLite database definition using better-sqlite3.
 *
 * The table layout matches finance.db files written by earlier versions,
 * so an existing file opens without conversion.
 */
import Database from 'better-sqlite3';
import type { Logger } from '../context.js';

export function openDatabase(filename: string, log: Logger = console): Database.Database {
  const db = new Database(filename);

  // WAL only applies to file databases; ':memory:' stays in memory mode
  if (filename !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      username TEXT UNIQUE NOT NULL,
      password TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS transactions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL,
      type TEXT NOT NULL CHECK(type IN ('income', 'expense')),
      amount REAL NOT NULL,
      category TEXT NOT NULL,
      description TEXT,
      date TEXT NOT NULL,
      FOREIGN KEY (user_id) REFERENCES users (id)
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS budgets (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL,
      category TEXT NOT NULL,
      amount REAL NOT NULL,
      month INTEGER NOT NULL,
      year INTEGER NOT NULL,
      FOREIGN KEY (user_id) REFERENCES users (id),
      UNIQUE(user_id, category, month, year)
    )
  `);

  // Listing and range filters are always scoped to one user
  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_transactions_user_date ON transactions(user_id, date)
  `);

  // --- Migrations: safe for databases created before these columns existed ---

  const txnColumns = db.prepare<[], { name: string }>('PRAGMA table_info(transactions)').all();
  const txnColNames = new Set(txnColumns.map((c) => c.name));
  if (!txnColNames.has('description')) {
    db.exec(`ALTER TABLE transactions ADD COLUMN description TEXT`);
  }

  const userCount = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM users').get();
  log.log(`[DB] Opened ${filename} (${userCount?.n ?? 0} users)`);

  return db;
}
