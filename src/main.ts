#!/usr/bin/env node
import { loadConfig } from './config.js';
import { createContext } from './context.js';
import { openDatabase } from './db/database.js';
import { runMenu } from './cli/menu.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const db = openDatabase(config.dbPath);
  try {
    await runMenu({
      ctx: createContext(db),
      input: process.stdin,
      output: process.stdout,
      restoreKeepsBudgetPeriod: config.restoreKeepsBudgetPeriod,
    });
  } finally {
    db.close();
  }
}

main().catch((error: unknown) => {
  console.error('[App] Fatal error:', error);
  process.exitCode = 1;
});
