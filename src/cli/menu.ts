/**
 * Menu-driven terminal front end. Every action goes through runOperation,
 * prints its message and loops back to the menu; only Exit (or the end of
 * input) leaves the loop.
 */
import type { FinanceContext } from '../context.js';
import { summarizeTransactions } from '../domain/computations.js';
import type { Session } from '../domain/types.js';
import { authenticate, registerUser, requireSession } from '../finance/credentials.js';
import { addTransaction, deleteTransaction, queryTransactions, updateTransaction, type TransactionQuery } from '../finance/ledger.js';
import { listBudgets, setBudget } from '../finance/budgets.js';
import { generateReport } from '../finance/reports.js';
import { createBackup, defaultBackupFileName, readBackupFile, restoreBackup, writeBackupFile } from '../finance/backup.js';
import { runOperation, type OperationResult } from '../finance/result.js';
import { createPrompter, type Prompter } from './prompter.js';
import {
  MENU,
  createPalette,
  formatBudgets,
  formatReport,
  formatTransactionList,
  monthLabel,
  type Palette,
} from './format.js';

export interface MenuOptions {
  ctx: FinanceContext;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream & { isTTY?: boolean };
  restoreKeepsBudgetPeriod?: boolean;
}

/** Number typed at a prompt, or null when it does not parse */
export function parseNumber(text: string): number | null {
  const trimmed = text.trim();
  if (!trimmed) return null;
  const value = Number(trimmed);
  return Number.isNaN(value) ? null : value;
}

export function parseId(text: string): number | null {
  const trimmed = text.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : null;
}

class Menu {
  private session: Session | null = null;
  private readonly c: Palette;

  constructor(
    private readonly ctx: FinanceContext,
    private readonly prompt: Prompter,
    private readonly output: NodeJS.WritableStream,
    private readonly restoreKeepsBudgetPeriod: boolean,
    colors: boolean,
  ) {
    this.c = createPalette(colors);
  }

  private say(...lines: string[]): void {
    for (const line of lines) this.output.write(`${line}\n`);
  }

  private async ask(question: string): Promise<string> {
    return (await this.prompt.ask(question)) ?? '';
  }

  private show<T>(result: OperationResult<T>): result is Extract<OperationResult<T>, { ok: true }> {
    this.say(result.ok ? this.c.green(result.message) : this.c.red(result.message));
    return result.ok;
  }

  private run<T>(fn: (session: Session) => T | Promise<T>, describe: (value: T) => string) {
    return runOperation(() => fn(requireSession(this.session)), describe, this.ctx.log);
  }

  async loop(): Promise<void> {
    for (;;) {
      this.say(MENU);
      const choice = await this.prompt.ask('Enter your choice (1-14): ');
      if (choice === null) return;

      switch (choice.trim()) {
        case '1': await this.register(); break;
        case '2': await this.login(); break;
        case '3': await this.add('income'); break;
        case '4': await this.add('expense'); break;
        case '5': await this.view(); break;
        case '6': await this.update(); break;
        case '7': await this.remove(); break;
        case '8': await this.report(); break;
        case '9': await this.setBudget(); break;
        case '10': await this.viewBudgets(); break;
        case '11': await this.backup(); break;
        case '12': await this.restore(); break;
        case '13':
          this.session = null;
          this.say('Logged out.');
          break;
        case '14':
          this.say('Thank you for using Personal Finance Manager!');
          return;
        default:
          this.say(this.c.red('Invalid choice. Please try again.'));
      }
    }
  }

  private async register(): Promise<void> {
    const username = (await this.ask('Enter username: ')).trim();
    const password = await this.ask('Enter password: ');
    this.show(await runOperation(() => registerUser(this.ctx, username, password), () => 'Registration successful!', this.ctx.log));
  }

  private async login(): Promise<void> {
    const username = (await this.ask('Enter username: ')).trim();
    const password = await this.ask('Enter password: ');
    const result = await runOperation(
      () => authenticate(this.ctx, username, password),
      (s) => `Welcome, ${s.username}!`,
      this.ctx.log,
    );
    if (this.show(result)) {
      this.session = result.value;
    }
  }

  private async add(type: 'income' | 'expense'): Promise<void> {
    const amount = parseNumber(await this.ask(`Enter ${type} amount: `));
    if (amount === null) {
      this.say(this.c.red('Invalid amount. Please enter a number.'));
      return;
    }
    const category = (await this.ask('Enter category: ')).trim();
    const description = (await this.ask('Enter description (optional): ')).trim();
    const result = await this.run(
      (s) => addTransaction(this.ctx, s, { type, amount, category, description }),
      () => 'Transaction added successfully!',
    );
    // An exceeded budget is reported through ctx.log.warn by the ledger
    this.show(result);
  }

  private async view(): Promise<void> {
    this.say('', 'Filter options:', '1. All transactions', '2. By date range', '3. By category', '4. By type (income/expense)');
    const filterChoice = (await this.ask('Enter your choice (1-4): ')).trim();

    const query: TransactionQuery = {};
    if (filterChoice === '2') {
      query.startDate = (await this.ask('Enter start date (YYYY-MM-DD): ')).trim();
      query.endDate = (await this.ask('Enter end date (YYYY-MM-DD): ')).trim();
    } else if (filterChoice === '3') {
      query.category = (await this.ask('Enter category: ')).trim();
    } else if (filterChoice === '4') {
      query.type = (await this.ask('Enter type (income/expense): ')).trim().toLowerCase();
    }

    const result = await this.run(
      (s) => queryTransactions(this.ctx, s, query),
      (txns) => `${txns.length} transaction(s) found.`,
    );
    if (!result.ok) {
      this.say(this.c.red(result.message));
    } else if (result.value.length === 0) {
      this.say('No transactions found.');
    } else {
      this.say(...formatTransactionList(result.value, summarizeTransactions(result.value)));
    }
  }

  private async update(): Promise<void> {
    const id = parseId(await this.ask('Enter transaction ID to update: '));
    if (id === null) {
      this.say(this.c.red('Invalid transaction ID.'));
      return;
    }
    this.say('Leave field blank to keep current value:');
    const amountText = (await this.ask('Enter new amount: ')).trim();
    const amount = amountText ? parseNumber(amountText) : undefined;
    if (amount === null) {
      this.say(this.c.red('Invalid amount. Please enter a number.'));
      return;
    }
    const category = (await this.ask('Enter new category: ')).trim() || undefined;
    const description = (await this.ask('Enter new description: ')).trim() || undefined;

    this.show(
      await this.run(
        (s) => updateTransaction(this.ctx, s, id, { amount, category, description }),
        () => 'Transaction updated successfully!',
      ),
    );
  }

  private async remove(): Promise<void> {
    const id = parseId(await this.ask('Enter transaction ID to delete: '));
    if (id === null) {
      this.say(this.c.red('Invalid transaction ID.'));
      return;
    }
    this.show(await this.run((s) => deleteTransaction(this.ctx, s, id), () => 'Transaction deleted successfully!'));
  }

  private async report(): Promise<void> {
    const period = (await this.ask('Enter period (monthly/yearly): ')).trim().toLowerCase();
    const result = await this.run(
      (s) => generateReport(this.ctx, s, period),
      (r) => `Report generated for ${r.startDate} to ${r.endDate}.`,
    );
    if (result.ok) {
      this.say(...formatReport(result.value));
    } else {
      this.say(this.c.red(result.message));
    }
  }

  private async setBudget(): Promise<void> {
    const category = (await this.ask('Enter category: ')).trim();
    const amount = parseNumber(await this.ask('Enter budget amount: '));
    if (amount === null) {
      this.say(this.c.red('Invalid amount. Please enter a number.'));
      return;
    }
    this.show(
      await this.run(
        (s) => setBudget(this.ctx, s, category, amount),
        (b) => `Budget for ${b.category} set to $${b.amount.toFixed(2)} for ${monthLabel(b.month, b.year)}.`,
      ),
    );
  }

  private async viewBudgets(): Promise<void> {
    const result = await this.run((s) => listBudgets(this.ctx, s), (b) => `${b.length} budget(s).`);
    if (!result.ok) {
      this.say(this.c.red(result.message));
    } else if (result.value.length === 0) {
      this.say('No budgets set for this month.');
    } else {
      this.say(...formatBudgets(result.value));
    }
  }

  private async backup(): Promise<void> {
    const fileName = (await this.ask('Enter backup filename: ')).trim() || defaultBackupFileName(this.ctx.now());
    this.show(
      await this.run(
        async (s) => {
          await writeBackupFile(fileName, createBackup(this.ctx, s));
          return fileName;
        },
        (name) => `Backup created successfully: ${name}`,
      ),
    );
  }

  private async restore(): Promise<void> {
    const fileName = (await this.ask('Enter backup filename: ')).trim();
    this.show(
      await this.run(
        async (s) =>
          restoreBackup(this.ctx, s, await readBackupFile(fileName), {
            preserveBudgetPeriod: this.restoreKeepsBudgetPeriod,
          }),
        (summary) => `Data restored successfully! (${summary.transactions} transactions, ${summary.budgets} budgets)`,
      ),
    );
  }
}

export async function runMenu(options: MenuOptions): Promise<void> {
  const prompt = createPrompter(options.input, options.output);
  const menu = new Menu(
    options.ctx,
    prompt,
    options.output,
    options.restoreKeepsBudgetPeriod ?? false,
    options.output.isTTY === true,
  );
  try {
    await menu.loop();
  } finally {
    prompt.close();
  }
}
