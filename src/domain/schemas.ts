import { z } from 'zod/v4';
import { FinanceError } from './errors.js';
import { isLedgerDate } from './computations.js';

export const TxTypeSchema = z.enum(['income', 'expense']);

export const LedgerDateSchema = z.string().refine(isLedgerDate, {
  message: 'expected YYYY-MM-DD or YYYY-MM-DD HH:MM:SS',
});

/** Same rule as the ledger: trimmed, never empty */
export const CategorySchema = z.string().trim().min(1, 'Category cannot be empty.');

// --- Backup document (field names are the on-disk format) ---

export const BackupTransactionSchema = z.object({
  id: z.number().int().optional(),
  type: TxTypeSchema,
  amount: z.number().positive(),
  category: CategorySchema,
  description: z.string().nullable().optional(),
  date: LedgerDateSchema,
});

export const BackupBudgetSchema = z.object({
  category: CategorySchema,
  amount: z.number().positive(),
  month: z.number().int().min(1).max(12).optional(),
  year: z.number().int().optional(),
});

export const BackupDocumentSchema = z.object({
  user_id: z.number().int(),
  backup_date: z.string(),
  transactions: z.array(BackupTransactionSchema),
  budgets: z.array(BackupBudgetSchema),
});

export type BackupTransaction = z.infer<typeof BackupTransactionSchema>;
export type BackupBudget = z.infer<typeof BackupBudgetSchema>;
export type BackupDocument = z.infer<typeof BackupDocumentSchema>;

// --- Request bodies ---
// type stays a plain string here so an unknown kind surfaces as InvalidKind from the ledger.

export const CredentialsBodySchema = z.object({
  username: z.string(),
  password: z.string(),
});

export const TransactionBodySchema = z.object({
  type: z.string(),
  amount: z.number(),
  category: z.string(),
  description: z.string().optional(),
});

export const TransactionPatchBodySchema = z.object({
  amount: z.number().optional(),
  category: z.string().optional(),
  description: z.string().optional(),
});

export const BudgetBodySchema = z.object({
  category: z.string(),
  amount: z.number(),
});

/** Parse or fail with InvalidInput naming the first offending paths */
export function parseWith<T extends z.ZodType>(schema: T, value: unknown, label: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => {
        const path = issue.path.map(String).join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join('; ');
    throw new FinanceError('InvalidInput', `Invalid ${label}: ${detail}`);
  }
  return result.data;
}
