import express, { type ErrorRequestHandler, type Request, type Response } from 'express';
import cors from 'cors';
import type { FinanceContext } from '../../src/context.js';
import { FinanceError, type FinanceErrorCode } from '../../src/domain/errors.js';
import {
  BudgetBodySchema,
  CredentialsBodySchema,
  TransactionBodySchema,
  TransactionPatchBodySchema,
  parseWith,
} from '../../src/domain/schemas.js';
import type { Session } from '../../src/domain/types.js';
import { authenticate, registerUser, requireSession } from '../../src/finance/credentials.js';
import { addTransaction, deleteTransaction, queryTransactions, updateTransaction } from '../../src/finance/ledger.js';
import { checkBudgetExceeded, listBudgets, setBudget } from '../../src/finance/budgets.js';
import { generateReport } from '../../src/finance/reports.js';
import { createBackup, restoreBackup } from '../../src/finance/backup.js';
import { runOperation, type OperationResult } from '../../src/finance/result.js';
import { SessionStore } from './sessions.js';

export interface AppOptions {
  sessions?: SessionStore;
  restoreKeepsBudgetPeriod?: boolean;
}

const STATUS_BY_CODE: Record<FinanceErrorCode, number> = {
  InvalidInput: 400,
  InvalidAmount: 400,
  InvalidKind: 400,
  InvalidPeriod: 400,
  NoOpUpdate: 400,
  InvalidCredentials: 401,
  NotAuthenticated: 401,
  OwnershipMismatch: 403,
  NotFound: 404,
  DuplicateUser: 409,
  StorageFailure: 500,
};

export function statusFor(code: FinanceErrorCode): number {
  return STATUS_BY_CODE[code];
}

/** Success bodies are the operation's value; failures are { error, code } */
export function toHttpResponse<T>(result: OperationResult<T>, successStatus = 200): { status: number; body: unknown } {
  if (result.ok) {
    return { status: successStatus, body: result.value === undefined ? { ok: true } : result.value };
  }
  return { status: statusFor(result.code), body: { error: result.message, code: result.code } };
}

/** Backups travel as one JSON body, so the parser limit has to fit a full ledger */
const BODY_LIMIT = '10mb';

/** body-parser rejections carry an HTTP status and a `type` such as 'entity.too.large' */
function bodyErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if (!('type' in error) || typeof error.type !== 'string' || !error.type.startsWith('entity.')) return undefined;
  return 'status' in error && typeof error.status === 'number' ? error.status : 400;
}

const handleBodyErrors: ErrorRequestHandler = (error: unknown, _req, res, next) => {
  const status = bodyErrorStatus(error);
  if (status === undefined) {
    next(error);
    return;
  }
  const message = status === 413 ? 'Request body is too large.' : 'Request body is not valid JSON.';
  res.status(status).json({ error: message, code: 'InvalidInput' });
};

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function parseIdParam(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new FinanceError('InvalidInput', `Invalid transaction id: ${value}`);
  }
  return Number(value);
}

export function createApp(ctx: FinanceContext, options: AppOptions = {}) {
  const sessions = options.sessions ?? new SessionStore();
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: BODY_LIMIT }));

  function sessionOf(req: Request): Session | undefined {
    const token = SessionStore.tokenFrom(req.get('authorization'));
    return token ? sessions.get(token) : undefined;
  }

  async function send<T>(
    res: Response,
    label: string,
    fn: () => T | Promise<T>,
    successStatus = 200,
  ): Promise<void> {
    const result = await runOperation(fn, () => label, ctx.log);
    if (!result.ok && result.code === 'StorageFailure') {
      ctx.log.error(`[API] Error in ${label}: ${result.message}`);
    }
    const { status, body } = toHttpResponse(result, successStatus);
    res.status(status).json(body);
  }

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  // --- Accounts ---

  app.post('/register', (req, res) => {
    void send(res, 'register', () => {
      const { username, password } = parseWith(CredentialsBodySchema, req.body, 'request body');
      return registerUser(ctx, username, password);
    }, 201);
  });

  app.post('/login', (req, res) => {
    void send(res, 'login', () => {
      const { username, password } = parseWith(CredentialsBodySchema, req.body, 'request body');
      const session = authenticate(ctx, username, password);
      return { token: sessions.open(session), ...session };
    });
  });

  app.post('/logout', (req, res) => {
    void send(res, 'logout', () => {
      const token = SessionStore.tokenFrom(req.get('authorization'));
      if (!token || !sessions.close(token)) {
        throw new FinanceError('NotAuthenticated', 'Please log in first.');
      }
    });
  });

  // --- Transactions ---

  // GET /transactions?start=YYYY-MM-DD&end=YYYY-MM-DD&category=...&type=income|expense
  app.get('/transactions', (req, res) => {
    void send(res, 'list transactions', () =>
      queryTransactions(ctx, requireSession(sessionOf(req)), {
        startDate: queryString(req.query.start),
        endDate: queryString(req.query.end),
        category: queryString(req.query.category),
        type: queryString(req.query.type),
      }),
    );
  });

  app.post('/transactions', (req, res) => {
    void send(res, 'add transaction', () => {
      const session = requireSession(sessionOf(req));
      const body = parseWith(TransactionBodySchema, req.body, 'request body');
      return addTransaction(ctx, session, body);
    }, 201);
  });

  app.patch('/transactions/:id', (req, res) => {
    void send(res, 'update transaction', () => {
      const session = requireSession(sessionOf(req));
      const patch = parseWith(TransactionPatchBodySchema, req.body, 'request body');
      return updateTransaction(ctx, session, parseIdParam(req.params.id), patch);
    });
  });

  app.delete('/transactions/:id', (req, res) => {
    void send(res, 'delete transaction', () =>
      deleteTransaction(ctx, requireSession(sessionOf(req)), parseIdParam(req.params.id)),
    );
  });

  // --- Budgets (current month) ---

  app.get('/budgets', (req, res) => {
    void send(res, 'list budgets', () => listBudgets(ctx, requireSession(sessionOf(req))));
  });

  app.put('/budgets', (req, res) => {
    void send(res, 'set budget', () => {
      const session = requireSession(sessionOf(req));
      const { category, amount } = parseWith(BudgetBodySchema, req.body, 'request body');
      return setBudget(ctx, session, category, amount);
    });
  });

  app.get('/budgets/:category/status', (req, res) => {
    void send(res, 'check budget', () =>
      checkBudgetExceeded(ctx, requireSession(sessionOf(req)), req.params.category),
    );
  });

  // --- Reports ---

  app.get('/reports/:period', (req, res) => {
    void send(res, 'generate report', () =>
      generateReport(ctx, requireSession(sessionOf(req)), req.params.period),
    );
  });

  // --- Backup / restore ---

  app.get('/backup', (req, res) => {
    void send(res, 'backup', () => createBackup(ctx, requireSession(sessionOf(req))));
  });

  app.post('/restore', (req, res) => {
    void send(res, 'restore', () =>
      restoreBackup(ctx, requireSession(sessionOf(req)), req.body, {
        preserveBudgetPeriod: options.restoreKeepsBudgetPeriod ?? false,
      }),
    );
  });

  app.use(handleBodyErrors);

  return app;
}
