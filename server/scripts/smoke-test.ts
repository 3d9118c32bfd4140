/**
 * Walks one throwaway account through the API end to end.
 * Start the server first (npm run server), then: npm run smoke
 * Steps share state, so the run stops at the first failing one.
 */

const API_BASE = process.env.FINANCE_API_URL ?? 'http://localhost:8787';

interface Reply {
  status: number;
  body: unknown;
}

interface Step {
  label: string;
  run: () => Promise<void>;
}

async function request(
  path: string,
  options: { method?: string; body?: unknown; token?: string } = {},
): Promise<Reply> {
  const response = await fetch(`${API_BASE}${path}`, {
    method: options.method ?? 'GET',
    headers: {
      'Content-Type': 'application/json',
      ...(options.token ? { Authorization: `Bearer ${options.token}` } : {}),
    },
    body: options.body === undefined ? undefined : JSON.stringify(options.body),
  });
  return { status: response.status, body: await response.json() };
}

function field(body: unknown, key: string): unknown {
  if (typeof body !== 'object' || body === null) return undefined;
  return Object.entries(body).find(([k]) => k === key)?.[1];
}

function expectStatus(reply: Reply, status: number): void {
  if (reply.status !== status) {
    throw new Error(`expected ${status}, got ${reply.status} ${JSON.stringify(reply.body)}`);
  }
}

const credentials = { username: `smoke-${Date.now()}`, password: 'test-password' };
let token = '';
let expenseId = 0;
let backup: unknown = null;

const steps: Step[] = [
  {
    label: 'health check',
    run: async () => expectStatus(await request('/health'), 200),
  },
  {
    label: 'register',
    run: async () => expectStatus(await request('/register', { method: 'POST', body: credentials }), 201),
  },
  {
    label: 'duplicate registration is a conflict',
    run: async () => expectStatus(await request('/register', { method: 'POST', body: credentials }), 409),
  },
  {
    label: 'login hands out a token',
    run: async () => {
      const reply = await request('/login', { method: 'POST', body: credentials });
      expectStatus(reply, 200);
      const value = field(reply.body, 'token');
      if (typeof value !== 'string') throw new Error('no token in login reply');
      token = value;
    },
  },
  {
    label: 'ledger is closed without a token',
    run: async () => expectStatus(await request('/transactions'), 401),
  },
  {
    label: 'add an expense',
    run: async () => {
      const reply = await request('/transactions', {
        method: 'POST',
        token,
        body: { type: 'expense', amount: 12.5, category: 'smoke', description: 'smoke run' },
      });
      expectStatus(reply, 201);
      const id = field(field(reply.body, 'transaction'), 'id');
      if (typeof id !== 'number') throw new Error('no id on the new transaction');
      expenseId = id;
    },
  },
  {
    label: 'monthly report counts the expense',
    run: async () => {
      const reply = await request('/reports/monthly', { token });
      expectStatus(reply, 200);
      if (field(reply.body, 'totalExpenses') !== 12.5) throw new Error(JSON.stringify(reply.body));
    },
  },
  {
    label: 'take a backup',
    run: async () => {
      const reply = await request('/backup', { token });
      expectStatus(reply, 200);
      backup = reply.body;
    },
  },
  {
    label: 'delete the expense',
    run: async () => expectStatus(await request(`/transactions/${expenseId}`, { method: 'DELETE', token }), 200),
  },
  {
    label: 'restore brings it back',
    run: async () => {
      expectStatus(await request('/restore', { method: 'POST', token, body: backup }), 200);
      const listed = await request('/transactions', { token });
      if (!Array.isArray(listed.body) || listed.body.length !== 1) throw new Error(JSON.stringify(listed.body));
    },
  },
];

async function main(): Promise<void> {
  console.log(`Smoke run against ${API_BASE}`);
  for (const [index, step] of steps.entries()) {
    try {
      await step.run();
      console.log(`  ok   ${step.label}`);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.log(`  FAIL ${step.label}: ${reason}`);
      console.log(`${index}/${steps.length} steps passed`);
      process.exitCode = 1;
      return;
    }
  }
  console.log(`${steps.length}/${steps.length} steps passed`);
}

void main();
