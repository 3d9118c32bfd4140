import { describe, it, expect, beforeEach } from 'vitest';
import { generateReport } from '../../src/finance/reports.js';
import { addTransaction } from '../../src/finance/ledger.js';
import type { Session } from '../../src/domain/types.js';
import { NOW, makeContext, signUp, thrown, type TestContext } from '../helpers.js';

describe('generateReport', () => {
  let t: TestContext;
  let alice: Session;

  beforeEach(() => {
    t = makeContext();
    alice = signUp(t.ctx, 'alice');

    t.setNow(new Date(2025, 11, 20, 10, 0, 0));
    addTransaction(t.ctx, alice, { type: 'income', amount: 300, category: 'bonus' });
    t.setNow(new Date(2026, 8, 12, 10, 0, 0));
    addTransaction(t.ctx, alice, { type: 'expense', amount: 200, category: 'travel' });
    t.setNow(NOW);
    addTransaction(t.ctx, alice, { type: 'income', amount: 1000, category: 'salary' });
    addTransaction(t.ctx, alice, { type: 'expense', amount: 60, category: 'food' });
    addTransaction(t.ctx, alice, { type: 'expense', amount: 50, category: 'food' });
    addTransaction(t.ctx, alice, { type: 'expense', amount: 500, category: 'rent' });
  });

  it('covers the current month up to and including today', () => {
    expect(generateReport(t.ctx, alice, 'monthly')).toEqual({
      period: 'monthly',
      startDate: '2026-10-01',
      endDate: '2026-10-19',
      totalIncome: 1000,
      totalExpenses: 610,
      savings: 390,
      categoryExpenses: [
        { category: 'rent', spent: 500 },
        { category: 'food', spent: 110 },
      ],
    });
  });

  it('covers the current year up to today', () => {
    expect(generateReport(t.ctx, alice, 'yearly')).toEqual({
      period: 'yearly',
      startDate: '2026-01-01',
      endDate: '2026-10-19',
      totalIncome: 1000,
      totalExpenses: 810,
      savings: 190,
      categoryExpenses: [
        { category: 'rent', spent: 500 },
        { category: 'travel', spent: 200 },
        { category: 'food', spent: 110 },
      ],
    });
  });

  it("leaves out other users' transactions", () => {
    const bob = signUp(t.ctx, 'bob');
    addTransaction(t.ctx, bob, { type: 'expense', amount: 75, category: 'food' });
    expect(generateReport(t.ctx, alice, 'monthly').totalExpenses).toBe(610);
    expect(generateReport(t.ctx, bob, 'monthly')).toMatchObject({ totalIncome: 0, totalExpenses: 75, savings: -75 });
  });

  it('rejects any other period', () => {
    expect(thrown(() => generateReport(t.ctx, alice, 'weekly'))).toMatchObject({
      code: 'InvalidPeriod',
      message: "Invalid period. Use 'monthly' or 'yearly'.",
    });
  });
});
