import { describe, it, expect, beforeEach } from 'vitest';
import { checkBudgetExceeded, listBudgets, setBudget } from '../../src/finance/budgets.js';
import { addTransaction } from '../../src/finance/ledger.js';
import type { Session } from '../../src/domain/types.js';
import { NOW, makeContext, signUp, thrown, type TestContext } from '../helpers.js';

describe('budgets', () => {
  let t: TestContext;
  let alice: Session;

  beforeEach(() => {
    t = makeContext();
    alice = signUp(t.ctx, 'alice');
  });

  describe('setBudget', () => {
    it('applies to the current month', () => {
      const budget = setBudget(t.ctx, alice, 'food', 100);
      expect(budget).toMatchObject({ userId: alice.userId, category: 'food', amount: 100, month: 10, year: 2026 });
    });

    it('replaces the ceiling when set again in the same month', () => {
      setBudget(t.ctx, alice, 'food', 100);
      setBudget(t.ctx, alice, 'food', 150);
      const budgets = listBudgets(t.ctx, alice);
      expect(budgets).toHaveLength(1);
      expect(budgets[0]).toMatchObject({ category: 'food', amount: 150 });
    });

    it.each([0, -20])('rejects the amount %s', (amount) => {
      expect(thrown(() => setBudget(t.ctx, alice, 'food', amount))).toMatchObject({
        code: 'InvalidAmount',
        message: 'Budget amount must be positive.',
      });
    });

    it('rejects an empty category', () => {
      expect(thrown(() => setBudget(t.ctx, alice, '', 10))).toMatchObject({ code: 'InvalidInput' });
    });
  });

  describe('listBudgets', () => {
    it("returns this month's budgets, sorted by category", () => {
      setBudget(t.ctx, alice, 'rent', 900);
      setBudget(t.ctx, alice, 'food', 100);
      expect(listBudgets(t.ctx, alice).map((b) => b.category)).toEqual(['food', 'rent']);
    });

    it("no longer shows last month's budgets once the month rolls over", () => {
      setBudget(t.ctx, alice, 'food', 100);
      t.setNow(new Date(2026, 10, 1, 8, 0, 0));
      expect(listBudgets(t.ctx, alice)).toEqual([]);
    });

    it("does not show another user's budgets", () => {
      const bob = signUp(t.ctx, 'bob');
      setBudget(t.ctx, bob, 'food', 100);
      expect(listBudgets(t.ctx, alice)).toEqual([]);
    });
  });

  describe('checkBudgetExceeded', () => {
    it('reports exceeded once month-to-date expenses pass the ceiling', () => {
      setBudget(t.ctx, alice, 'food', 100);
      addTransaction(t.ctx, alice, { type: 'expense', amount: 60, category: 'food' });
      addTransaction(t.ctx, alice, { type: 'expense', amount: 50, category: 'food' });

      expect(checkBudgetExceeded(t.ctx, alice, 'food')).toEqual({
        exceeded: true,
        category: 'food',
        budget: 100,
        spent: 110,
      });
    });

    it('is not exceeded by a single smaller expense', () => {
      setBudget(t.ctx, alice, 'food', 100);
      addTransaction(t.ctx, alice, { type: 'expense', amount: 40, category: 'food' });

      expect(checkBudgetExceeded(t.ctx, alice, 'food')).toEqual({
        exceeded: false,
        category: 'food',
        budget: 100,
        spent: 40,
      });
    });

    it('is never exceeded without a budget', () => {
      addTransaction(t.ctx, alice, { type: 'expense', amount: 5000, category: 'travel' });
      expect(checkBudgetExceeded(t.ctx, alice, 'travel')).toEqual({
        exceeded: false,
        category: 'travel',
        budget: null,
        spent: 0,
      });
    });

    it("ignores income and last month's expenses", () => {
      t.setNow(new Date(2026, 8, 28, 12, 0, 0));
      addTransaction(t.ctx, alice, { type: 'expense', amount: 500, category: 'food' });
      t.setNow(NOW);

      setBudget(t.ctx, alice, 'food', 100);
      addTransaction(t.ctx, alice, { type: 'income', amount: 300, category: 'food' });
      addTransaction(t.ctx, alice, { type: 'expense', amount: 25, category: 'food' });

      expect(checkBudgetExceeded(t.ctx, alice, 'food')).toMatchObject({ exceeded: false, spent: 25 });
    });

    it('warns through the logger when an expense pushes spending over the ceiling', () => {
      setBudget(t.ctx, alice, 'food', 100);
      const first = addTransaction(t.ctx, alice, { type: 'expense', amount: 60, category: 'food' });
      expect(first.budget).toMatchObject({ exceeded: false, spent: 60 });
      expect(t.log.warn).not.toHaveBeenCalled();

      const second = addTransaction(t.ctx, alice, { type: 'expense', amount: 50, category: 'food' });
      expect(second.budget).toEqual({ exceeded: true, category: 'food', budget: 100, spent: 110 });
      expect(t.log.warn).toHaveBeenCalledWith(
        '[Budget] Warning: You have exceeded your budget for food! Budget: $100.00, Spent: $110.00',
      );
    });

    it('never blocks the transaction that exceeds the budget', () => {
      setBudget(t.ctx, alice, 'food', 10);
      const { transaction } = addTransaction(t.ctx, alice, { type: 'expense', amount: 50, category: 'food' });
      expect(transaction.id).toBe(1);
    });
  });
});
