import { describe, expect, it } from 'vitest';
import { BudgetManager } from '../src/services/budgetManager.js';

describe('BudgetManager', () => {
  it('throttles within a second once the per-second cap is reached', () => {
    const clock = { now: Date.parse('2025-03-10T10:00:00.000Z') };
    const budget = new BudgetManager({ perSecondCap: 2, now: () => clock.now });

    budget.recordRequest();
    budget.recordRequest();
    clock.now += 500;
    expect(budget.shouldThrottle()).toBe(true);

    clock.now += 500;
    expect(budget.shouldThrottle()).toBe(false);
  });

  it('resets the daily count at the UTC day boundary', () => {
    const clock = { now: Date.parse('2025-03-10T23:59:00.000Z') };
    const budget = new BudgetManager({ dailyRequestsCap: 3, now: () => clock.now });

    budget.recordRequest(3);
    expect(budget.shouldThrottle()).toBe(true);
    expect(budget.getState().daily).toEqual({ cap: 3, dayKey: '2025-03-10', dayCount: 3 });

    clock.now = Date.parse('2025-03-11T00:01:00.000Z');
    expect(budget.shouldThrottle()).toBe(false);
  });

  it('never throttles without caps', () => {
    const budget = new BudgetManager();
    budget.recordRequest(1000);
    expect(budget.shouldThrottle()).toBe(false);
  });
});
