import { BudgetTracker } from '../../budget/budget-tracker';
import { BudgetError } from '../../core/errors';

describe('BudgetTracker', () => {
  it('blocks once spend reaches the ceiling', () => {
    const budget = new BudgetTracker({ defaultCeiling: 10 });

    expect(budget.charge('c1', 4)).toBe(false);
    expect(budget.isBlocked('c1')).toBe(false);
    expect(budget.charge('c1', 6)).toBe(true);
    expect(budget.isBlocked('c1')).toBe(true);
    expect(budget.charge('c1', 1)).toBe(false);
    expect(budget.remaining('c1')).toBe(0);
  });

  it('reports the soft threshold', () => {
    const budget = new BudgetTracker({ defaultCeiling: 10, softRatio: 0.8 });
    budget.charge('c1', 7);
    expect(budget.isSoftThresholdReached('c1')).toBe(false);
    budget.charge('c1', 1);
    expect(budget.snapshot('c1')).toEqual({ spent: 8, ceiling: 10, blocked: false, softThresholdReached: true });
  });

  it('uses explicit ceilings over the default', () => {
    const budget = new BudgetTracker({ defaultCeiling: 10, ceilings: new Map([['vip', 50]]) });
    expect(budget.remaining('vip')).toBe(50);
    expect(budget.remaining('other')).toBe(10);
  });

  it('unblocks on reset by zeroing spend', () => {
    const budget = new BudgetTracker({ defaultCeiling: 5 });
    budget.charge('c1', 5);

    expect(budget.reset('c1', 'reset')).toBe(true);
    expect(budget.snapshot('c1')).toEqual({ spent: 0, ceiling: 5, blocked: false, softThresholdReached: false });
  });

  it('unblocks on a top-up only when it lifts the ceiling above spend', () => {
    const budget = new BudgetTracker({ defaultCeiling: 5 });
    budget.charge('c1', 6);

    expect(budget.reset('c1', 'top_up', 1)).toBe(false);
    expect(budget.isBlocked('c1')).toBe(true);
    expect(budget.reset('c1', 'top_up', 4)).toBe(true);
    expect(budget.snapshot('c1')).toEqual({ spent: 6, ceiling: 10, blocked: false, softThresholdReached: true });
  });

  it('lists blocked conversations', () => {
    const budget = new BudgetTracker({ defaultCeiling: 1 });
    budget.charge('a', 1);
    budget.charge('b', 0.5);
    budget.charge('c', 2);
    expect(budget.blockedConversations()).toEqual(['a', 'c']);
  });

  it('rejects invalid amounts', () => {
    const budget = new BudgetTracker({ defaultCeiling: 1 });
    expect(() => budget.charge('c1', -1)).toThrow(BudgetError);
    expect(() => budget.charge('c1', Number.NaN)).toThrow('Charge must be a finite non-negative number. Got: NaN');
    expect(() => new BudgetTracker({ defaultCeiling: 0 })).toThrow('defaultCeiling must be a finite positive number. Got: 0');
    expect(() => new BudgetTracker({ defaultCeiling: 1, softRatio: 1.5 })).toThrow('softRatio must be in (0, 1]. Got: 1.5');
  });
});
