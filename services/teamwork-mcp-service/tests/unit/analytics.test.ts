import { describe, test, expect } from 'vitest';
import {
  budgetRefId,
  estimateBudget,
  percentUsed,
  projectHealth,
  summarizeProject,
  summarizeTimeTotals,
  toMinimalProject,
  truncateDescription,
} from '../../src/teamwork/analytics';

describe('Budget analytics', () => {
  describe('summarizeTimeTotals', () => {
    test('reports remaining minutes under the estimate', () => {
      expect(summarizeTimeTotals({ estimatedMinutes: 600, minutes: 450 })).toEqual({
        estimated_minutes: 600,
        minutes: 450,
        remaining_minutes: 150,
        is_over_budget: false,
      });
    });

    test('flags logged time beyond the estimate', () => {
      expect(summarizeTimeTotals({ estimatedMinutes: 120, minutes: 150 })).toEqual({
        estimated_minutes: 120,
        minutes: 150,
        remaining_minutes: -30,
        is_over_budget: true,
      });
    });

    test('is not over budget when logged equals estimate', () => {
      expect(summarizeTimeTotals({ estimatedMinutes: 60, minutes: 60 }).is_over_budget).toBe(false);
    });
  });

  describe('percentUsed', () => {
    test('rounds to one decimal', () => {
      expect(percentUsed(300, 100)).toBe(33.3);
      expect(percentUsed(120, 150)).toBe(125);
    });

    test('is null when time is logged without an estimate', () => {
      expect(percentUsed(0, 30)).toBeNull();
    });

    test('is zero when nothing is estimated or logged', () => {
      expect(percentUsed(0, 0)).toBe(0);
    });
  });

  describe('budgetRefId', () => {
    test('reads the id from a budget reference object', () => {
      expect(budgetRefId({ id: 127645, type: 'budgets' })).toBe('127645');
    });

    test('accepts bare ids', () => {
      expect(budgetRefId(42)).toBe('42');
      expect(budgetRefId('43')).toBe('43');
    });

    test('returns null for missing references', () => {
      expect(budgetRefId(null)).toBeNull();
      expect(budgetRefId(undefined)).toBeNull();
      expect(budgetRefId({})).toBeNull();
      expect(budgetRefId('')).toBeNull();
    });
  });

  describe('estimateBudget', () => {
    test('builds an unofficial budget from task estimates', () => {
      const estimate = estimateBudget(
        '1001',
        { id: 1001, name: 'Website Redesign', timeBudget: null, financialBudget: null },
        { estimatedMinutes: 480, minutes: 120 }
      );

      expect(estimate).toEqual({
        project_id: '1001',
        project_name: 'Website Redesign',
        budget_type: 'estimated',
        budget_minutes: 480,
        used_minutes: 120,
        remaining_minutes: 360,
        percent_used: 25,
        is_over_budget: false,
        has_official_budget: false,
      });
    });

    test('notes when an official budget exists', () => {
      const estimate = estimateBudget(
        '1002',
        { id: 1002, name: 'Mobile App', timeBudget: null, financialBudget: { id: 9 } },
        { estimatedMinutes: 0, minutes: 90 }
      );

      expect(estimate.has_official_budget).toBe(true);
      expect(estimate.percent_used).toBeNull();
      expect(estimate.is_over_budget).toBe(true);
      expect(estimate.remaining_minutes).toBe(-90);
    });
  });

  describe('truncateDescription', () => {
    test('keeps descriptions up to 200 characters', () => {
      const text = 'x'.repeat(200);
      expect(truncateDescription(text)).toBe(text);
    });

    test('truncates longer descriptions to 197 characters plus an ellipsis', () => {
      const result = truncateDescription('y'.repeat(250));
      expect(result).toBe(`${'y'.repeat(197)}...`);
      expect(result).toHaveLength(200);
    });

    test('treats a missing description as empty', () => {
      expect(truncateDescription(null)).toBe('');
      expect(truncateDescription(undefined)).toBe('');
    });
  });

  describe('projectHealth', () => {
    test('is on-track without tasks', () => {
      expect(projectHealth(0, 0)).toBe('on-track');
    });

    test('is at-risk at ten percent overdue', () => {
      expect(projectHealth(10, 1)).toBe('at-risk');
    });

    test('is at-risk with three overdue tasks regardless of ratio', () => {
      expect(projectHealth(100, 3)).toBe('at-risk');
    });

    test('is on-track below both thresholds', () => {
      expect(projectHealth(100, 2)).toBe('on-track');
      expect(projectHealth(20, 1)).toBe('on-track');
    });
  });

  test('summarizeProject combines project fields, counts and health', () => {
    const summary = summarizeProject(
      { id: 7, name: 'Launch', status: 'active', description: 'Go live' },
      { total: 12, overdue: 4, dueThisWeek: 2 }
    );

    expect(summary).toEqual({
      project: { id: 7, name: 'Launch', status: 'active', description: 'Go live' },
      taskStats: { total: 12, overdue: 4, dueThisWeek: 2 },
      health: 'at-risk',
    });
  });

  test('toMinimalProject keeps only list fields', () => {
    const minimal = toMinimalProject({
      id: 5,
      name: 'Intranet',
      status: 'active',
      description: 'Internal site',
      company: { id: 3, name: 'Acme Ltd' },
      timeBudget: { id: 11 },
      startDate: '2026-01-01',
    });

    expect(minimal).toEqual({
      id: 5,
      name: 'Intranet',
      status: 'active',
      company: 'Acme Ltd',
      timeBudget: { id: 11 },
      financialBudget: null,
    });
  });
});
