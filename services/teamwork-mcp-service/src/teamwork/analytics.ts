/**
 * Budget and project-health calculations over Teamwork data.
 */

import type {
  BudgetEstimate,
  MinimalProject,
  Project,
  ProjectHealth,
  ProjectSummary,
  TimeTotals,
  TimeTotalsSummary,
} from './types';

const DESCRIPTION_LIMIT = 200;
const AT_RISK_OVERDUE_RATIO = 0.1;
const AT_RISK_OVERDUE_COUNT = 3;

export function summarizeTimeTotals(totals: TimeTotals): TimeTotalsSummary {
  const estimated = totals.estimatedMinutes;
  const logged = totals.minutes;
  return {
    estimated_minutes: estimated,
    minutes: logged,
    remaining_minutes: estimated - logged,
    is_over_budget: logged > estimated,
  };
}

/**
 * Percentage of the estimate already logged, to one decimal.
 * No estimate means no meaningful percentage unless nothing is logged either.
 */
export function percentUsed(budgetMinutes: number, usedMinutes: number): number | null {
  if (budgetMinutes > 0) {
    return Math.round((usedMinutes / budgetMinutes) * 1000) / 10;
  }
  return usedMinutes > 0 ? null : 0;
}

/**
 * A budget reference on a project is either null or an object carrying the budget id.
 */
export function budgetRefId(ref: unknown): string | null {
  if (typeof ref === 'number' || (typeof ref === 'string' && ref !== '')) {
    return String(ref);
  }
  if (typeof ref === 'object' && ref !== null && 'id' in ref) {
    const { id } = ref;
    if (typeof id === 'number' || (typeof id === 'string' && id !== '')) {
      return String(id);
    }
  }
  return null;
}

export function hasOfficialBudget(project: Project): boolean {
  return budgetRefId(project.timeBudget) !== null || budgetRefId(project.financialBudget) !== null;
}

export function estimateBudget(projectId: string, project: Project, totals: TimeTotals): BudgetEstimate {
  const { estimated_minutes, minutes, remaining_minutes, is_over_budget } = summarizeTimeTotals(totals);
  return {
    project_id: projectId,
    project_name: project.name ?? null,
    budget_type: 'estimated',
    budget_minutes: estimated_minutes,
    used_minutes: minutes,
    remaining_minutes,
    percent_used: percentUsed(estimated_minutes, minutes),
    is_over_budget,
    has_official_budget: hasOfficialBudget(project),
  };
}

export function truncateDescription(description: string | null | undefined): string {
  const text = description ?? '';
  if (text.length <= DESCRIPTION_LIMIT) {
    return text;
  }
  return `${text.slice(0, DESCRIPTION_LIMIT - 3)}...`;
}

export function projectHealth(total: number, overdue: number): ProjectHealth {
  if (total <= 0) {
    return 'on-track';
  }
  if (overdue / total >= AT_RISK_OVERDUE_RATIO || overdue >= AT_RISK_OVERDUE_COUNT) {
    return 'at-risk';
  }
  return 'on-track';
}

export function summarizeProject(
  project: Project,
  counts: { total: number; overdue: number; dueThisWeek: number }
): ProjectSummary {
  return {
    project: {
      id: project.id,
      name: project.name ?? null,
      status: project.status ?? null,
      description: truncateDescription(project.description),
    },
    taskStats: counts,
    health: projectHealth(counts.total, counts.overdue),
  };
}

export function toMinimalProject(project: Project): MinimalProject {
  return {
    id: project.id,
    name: project.name ?? null,
    status: project.status ?? null,
    company: project.company?.name ?? null,
    timeBudget: project.timeBudget ?? null,
    financialBudget: project.financialBudget ?? null,
  };
}
