/**
 * Teamwork Types
 *
 * Schemas for the parts of Teamwork API responses this server reads.
 * Everything else passes through untouched.
 */

import { z } from 'zod';

export const JsonObjectSchema = z.record(z.unknown());
export type JsonObject = z.infer<typeof JsonObjectSchema>;

const IdSchema = z.union([z.number(), z.string()]);

export const ProjectSchema = z
  .object({
    id: IdSchema,
    name: z.string().nullish(),
    description: z.string().nullish(),
    status: z.string().nullish(),
    company: z.object({ id: IdSchema.optional(), name: z.string().nullish() }).passthrough().nullish(),
    timeBudget: z.unknown().optional(),
    financialBudget: z.unknown().optional(),
  })
  .passthrough();
export type Project = z.infer<typeof ProjectSchema>;

export const ProjectResponseSchema = z.object({ project: ProjectSchema }).passthrough();

export const ProjectListResponseSchema = z
  .object({
    projects: z.array(ProjectSchema).default([]),
    meta: JsonObjectSchema.default({}),
  })
  .passthrough();

/** Only `meta.page.count` matters: it is the total across all pages. */
export const PagedCountSchema = z
  .object({
    meta: z
      .object({
        page: z.object({ count: z.number().default(0) }).passthrough().default({}),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

export const TimeTotalsResponseSchema = z
  .object({
    timeTotals: z
      .object({
        estimatedMinutes: z.number().default(0),
        minutes: z.number().default(0),
      })
      .passthrough(),
  })
  .passthrough();
export type TimeTotals = z.infer<typeof TimeTotalsResponseSchema>['timeTotals'];

export const MeResponseSchema = z
  .object({
    person: z.object({ id: IdSchema.optional() }).passthrough().optional(),
    id: IdSchema.optional(),
  })
  .passthrough();

export type DateFilter = 'overdue' | 'today' | 'thisweek' | 'within7' | 'within14' | 'within30';

export const DATE_FILTERS: readonly [DateFilter, ...DateFilter[]] = [
  'overdue',
  'today',
  'thisweek',
  'within7',
  'within14',
  'within30',
];

export interface Pagination {
  page?: number;
  pageSize?: number;
}

export interface ListProjectsParams extends Pagination {
  includeDetails?: boolean;
}

export interface ListTasksParams extends Pagination {
  projectId?: string;
}

export interface TimeEntryFilter extends Pagination {
  projectId?: string;
  userId?: string;
}

export interface ListPeopleParams extends Pagination {
  projectId?: string;
}

export interface CreateProjectParams {
  name: string;
  description?: string;
  startDate?: string;
  endDate?: string;
}

export interface UpdateProjectParams {
  name?: string;
  description?: string;
  status?: string;
  startDate?: string;
  endDate?: string;
}

export interface CreateTaskParams {
  tasklistId: string;
  name: string;
  description?: string;
  dueDate?: string;
  assigneeIds?: string[];
  priority?: TaskPriority;
  estimatedMinutes?: number;
  progress?: number;
}

export type TaskPriority = 'low' | 'medium' | 'high';

export interface UpdateTaskParams {
  name?: string;
  description?: string;
  dueDate?: string;
  priority?: TaskPriority;
  completed?: boolean;
  estimatedMinutes?: number;
  progress?: number;
}

export interface CreateSubtaskParams {
  name: string;
  description?: string;
  assigneeIds?: string[];
}

export interface UpdateTaskListParams {
  name?: string;
  description?: string;
}

export interface LogTimeParams {
  projectId: string;
  hours: number;
  description: string;
  date?: string;
  taskId?: string;
  isBillable?: boolean;
}

export interface CreateMessageParams {
  title: string;
  body: string;
  notify?: boolean;
  categoryId?: string;
}

export interface StartTimerParams {
  projectId?: string;
  taskId?: string;
  description?: string;
  isBillable?: boolean;
}

export interface StopTimerParams {
  description?: string;
  isBillable?: boolean;
}

/** Project list entry returned unless full details are requested. */
export interface MinimalProject {
  id: number | string;
  name: string | null;
  status: string | null;
  company: string | null;
  timeBudget: unknown;
  financialBudget: unknown;
}

export interface TimeTotalsSummary {
  estimated_minutes: number;
  minutes: number;
  remaining_minutes: number;
  is_over_budget: boolean;
}

export interface ProjectBudgets {
  project_id: string;
  project_name: string | null;
  budgets: JsonObject[];
  has_time_budget: boolean;
  has_financial_budget: boolean;
}

export interface BudgetEstimate {
  project_id: string;
  project_name: string | null;
  budget_type: 'estimated';
  budget_minutes: number;
  used_minutes: number;
  remaining_minutes: number;
  percent_used: number | null;
  is_over_budget: boolean;
  has_official_budget: boolean;
}

export type ProjectHealth = 'on-track' | 'at-risk';

export interface ProjectSummary {
  project: {
    id: number | string;
    name: string | null;
    status: string | null;
    description: string;
  };
  taskStats: {
    total: number;
    overdue: number;
    dueThisWeek: number;
  };
  health: ProjectHealth;
}
