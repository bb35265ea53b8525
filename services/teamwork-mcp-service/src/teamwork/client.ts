/**
 * Teamwork Client
 *
 * Wrapper around the Teamwork REST API (v3, plus v1 for task-list writes)
 */

import type { z } from 'zod';
import { RestClient } from '@teamwork-mcp/shared-clients';
import type { HttpMethod, RequestOptions } from '@teamwork-mcp/shared-clients';
import { logger, TeamworkApiError, TeamworkMcpError, ValidationError } from '@teamwork-mcp/shared-utils';
import type { APIResponse } from '@teamwork-mcp/shared-types';
import { estimateBudget, summarizeProject, summarizeTimeTotals, toMinimalProject, budgetRefId } from './analytics';
import {
  JsonObjectSchema,
  MeResponseSchema,
  PagedCountSchema,
  ProjectListResponseSchema,
  ProjectResponseSchema,
  TimeTotalsResponseSchema,
} from './types';
import type {
  BudgetEstimate,
  CreateMessageParams,
  CreateProjectParams,
  CreateSubtaskParams,
  CreateTaskParams,
  DateFilter,
  JsonObject,
  ListPeopleParams,
  ListProjectsParams,
  ListTasksParams,
  LogTimeParams,
  Pagination,
  ProjectBudgets,
  ProjectSummary,
  StartTimerParams,
  StopTimerParams,
  TimeEntryFilter,
  TimeTotalsSummary,
  UpdateProjectParams,
  UpdateTaskListParams,
  UpdateTaskParams,
} from './types';

const SERVICE = 'teamwork';

export interface TeamworkClientOptions {
  timeout?: number;
  retries?: number;
}

export type TimeTotalsScope = 'project' | 'tasklist' | 'task';

const TIME_TOTALS_PATHS: Record<TimeTotalsScope, string> = {
  project: 'projects',
  tasklist: 'tasklists',
  task: 'tasks',
};

function toNumericId(label: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`${label} must be a numeric ID`, SERVICE, { [label]: value });
  }
  return Number(value);
}

function checkEstimate(estimatedMinutes: number | undefined): void {
  if (estimatedMinutes !== undefined && estimatedMinutes <= 0) {
    throw new ValidationError('estimated_minutes must be a positive value', SERVICE, { estimatedMinutes });
  }
}

function checkProgress(progress: number | undefined): void {
  if (progress !== undefined && (progress < 0 || progress > 100)) {
    throw new ValidationError('progress must be between 0 and 100', SERVICE, { progress });
  }
}

function omitUndefined(fields: Record<string, unknown>): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

export function todayIsoDate(now: Date = new Date()): string {
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${now.getFullYear()}-${month}-${day}`;
}

/**
 * Split fractional hours into whole hours and minutes, rounding to the nearest minute.
 */
export function splitHours(hours: number): { hours: number; minutes: number } {
  const totalMinutes = Math.round(hours * 60);
  return { hours: Math.floor(totalMinutes / 60), minutes: totalMinutes % 60 };
}

/**
 * TeamworkClient provides methods for interacting with one Teamwork installation
 */
export class TeamworkClient extends RestClient {
  readonly domain: string;
  private readonly v1BaseUrl: string;

  constructor(accessToken: string, domain: string, options: TeamworkClientOptions = {}) {
    super(`https://${domain}/projects/api/v3`, {
      timeout: options.timeout,
      retries: options.retries,
      headers: { Authorization: `Bearer ${accessToken}` },
    });
    this.domain = domain;
    this.v1BaseUrl = `https://${domain}`;
  }

  // ==========================================
  // Projects
  // ==========================================

  /**
   * List projects. Entries are reduced to MinimalProject unless details are requested.
   */
  async listProjects(params: ListProjectsParams = {}): Promise<JsonObject> {
    const { page = 1, pageSize = 25, includeDetails = false } = params;
    logger.info('Listing Teamwork projects', { page, pageSize, includeDetails });

    const raw = await this.call('GET', '/projects.json', { query: { page, pageSize } });
    if (includeDetails) {
      return raw;
    }
    const parsed = this.parse(ProjectListResponseSchema, raw, 'project list');
    return { ...parsed, projects: parsed.projects.map(toMinimalProject) };
  }

  /**
   * Get a single project
   */
  async getProject(projectId: string): Promise<JsonObject> {
    logger.info(`Getting project ${projectId}`);
    return this.call('GET', `/projects/${projectId}.json`);
  }

  /**
   * Create a project
   */
  async createProject(params: CreateProjectParams): Promise<JsonObject> {
    logger.info('Creating project', { name: params.name });

    const project = omitUndefined({
      name: params.name,
      description: params.description,
      startDate: params.startDate,
      endDate: params.endDate,
    });
    return this.call('POST', '/projects.json', { body: { project } });
  }

  /**
   * Update project fields. At least one field is required
   */
  async updateProject(projectId: string, params: UpdateProjectParams): Promise<JsonObject> {
    const project = omitUndefined({
      name: params.name,
      description: params.description,
      status: params.status,
      startDate: params.startDate,
      endDate: params.endDate,
    });
    if (Object.keys(project).length === 0) {
      throw new ValidationError('update_project requires at least one field to update', SERVICE);
    }

    logger.info(`Updating project ${projectId}`, { fields: Object.keys(project) });
    return this.call('PATCH', `/projects/${projectId}.json`, { body: { project } });
  }

  /**
   * Archive a project by setting its status
   */
  async archiveProject(projectId: string): Promise<JsonObject> {
    return this.updateProject(projectId, { status: 'archived' });
  }

  // ==========================================
  // Budgets and time totals
  // ==========================================

  /**
   * Get a single project budget
   */
  async getProjectBudget(budgetId: string): Promise<JsonObject> {
    logger.info(`Getting budget ${budgetId}`);
    return this.call('GET', `/projects/budgets/${budgetId}.json`);
  }

  /**
   * Fetch the project and every budget it references.
   */
  async listProjectBudgets(projectId: string): Promise<ProjectBudgets> {
    logger.info(`Listing budgets for project ${projectId}`);

    const { project } = this.parse(ProjectResponseSchema, await this.getProject(projectId), 'project');
    const timeBudgetId = budgetRefId(project.timeBudget);
    const financialBudgetId = budgetRefId(project.financialBudget);

    const ids = [timeBudgetId, financialBudgetId].filter((id): id is string => id !== null);
    const responses = await Promise.all(ids.map((id) => this.getProjectBudget(id)));
    const budgets = responses.map((response) => {
      const inner = JsonObjectSchema.safeParse(response.budget);
      return inner.success ? inner.data : response;
    });

    return {
      project_id: projectId,
      project_name: project.name ?? null,
      budgets,
      has_time_budget: timeBudgetId !== null,
      has_financial_budget: financialBudgetId !== null,
    };
  }

  /**
   * Get estimated and logged minutes for a project, task list or task
   */
  async getTimeTotals(scope: TimeTotalsScope, id: string): Promise<TimeTotalsSummary> {
    logger.info(`Getting time totals for ${scope} ${id}`);

    const raw = await this.call('GET', `/${TIME_TOTALS_PATHS[scope]}/${id}/time/total.json`);
    const { timeTotals } = this.parse(TimeTotalsResponseSchema, raw, 'time totals');
    return summarizeTimeTotals(timeTotals);
  }

  /**
   * Get time totals for a project
   */
  async getProjectTimeTotals(projectId: string): Promise<{ project_id: string } & TimeTotalsSummary> {
    return { project_id: projectId, ...(await this.getTimeTotals('project', projectId)) };
  }

  /**
   * Get time totals for a task list
   */
  async getTasklistTimeTotals(tasklistId: string): Promise<{ tasklist_id: string } & TimeTotalsSummary> {
    return { tasklist_id: tasklistId, ...(await this.getTimeTotals('tasklist', tasklistId)) };
  }

  /**
   * Get time totals for a task
   */
  async getTaskTimeTotals(taskId: string): Promise<{ task_id: string } & TimeTotalsSummary> {
    return { task_id: taskId, ...(await this.getTimeTotals('task', taskId)) };
  }

  /**
   * Use task estimates as an unofficial budget for projects without a Teamwork budget.
   */
  async estimateProjectBudget(projectId: string): Promise<BudgetEstimate> {
    logger.info(`Estimating budget for project ${projectId}`);

    const [projectResponse, totalsResponse] = await Promise.all([
      this.getProject(projectId),
      this.call('GET', `/projects/${projectId}/time/total.json`),
    ]);
    const { project } = this.parse(ProjectResponseSchema, projectResponse, 'project');
    const { timeTotals } = this.parse(TimeTotalsResponseSchema, totalsResponse, 'time totals');
    return estimateBudget(projectId, project, timeTotals);
  }

  // ==========================================
  // Tasks
  // ==========================================

  /**
   * List tasks, optionally for one project
   */
  async listTasks(params: ListTasksParams = {}): Promise<JsonObject> {
    const { page = 1, pageSize = 50, projectId } = params;
    logger.info('Listing tasks', { page, pageSize, projectId });

    return this.call('GET', '/tasks.json', { query: { page, pageSize, projectId } });
  }

  /**
   * Get a single task
   */
  async getTask(taskId: string): Promise<JsonObject> {
    logger.info(`Getting task ${taskId}`);
    return this.call('GET', `/tasks/${taskId}.json`);
  }

  /**
   * Create a task in a task list
   */
  async createTask(params: CreateTaskParams): Promise<JsonObject> {
    const tasklistId = toNumericId('tasklist_id', params.tasklistId);
    checkEstimate(params.estimatedMinutes);
    checkProgress(params.progress);

    logger.info(`Creating task in task list ${tasklistId}`, { name: params.name });

    const task = omitUndefined({
      name: params.name,
      tasklistId,
      description: params.description,
      dueDate: params.dueDate,
      assigneeIds: params.assigneeIds,
      priority: params.priority,
      estimatedMinutes: params.estimatedMinutes,
      progress: params.progress,
    });
    return this.call('POST', `/tasklists/${tasklistId}/tasks.json`, { body: { task } });
  }

  /**
   * Update task fields. `completed` and `progress` must agree when both are given
   */
  async updateTask(taskId: string, params: UpdateTaskParams): Promise<JsonObject> {
    checkEstimate(params.estimatedMinutes);
    checkProgress(params.progress);
    if (params.completed !== undefined && params.progress !== undefined) {
      if ((params.completed && params.progress !== 100) || (!params.completed && params.progress === 100)) {
        throw new ValidationError(
          'completed and progress must agree: completed=true requires progress=100 and progress=100 requires completed=true',
          SERVICE,
          { completed: params.completed, progress: params.progress }
        );
      }
    }

    const task = omitUndefined({
      name: params.name,
      description: params.description,
      dueDate: params.dueDate,
      priority: params.priority,
      completed: params.completed,
      estimatedMinutes: params.estimatedMinutes,
      progress: params.progress,
    });
    if (Object.keys(task).length === 0) {
      throw new ValidationError('update_task requires at least one field to update', SERVICE);
    }

    logger.info(`Updating task ${taskId}`, { fields: Object.keys(task) });
    return this.call('PATCH', `/tasks/${taskId}.json`, { body: { task } });
  }

  /**
   * Mark a task as complete
   */
  async completeTask(taskId: string): Promise<JsonObject> {
    return this.updateTask(taskId, { completed: true });
  }

  /**
   * Move a task to another task list, and optionally another project
   */
  async moveTask(taskId: string, targetTasklistId: string, targetProjectId?: string): Promise<JsonObject> {
    logger.info(`Moving task ${taskId} to task list ${targetTasklistId}`, { targetProjectId });

    const task = omitUndefined({
      taskListId: toNumericId('target_tasklist_id', targetTasklistId),
      projectId: targetProjectId === undefined ? undefined : toNumericId('target_project_id', targetProjectId),
    });
    return this.call('PATCH', `/tasks/${taskId}.json`, { body: { task } });
  }

  // ==========================================
  // Subtasks, comments and tags
  // ==========================================

  /**
   * List subtasks of a task
   */
  async listSubtasks(taskId: string, pagination: Pagination = {}): Promise<JsonObject> {
    const { page = 1, pageSize = 50 } = pagination;
    logger.info(`Listing subtasks of task ${taskId}`, { page, pageSize });

    return this.call('GET', `/tasks/${taskId}/subtasks.json`, { query: { page, pageSize } });
  }

  /**
   * Create a subtask under a parent task
   */
  async createSubtask(taskId: string, params: CreateSubtaskParams): Promise<JsonObject> {
    logger.info(`Creating subtask under task ${taskId}`, { name: params.name });

    const task = omitUndefined({
      name: params.name,
      parentTaskId: toNumericId('task_id', taskId),
      description: params.description,
      assigneeIds: params.assigneeIds,
    });
    return this.call('POST', '/tasks.json', { body: { task } });
  }

  /**
   * List comments on a task
   */
  async listTaskComments(taskId: string, pagination: Pagination = {}): Promise<JsonObject> {
    const { page = 1, pageSize = 50 } = pagination;
    logger.info(`Listing comments on task ${taskId}`, { page, pageSize });

    return this.call('GET', `/tasks/${taskId}/comments.json`, { query: { page, pageSize } });
  }

  /**
   * Add a comment to a task
   */
  async addTaskComment(taskId: string, body: string): Promise<JsonObject> {
    logger.info(`Adding comment to task ${taskId}`);
    return this.call('POST', `/tasks/${taskId}/comments.json`, { body: { comment: { body } } });
  }

  /**
   * List tags for the installation
   */
  async listTags(pagination: Pagination = {}): Promise<JsonObject> {
    const { page = 1, pageSize = 100 } = pagination;
    logger.info('Listing tags', { page, pageSize });

    return this.call('GET', '/tags.json', { query: { page, pageSize } });
  }

  /**
   * Add tags to a task
   */
  async addTagsToTask(taskId: string, tagIds: string[]): Promise<JsonObject> {
    if (tagIds.length === 0) {
      throw new ValidationError('add_tag_to_task requires at least one tag ID', SERVICE);
    }
    logger.info(`Tagging task ${taskId}`, { tagIds });

    const ids = tagIds.map((id) => toNumericId('tag_ids', id));
    return this.call('PUT', `/tasks/${taskId}/tags.json`, { body: { tagIds: ids } });
  }

  // ==========================================
  // Task lists
  // ==========================================

  /**
   * List task lists in a project
   */
  async listTaskLists(projectId: string, pagination: Pagination = {}): Promise<JsonObject> {
    const { page = 1, pageSize = 50 } = pagination;
    logger.info(`Listing task lists for project ${projectId}`, { page, pageSize });

    return this.call('GET', `/projects/${projectId}/tasklists.json`, { query: { page, pageSize } });
  }

  /**
   * Create a task list (v1 API)
   */
  async createTaskList(projectId: string, name: string, description?: string): Promise<JsonObject> {
    logger.info(`Creating task list in project ${projectId}`, { name });

    const todoList = omitUndefined({ name, description });
    return this.call('POST', `/projects/${projectId}/tasklists.json`, {
      body: { 'todo-list': todoList },
      baseUrl: this.v1BaseUrl,
    });
  }

  /**
   * Rename or redescribe a task list (v1 API)
   */
  async updateTaskList(tasklistId: string, params: UpdateTaskListParams): Promise<JsonObject> {
    const todoList = omitUndefined({ name: params.name, description: params.description });
    if (Object.keys(todoList).length === 0) {
      throw new ValidationError("update_task_list requires at least one of 'name' or 'description'", SERVICE);
    }

    logger.info(`Updating task list ${tasklistId}`, { fields: Object.keys(todoList) });
    return this.call('PUT', `/tasklists/${tasklistId}.json`, {
      body: { 'todo-list': todoList },
      baseUrl: this.v1BaseUrl,
    });
  }

  // ==========================================
  // Time entries
  // ==========================================

  /**
   * Log time against a project, or a task when one is given
   */
  async logTime(params: LogTimeParams): Promise<JsonObject> {
    if (params.hours <= 0) {
      throw new ValidationError('hours must be a positive value', SERVICE, { hours: params.hours });
    }
    const projectId = toNumericId('project_id', params.projectId);
    const { hours, minutes } = splitHours(params.hours);

    const timelog = omitUndefined({
      date: params.date ?? todayIsoDate(),
      hours,
      minutes,
      description: params.description,
      isBillable: params.isBillable ?? true,
      projectId,
      taskId: params.taskId === undefined ? undefined : toNumericId('task_id', params.taskId),
    });

    const path = params.taskId === undefined ? `/projects/${projectId}/time.json` : `/tasks/${params.taskId}/time.json`;
    logger.info('Logging time', { projectId, taskId: params.taskId, hours, minutes });
    return this.call('POST', path, { body: { timelog } });
  }

  /**
   * List time entries, optionally by project or user
   */
  async getTimeEntries(filter: TimeEntryFilter = {}): Promise<JsonObject> {
    const { page = 1, pageSize = 50, projectId, userId } = filter;
    logger.info('Listing time entries', { page, pageSize, projectId, userId });

    return this.call('GET', '/time.json', {
      query: { page, pageSize, projectIds: projectId, userIds: userId },
    });
  }

  // ==========================================
  // Timers
  // ==========================================

  /**
   * Get the current user's running timers
   */
  async getActiveTimer(): Promise<JsonObject> {
    logger.info('Getting running timers');
    return this.call('GET', '/me/timers.json');
  }

  /**
   * Start a timer on a project or task
   */
  async startTimer(params: StartTimerParams): Promise<JsonObject> {
    if (params.projectId === undefined && params.taskId === undefined) {
      throw new ValidationError('start_timer requires a project_id or a task_id', SERVICE);
    }
    logger.info('Starting timer', { projectId: params.projectId, taskId: params.taskId });

    const timer = omitUndefined({
      projectId: params.projectId === undefined ? undefined : toNumericId('project_id', params.projectId),
      taskId: params.taskId === undefined ? undefined : toNumericId('task_id', params.taskId),
      description: params.description,
      isBillable: params.isBillable === false ? false : undefined,
    });
    return this.call('POST', '/me/timers.json', { body: { timer } });
  }

  /**
   * Stop a timer and turn it into a time entry
   */
  async stopTimer(timerId: string, params: StopTimerParams = {}): Promise<JsonObject> {
    logger.info(`Stopping timer ${timerId}`);

    const timer = omitUndefined({ description: params.description, isBillable: params.isBillable });
    return this.call('PUT', `/me/timers/${timerId}/complete.json`, { body: { timer } });
  }

  /**
   * Pause a running timer
   */
  async pauseTimer(timerId: string): Promise<JsonObject> {
    logger.info(`Pausing timer ${timerId}`);
    return this.call('PUT', `/me/timers/${timerId}/pause.json`);
  }

  /**
   * Resume a paused timer
   */
  async resumeTimer(timerId: string): Promise<JsonObject> {
    logger.info(`Resuming timer ${timerId}`);
    return this.call('PUT', `/me/timers/${timerId}/resume.json`);
  }

  /**
   * Discard a timer without logging time
   */
  async cancelTimer(timerId: string): Promise<JsonObject> {
    logger.info(`Cancelling timer ${timerId}`);
    return this.call('DELETE', `/me/timers/${timerId}.json`);
  }

  // ==========================================
  // People and planning
  // ==========================================

  /**
   * List people, optionally on one project
   */
  async listPeople(params: ListPeopleParams = {}): Promise<JsonObject> {
    const { page = 1, pageSize = 50, projectId } = params;
    logger.info('Listing people', { page, pageSize, projectId });

    return this.call('GET', '/people.json', { query: { page, pageSize, projectId } });
  }

  /**
   * Get the authenticated user
   */
  async getMe(): Promise<JsonObject> {
    logger.info('Getting current user');
    return this.call('GET', '/me.json');
  }

  /**
   * Resolve the authenticated user ID from /me.json
   */
  async getCurrentUserId(): Promise<string> {
    const me = this.parse(MeResponseSchema, await this.getMe(), 'current user');
    const id = me.person?.id ?? me.id;
    if (id === undefined) {
      throw new TeamworkMcpError('Could not determine the current user ID from /me.json', 'USER_NOT_FOUND', SERVICE);
    }
    return String(id);
  }

  /**
   * List tasks assigned to the authenticated user
   */
  async getMyTasks(dateFilter: DateFilter = 'within7', includeCompleted: boolean = false): Promise<JsonObject> {
    const userId = await this.getCurrentUserId();
    logger.info(`Listing tasks for user ${userId}`, { dateFilter, includeCompleted });

    return this.call('GET', '/tasks.json', {
      query: {
        responsiblePartyIds: userId,
        filter: dateFilter,
        includeCompletedTasks: includeCompleted,
        pageSize: 100,
      },
    });
  }

  /**
   * Project overview with task counts and a health flag.
   * Counts come from `meta.page.count` of single-item pages.
   */
  async getProjectSummary(projectId: string): Promise<ProjectSummary> {
    logger.info(`Summarizing project ${projectId}`);

    const { project } = this.parse(ProjectResponseSchema, await this.getProject(projectId), 'project');
    const [total, overdue, dueThisWeek] = await Promise.all([
      this.countTasks(projectId),
      this.countTasks(projectId, 'overdue'),
      this.countTasks(projectId, 'thisweek'),
    ]);
    return summarizeProject(project, { total, overdue, dueThisWeek });
  }

  private async countTasks(projectId: string, filter?: DateFilter): Promise<number> {
    const raw = await this.call('GET', '/tasks.json', { query: { projectId, filter, pageSize: 1 } });
    return this.parse(PagedCountSchema, raw, 'task page').meta.page.count;
  }

  // ==========================================
  // Milestones, notebooks and messages
  // ==========================================

  /**
   * List milestones in a project
   */
  async listMilestones(projectId: string, pagination: Pagination = {}): Promise<JsonObject> {
    const { page = 1, pageSize = 50 } = pagination;
    logger.info(`Listing milestones for project ${projectId}`, { page, pageSize });

    return this.call('GET', `/projects/${projectId}/milestones.json`, { query: { page, pageSize } });
  }

  /**
   * Get a single milestone
   */
  async getMilestone(milestoneId: string): Promise<JsonObject> {
    logger.info(`Getting milestone ${milestoneId}`);
    return this.call('GET', `/milestones/${milestoneId}.json`);
  }

  /**
   * List notebooks in a project
   */
  async listNotebooks(projectId: string, pagination: Pagination = {}): Promise<JsonObject> {
    const { page = 1, pageSize = 50 } = pagination;
    logger.info(`Listing notebooks for project ${projectId}`, { page, pageSize });

    return this.call('GET', '/notebooks.json', { query: { projectIds: projectId, page, pageSize } });
  }

  /**
   * Get a single notebook
   */
  async getNotebook(notebookId: string): Promise<JsonObject> {
    logger.info(`Getting notebook ${notebookId}`);
    return this.call('GET', `/notebooks/${notebookId}.json`);
  }

  /**
   * List messages in a project
   */
  async listMessages(projectId: string, pagination: Pagination = {}): Promise<JsonObject> {
    const { page = 1, pageSize = 50 } = pagination;
    logger.info(`Listing messages for project ${projectId}`, { page, pageSize });

    return this.call('GET', '/messages.json', { query: { projectIds: projectId, page, pageSize } });
  }

  /**
   * Post a message to a project
   */
  async createMessage(projectId: string, params: CreateMessageParams): Promise<JsonObject> {
    logger.info(`Posting message to project ${projectId}`, { title: params.title });

    const post = omitUndefined({
      title: params.title,
      body: params.body,
      notify: params.notify ?? false,
      categoryId: params.categoryId === undefined ? undefined : toNumericId('category_id', params.categoryId),
    });
    return this.call('POST', `/projects/${projectId}/posts.json`, { body: { post } });
  }

  // ==========================================
  // Transport
  // ==========================================

  /**
   * Send a request and unwrap the response envelope.
   * Non-object JSON bodies are wrapped as `{ data }`.
   */
  private async call(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<JsonObject> {
    const response = await this.request(method, path, options);
    return this.unwrap(response);
  }

  private unwrap(response: APIResponse<unknown>): JsonObject {
    if (!response.success) {
      const error = response.error;
      if (error?.status !== undefined) {
        throw new TeamworkApiError(error.status, error.message, SERVICE, { domain: this.domain });
      }
      throw new TeamworkMcpError(error?.message ?? 'Unknown error', error?.code ?? 'REQUEST_ERROR', SERVICE, {
        domain: this.domain,
      });
    }
    if (response.data === undefined) {
      return { success: true };
    }
    const parsed = JsonObjectSchema.safeParse(response.data);
    return parsed.success ? parsed.data : { data: response.data };
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: JsonObject, what: string): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new TeamworkMcpError(`Unexpected ${what} response from Teamwork`, 'UNEXPECTED_RESPONSE', SERVICE, {
        issues: result.error.issues,
      });
    }
    return result.data;
  }
}
