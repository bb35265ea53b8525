import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { TeamworkApiError, TeamworkMcpError, ValidationError } from '@teamwork-mcp/shared-utils';
import { TeamworkClient, splitHours, todayIsoDate } from '../../src/teamwork';

const BASE = 'https://acme.teamwork.com/projects/api/v3';

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function sent(calls: Parameters<typeof fetch>[], index = 0) {
  const [input, init] = calls[index];
  return {
    url: String(input),
    method: init?.method,
    headers: new Headers(init?.headers),
    body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
  };
}

describe('TeamworkClient', () => {
  let client: TeamworkClient;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    client = new TeamworkClient('test-token', 'acme.teamwork.com');
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  function respond(body: unknown, status = 200) {
    return vi.spyOn(globalThis, 'fetch').mockImplementation(async () => json(body, status));
  }

  describe('projects', () => {
    test('lists projects as minimal records with bearer auth', async () => {
      const fetchSpy = respond({
        projects: [
          {
            id: 1,
            name: 'Website',
            status: 'active',
            description: 'Public site',
            company: { id: 2, name: 'Acme Ltd' },
            timeBudget: { id: 5 },
            financialBudget: null,
          },
        ],
        meta: { page: { count: 1 } },
      });

      const result = await client.listProjects();

      expect(result).toEqual({
        projects: [
          { id: 1, name: 'Website', status: 'active', company: 'Acme Ltd', timeBudget: { id: 5 }, financialBudget: null },
        ],
        meta: { page: { count: 1 } },
      });
      const request = sent(fetchSpy.mock.calls);
      expect(request.url).toBe(`${BASE}/projects.json?page=1&pageSize=25`);
      expect(request.method).toBe('GET');
      expect(request.headers.get('authorization')).toBe('Bearer test-token');
      expect(request.headers.get('accept')).toBe('application/json');
    });

    test('returns full records when details are requested', async () => {
      const payload = { projects: [{ id: 1, name: 'Website', tags: ['web'] }], meta: {} };
      respond(payload);

      expect(await client.listProjects({ includeDetails: true, page: 2, pageSize: 10 })).toEqual(payload);
    });

    test('reports unexpected list payloads', async () => {
      respond({ projects: 'none' });

      await expect(client.listProjects()).rejects.toMatchObject({ code: 'UNEXPECTED_RESPONSE' });
    });

    test('creates a project with only the given fields', async () => {
      const fetchSpy = respond({ id: '900' });

      await client.createProject({ name: 'New Launch', startDate: '2026-02-01' });

      const request = sent(fetchSpy.mock.calls);
      expect(request.url).toBe(`${BASE}/projects.json`);
      expect(request.method).toBe('POST');
      expect(request.body).toEqual({ project: { name: 'New Launch', startDate: '2026-02-01' } });
    });

    test('requires a field when updating a project', async () => {
      const fetchSpy = respond({});

      await expect(client.updateProject('10', {})).rejects.toThrow(ValidationError);
      expect(fetchSpy).not.toHaveBeenCalled();
    });

    test('archives a project through a status update', async () => {
      const fetchSpy = respond({ project: { id: 10, status: 'archived' } });

      await client.archiveProject('10');

      const request = sent(fetchSpy.mock.calls);
      expect(request.url).toBe(`${BASE}/projects/10.json`);
      expect(request.method).toBe('PATCH');
      expect(request.body).toEqual({ project: { status: 'archived' } });
    });

    test('turns error statuses into TeamworkApiError', async () => {
      respond({ error: 'not found' }, 404);

      const error = await client.getProject('404').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TeamworkApiError);
      expect(error).toMatchObject({ status: 404, message: 'Teamwork API error 404: {"error":"not found"}' });
    });
  });

  describe('budgets and time totals', () => {
    test('lists the budgets a project references', async () => {
      const fetchSpy = vi.spyOn(globalThis, 'fetch').mockImplementation(async (input) => {
        if (String(input).includes('/budgets/')) {
          return json({ budget: { id: 11, type: 'TIME', capacity: 6000 } });
        }
        return json({ project: { id: 5, name: 'Support', timeBudget: { id: 11 }, financialBudget: null } });
      });

      const result = await client.listProjectBudgets('5');

      expect(result).toEqual({
        project_id: '5',
        project_name: 'Support',
        budgets: [{ id: 11, type: 'TIME', capacity: 6000 }],
        has_time_budget: true,
        has_financial_budget: false,
      });
      expect(sent(fetchSpy.mock.calls, 1).url).toBe(`${BASE}/projects/budgets/11.json`);
    });

    test('summarizes task time totals', async () => {
      const fetchSpy = respond({ timeTotals: { estimatedMinutes: 60, minutes: 15 } });

      expect(await client.getTaskTimeTotals('3')).toEqual({
        task_id: '3',
        estimated_minutes: 60,
        minutes: 15,
        remaining_minutes: 45,
        is_over_budget: false,
      });
      expect(sent(fetchSpy.mock.calls).url).toBe(`${BASE}/tasks/3/time/total.json`);
    });

    test('uses the task list path for task list totals', async () => {
      const fetchSpy = respond({ timeTotals: { estimatedMinutes: 0, minutes: 0 } });

      await client.getTasklistTimeTotals('8');

      expect(sent(fetchSpy.mock.calls).url).toBe(`${BASE}/tasklists/8/time/total.json`);
    });

    test('estimates a budget from project time totals', async () => {
      vi.spyOn(globalThis, 'fetch').mockImplementation(async (input) => {
        if (String(input).endsWith('/time/total.json')) {
          return json({ timeTotals: { estimatedMinutes: 200, minutes: 50 } });
        }
        return json({ project: { id: 5, name: 'Support', timeBudget: null, financialBudget: null } });
      });

      expect(await client.estimateProjectBudget('5')).toEqual({
        project_id: '5',
        project_name: 'Support',
        budget_type: 'estimated',
        budget_minutes: 200,
        used_minutes: 50,
        remaining_minutes: 150,
        percent_used: 25,
        is_over_budget: false,
        has_official_budget: false,
      });
    });
  });

  describe('tasks', () => {
    test('creates a task with a numeric task list id', async () => {
      const fetchSpy = respond({ task: { id: 77 } });

      await client.createTask({ tasklistId: '42', name: 'Write docs', estimatedMinutes: 90, progress: 0 });

      const request = sent(fetchSpy.mock.calls);
      expect(request.url).toBe(`${BASE}/tasklists/42/tasks.json`);
      expect(request.body).toEqual({ task: { name: 'Write docs', tasklistId: 42, estimatedMinutes: 90, progress: 0 } });
    });

    test('validates task arguments before calling Teamwork', async () => {
      const fetchSpy = respond({});

      await expect(client.createTask({ tasklistId: 'abc', name: 'x' })).rejects.toThrow('tasklist_id must be a numeric ID');
      await expect(client.createTask({ tasklistId: '1', name: 'x', estimatedMinutes: 0 })).rejects.toThrow(
        'estimated_minutes must be a positive value'
      );
      await expect(client.updateTask('1', { progress: 120 })).rejects.toThrow('progress must be between 0 and 100');
      expect(fetchSpy).not.toHaveBeenCalled();
    });

    test('rejects completed and progress that disagree', async () => {
      const fetchSpy = respond({});

      await expect(client.updateTask('1', { completed: true, progress: 50 })).rejects.toThrow(ValidationError);
      await expect(client.updateTask('1', { completed: false, progress: 100 })).rejects.toThrow(ValidationError);
      expect(fetchSpy).not.toHaveBeenCalled();

      await client.updateTask('1', { completed: true, progress: 100 });
      expect(sent(fetchSpy.mock.calls).body).toEqual({ task: { completed: true, progress: 100 } });
    });

    test('completes a task', async () => {
      const fetchSpy = respond({ task: { id: 1 } });

      await client.completeTask('1');

      const request = sent(fetchSpy.mock.calls);
      expect(request.url).toBe(`${BASE}/tasks/1.json`);
      expect(request.method).toBe('PATCH');
      expect(request.body).toEqual({ task: { completed: true } });
    });

    test('moves a task to another list and project', async () => {
      const fetchSpy = respond({});

      await client.moveTask('1', '9', '3');

      expect(sent(fetchSpy.mock.calls).body).toEqual({ task: { taskListId: 9, projectId: 3 } });
    });

    test('creates a subtask under its parent', async () => {
      const fetchSpy = respond({ task: { id: 2 } });

      await client.createSubtask('1', { name: 'Proofread' });

      const request = sent(fetchSpy.mock.calls);
      expect(request.url).toBe(`${BASE}/tasks.json`);
      expect(request.body).toEqual({ task: { name: 'Proofread', parentTaskId: 1 } });
    });

    test('tags a task', async () => {
      const fetchSpy = respond({});

      await client.addTagsToTask('1', ['3', '4']);

      const request = sent(fetchSpy.mock.calls);
      expect(request.url).toBe(`${BASE}/tasks/1/tags.json`);
      expect(request.method).toBe('PUT');
      expect(request.body).toEqual({ tagIds: [3, 4] });
    });

    test('comments on a task', async () => {
      const fetchSpy = respond({ id: 5 });

      await client.addTaskComment('1', 'Looks good');

      expect(sent(fetchSpy.mock.calls).body).toEqual({ comment: { body: 'Looks good' } });
    });
  });

  describe('task lists', () => {
    test('creates task lists through the v1 API', async () => {
      const fetchSpy = respond({ TASKLISTID: '55', STATUS: 'OK' });

      await client.createTaskList('5', 'Sprint 1');

      const request = sent(fetchSpy.mock.calls);
      expect(request.url).toBe('https://acme.teamwork.com/projects/5/tasklists.json');
      expect(request.method).toBe('POST');
      expect(request.body).toEqual({ 'todo-list': { name: 'Sprint 1' } });
    });

    test('updates task lists through the v1 API', async () => {
      const fetchSpy = respond({ STATUS: 'OK' });

      await expect(client.updateTaskList('8', {})).rejects.toThrow(ValidationError);
      await client.updateTaskList('8', { description: 'Backlog' });

      const request = sent(fetchSpy.mock.calls);
      expect(request.url).toBe('https://acme.teamwork.com/tasklists/8.json');
      expect(request.method).toBe('PUT');
      expect(request.body).toEqual({ 'todo-list': { description: 'Backlog' } });
    });
  });

  describe('time', () => {
    test('splits fractional hours', () => {
      expect(splitHours(1.5)).toEqual({ hours: 1, minutes: 30 });
      expect(splitHours(0.25)).toEqual({ hours: 0, minutes: 15 });
      expect(splitHours(2.999)).toEqual({ hours: 3, minutes: 0 });
    });

    test('formats the local date', () => {
      expect(todayIsoDate(new Date(2026, 2, 4, 12, 0))).toBe('2026-03-04');
    });

    test('logs project time dated today by default', async () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date(2026, 2, 4, 12, 0));
      const fetchSpy = respond({ timelog: { id: 1 } });

      await client.logTime({ projectId: '12', hours: 1.5, description: 'Review' });

      const request = sent(fetchSpy.mock.calls);
      expect(request.url).toBe(`${BASE}/projects/12/time.json`);
      expect(request.body).toEqual({
        timelog: { date: '2026-03-04', hours: 1, minutes: 30, description: 'Review', isBillable: true, projectId: 12 },
      });
    });

    test('logs task time against the task', async () => {
      const fetchSpy = respond({ timelog: { id: 2 } });

      await client.logTime({
        projectId: '12',
        taskId: '34',
        hours: 2,
        description: 'Build',
        date: '2026-01-15',
        isBillable: false,
      });

      const request = sent(fetchSpy.mock.calls);
      expect(request.url).toBe(`${BASE}/tasks/34/time.json`);
      expect(request.body).toEqual({
        timelog: { date: '2026-01-15', hours: 2, minutes: 0, description: 'Build', isBillable: false, projectId: 12, taskId: 34 },
      });
    });

    test('filters time entries by project and user', async () => {
      const fetchSpy = respond({ timelogs: [] });

      await client.getTimeEntries({ projectId: '12', userId: '7' });

      expect(sent(fetchSpy.mock.calls).url).toBe(`${BASE}/time.json?page=1&pageSize=50&projectIds=12&userIds=7`);
    });
  });

  describe('timers', () => {
    test('requires a project or task to start a timer', async () => {
      await expect(client.startTimer({ description: 'Focus' })).rejects.toThrow(
        'start_timer requires a project_id or a task_id'
      );
    });

    test('sends the billable flag only when disabled', async () => {
      const fetchSpy = respond({ timer: { id: 7 } });

      await client.startTimer({ projectId: '12', isBillable: true });
      await client.startTimer({ taskId: '34', isBillable: false });

      expect(sent(fetchSpy.mock.calls, 0).body).toEqual({ timer: { projectId: 12 } });
      expect(sent(fetchSpy.mock.calls, 1).body).toEqual({ timer: { taskId: 34, isBillable: false } });
      expect(sent(fetchSpy.mock.calls, 1).url).toBe(`${BASE}/me/timers.json`);
    });

    test('completes a timer', async () => {
      const fetchSpy = respond({ timer: { id: 7 } });

      await client.stopTimer('7', { description: 'Done' });

      const request = sent(fetchSpy.mock.calls);
      expect(request.url).toBe(`${BASE}/me/timers/7/complete.json`);
      expect(request.method).toBe('PUT');
      expect(request.body).toEqual({ timer: { description: 'Done' } });
    });

    test('cancels a timer with an empty response', async () => {
      const fetchSpy = vi.spyOn(globalThis, 'fetch').mockImplementation(async () => new Response(null, { status: 204 }));

      expect(await client.cancelTimer('7')).toEqual({ success: true });
      expect(sent(fetchSpy.mock.calls).method).toBe('DELETE');
    });
  });

  describe('people and planning', () => {
    test('lists my tasks for a date window', async () => {
      const fetchSpy = vi.spyOn(globalThis, 'fetch').mockImplementation(async (input) => {
        if (String(input).endsWith('/me.json')) {
          return json({ person: { id: 77, firstName: 'Sam' } });
        }
        return json({ tasks: [] });
      });

      await client.getMyTasks('overdue');

      expect(sent(fetchSpy.mock.calls, 1).url).toBe(
        `${BASE}/tasks.json?responsiblePartyIds=77&filter=overdue&includeCompletedTasks=false&pageSize=100`
      );
    });

    test('fails when the current user has no id', async () => {
      respond({});

      const error = await client.getMyTasks().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TeamworkMcpError);
      expect(error).toMatchObject({ code: 'USER_NOT_FOUND' });
    });

    test('summarizes a project from task counts', async () => {
      const fetchSpy = vi.spyOn(globalThis, 'fetch').mockImplementation(async (input) => {
        const url = String(input);
        if (url.includes('filter=overdue')) return json({ tasks: [], meta: { page: { count: 4 } } });
        if (url.includes('filter=thisweek')) return json({ tasks: [], meta: { page: { count: 2 } } });
        if (url.includes('/tasks.json')) return json({ tasks: [], meta: { page: { count: 30 } } });
        return json({ project: { id: 5, name: 'Support', status: 'active', description: 'Helpdesk' } });
      });

      const summary = await client.getProjectSummary('5');

      expect(summary).toEqual({
        project: { id: 5, name: 'Support', status: 'active', description: 'Helpdesk' },
        taskStats: { total: 30, overdue: 4, dueThisWeek: 2 },
        health: 'at-risk',
      });
      expect(sent(fetchSpy.mock.calls, 1).url).toBe(`${BASE}/tasks.json?projectId=5&pageSize=1`);
    });
  });

  describe('messages', () => {
    test('posts a message without notifying by default', async () => {
      const fetchSpy = respond({ post: { id: 3 } });

      await client.createMessage('5', { title: 'Release', body: 'Shipping Friday' });

      const request = sent(fetchSpy.mock.calls);
      expect(request.url).toBe(`${BASE}/projects/5/posts.json`);
      expect(request.body).toEqual({ post: { title: 'Release', body: 'Shipping Friday', notify: false } });
    });

    test('filters notebooks by project', async () => {
      const fetchSpy = respond({ notebooks: [] });

      await client.listNotebooks('5');

      expect(sent(fetchSpy.mock.calls).url).toBe(`${BASE}/notebooks.json?projectIds=5&page=1&pageSize=50`);
    });
  });
});
