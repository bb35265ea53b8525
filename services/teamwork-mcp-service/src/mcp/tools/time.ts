import { z } from 'zod';
import type { ToolRegistry } from '../registry';
import { dateArg, idArg, pageArg, pageSizeArg } from '../schemas';

export function registerTimeTools(tools: ToolRegistry): void {
  tools.register(
    'log_time',
    {
      description:
        'Log time against a project, or against a task when task_id is given. Fractional hours are ' +
        'converted to hours and minutes. The date defaults to today.',
      inputSchema: {
        project_id: idArg('Project ID'),
        hours: z.number().positive().describe('Hours worked, e.g. 1.5'),
        description: z.string().describe('Description of the work'),
        date: dateArg.optional().describe('Date (YYYY-MM-DD, defaults to today)'),
        task_id: idArg('Task ID').optional(),
        is_billable: z.boolean().default(true).describe('Whether the time is billable'),
      },
    },
    async ({ project_id, hours, description, date, task_id, is_billable }, extra) =>
      tools.run('log_time', extra, (client) =>
        client.logTime({ projectId: project_id, hours, description, date, taskId: task_id, isBillable: is_billable })
      )
  );

  tools.register(
    'get_time_entries',
    {
      description: 'List logged time entries, optionally filtered by project and user.',
      inputSchema: {
        project_id: idArg('Filter by project ID').optional(),
        user_id: idArg('Filter by user ID').optional(),
        page: pageArg,
        page_size: pageSizeArg(50),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ project_id, user_id, page, page_size }, extra) =>
      tools.run('get_time_entries', extra, (client) =>
        client.getTimeEntries({ projectId: project_id, userId: user_id, page, pageSize: page_size })
      )
  );

  tools.register(
    'get_active_timer',
    {
      description: "List the current user's timers, including any that are running.",
      inputSchema: {},
      annotations: { readOnlyHint: true },
    },
    async (_args, extra) => tools.run('get_active_timer', extra, (client) => client.getActiveTimer())
  );

  tools.register(
    'start_timer',
    {
      description: 'Start a timer on a project or task. One of project_id or task_id is required.',
      inputSchema: {
        project_id: idArg('Project ID').optional(),
        task_id: idArg('Task ID').optional(),
        description: z.string().optional().describe('What the timer is for'),
        is_billable: z.boolean().default(true).describe('Whether the tracked time is billable'),
      },
    },
    async ({ project_id, task_id, description, is_billable }, extra) =>
      tools.run('start_timer', extra, (client) =>
        client.startTimer({ projectId: project_id, taskId: task_id, description, isBillable: is_billable })
      )
  );

  tools.register(
    'stop_timer',
    {
      description: 'Stop a timer and turn it into a time log.',
      inputSchema: {
        timer_id: idArg('Timer ID'),
        description: z.string().optional().describe('Description for the resulting time log'),
        is_billable: z.boolean().optional().describe('Override the billable flag'),
      },
    },
    async ({ timer_id, description, is_billable }, extra) =>
      tools.run('stop_timer', extra, (client) => client.stopTimer(timer_id, { description, isBillable: is_billable }))
  );

  tools.register(
    'pause_timer',
    {
      description: 'Pause a running timer.',
      inputSchema: { timer_id: idArg('Timer ID') },
    },
    async ({ timer_id }, extra) => tools.run('pause_timer', extra, (client) => client.pauseTimer(timer_id))
  );

  tools.register(
    'resume_timer',
    {
      description: 'Resume a paused timer.',
      inputSchema: { timer_id: idArg('Timer ID') },
    },
    async ({ timer_id }, extra) => tools.run('resume_timer', extra, (client) => client.resumeTimer(timer_id))
  );

  tools.register(
    'cancel_timer',
    {
      description: 'Delete a timer without logging its time.',
      inputSchema: { timer_id: idArg('Timer ID') },
      annotations: { destructiveHint: true },
    },
    async ({ timer_id }, extra) => tools.run('cancel_timer', extra, (client) => client.cancelTimer(timer_id))
  );
}
