import { z } from 'zod';
import { DATE_FILTERS } from '../../teamwork';
import type { ToolRegistry } from '../registry';
import { idArg, pageArg, pageSizeArg } from '../schemas';

export function registerPeopleTools(tools: ToolRegistry): void {
  tools.register(
    'list_people',
    {
      description: 'List people in the installation, optionally limited to one project.',
      inputSchema: {
        page: pageArg,
        page_size: pageSizeArg(50),
        project_id: idArg('Filter by project ID').optional(),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ page, page_size, project_id }, extra) =>
      tools.run('list_people', extra, (client) => client.listPeople({ page, pageSize: page_size, projectId: project_id }))
  );

  tools.register(
    'get_me',
    {
      description: 'Get the authenticated user, including the user ID other tools filter by.',
      inputSchema: {},
      annotations: { readOnlyHint: true },
    },
    async (_args, extra) => tools.run('get_me', extra, (client) => client.getMe())
  );

  tools.register(
    'get_my_tasks',
    {
      description:
        'List tasks assigned to the authenticated user due in a time window: overdue, today, thisweek, ' +
        'within7, within14 or within30.',
      inputSchema: {
        date_filter: z.enum(DATE_FILTERS).default('within7').describe('Due-date window'),
        include_completed: z.boolean().default(false).describe('Include completed tasks'),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ date_filter, include_completed }, extra) =>
      tools.run('get_my_tasks', extra, (client) => client.getMyTasks(date_filter, include_completed))
  );

  tools.register(
    'get_project_summary',
    {
      description:
        'Summarize a project for status reporting: task totals, overdue and due-this-week counts, and a ' +
        'health flag (at-risk when 10% or more tasks, or at least 3, are overdue).',
      inputSchema: { project_id: idArg('Project ID') },
      annotations: { readOnlyHint: true },
    },
    async ({ project_id }, extra) =>
      tools.run('get_project_summary', extra, (client) => client.getProjectSummary(project_id))
  );
}
