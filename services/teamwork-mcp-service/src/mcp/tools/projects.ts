import { z } from 'zod';
import type { ToolRegistry } from '../registry';
import { dateArg, idArg, pageArg, pageSizeArg } from '../schemas';

export function registerProjectTools(tools: ToolRegistry): void {
  tools.register(
    'list_projects',
    {
      description:
        'List Teamwork projects with pagination. Returns id, name, status, company and budget references ' +
        'for each project unless include_details is set, in which case the full Teamwork records are returned.',
      inputSchema: {
        page: pageArg,
        page_size: pageSizeArg(25),
        include_details: z.boolean().default(false).describe('Return full project records'),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ page, page_size, include_details }, extra) =>
      tools.run('list_projects', extra, (client) =>
        client.listProjects({ page, pageSize: page_size, includeDetails: include_details })
      )
  );

  tools.register(
    'get_project',
    {
      description: 'Get full details of a Teamwork project, including company, dates and budget references.',
      inputSchema: { project_id: idArg('Project ID') },
      annotations: { readOnlyHint: true },
    },
    async ({ project_id }, extra) => tools.run('get_project', extra, (client) => client.getProject(project_id))
  );

  tools.register(
    'create_project',
    {
      description: 'Create a Teamwork project. Returns the created project including its new ID.',
      inputSchema: {
        name: z.string().min(1).describe('Project name'),
        description: z.string().optional().describe('Project description'),
        start_date: dateArg.optional().describe('Start date (YYYY-MM-DD)'),
        end_date: dateArg.optional().describe('End date (YYYY-MM-DD)'),
      },
    },
    async ({ name, description, start_date, end_date }, extra) =>
      tools.run('create_project', extra, (client) =>
        client.createProject({ name, description, startDate: start_date, endDate: end_date })
      )
  );

  tools.register(
    'update_project',
    {
      description: 'Update a Teamwork project. Only the given fields change; at least one is required.',
      inputSchema: {
        project_id: idArg('Project ID'),
        name: z.string().min(1).optional().describe('New project name'),
        description: z.string().optional().describe('New description'),
        status: z.string().optional().describe('New status, e.g. active or archived'),
        start_date: dateArg.optional().describe('New start date (YYYY-MM-DD)'),
        end_date: dateArg.optional().describe('New end date (YYYY-MM-DD)'),
      },
    },
    async ({ project_id, name, description, status, start_date, end_date }, extra) =>
      tools.run('update_project', extra, (client) =>
        client.updateProject(project_id, { name, description, status, startDate: start_date, endDate: end_date })
      )
  );

  tools.register(
    'archive_project',
    {
      description: 'Archive a Teamwork project by setting its status to archived.',
      inputSchema: { project_id: idArg('Project ID') },
      annotations: { destructiveHint: true },
    },
    async ({ project_id }, extra) => tools.run('archive_project', extra, (client) => client.archiveProject(project_id))
  );
}
