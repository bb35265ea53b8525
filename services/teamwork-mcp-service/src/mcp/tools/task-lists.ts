import { z } from 'zod';
import type { ToolRegistry } from '../registry';
import { idArg, pageArg, pageSizeArg } from '../schemas';

export function registerTaskListTools(tools: ToolRegistry): void {
  tools.register(
    'list_task_lists',
    {
      description: 'List the task lists of a project.',
      inputSchema: { project_id: idArg('Project ID'), page: pageArg, page_size: pageSizeArg(50) },
      annotations: { readOnlyHint: true },
    },
    async ({ project_id, page, page_size }, extra) =>
      tools.run('list_task_lists', extra, (client) => client.listTaskLists(project_id, { page, pageSize: page_size }))
  );

  tools.register(
    'create_task_list',
    {
      description: 'Create a task list in a project.',
      inputSchema: {
        project_id: idArg('Project ID'),
        name: z.string().min(1).describe('Task list name'),
        description: z.string().optional().describe('Task list description'),
      },
    },
    async ({ project_id, name, description }, extra) =>
      tools.run('create_task_list', extra, (client) => client.createTaskList(project_id, name, description))
  );

  tools.register(
    'update_task_list',
    {
      description: 'Rename a task list or change its description. At least one of the two is required.',
      inputSchema: {
        tasklist_id: idArg('Task list ID'),
        name: z.string().min(1).optional().describe('New name'),
        description: z.string().optional().describe('New description'),
      },
    },
    async ({ tasklist_id, name, description }, extra) =>
      tools.run('update_task_list', extra, (client) => client.updateTaskList(tasklist_id, { name, description }))
  );
}
