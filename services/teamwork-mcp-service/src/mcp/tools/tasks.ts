import { z } from 'zod';
import type { ToolRegistry } from '../registry';
import { dateArg, estimatedMinutesArg, idArg, pageArg, pageSizeArg, priorityArg, progressArg } from '../schemas';

const assigneeIdsArg = z.array(z.string()).describe('User IDs to assign');

export function registerTaskTools(tools: ToolRegistry): void {
  tools.register(
    'list_tasks',
    {
      description: 'List tasks, optionally limited to one project.',
      inputSchema: {
        project_id: idArg('Filter by project ID').optional(),
        page: pageArg,
        page_size: pageSizeArg(50),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ project_id, page, page_size }, extra) =>
      tools.run('list_tasks', extra, (client) => client.listTasks({ projectId: project_id, page, pageSize: page_size }))
  );

  tools.register(
    'get_task',
    {
      description: 'Get full details of a task: status, assignees, dates, estimate and progress.',
      inputSchema: { task_id: idArg('Task ID') },
      annotations: { readOnlyHint: true },
    },
    async ({ task_id }, extra) => tools.run('get_task', extra, (client) => client.getTask(task_id))
  );

  tools.register(
    'create_teamwork_task',
    {
      description:
        'Create a task in a task list. estimated_minutes must be positive and progress between 0 and 100.',
      inputSchema: {
        tasklist_id: idArg('Task list ID'),
        name: z.string().min(1).describe('Task name'),
        description: z.string().optional().describe('Task description'),
        due_date: dateArg.optional().describe('Due date (YYYY-MM-DD)'),
        assignee_ids: assigneeIdsArg.optional(),
        priority: priorityArg.optional().describe('Priority (low, medium, high)'),
        estimated_minutes: estimatedMinutesArg.optional(),
        progress: progressArg.optional(),
      },
    },
    async (args, extra) =>
      tools.run('create_teamwork_task', extra, (client) =>
        client.createTask({
          tasklistId: args.tasklist_id,
          name: args.name,
          description: args.description,
          dueDate: args.due_date,
          assigneeIds: args.assignee_ids,
          priority: args.priority,
          estimatedMinutes: args.estimated_minutes,
          progress: args.progress,
        })
      )
  );

  tools.register(
    'update_task',
    {
      description:
        'Update a task. Only the given fields change. When both completed and progress are given they must agree: ' +
        'completed=true goes with progress=100.',
      inputSchema: {
        task_id: idArg('Task ID'),
        name: z.string().min(1).optional().describe('New task name'),
        description: z.string().optional().describe('New description'),
        due_date: dateArg.optional().describe('New due date (YYYY-MM-DD)'),
        priority: priorityArg.optional().describe('New priority (low, medium, high)'),
        completed: z.boolean().optional().describe('Mark as completed or incomplete'),
        estimated_minutes: estimatedMinutesArg.optional(),
        progress: progressArg.optional(),
      },
    },
    async (args, extra) =>
      tools.run('update_task', extra, (client) =>
        client.updateTask(args.task_id, {
          name: args.name,
          description: args.description,
          dueDate: args.due_date,
          priority: args.priority,
          completed: args.completed,
          estimatedMinutes: args.estimated_minutes,
          progress: args.progress,
        })
      )
  );

  tools.register(
    'complete_task',
    {
      description: 'Mark a task as complete.',
      inputSchema: { task_id: idArg('Task ID') },
    },
    async ({ task_id }, extra) => tools.run('complete_task', extra, (client) => client.completeTask(task_id))
  );

  tools.register(
    'move_task',
    {
      description: 'Move a task to another task list, and optionally to another project.',
      inputSchema: {
        task_id: idArg('Task ID'),
        target_tasklist_id: idArg('Destination task list ID'),
        target_project_id: idArg('Destination project ID').optional(),
      },
    },
    async ({ task_id, target_tasklist_id, target_project_id }, extra) =>
      tools.run('move_task', extra, (client) => client.moveTask(task_id, target_tasklist_id, target_project_id))
  );

  tools.register(
    'list_subtasks',
    {
      description: 'List the subtasks of a task.',
      inputSchema: { task_id: idArg('Parent task ID'), page: pageArg, page_size: pageSizeArg(50) },
      annotations: { readOnlyHint: true },
    },
    async ({ task_id, page, page_size }, extra) =>
      tools.run('list_subtasks', extra, (client) => client.listSubtasks(task_id, { page, pageSize: page_size }))
  );

  tools.register(
    'create_subtask',
    {
      description: 'Create a subtask under a parent task.',
      inputSchema: {
        task_id: idArg('Parent task ID'),
        name: z.string().min(1).describe('Subtask name'),
        description: z.string().optional().describe('Subtask description'),
        assignee_ids: assigneeIdsArg.optional(),
      },
    },
    async ({ task_id, name, description, assignee_ids }, extra) =>
      tools.run('create_subtask', extra, (client) =>
        client.createSubtask(task_id, { name, description, assigneeIds: assignee_ids })
      )
  );
}
