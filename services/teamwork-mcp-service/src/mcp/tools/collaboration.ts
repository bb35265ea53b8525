import { z } from 'zod';
import type { ToolRegistry } from '../registry';
import { idArg, pageArg, pageSizeArg } from '../schemas';

/**
 * Comments, tags, milestones, notebooks and messages.
 */
export function registerCollaborationTools(tools: ToolRegistry): void {
  tools.register(
    'list_task_comments',
    {
      description: 'List the comments on a task.',
      inputSchema: { task_id: idArg('Task ID'), page: pageArg, page_size: pageSizeArg(50) },
      annotations: { readOnlyHint: true },
    },
    async ({ task_id, page, page_size }, extra) =>
      tools.run('list_task_comments', extra, (client) => client.listTaskComments(task_id, { page, pageSize: page_size }))
  );

  tools.register(
    'add_task_comment',
    {
      description: 'Add a comment to a task.',
      inputSchema: {
        task_id: idArg('Task ID'),
        body: z.string().min(1).describe('Comment text'),
      },
    },
    async ({ task_id, body }, extra) =>
      tools.run('add_task_comment', extra, (client) => client.addTaskComment(task_id, body))
  );

  tools.register(
    'list_tags',
    {
      description: 'List the tags available in the installation.',
      inputSchema: { page: pageArg, page_size: pageSizeArg(100) },
      annotations: { readOnlyHint: true },
    },
    async ({ page, page_size }, extra) =>
      tools.run('list_tags', extra, (client) => client.listTags({ page, pageSize: page_size }))
  );

  tools.register(
    'add_tag_to_task',
    {
      description: 'Attach one or more existing tags to a task.',
      inputSchema: {
        task_id: idArg('Task ID'),
        tag_ids: z.array(idArg('Tag ID')).min(1).describe('Tag IDs to add'),
      },
    },
    async ({ task_id, tag_ids }, extra) =>
      tools.run('add_tag_to_task', extra, (client) => client.addTagsToTask(task_id, tag_ids))
  );

  tools.register(
    'list_milestones',
    {
      description: 'List the milestones of a project.',
      inputSchema: { project_id: idArg('Project ID'), page: pageArg, page_size: pageSizeArg(50) },
      annotations: { readOnlyHint: true },
    },
    async ({ project_id, page, page_size }, extra) =>
      tools.run('list_milestones', extra, (client) => client.listMilestones(project_id, { page, pageSize: page_size }))
  );

  tools.register(
    'get_milestone',
    {
      description: 'Get a milestone with its deadline, responsible people and linked task lists.',
      inputSchema: { milestone_id: idArg('Milestone ID') },
      annotations: { readOnlyHint: true },
    },
    async ({ milestone_id }, extra) =>
      tools.run('get_milestone', extra, (client) => client.getMilestone(milestone_id))
  );

  tools.register(
    'list_notebooks',
    {
      description: 'List the notebooks of a project.',
      inputSchema: { project_id: idArg('Project ID'), page: pageArg, page_size: pageSizeArg(50) },
      annotations: { readOnlyHint: true },
    },
    async ({ project_id, page, page_size }, extra) =>
      tools.run('list_notebooks', extra, (client) => client.listNotebooks(project_id, { page, pageSize: page_size }))
  );

  tools.register(
    'get_notebook',
    {
      description: 'Get a notebook including its content.',
      inputSchema: { notebook_id: idArg('Notebook ID') },
      annotations: { readOnlyHint: true },
    },
    async ({ notebook_id }, extra) => tools.run('get_notebook', extra, (client) => client.getNotebook(notebook_id))
  );

  tools.register(
    'list_messages',
    {
      description: 'List the messages posted in a project.',
      inputSchema: { project_id: idArg('Project ID'), page: pageArg, page_size: pageSizeArg(50) },
      annotations: { readOnlyHint: true },
    },
    async ({ project_id, page, page_size }, extra) =>
      tools.run('list_messages', extra, (client) => client.listMessages(project_id, { page, pageSize: page_size }))
  );

  tools.register(
    'create_message',
    {
      description: 'Post a message to a project, optionally notifying project members.',
      inputSchema: {
        project_id: idArg('Project ID'),
        title: z.string().min(1).describe('Message title'),
        body: z.string().min(1).describe('Message body'),
        notify: z.boolean().default(false).describe('Notify project members'),
        category_id: idArg('Message category ID').optional(),
      },
    },
    async ({ project_id, title, body, notify, category_id }, extra) =>
      tools.run('create_message', extra, (client) =>
        client.createMessage(project_id, { title, body, notify, categoryId: category_id })
      )
  );
}
