import type { ToolRegistry } from '../registry';
import { idArg } from '../schemas';

export function registerBudgetTools(tools: ToolRegistry): void {
  tools.register(
    'get_project_budget',
    {
      description: 'Get a Teamwork project budget by budget ID (capacity, usage, type and currency).',
      inputSchema: { budget_id: idArg('Budget ID') },
      annotations: { readOnlyHint: true },
    },
    async ({ budget_id }, extra) =>
      tools.run('get_project_budget', extra, (client) => client.getProjectBudget(budget_id))
  );

  tools.register(
    'list_project_budgets',
    {
      description:
        'List the time and financial budgets attached to a project. Reports which budget kinds exist ' +
        'and the details of each.',
      inputSchema: { project_id: idArg('Project ID') },
      annotations: { readOnlyHint: true },
    },
    async ({ project_id }, extra) =>
      tools.run('list_project_budgets', extra, (client) => client.listProjectBudgets(project_id))
  );

  tools.register(
    'get_project_time_totals',
    {
      description: 'Estimated versus logged minutes for a project, with remaining minutes and an over-budget flag.',
      inputSchema: { project_id: idArg('Project ID') },
      annotations: { readOnlyHint: true },
    },
    async ({ project_id }, extra) =>
      tools.run('get_project_time_totals', extra, (client) => client.getProjectTimeTotals(project_id))
  );

  tools.register(
    'get_tasklist_time_totals',
    {
      description: 'Estimated versus logged minutes for a task list.',
      inputSchema: { tasklist_id: idArg('Task list ID') },
      annotations: { readOnlyHint: true },
    },
    async ({ tasklist_id }, extra) =>
      tools.run('get_tasklist_time_totals', extra, (client) => client.getTasklistTimeTotals(tasklist_id))
  );

  tools.register(
    'get_task_time_totals',
    {
      description: 'Estimated versus logged minutes for a single task.',
      inputSchema: { task_id: idArg('Task ID') },
      annotations: { readOnlyHint: true },
    },
    async ({ task_id }, extra) =>
      tools.run('get_task_time_totals', extra, (client) => client.getTaskTimeTotals(task_id))
  );

  tools.register(
    'estimate_project_budget',
    {
      description:
        'Treat the sum of task estimates as an unofficial budget for a project and report usage against it. ' +
        'Useful for projects without a Teamwork budget; has_official_budget tells whether one exists.',
      inputSchema: { project_id: idArg('Project ID') },
      annotations: { readOnlyHint: true },
    },
    async ({ project_id }, extra) =>
      tools.run('estimate_project_budget', extra, (client) => client.estimateProjectBudget(project_id))
  );
}
