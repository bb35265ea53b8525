import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Settings } from '../config/settings';
import { ToolRegistry } from './registry';
import type { ClientFactory } from './registry';
import { registerBudgetTools } from './tools/budgets';
import { registerCollaborationTools } from './tools/collaboration';
import { registerPeopleTools } from './tools/people';
import { registerProjectTools } from './tools/projects';
import { registerTaskListTools } from './tools/task-lists';
import { registerTaskTools } from './tools/tasks';
import { registerTimeTools } from './tools/time';

export interface TeamworkMcpServer {
  server: McpServer;
  toolNames: readonly string[];
}

/**
 * Build an MCP server with every Teamwork tool registered.
 */
export function createMcpServer(settings: Settings, createClient?: ClientFactory): TeamworkMcpServer {
  const server = new McpServer({ name: settings.name, version: settings.version });
  const tools = new ToolRegistry(server, settings, createClient);

  registerProjectTools(tools);
  registerBudgetTools(tools);
  registerTaskTools(tools);
  registerTaskListTools(tools);
  registerTimeTools(tools);
  registerPeopleTools(tools);
  registerCollaborationTools(tools);

  return { server, toolNames: tools.names };
}
