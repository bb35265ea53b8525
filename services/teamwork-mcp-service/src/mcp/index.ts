export { createMcpServer } from './server';
export type { TeamworkMcpServer } from './server';
export { ToolRegistry, defaultClientFactory, toolError, toolResult } from './registry';
export type { ClientFactory, ToolDefinition, ToolExtra } from './registry';
