/**
 * Tool registration and execution.
 *
 * Every tool resolves credentials from the forwarding request, runs one Teamwork
 * operation and reports the outcome as a single JSON text block.
 */

import type { McpServer, ToolCallback } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { RequestHandlerExtra } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type {
  CallToolResult,
  ServerNotification,
  ServerRequest,
  ToolAnnotations,
} from '@modelcontextprotocol/sdk/types.js';
import type { ZodRawShape } from 'zod';
import { logger, toServiceError } from '@teamwork-mcp/shared-utils';
import { resolveCredentials } from '../auth/credentials';
import type { TeamworkCredentials } from '../auth/credentials';
import type { Settings } from '../config/settings';
import { TeamworkClient } from '../teamwork';

const log = logger.child('tools');

export type ToolExtra = RequestHandlerExtra<ServerRequest, ServerNotification>;

export type ClientFactory = (credentials: TeamworkCredentials, settings: Settings) => TeamworkClient;

export interface ToolDefinition<Shape extends ZodRawShape> {
  description: string;
  inputSchema: Shape;
  annotations?: ToolAnnotations;
}

export const defaultClientFactory: ClientFactory = (credentials, settings) =>
  new TeamworkClient(credentials.accessToken, credentials.domain, {
    timeout: settings.requestTimeoutMs,
    retries: settings.requestRetries,
  });

export function toolResult(value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

export function toolError(error: unknown, service: string): CallToolResult {
  return {
    isError: true,
    content: [{ type: 'text', text: JSON.stringify({ success: false, error: toServiceError(error, service) }, null, 2) }],
  };
}

export class ToolRegistry {
  private readonly registered: string[] = [];

  constructor(
    private readonly server: McpServer,
    private readonly settings: Settings,
    private readonly createClient: ClientFactory = defaultClientFactory
  ) {}

  get names(): readonly string[] {
    return this.registered;
  }

  register<Shape extends ZodRawShape>(name: string, definition: ToolDefinition<Shape>, callback: ToolCallback<Shape>): void {
    this.server.registerTool(name, definition, callback);
    this.registered.push(name);
  }

  /**
   * Run one Teamwork operation for a tool call. Failures never escape: they become isError results.
   */
  async run(name: string, extra: ToolExtra, operation: (client: TeamworkClient) => Promise<unknown>): Promise<CallToolResult> {
    const startTime = Date.now();
    try {
      const credentials = resolveCredentials(extra.requestInfo?.headers ?? {}, this.settings);
      const result = await operation(this.createClient(credentials, this.settings));
      log.info(`Tool ${name} completed`, { durationMs: Date.now() - startTime });
      return toolResult(result);
    } catch (error: unknown) {
      const serviceError = toServiceError(error, this.settings.name);
      log.error(`Tool ${name} failed`, { code: serviceError.code, message: serviceError.message });
      return toolError(error, this.settings.name);
    }
  }
}
