import { Hono } from 'hono';
import type { HttpBindings } from '@hono/node-server';
import { RESPONSE_ALREADY_SENT } from '@hono/node-server/utils/response';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '@teamwork-mcp/shared-utils';
import type { Settings } from '../config/settings';
import { createMcpServer } from '../mcp';
import type { ClientFactory } from '../mcp';

const log = logger.child('mcp');

function jsonRpcError(code: number, message: string) {
  return { jsonrpc: '2.0', error: { code, message }, id: null };
}

/**
 * Stateless MCP Streamable HTTP endpoint: every POST gets its own server and transport.
 */
export function createMcpRouter(settings: Settings, createClient?: ClientFactory): Hono<{ Bindings: HttpBindings }> {
  const mcp = new Hono<{ Bindings: HttpBindings }>();

  mcp.post('/', async (c) => {
    const requestId = uuidv4();

    let body: unknown;
    try {
      body = await c.req.json();
    } catch (error: unknown) {
      log.warn('Rejected MCP request with invalid JSON', { requestId, error: String(error) });
      return c.json(jsonRpcError(-32700, 'Parse error: Invalid JSON'), 400);
    }

    const { server } = createMcpServer(settings, createClient);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });
    const { incoming, outgoing } = c.env;

    outgoing.on('close', () => {
      transport.close().catch((error: unknown) => log.warn('Failed to close MCP transport', { requestId, error: String(error) }));
      server.close().catch((error: unknown) => log.warn('Failed to close MCP server', { requestId, error: String(error) }));
    });

    try {
      log.debug('Handling MCP request', { requestId });
      await server.connect(transport);
      await transport.handleRequest(incoming, outgoing, body);
      return RESPONSE_ALREADY_SENT;
    } catch (error: unknown) {
      log.error('MCP request failed', { requestId, error: error instanceof Error ? error.message : String(error) });
      if (outgoing.headersSent) {
        return RESPONSE_ALREADY_SENT;
      }
      return c.json(jsonRpcError(-32603, 'Internal server error'), 500);
    }
  });

  mcp.on(['GET', 'DELETE'], '/', (c) => c.json(jsonRpcError(-32000, 'Method not allowed.'), 405));

  return mcp;
}
