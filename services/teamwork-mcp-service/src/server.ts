/**
 * Teamwork MCP Server
 *
 * HTTP server exposing Teamwork tools over MCP Streamable HTTP
 */

import { createServer } from 'node:http';
import type { Server } from 'node:http';
import { Hono } from 'hono';
import { getRequestListener } from '@hono/node-server';
import type { HttpBindings } from '@hono/node-server';
import { gatewayAuthMiddleware, logger, rateLimitMiddleware, SimpleRateLimiter } from '@teamwork-mcp/shared-utils';
import type { Settings } from './config/settings';
import { createMcpServer } from './mcp';
import type { ClientFactory } from './mcp';
import { healthHandler } from './routes/health';
import { createMcpRouter } from './routes/mcp';

export interface AppOptions {
  createClient?: ClientFactory;
  rateLimiter?: SimpleRateLimiter;
}

export function createApp(settings: Settings, options: AppOptions = {}): Hono<{ Bindings: HttpBindings }> {
  const app = new Hono<{ Bindings: HttpBindings }>();
  const toolCount = createMcpServer(settings, options.createClient).toolNames.length;
  const limiter = options.rateLimiter ?? new SimpleRateLimiter({ requestsPerMinute: settings.rateLimitPerMinute });
  const checkGateway = gatewayAuthMiddleware(settings.gatewaySecret);
  const checkRateLimit = rateLimitMiddleware(limiter);

  // Health check endpoint
  app.get('/health', (c) => c.json(healthHandler(settings, toolCount)));

  // Gateway secret and rate limiting guard the MCP endpoint
  app.use('/mcp', async (c, next) => {
    const blocked = checkGateway(c.req.raw) ?? checkRateLimit(c.req.raw);
    if (blocked) return blocked;
    await next();
  });

  app.route('/mcp', createMcpRouter(settings, options.createClient));

  app.notFound((c) => c.json({ success: false, error: 'Not found' }, 404));

  return app;
}

/**
 * Start listening. Resolves once the port is bound.
 */
export async function startServer(settings: Settings, options: AppOptions = {}): Promise<Server> {
  const app = createApp(settings, options);
  const server = createServer(getRequestListener(app.fetch));

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(settings.port, settings.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : settings.port;
  logger.info(`${settings.name} v${settings.version} listening on http://${settings.host}:${port}`);
  logger.info('Available routes:');
  logger.info('  GET  /health');
  logger.info('  POST /mcp');

  return server;
}

/**
 * Close the listener and drop open connections. Resolves once the server has stopped.
 */
export async function stopServer(server: Server, reason: string): Promise<void> {
  logger.info(`Received ${reason}, shutting down`);
  const closed = new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
  server.closeAllConnections();
  await closed;
}
