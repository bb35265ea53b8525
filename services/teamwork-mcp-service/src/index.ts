import type { Server } from 'node:http';
import { logger } from '@teamwork-mcp/shared-utils';
import { loadSettings } from './config/settings';
import { startServer, stopServer } from './server';

function onSignal(server: Server, signal: string): void {
  void stopServer(server, signal).then(
    () => process.exit(0),
    (error: unknown) => {
      logger.error('Error while closing server', error);
      process.exit(1);
    }
  );
}

async function main() {
  try {
    const settings = loadSettings();
    const server = await startServer(settings);
    process.on('SIGINT', () => onSignal(server, 'SIGINT'));
    process.on('SIGTERM', () => onSignal(server, 'SIGTERM'));
  } catch (error) {
    logger.error('Failed to start Teamwork MCP server', error);
    process.exit(1);
  }
}

void main();
