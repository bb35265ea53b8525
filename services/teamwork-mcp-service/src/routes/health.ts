import type { HealthResponse } from '@teamwork-mcp/shared-types';
import type { Settings } from '../config/settings';

export function healthHandler(settings: Settings, toolCount: number): HealthResponse {
  return {
    status: 'healthy',
    service: settings.name,
    version: settings.version,
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    tools: toolCount,
  };
}
