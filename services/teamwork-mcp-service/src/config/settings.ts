import { z } from 'zod';
import {
  ConfigurationError,
  getEnv,
  getEnvNumber,
  getEnvOptional,
  logger,
} from '@teamwork-mcp/shared-utils';
import type { ServiceConfig } from '@teamwork-mcp/shared-types';

export const SettingsSchema = z.object({
  name: z.string().min(1).default('teamwork-mcp'),
  version: z.string().min(1).default('1.0.0'),
  description: z.string().default('Teamwork.com project management tools over MCP'),
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(0).max(65535).default(3005),
  logLevel: z
    .string()
    .transform((level) => level.toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error']))
    .default('info'),
  defaultDomain: z.string().min(1).optional(),
  fallbackAccessToken: z.string().min(1).optional(),
  requestTimeoutMs: z.number().int().positive().default(30000),
  requestRetries: z.number().int().min(0).max(5).default(0),
  rateLimitPerMinute: z.number().int().positive().default(120),
  gatewaySecret: z.string().min(1).optional(),
});

export type Settings = z.infer<typeof SettingsSchema> & ServiceConfig;

/**
 * Build settings from explicit values, filling in defaults.
 */
export function createSettings(input: z.input<typeof SettingsSchema> = {}): Settings {
  const result = SettingsSchema.safeParse(input);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    logger.error('Configuration validation failed', messages);
    throw new ConfigurationError(`Invalid configuration: ${messages.join(', ')}`, 'teamwork-mcp', {
      issues: messages,
    });
  }
  return result.data;
}

/**
 * Load settings from the process environment.
 */
export function loadSettings(): Settings {
  const settings = createSettings({
    name: getEnv('MCP_SERVER_NAME', 'teamwork-mcp'),
    version: getEnv('MCP_SERVER_VERSION', '1.0.0'),
    host: getEnv('HOST', '0.0.0.0'),
    port: getEnvNumber('PORT', 3005),
    logLevel: getEnv('LOG_LEVEL', 'info'),
    defaultDomain: getEnvOptional('TEAMWORK_DOMAIN'),
    fallbackAccessToken: getEnvOptional('TEAMWORK_ACCESS_TOKEN'),
    requestTimeoutMs: getEnvNumber('TEAMWORK_TIMEOUT_MS', 30000),
    requestRetries: getEnvNumber('TEAMWORK_RETRIES', 0),
    rateLimitPerMinute: getEnvNumber('RATE_LIMIT_PER_MINUTE', 120),
    gatewaySecret: getEnvOptional('GATEWAY_SHARED_SECRET'),
  });

  logger.setLevel(settings.logLevel);
  return settings;
}
