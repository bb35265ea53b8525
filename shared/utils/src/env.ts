import { ConfigurationError } from './errors';

/**
 * Environment variable helpers
 */

export function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(
      `Environment variable ${key} is required but not set`,
      'teamwork-mcp',
      { key }
    );
  }
  return value;
}

export function getEnvOptional(key: string): string | undefined {
  const value = process.env[key];
  return value === '' ? undefined : value;
}

export function getEnvNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new ConfigurationError(
      `Environment variable ${key} is required but not set`,
      'teamwork-mcp',
      { key }
    );
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new ConfigurationError(
      `Environment variable ${key} must be a valid number`,
      'teamwork-mcp',
      { key, value }
    );
  }
  return parsed;
}
