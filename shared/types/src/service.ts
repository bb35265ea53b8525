/**
 * Service Configuration
 */
export interface ServiceConfig {
  name: string;
  version: string;
  description: string;
  host: string;
  port: number;
  logLevel: LogLevel;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Service Health Response
 */
export interface HealthResponse {
  status: 'healthy' | 'unhealthy' | 'degraded';
  service: string;
  timestamp: string;
  uptime?: number;
  version?: string;
  tools?: number;
}

/**
 * Service Error
 */
export interface ServiceError {
  code: string;
  message: string;
  service: string;
  timestamp: string;
  status?: number;
  details?: unknown;
}

/**
 * API Response Wrapper
 */
export interface APIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ServiceError;
}
