import { logger, ServiceUnavailableError, TimeoutError } from '@teamwork-mcp/shared-utils';
import type { APIResponse } from '@teamwork-mcp/shared-types';

export interface RestClientOptions {
  timeout?: number;
  headers?: Record<string, string>;
  retries?: number;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryValue = string | number | boolean | null | undefined;

export type QueryParams = Record<string, QueryValue>;

export interface RequestOptions {
  query?: QueryParams;
  body?: unknown;
  /** Absolute base URL for this call instead of the client's own. */
  baseUrl?: string;
}

function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return errorCode(error.cause);
  return undefined;
}

/**
 * JSON-over-HTTP client. Non-2xx answers come back as `success: false`
 * envelopes; timeouts and refused connections throw. Timed-out GETs are
 * retried up to `retries` times.
 */
export class RestClient {
  protected readonly baseUrl: string;
  private readonly timeout: number;
  private readonly headers: Record<string, string>;
  private readonly retries: number;

  constructor(baseUrl: string, options: RestClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeout = options.timeout ?? 30000;
    this.headers = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      ...options.headers,
    };
    this.retries = options.retries ?? 0;
  }

  buildUrl(path: string, query?: QueryParams, baseUrl: string = this.baseUrl): string {
    const url = new URL(`${baseUrl.replace(/\/+$/, '')}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined && value !== null) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  async request(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {},
    attempt: number = 0
  ): Promise<APIResponse<unknown>> {
    const url = this.buildUrl(path, options.query, options.baseUrl);
    const service = options.baseUrl ?? this.baseUrl;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      logger.debug(`${method} ${url}`);

      const response = await fetch(url, {
        method,
        headers: this.headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });

      const text = await response.text();

      if (!response.ok) {
        return {
          success: false,
          error: {
            code: `HTTP_${response.status}`,
            message: text || response.statusText,
            service,
            status: response.status,
            timestamp: new Date().toISOString(),
          },
        };
      }

      if (response.status === 204 || text.trim() === '') {
        return { success: true };
      }

      return { success: true, data: JSON.parse(text) };
    } catch (error: unknown) {
      if (isAbortError(error)) {
        // Only reads are repeated; a write may already have been applied upstream
        if (method === 'GET' && attempt < this.retries) {
          logger.warn(`Request timeout, retrying (${attempt + 1}/${this.retries})...`, { method, path });
          return this.request(method, path, options, attempt + 1);
        }
        throw new TimeoutError(`${method} ${path}`, service, this.timeout);
      }

      if (errorCode(error) === 'ECONNREFUSED') {
        throw new ServiceUnavailableError(service, {
          url,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      return {
        success: false,
        error: {
          code: 'REQUEST_ERROR',
          message: error instanceof Error ? error.message : 'Unknown error',
          service,
          timestamp: new Date().toISOString(),
        },
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
