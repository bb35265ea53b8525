/**
 * Inbound rate limiting
 *
 * Token bucket per client IP. Blocked requests get 429 with Retry-After.
 */

import { logger } from './logger';

export interface RateLimiterOptions {
  requestsPerMinute: number;
  burstSize?: number;
}

interface ClientBucket {
  tokens: number;
  lastRefill: number;
}

const STALE_AFTER_MS = 120_000;

export class SimpleRateLimiter {
  private readonly requestsPerMinute: number;
  private readonly burstSize: number;
  private readonly buckets = new Map<string, ClientBucket>();
  private cleanupInterval: ReturnType<typeof setInterval> | null;

  constructor(options: RateLimiterOptions) {
    this.requestsPerMinute = options.requestsPerMinute;
    this.burstSize = options.burstSize ?? options.requestsPerMinute;

    this.cleanupInterval = setInterval(() => this.cleanup(), 60_000);
    this.cleanupInterval.unref();
  }

  /**
   * Take one token for the client. False when the bucket is empty.
   */
  tryAcquire(clientId: string = 'default'): boolean {
    const bucket = this.refill(clientId);
    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return true;
    }
    return false;
  }

  /**
   * Seconds until the client has a whole token again.
   */
  getRetryAfterSeconds(clientId: string = 'default'): number {
    const bucket = this.refill(clientId);
    if (bucket.tokens >= 1) return 0;
    const perSecond = this.requestsPerMinute / 60;
    return Math.max(1, Math.ceil((1 - bucket.tokens) / perSecond));
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }

  private refill(clientId: string): ClientBucket {
    const now = Date.now();
    let bucket = this.buckets.get(clientId);
    if (!bucket) {
      bucket = { tokens: this.burstSize, lastRefill: now };
      this.buckets.set(clientId, bucket);
      return bucket;
    }

    const elapsed = now - bucket.lastRefill;
    bucket.tokens = Math.min(this.burstSize, bucket.tokens + (elapsed / 60_000) * this.requestsPerMinute);
    bucket.lastRefill = now;
    return bucket;
  }

  private cleanup(): void {
    const cutoff = Date.now() - STALE_AFTER_MS;
    for (const [clientId, bucket] of this.buckets) {
      if (bucket.lastRefill < cutoff) {
        this.buckets.delete(clientId);
      }
    }
  }
}

/**
 * Client address as seen by the nearest proxy. The last X-Forwarded-For entry is the
 * one the gateway appended; earlier entries come from the caller.
 */
export function getClientIp(req: Request): string {
  const forwarded = req.headers.get('x-forwarded-for');
  if (forwarded) {
    const last = forwarded.split(',').pop()?.trim();
    if (last) return last;
  }

  return req.headers.get('x-real-ip') ?? 'unknown';
}

/**
 * Rate limit check for a request.
 * Returns null to continue, or a 429 Response to block.
 */
export function rateLimitMiddleware(limiter: SimpleRateLimiter): (req: Request) => Response | null {
  return (req: Request): Response | null => {
    const clientIp = getClientIp(req);
    if (limiter.tryAcquire(clientIp)) {
      return null;
    }

    const path = new URL(req.url).pathname;
    logger.warn(`Rate limited client ${clientIp} on ${path}`);
    return Response.json(
      { success: false, error: 'Too Many Requests' },
      {
        status: 429,
        headers: { 'Retry-After': String(limiter.getRetryAfterSeconds(clientIp)) },
      },
    );
  };
}
