/**
 * Gateway-to-server authentication
 *
 * Optional shared secret between the MCP Gateway and this server. When no
 * secret is configured every request passes.
 */

import { timingSafeEqual } from 'node:crypto';
import { logger } from './logger';

export const GATEWAY_SECRET_HEADER = 'x-gateway-secret';

export function validateGatewaySecret(req: Request, expected: string | undefined): boolean {
  if (!expected) {
    return true;
  }

  const provided = req.headers.get(GATEWAY_SECRET_HEADER);
  if (!provided) {
    return false;
  }

  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Returns a 401 Response for requests without the right secret, or null to continue.
 */
export function gatewayAuthMiddleware(expected: string | undefined): (req: Request) => Response | null {
  return (req: Request): Response | null => {
    if (validateGatewaySecret(req, expected)) {
      return null;
    }

    const path = new URL(req.url).pathname;
    logger.warn(`Rejected request to ${path}: invalid or missing gateway secret`);
    return Response.json(
      { success: false, error: 'Unauthorized: invalid or missing gateway secret' },
      { status: 401 },
    );
  };
}
