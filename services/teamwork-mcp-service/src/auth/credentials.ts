/**
 * Per-request Teamwork credentials.
 *
 * The gateway forwards the OAuth access token as a bearer token and may name the
 * installation in X-Teamwork-Domain. Environment values cover local development.
 */

import { AuthenticationError, ConfigurationError } from '@teamwork-mcp/shared-utils';

export type RequestHeaders = Record<string, string | string[] | undefined>;

export interface TeamworkCredentials {
  accessToken: string;
  domain: string;
}

export interface CredentialFallbacks {
  fallbackAccessToken?: string;
  defaultDomain?: string;
}

export const DOMAIN_HEADER = 'x-teamwork-domain';

// Bare DNS name with at least two labels and an alphabetic top-level label.
// Rejects userinfo, ports, paths, fragments and IP literals.
const HOSTNAME_PATTERN = /^(?:[a-z0-9](?:[a-z0-9-]*[a-z0-9])?\.)+[a-z](?:[a-z0-9-]*[a-z0-9])?$/i;

export function getHeader(headers: RequestHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted) continue;
    const first = Array.isArray(value) ? value[0] : value;
    const trimmed = first?.trim();
    return trimmed ? trimmed : undefined;
  }
  return undefined;
}

export function extractBearerToken(headers: RequestHeaders): string | undefined {
  const authorization = getHeader(headers, 'authorization');
  const match = authorization?.match(/^Bearer\s+(\S+)$/i);
  return match?.[1];
}

/**
 * Strip scheme and trailing slashes: "https://acme.teamwork.com/" becomes "acme.teamwork.com".
 */
export function normalizeDomain(domain: string): string {
  return domain.trim().replace(/^https?:\/\//i, '').replace(/\/+$/, '');
}

export function isValidDomain(domain: string): boolean {
  return domain.length <= 253 && HOSTNAME_PATTERN.test(domain);
}

export function resolveCredentials(headers: RequestHeaders, fallbacks: CredentialFallbacks = {}): TeamworkCredentials {
  const accessToken = extractBearerToken(headers) ?? fallbacks.fallbackAccessToken;
  if (!accessToken) {
    throw new AuthenticationError(
      'Missing Authorization header. This server requires OAuth authentication via the gateway.'
    );
  }

  const rawDomain = getHeader(headers, DOMAIN_HEADER) ?? fallbacks.defaultDomain;
  const domain = rawDomain === undefined ? '' : normalizeDomain(rawDomain);
  if (!domain) {
    throw new ConfigurationError(
      'Teamwork installation domain is required. Provide via X-Teamwork-Domain header or TEAMWORK_DOMAIN environment variable.'
    );
  }
  if (!isValidDomain(domain)) {
    throw new ConfigurationError(
      `Invalid Teamwork domain '${domain}'. Expected a hostname such as acme.teamwork.com.`,
      'teamwork-mcp',
      { domain }
    );
  }

  return { accessToken, domain };
}
