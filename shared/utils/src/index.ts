// Logger
export { logger, Logger, sanitizeString, isLogLevel } from './logger';

// Errors
export * from './errors';

// Environment helpers
export * from './env';

// Gateway authentication
export * from './gateway-auth';

// Rate limiting
export * from './rate-limiter';
