import { z } from 'zod';

/** Teamwork ids are numeric; clients may send them as strings or numbers. */
export function idArg(description: string) {
  return z
    .union([
      z.string().regex(/^\d+$/, 'must be a numeric ID'),
      z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
    ])
    .transform(String)
    .describe(description);
}

export const pageArg = z.number().int().min(1).default(1).describe('Page number');

export function pageSizeArg(defaultSize: number) {
  return z.number().int().min(1).max(500).default(defaultSize).describe(`Results per page (1-500, default ${defaultSize})`);
}

export const dateArg = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a date in YYYY-MM-DD format');

export const priorityArg = z.enum(['low', 'medium', 'high']);

export const estimatedMinutesArg = z.number().int().describe('Estimated time in minutes (must be positive)');

export const progressArg = z.number().int().describe('Progress percentage (0-100)');
