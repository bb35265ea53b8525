export { TeamworkClient, splitHours, todayIsoDate } from './client';
export type { TeamworkClientOptions, TimeTotalsScope } from './client';
export * from './analytics';
export * from './types';
