export * from './types';
export * from './sentinels';
export * from './catalog';
export * from './planner';
export * from './statistics';
export * from './schema';
export { normalizeRow, type ReportRow, type StatMap } from './normalizer';
export * from './errors';
