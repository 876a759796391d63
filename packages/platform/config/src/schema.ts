import { z } from 'zod';

/** CloudWatch refuses a GetMetricStatistics call spanning more datapoints than this. */
export const MAX_DATAPOINTS_PER_QUERY = 1440;

/**
 * CloudWatch rolls old datapoints up: past each age only periods that are
 * multiples of the tier's period return data. Oldest tier first.
 */
export const RETENTION_TIERS = [
  { olderThanDays: 63, periodSeconds: 3600 },
  { olderThanDays: 15, periodSeconds: 300 },
] as const;

const toList = (value: string | readonly string[]): string[] => {
  const parts = typeof value === 'string' ? value.split(',') : value.flatMap((entry) => entry.split(','));
  return [...new Set(parts.map((part) => part.trim()).filter((part) => part.length > 0))];
};

export const retrySchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(10).default(3),
    baseDelayMs: z.number().int().min(0).default(200),
    maxDelayMs: z.number().int().min(0).default(5_000),
  })
  .strict();

export const windowSchema = z
  .object({
    start: z.coerce.date(),
    end: z.coerce.date(),
  })
  .strict()
  .refine((window) => window.end.getTime() > window.start.getTime(), { message: 'window end must be after its start' });

export const reportConfigSchema = z
  .object({
    profile: z.string().min(1).optional(),
    regions: z.union([z.string(), z.array(z.string())]).default([]).transform(toList),
    validateRegions: z.boolean().default(true),
    lookbackHours: z.number().positive().default(168),
    window: windowSchema.optional(),
    periodSeconds: z.number().int().positive().multipleOf(60, 'period must be a multiple of 60 seconds').default(3600),
    outputDirectory: z.string().min(1).default('.'),
    reportPrefix: z
      .string()
      .regex(/^[\w.-]+$/, 'report prefix may only hold letters, digits, dots, dashes and underscores')
      .default('msk_cluster_report'),
    regionConcurrency: z.number().int().min(1).default(2),
    clusterConcurrency: z.number().int().min(1).default(4),
    queryConcurrency: z.number().int().min(1).default(4),
    retry: retrySchema.default({}),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .strict();

export type ReportConfigInput = z.input<typeof reportConfigSchema>;
export type ReportConfig = z.output<typeof reportConfigSchema>;
export type RetrySettings = z.output<typeof retrySchema>;
