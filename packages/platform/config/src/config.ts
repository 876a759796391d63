import { readFile } from 'node:fs/promises';
import { AppError } from '@shared/errors';
import { z } from 'zod';
import { readEnvList, readEnvString, type EnvSource } from './env';
import { MAX_DATAPOINTS_PER_QUERY, RETENTION_TIERS, reportConfigSchema, type ReportConfig } from './schema';

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('CONFIG', message, { scope: 'fatal', cause });
  }
}

/** Values given on the command line; they win over everything else. */
export type ConfigOverrides = {
  readonly profile?: string;
  readonly regions?: string;
  readonly validateRegions?: boolean;
  readonly lookbackHours?: number;
  readonly periodSeconds?: number;
  readonly outputDirectory?: string;
};

export interface ConfigSources {
  /** Parsed contents of the config file, if one was given. */
  readonly file?: unknown;
  readonly env?: EnvSource;
  readonly flags?: ConfigOverrides;
}

export interface ReportWindow {
  readonly start: Date;
  readonly end: Date;
  readonly periodSeconds: number;
}

const DAY_MS = 86_400_000;

const fileShape = z.record(z.string(), z.unknown());

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.length ? issue.path.join('.') : 'config'}: ${issue.message}`).join('; ');

const withoutUndefined = (input: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));

export const loadConfigFile = async (path: string): Promise<unknown> => {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`could not read config file ${path}`, error);
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`config file ${path} is not valid JSON`, error);
  }
};

export const envOverrides = (env: EnvSource): Record<string, unknown> =>
  withoutUndefined({
    profile: readEnvString(env, 'AWS_PROFILE'),
    regions: readEnvList(env, 'MSK_REPORT_REGIONS'),
    outputDirectory: readEnvString(env, 'MSK_REPORT_OUTPUT_DIR'),
  });

/**
 * Layers flags over environment over file over schema defaults and
 * validates the result. Throws ConfigError on anything invalid.
 */
export const resolveConfig = (sources: ConfigSources = {}): ReportConfig => {
  let file: Record<string, unknown> = {};
  if (sources.file !== undefined) {
    const shaped = fileShape.safeParse(sources.file);
    if (!shaped.success) {
      throw new ConfigError('config file must hold a JSON object');
    }
    file = shaped.data;
  }

  const merged = {
    ...file,
    ...envOverrides(sources.env ?? {}),
    ...withoutUndefined({ ...sources.flags }),
  };

  const parsed = reportConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`invalid configuration: ${formatIssues(parsed.error)}`, parsed.error);
  }
  return parsed.data;
};

/**
 * The collection window: the explicit one when configured, otherwise the
 * lookback ending at `now`. Rejects windows CloudWatch would refuse or
 * answer with no datapoints.
 */
export const resolveWindow = (config: ReportConfig, now: Date = new Date()): ReportWindow => {
  const end = config.window?.end ?? now;
  const start = config.window?.start ?? new Date(end.getTime() - config.lookbackHours * 3_600_000);
  if (end.getTime() <= start.getTime()) {
    throw new ConfigError('window end must be after its start');
  }

  const datapoints = Math.ceil((end.getTime() - start.getTime()) / (config.periodSeconds * 1000));
  if (datapoints > MAX_DATAPOINTS_PER_QUERY) {
    throw new ConfigError(
      `window of ${datapoints} periods exceeds the ${MAX_DATAPOINTS_PER_QUERY} datapoints CloudWatch returns per query; raise periodSeconds or shorten the window`,
    );
  }

  const age = now.getTime() - start.getTime();
  for (const tier of RETENTION_TIERS) {
    if (age > tier.olderThanDays * DAY_MS && config.periodSeconds % tier.periodSeconds !== 0) {
      throw new ConfigError(
        `windows starting more than ${tier.olderThanDays} days ago need a period that is a multiple of ${tier.periodSeconds} seconds`,
      );
    }
  }
  return { start, end, periodSeconds: config.periodSeconds };
};
