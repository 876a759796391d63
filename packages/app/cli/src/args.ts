import { parseArgs } from 'node:util';
import type { ConfigOverrides } from '@platform/config';

export const USAGE = `usage: msk-report [options]

  --config <file>          JSON config file
  --output <dir>           directory the CSV report is written to
  --profile <name>         AWS credentials profile
  --regions <a,b>          regions to scan (default: every enabled region)
  --lookback-hours <n>     hours of metrics to aggregate (default: 168)
  --period <seconds>       metric period, a multiple of 60 (default: 3600)
  --no-validate-regions    scan the given regions without checking them
  -h, --help               show this help`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliArgs {
  readonly help: boolean;
  readonly configPath?: string;
  readonly overrides: ConfigOverrides;
}

const toNumber = (flag: string, value: string | undefined): number | undefined => {
  if (value === undefined) return undefined;
  const parsed = value.trim() === '' ? Number.NaN : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new UsageError(`--${flag} expects a number, got "${value}"`);
  }
  return parsed;
};

const readArgs = (argv: readonly string[]) =>
  parseArgs({
    args: [...argv],
    strict: true,
    allowPositionals: false,
    options: {
      config: { type: 'string' },
      output: { type: 'string' },
      profile: { type: 'string' },
      regions: { type: 'string' },
      'lookback-hours': { type: 'string' },
      period: { type: 'string' },
      'no-validate-regions': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

/** Throws UsageError for unknown flags, missing or non-numeric values and positionals. */
export const parseCliArgs = (argv: readonly string[]): CliArgs => {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  const { values } = parsed;
  return {
    help: values.help === true,
    configPath: values.config,
    overrides: {
      profile: values.profile,
      regions: values.regions,
      validateRegions: values['no-validate-regions'] === true ? false : undefined,
      lookbackHours: toNumber('lookback-hours', values['lookback-hours']),
      periodSeconds: toNumber('period', values.period),
      outputDirectory: values.output,
    },
  };
};
