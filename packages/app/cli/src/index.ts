import { writeReport, ensureWritable } from '@app/reporter';
import { AwsBackendFactory, openSession, resolveHomeRegion, type BackendFactory } from '@infrastructure/aws-ops';
import { loadConfigFile, resolveConfig, resolveWindow, type EnvSource, type ReportConfig } from '@platform/config';
import { ConsoleSink, Logger, defaultNamespace, type LogLevel } from '@platform/logging';
import { runTelemetryReport } from '@service/msk-telemetry';
import { isAppError } from '@shared/errors';
import { toError } from '@shared/result';
import { USAGE, UsageError, parseCliArgs, type CliArgs } from './args';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

export interface CliDeps {
  readonly env?: EnvSource;
  readonly now?: () => Date;
  readonly stdout?: (line: string) => void;
  readonly stderr?: (line: string) => void;
  readonly openFactory?: (config: ReportConfig) => Promise<BackendFactory>;
}

export const openAwsFactory = async (config: ReportConfig): Promise<BackendFactory> => {
  const homeRegion = resolveHomeRegion({});
  const session = await openSession({ profile: config.profile, homeRegion });
  if (!session.ok) throw session.error;
  return new AwsBackendFactory(session.value, { retry: config.retry, homeRegion });
};

const run = async (args: CliArgs, deps: CliDeps, logger: (level: LogLevel) => Logger): Promise<number> => {
  const env = deps.env ?? process.env;
  const now = deps.now ?? (() => new Date());
  let log = logger('info');

  try {
    const file = args.configPath ? await loadConfigFile(args.configPath) : undefined;
    const config = resolveConfig({ file, env, flags: args.overrides });
    log = logger(config.logLevel);

    const window = resolveWindow(config, now());
    await ensureWritable(config.outputDirectory);

    const factory = await (deps.openFactory ?? openAwsFactory)(config);
    log.info('session opened', { accountId: factory.accountId, profile: config.profile ?? 'default chain' });

    const report = await runTelemetryReport({
      factory,
      selection: { regions: config.regions, validate: config.validateRegions },
      window,
      logger: log,
      concurrency: {
        regions: config.regionConcurrency,
        clusters: config.clusterConcurrency,
        queries: config.queryConcurrency,
      },
    });

    await writeReport({
      table: { columns: report.columns, rows: report.rows },
      directory: config.outputDirectory,
      prefix: config.reportPrefix,
      logger: log.child('reporter'),
      now: now(),
    });
    return EXIT_OK;
  } catch (error) {
    if (isAppError(error)) {
      log.error('fatal error, stopping', error, { code: error.code });
    } else {
      log.error('unexpected failure, stopping', toError(error, 'unexpected-failure'));
    }
    return EXIT_FATAL;
  }
};

/**
 * Runs one report from command-line arguments and returns the exit code.
 * Per-region and per-cluster failures still exit 0; they are in the log
 * and the run summary.
 */
export const bootstrap = async (argv: readonly string[], deps: CliDeps = {}): Promise<number> => {
  const stdout = deps.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
  const stderr = deps.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    stderr(`msk-report: ${error.message}`);
    stderr(USAGE);
    return EXIT_USAGE;
  }

  if (args.help) {
    stdout(USAGE);
    return EXIT_OK;
  }

  return run(args, deps, (level) => new Logger(defaultNamespace, [new ConsoleSink({ minLevel: level, write: stderr })]));
};
