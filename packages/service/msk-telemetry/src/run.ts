import type { ClusterKind, MetricTemplate, MetricWindow, RegionId } from '@domain/msk-inventory';
import type { BackendFactory } from '@infrastructure/aws-ops';
import type { Logger } from '@platform/logging';
import { assembleReport, type AssembledReport } from './assembler';
import { TelemetryCollector, type ConcurrencyLimits } from './collector';
import { resolveRegions, type RegionSelection } from './region-resolver';

export interface RunOptions {
  readonly factory: BackendFactory;
  readonly selection: RegionSelection;
  readonly window: MetricWindow;
  readonly logger: Logger;
  readonly concurrency?: ConcurrencyLimits;
  readonly catalog?: Readonly<Record<ClusterKind, readonly MetricTemplate[]>>;
}

const resolve = async (options: RunOptions): Promise<RegionId[]> => {
  const catalog = options.factory.regionCatalog();
  try {
    return await resolveRegions(options.selection, catalog, options.logger.child('regions'));
  } finally {
    catalog.close();
  }
};

/**
 * Region resolution -> enumeration -> aggregation -> normalization -> assembly.
 * Only region resolution can throw; every later failure is folded into the
 * report and its summary.
 */
export const runTelemetryReport = async (options: RunOptions): Promise<AssembledReport> => {
  const { logger } = options;
  const regions = await resolve(options);
  logger.info('collecting telemetry', {
    regions: regions.length,
    start: options.window.start.toISOString(),
    end: options.window.end.toISOString(),
    periodSeconds: options.window.periodSeconds,
  });

  const collector = new TelemetryCollector({
    factory: options.factory,
    window: options.window,
    logger,
    concurrency: options.concurrency,
    catalog: options.catalog,
  });
  const report = assembleReport(await collector.collect(regions), options.catalog);

  const { summary } = report;
  logger.info('collection finished', {
    regionsScanned: summary.regionsScanned,
    regionsFailed: summary.regionsFailed.length,
    clustersReported: summary.clustersReported,
    clustersSkipped: summary.clustersSkipped.length,
    failedMetricCells: summary.failedMetricCells,
  });
  for (const skipped of summary.clustersSkipped) {
    logger.warn('cluster left out of the report', { region: skipped.region, clusterArn: skipped.clusterArn, reason: skipped.reason });
  }
  return report;
};
