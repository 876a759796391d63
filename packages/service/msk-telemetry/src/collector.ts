import {
  METRIC_CATALOG,
  QUERY_FAILED,
  normalizeRow,
  type ClusterKind,
  type MetricTemplate,
  type MetricWindow,
  type RegionId,
  type ReportRow,
} from '@domain/msk-inventory';
import type { BackendFactory, RegionBackends } from '@infrastructure/aws-ops';
import type { Logger } from '@platform/logging';
import { mapBounded } from '@shared/core';
import { describeError } from '@shared/errors';
import { toError } from '@shared/result';
import { MetricsAggregator } from './aggregator';
import { ClusterEnumerator, type SkippedCluster } from './enumerator';

export interface ConcurrencyLimits {
  readonly regions: number;
  readonly clusters: number;
  readonly queries: number;
}

export const SEQUENTIAL: ConcurrencyLimits = { regions: 1, clusters: 1, queries: 1 };

export interface CollectorOptions {
  readonly factory: BackendFactory;
  readonly window: MetricWindow;
  readonly logger: Logger;
  readonly concurrency?: ConcurrencyLimits;
  readonly catalog?: Readonly<Record<ClusterKind, readonly MetricTemplate[]>>;
}

export interface RegionReport {
  readonly region: RegionId;
  readonly status: 'scanned' | 'failed';
  readonly rows: readonly ReportRow[];
  readonly skipped: readonly SkippedCluster[];
  readonly failedMetricCells: number;
  readonly error?: string;
}

/**
 * Drives enumerate -> aggregate -> normalize for every region. Each region
 * and cluster task returns its own result; nothing is shared between tasks
 * while they run.
 */
export class TelemetryCollector {
  private readonly limits: ConcurrencyLimits;

  constructor(private readonly options: CollectorOptions) {
    this.limits = options.concurrency ?? SEQUENTIAL;
  }

  async collect(regions: readonly RegionId[]): Promise<RegionReport[]> {
    return mapBounded(regions, this.limits.regions, (region) => this.collectRegion(region));
  }

  /** Never rejects: anything unexpected inside a region fails only that region. */
  async collectRegion(region: RegionId): Promise<RegionReport> {
    let backends: RegionBackends | undefined;
    try {
      backends = this.options.factory.forRegion(region);
      return await this.scan(region, backends);
    } catch (error) {
      this.options.logger.error('region scan aborted', toError(error, 'region-scan-failed'), { region });
      return { region, status: 'failed', rows: [], skipped: [], failedMetricCells: 0, error: describeError(error) };
    } finally {
      backends?.close();
    }
  }

  private async scan(region: RegionId, backends: RegionBackends): Promise<RegionReport> {
    const { logger, window } = this.options;
    logger.info('scanning region', { region });

    const enumerator = new ClusterEnumerator({
      accountId: this.options.factory.accountId,
      backends: () => backends,
      logger: logger.child('enumerator'),
      clusterConcurrency: this.limits.clusters,
    });
    const inventory = await enumerator.enumerate(region);
    if (!inventory.ok) {
      return { region, status: 'failed', rows: [], skipped: [], failedMetricCells: 0, error: inventory.error.message };
    }

    const aggregator = new MetricsAggregator(backends.metrics, {
      logger: logger.child('aggregator'),
      queryConcurrency: this.limits.queries,
      catalog: this.options.catalog,
    });

    const resolved = await mapBounded(inventory.value.clusters, this.limits.clusters, async (cluster) => {
      const { stats } = await aggregator.aggregate(cluster, window);
      const row = normalizeRow(cluster, stats, this.options.catalog ?? METRIC_CATALOG);
      return { row, failedCells: [...stats.values()].filter((value) => value === QUERY_FAILED).length };
    });

    logger.info('region scanned', {
      region,
      clusters: resolved.length,
      skipped: inventory.value.skipped.length,
    });

    return {
      region,
      status: 'scanned',
      rows: resolved.map((entry) => entry.row),
      skipped: inventory.value.skipped,
      failedMetricCells: resolved.reduce((acc, entry) => acc + entry.failedCells, 0),
    };
  }
}
