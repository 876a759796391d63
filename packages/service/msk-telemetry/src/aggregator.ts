import {
  METRIC_CATALOG,
  NO_DATA,
  QUERY_FAILED,
  buildQueries,
  planMetrics,
  reduceSeries,
  rollupBrokers,
  seriesFor,
  statColumn,
  type AggregatedStat,
  type ClusterDescriptor,
  type ClusterKind,
  type MetricDatapoint,
  type MetricQuery,
  type MetricTemplate,
  type MetricWindow,
} from '@domain/msk-inventory';
import type { MetricsBackend } from '@infrastructure/aws-ops';
import type { Logger } from '@platform/logging';
import { mapBounded } from '@shared/core';
import type { Result } from '@shared/result';

export interface AggregatorOptions {
  readonly logger: Logger;
  readonly queryConcurrency?: number;
  readonly catalog?: Readonly<Record<ClusterKind, readonly MetricTemplate[]>>;
}

export interface ClusterStats {
  readonly stats: ReadonlyMap<string, AggregatedStat>;
  /** Metrics whose backend calls failed; their cells hold QUERY_FAILED. */
  readonly failedMetrics: readonly string[];
}

interface Planned {
  readonly template: MetricTemplate;
  readonly queries: readonly MetricQuery[];
}

/** Reduces one template's query results into one value per statistic. */
export const reduceTemplate = (
  template: MetricTemplate,
  results: readonly Result<MetricDatapoint[], Error>[],
): Map<string, AggregatedStat> => {
  const out = new Map<string, AggregatedStat>();
  const failed = results.some((result) => !result.ok);

  for (const statistic of template.statistics) {
    const column = statColumn(template.metric, statistic);
    if (failed) {
      out.set(column, QUERY_FAILED);
      continue;
    }
    const reduced = results.map((result) => (result.ok ? reduceSeries(seriesFor(result.value, statistic), statistic) : QUERY_FAILED));
    if (reduced.length === 0) {
      out.set(column, NO_DATA);
    } else if (template.scope === 'broker') {
      out.set(column, rollupBrokers(reduced, statistic, template.brokerRollup));
    } else {
      out.set(column, reduced[0]);
    }
  }
  return out;
};

export class MetricsAggregator {
  constructor(
    private readonly backend: MetricsBackend,
    private readonly options: AggregatorOptions,
  ) {}

  /**
   * Queries every planned metric of `cluster` over `window`. A failed call
   * only marks its own metric; the rest of the cluster still resolves.
   */
  async aggregate(cluster: ClusterDescriptor, window: MetricWindow): Promise<ClusterStats> {
    const plan: Planned[] = planMetrics(cluster.kind, this.options.catalog ?? METRIC_CATALOG).map((template) => ({
      template,
      queries: buildQueries(cluster, template, window),
    }));

    const flat = plan.flatMap((entry, planIndex) => entry.queries.map((query) => ({ planIndex, query })));
    const fetched = await mapBounded(flat, this.options.queryConcurrency ?? 1, ({ query }) => this.backend.fetch(query));

    const grouped = plan.map((): Result<MetricDatapoint[], Error>[] => []);
    flat.forEach(({ planIndex }, index) => grouped[planIndex].push(fetched[index]));

    const stats = new Map<string, AggregatedStat>();
    const failedMetrics: string[] = [];
    plan.forEach(({ template }, planIndex) => {
      const results = grouped[planIndex];
      const failure = results.find((result) => !result.ok);
      if (failure && !failure.ok) {
        failedMetrics.push(template.metric);
        this.options.logger.warn('metric query failed', {
          region: cluster.region,
          clusterArn: cluster.clusterArn,
          metric: template.metric,
          reason: failure.error.message,
        });
      }
      for (const [column, value] of reduceTemplate(template, results)) stats.set(column, value);
    });

    return { stats, failedMetrics };
  }
}
