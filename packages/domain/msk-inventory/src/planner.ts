import { METRIC_CATALOG } from './catalog';
import type { ClusterDescriptor, ClusterKind, MetricDimension, MetricQuery, MetricTemplate, MetricWindow, Statistic } from './types';

export const CLUSTER_DIMENSION = 'Cluster Name';
export const BROKER_DIMENSION = 'Broker ID';

export const planMetrics = (
  kind: ClusterKind,
  catalog: Readonly<Record<ClusterKind, readonly MetricTemplate[]>> = METRIC_CATALOG,
): readonly MetricTemplate[] => catalog[kind];

/** CloudWatch only returns Average, Maximum and Sum; `Latest` is read from the Maximum series. */
export const backendStatistics = (statistics: readonly Statistic[]): Exclude<Statistic, 'Latest'>[] => {
  const out = new Set<Exclude<Statistic, 'Latest'>>();
  for (const statistic of statistics) {
    out.add(statistic === 'Latest' ? 'Maximum' : statistic);
  }
  return [...out];
};

const clusterDimension = (cluster: ClusterDescriptor): MetricDimension => ({ name: CLUSTER_DIMENSION, value: cluster.clusterName });

/**
 * Expands a template into concrete queries for one cluster. Broker-scoped
 * templates yield one query per broker (IDs 1..N); a Provisioned cluster
 * reporting zero brokers, or no broker count at all, yields none.
 */
export const buildQueries = (cluster: ClusterDescriptor, template: MetricTemplate, window: MetricWindow): MetricQuery[] => {
  if (template.scope === 'cluster' || cluster.kind === 'Serverless') {
    return [{ template, dimensions: [clusterDimension(cluster)], window }];
  }

  const queries: MetricQuery[] = [];
  const brokerCount = cluster.brokerCount ?? 0;
  for (let brokerId = 1; brokerId <= brokerCount; brokerId += 1) {
    queries.push({
      template,
      dimensions: [clusterDimension(cluster), { name: BROKER_DIMENSION, value: `${brokerId}` }],
      window,
      brokerId,
    });
  }
  return queries;
};
