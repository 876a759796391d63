import type { ClusterKind, MetricTemplate, MetricUnit, Statistic } from './types';

const PROVISIONED_NAMESPACE = 'AWS/Kafka';
const SERVERLESS_NAMESPACE = 'AWS/Kafka-Serverless';
const AVG_PEAK: readonly Statistic[] = ['Average', 'Maximum'];

const provisioned = (
  metric: string,
  unit: MetricUnit,
  overrides: Partial<Omit<MetricTemplate, 'metric' | 'unit' | 'namespace'>> = {},
): MetricTemplate => ({
  metric,
  cloudWatchName: metric,
  namespace: PROVISIONED_NAMESPACE,
  unit,
  scope: 'broker',
  brokerRollup: 'sum',
  statistics: AVG_PEAK,
  ...overrides,
});

const serverless = (metric: string, unit: MetricUnit): MetricTemplate => ({
  metric,
  cloudWatchName: metric,
  namespace: SERVERLESS_NAMESPACE,
  unit,
  scope: 'cluster',
  brokerRollup: 'sum',
  statistics: AVG_PEAK,
});

/**
 * Metrics requested per cluster kind. Adding a metric here is enough for it to
 * be queried, aggregated and given report columns.
 */
export const METRIC_CATALOG: Readonly<Record<ClusterKind, readonly MetricTemplate[]>> = {
  Provisioned: [
    provisioned('StorageUsedPercent', 'Percent', { cloudWatchName: 'KafkaDataLogsDiskUsed', brokerRollup: 'mean' }),
    provisioned('GlobalPartitionCount', 'Count', { scope: 'cluster', statistics: ['Average', 'Maximum', 'Latest'] }),
    provisioned('GlobalTopicCount', 'Count', { scope: 'cluster', statistics: ['Average', 'Maximum', 'Latest'] }),
    provisioned('BytesInPerSec', 'Bytes/Second'),
    provisioned('BytesOutPerSec', 'Bytes/Second'),
    provisioned('ClientConnectionCount', 'Count'),
    provisioned('ConnectionCloseRate', 'Count/Second'),
    provisioned('ConnectionCreationRate', 'Count/Second'),
    provisioned('RequestBytesMean', 'Bytes', { brokerRollup: 'mean' }),
  ],
  Serverless: [serverless('BytesInPerSec', 'Bytes/Second'), serverless('BytesOutPerSec', 'Bytes/Second')],
};

export const CLUSTER_KINDS: readonly ClusterKind[] = ['Provisioned', 'Serverless'];

export const STATISTIC_SUFFIX: Readonly<Record<Statistic, string>> = {
  Latest: 'Latest',
  Average: 'Avg',
  Maximum: 'Peak',
  Sum: 'Sum',
};

/** Column groups follow this order: latest values, then averages, peaks and sums. */
export const STATISTIC_ORDER: readonly Statistic[] = ['Latest', 'Average', 'Maximum', 'Sum'];

export const statColumn = (metric: string, statistic: Statistic): string => `${metric}_${STATISTIC_SUFFIX[statistic]}`;
