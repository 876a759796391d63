import { CLUSTER_KINDS, METRIC_CATALOG, STATISTIC_ORDER, statColumn } from './catalog';
import type { ClusterKind, MetricTemplate } from './types';

export const DESCRIPTOR_COLUMNS = [
  'AccountID',
  'Region',
  'ClusterName',
  'ClusterArn',
  'ClusterType',
  'CreationTime',
  'KafkaVersion',
  'NumberOfBrokerNodes',
  'BrokerInstanceType',
  'NumberOfAvailabilityZones',
  'StoragePerBrokerGB',
  'Authentication',
  'DescribeApi',
] as const;

export type DescriptorColumn = (typeof DESCRIPTOR_COLUMNS)[number];

type Catalog = Readonly<Record<ClusterKind, readonly MetricTemplate[]>>;

/** Metric names across every kind, first-seen order. */
export const catalogMetricNames = (catalog: Catalog = METRIC_CATALOG): string[] => {
  const names = new Set<string>();
  for (const kind of CLUSTER_KINDS) {
    for (const template of catalog[kind]) names.add(template.metric);
  }
  return [...names];
};

/** Column names of every metric statistic planned for any kind. */
export const metricColumns = (catalog: Catalog = METRIC_CATALOG): string[] => {
  const planned = new Set<string>();
  for (const kind of CLUSTER_KINDS) {
    for (const template of catalog[kind]) {
      for (const statistic of template.statistics) planned.add(statColumn(template.metric, statistic));
    }
  }

  const columns: string[] = [];
  for (const statistic of STATISTIC_ORDER) {
    for (const metric of catalogMetricNames(catalog)) {
      const column = statColumn(metric, statistic);
      if (planned.has(column)) columns.push(column);
    }
  }
  return columns;
};

/**
 * The report header. It depends only on the catalog, never on which cluster
 * kinds a run happened to find.
 */
export const reportColumns = (catalog: Catalog = METRIC_CATALOG): readonly string[] => [
  ...DESCRIPTOR_COLUMNS,
  ...metricColumns(catalog),
];
