import { METRIC_CATALOG, statColumn } from './catalog';
import { NOT_APPLICABLE, NO_DATA, type AggregatedStat, type CellValue } from './sentinels';
import { DESCRIPTOR_COLUMNS, metricColumns, type DescriptorColumn } from './schema';
import type { ClusterDescriptor, ClusterKind, MetricTemplate } from './types';

export type StatMap = ReadonlyMap<string, AggregatedStat>;
export type ReportRow = Readonly<Record<string, CellValue>>;

const orNotApplicable = (value: string | number | null): CellValue => value ?? NOT_APPLICABLE;

const descriptorCells = (cluster: ClusterDescriptor): Record<DescriptorColumn, CellValue> => {
  const common = {
    AccountID: cluster.accountId,
    Region: cluster.region,
    ClusterName: cluster.clusterName,
    ClusterArn: cluster.clusterArn,
    ClusterType: cluster.kind,
    CreationTime: orNotApplicable(cluster.creationTime),
    Authentication: orNotApplicable(cluster.authentication),
    DescribeApi: cluster.apiGeneration,
  };

  if (cluster.kind === 'Serverless') {
    return {
      ...common,
      KafkaVersion: NOT_APPLICABLE,
      NumberOfBrokerNodes: NOT_APPLICABLE,
      BrokerInstanceType: NOT_APPLICABLE,
      NumberOfAvailabilityZones: NOT_APPLICABLE,
      StoragePerBrokerGB: NOT_APPLICABLE,
    };
  }

  return {
    ...common,
    KafkaVersion: orNotApplicable(cluster.kafkaVersion),
    NumberOfBrokerNodes: orNotApplicable(cluster.brokerCount),
    BrokerInstanceType: orNotApplicable(cluster.brokerInstanceType),
    NumberOfAvailabilityZones: orNotApplicable(cluster.availabilityZoneCount),
    StoragePerBrokerGB: orNotApplicable(cluster.storagePerBrokerGb),
  };
};

/**
 * Merges a descriptor with its aggregated stats into one row of the fixed
 * schema. Columns planned for the cluster's kind but missing from `stats`
 * read NO_DATA; columns of the other kind read NOT_APPLICABLE.
 */
export const normalizeRow = (
  cluster: ClusterDescriptor,
  stats: StatMap,
  catalog: Readonly<Record<ClusterKind, readonly MetricTemplate[]>> = METRIC_CATALOG,
): ReportRow => {
  const applicable = new Set<string>();
  for (const template of catalog[cluster.kind]) {
    for (const statistic of template.statistics) applicable.add(statColumn(template.metric, statistic));
  }

  const row: Record<string, CellValue> = { ...descriptorCells(cluster) };
  for (const column of metricColumns(catalog)) {
    row[column] = applicable.has(column) ? stats.get(column) ?? NO_DATA : NOT_APPLICABLE;
  }
  return row;
};
