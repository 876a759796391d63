import type { Brand } from '@shared/core';

export type RegionId = Brand<string, 'RegionId'>;
export type ClusterArn = Brand<string, 'ClusterArn'>;

export const asRegionId = (value: string): RegionId => value as RegionId;
export const asClusterArn = (value: string): ClusterArn => value as ClusterArn;

export type ClusterKind = 'Provisioned' | 'Serverless';
export type ApiGeneration = 'v2' | 'v1';

interface ClusterIdentity {
  readonly accountId: string;
  readonly region: RegionId;
  readonly clusterName: string;
  readonly clusterArn: ClusterArn;
  readonly creationTime: string | null;
  readonly authentication: string | null;
  readonly apiGeneration: ApiGeneration;
}

export interface ProvisionedCluster extends ClusterIdentity {
  readonly kind: 'Provisioned';
  readonly kafkaVersion: string | null;
  readonly brokerCount: number | null;
  readonly brokerInstanceType: string | null;
  readonly storagePerBrokerGb: number | null;
  readonly availabilityZoneCount: number | null;
}

export interface ServerlessCluster extends ClusterIdentity {
  readonly kind: 'Serverless';
}

export type ClusterDescriptor = ProvisionedCluster | ServerlessCluster;

export type Statistic = 'Average' | 'Maximum' | 'Sum' | 'Latest';
export type MetricScope = 'cluster' | 'broker';
export type BrokerRollup = 'sum' | 'mean';
export type MetricUnit = 'Percent' | 'Count' | 'Bytes' | 'Bytes/Second' | 'Count/Second';

export interface MetricTemplate {
  readonly metric: string;
  readonly cloudWatchName: string;
  readonly namespace: string;
  readonly unit: MetricUnit;
  readonly scope: MetricScope;
  readonly brokerRollup: BrokerRollup;
  readonly statistics: readonly Statistic[];
}

export interface MetricWindow {
  readonly start: Date;
  readonly end: Date;
  readonly periodSeconds: number;
}

export interface MetricDimension {
  readonly name: string;
  readonly value: string;
}

export interface MetricQuery {
  readonly template: MetricTemplate;
  readonly dimensions: readonly MetricDimension[];
  readonly window: MetricWindow;
  /** Broker number for broker-scoped queries. */
  readonly brokerId?: number;
}

export interface MetricDatapoint {
  readonly timestamp: Date;
  readonly values: Partial<Record<Exclude<Statistic, 'Latest'>, number>>;
}

export interface SeriesPoint {
  readonly timestamp: Date;
  readonly value: number;
}

export type MetricSeries = readonly SeriesPoint[];
