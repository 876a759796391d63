import { describe, expect, it } from 'vitest';
import { METRIC_CATALOG } from './catalog';
import { BROKER_DIMENSION, CLUSTER_DIMENSION, backendStatistics, buildQueries, planMetrics } from './planner';
import { asClusterArn, asRegionId, type MetricTemplate, type MetricWindow, type ProvisionedCluster, type ServerlessCluster } from './types';

const window: MetricWindow = {
  start: new Date('2026-01-01T00:00:00Z'),
  end: new Date('2026-01-02T00:00:00Z'),
  periodSeconds: 300,
};

const provisioned: ProvisionedCluster = {
  kind: 'Provisioned',
  accountId: '111122223333',
  region: asRegionId('eu-west-1'),
  clusterName: 'orders',
  clusterArn: asClusterArn('arn:aws:kafka:eu-west-1:111122223333:cluster/orders/abc'),
  creationTime: null,
  authentication: null,
  apiGeneration: 'v2',
  kafkaVersion: '3.6.0',
  brokerCount: 3,
  brokerInstanceType: 'kafka.m5.large',
  storagePerBrokerGb: 100,
  availabilityZoneCount: 3,
};

const serverless: ServerlessCluster = {
  kind: 'Serverless',
  accountId: '111122223333',
  region: asRegionId('eu-west-1'),
  clusterName: 'events',
  clusterArn: asClusterArn('arn:aws:kafka:eu-west-1:111122223333:cluster/events/def'),
  creationTime: null,
  authentication: 'IAM',
  apiGeneration: 'v2',
};

const template = (metric: string): MetricTemplate => {
  const found = METRIC_CATALOG.Provisioned.find((entry) => entry.metric === metric);
  if (!found) throw new Error(`missing ${metric}`);
  return found;
};

describe('planMetrics', () => {
  it('plans only throughput for serverless clusters', () => {
    const plan = planMetrics('Serverless');
    expect(plan.map((entry) => entry.metric)).toEqual(['BytesInPerSec', 'BytesOutPerSec']);
    expect(plan.every((entry) => entry.statistics.join() === 'Average,Maximum')).toBe(true);
    expect(plan.every((entry) => entry.namespace === 'AWS/Kafka-Serverless')).toBe(true);
  });

  it('includes storage and partition metrics for provisioned clusters', () => {
    const names = planMetrics('Provisioned').map((entry) => entry.metric);
    expect(names).toContain('StorageUsedPercent');
    expect(names).toContain('GlobalPartitionCount');
    expect(names).toContain('BytesInPerSec');
  });

  it('takes a replacement catalog', () => {
    const custom = { Provisioned: [template('BytesInPerSec')], Serverless: [] };
    expect(planMetrics('Provisioned', custom)).toHaveLength(1);
  });
});

describe('buildQueries', () => {
  it('fans broker-scoped metrics out per broker', () => {
    const queries = buildQueries(provisioned, template('BytesInPerSec'), window);

    expect(queries.map((query) => query.brokerId)).toEqual([1, 2, 3]);
    expect(queries[2]?.dimensions).toEqual([
      { name: CLUSTER_DIMENSION, value: 'orders' },
      { name: BROKER_DIMENSION, value: '3' },
    ]);
  });

  it('issues one cluster-level query for cluster-scoped metrics', () => {
    const queries = buildQueries(provisioned, template('GlobalPartitionCount'), window);

    expect(queries).toHaveLength(1);
    expect(queries[0]?.dimensions).toEqual([{ name: CLUSTER_DIMENSION, value: 'orders' }]);
    expect(queries[0]?.window).toBe(window);
  });

  it('never adds a broker dimension for serverless clusters', () => {
    const [query] = buildQueries(serverless, planMetrics('Serverless')[0] ?? template('BytesInPerSec'), window);
    expect(query?.dimensions).toEqual([{ name: CLUSTER_DIMENSION, value: 'events' }]);
  });

  it('yields nothing for a provisioned cluster without brokers', () => {
    expect(buildQueries({ ...provisioned, brokerCount: 0 }, template('BytesInPerSec'), window)).toEqual([]);
    expect(buildQueries({ ...provisioned, brokerCount: null }, template('BytesInPerSec'), window)).toEqual([]);
  });
});

describe('backendStatistics', () => {
  it('maps Latest onto Maximum without duplicates', () => {
    expect(backendStatistics(['Average', 'Maximum', 'Latest'])).toEqual(['Average', 'Maximum']);
    expect(backendStatistics(['Latest'])).toEqual(['Maximum']);
  });
});
