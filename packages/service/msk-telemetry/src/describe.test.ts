import { describe, expect, it } from 'vitest';
import { NOT_APPLICABLE, NO_DATA, asRegionId, normalizeRow } from '@domain/msk-inventory';
import { describeAuthentication, shapeFromV1, shapeFromV2, subnetsNeedingLookup, toDescriptor } from './describe';
import { clusterArn, provisionedV1, provisionedV2, serverlessV2 } from './testing';

const context = { accountId: '111122223333', region: asRegionId('eu-west-1'), clusterArn: clusterArn('eu-west-1', 'orders') };

describe('describeAuthentication', () => {
  it('lists enabled methods in a fixed order', () => {
    expect(
      describeAuthentication({
        Tls: { Enabled: true },
        Sasl: { Scram: { Enabled: true }, Iam: { Enabled: true } },
        Unauthenticated: { Enabled: true },
      }),
    ).toBe('IAM, SCRAM, mTLS, Unauthenticated');
  });

  it('distinguishes an empty block from a missing one', () => {
    expect(describeAuthentication({ Sasl: { Iam: { Enabled: false } } })).toBe('None Enabled');
    expect(describeAuthentication(undefined)).toBeNull();
  });
});

describe('shapes', () => {
  it('reads provisioned details from the V2 response', () => {
    const shape = shapeFromV2(provisionedV2({ region: 'eu-west-1', name: 'orders', brokers: 3, zoneIds: ['euw1-az1', 'euw1-az2'] }));
    const descriptor = toDescriptor({ ...shape, clusterName: 'orders' }, context, 2);

    expect(descriptor).toEqual({
      kind: 'Provisioned',
      accountId: '111122223333',
      region: 'eu-west-1',
      clusterName: 'orders',
      clusterArn: clusterArn('eu-west-1', 'orders'),
      creationTime: '2025-06-01T12:00:00.000Z',
      authentication: 'IAM, mTLS',
      apiGeneration: 'v2',
      kafkaVersion: '3.6.0',
      brokerCount: 3,
      brokerInstanceType: 'kafka.m5.large',
      storagePerBrokerGb: 100,
      availabilityZoneCount: 2,
    });
  });

  it('classifies serverless clusters and leaves broker fields out', () => {
    const shape = shapeFromV2(serverlessV2('eu-west-1', 'clicks'));
    const descriptor = toDescriptor({ ...shape, clusterName: 'clicks' }, context, null);

    expect(descriptor.kind).toBe('Serverless');
    expect(descriptor).not.toHaveProperty('brokerCount');
    expect(descriptor.authentication).toBe('IAM');
  });

  it('treats legacy responses as provisioned', () => {
    const shape = shapeFromV1(provisionedV1({ region: 'eu-west-1', name: 'legacy', brokers: 2 }));

    expect(shape.kind).toBe('Provisioned');
    expect(shape.apiGeneration).toBe('v1');
    expect(shape.kafkaVersion).toBe('2.8.1');
    expect(shape.brokerCount).toBe(2);
  });

  it('asks for a subnet lookup only when zone ids are missing', () => {
    const withZones = shapeFromV2(provisionedV2({ region: 'eu-west-1', name: 'a', zoneIds: ['z1'] }));
    const withoutZones = shapeFromV2(provisionedV2({ region: 'eu-west-1', name: 'b', subnets: ['s1', 's2'] }));

    expect(subnetsNeedingLookup(withZones)).toEqual([]);
    expect(subnetsNeedingLookup(withoutZones)).toEqual(['s1', 's2']);
    expect(subnetsNeedingLookup(shapeFromV2(serverlessV2('eu-west-1', 'c')))).toEqual([]);
  });

  it('keeps a missing broker count unknown', () => {
    const descriptor = toDescriptor({ apiGeneration: 'v1', kind: 'Provisioned', clusterName: 'bare' }, context, null);

    expect(descriptor).toMatchObject({ brokerCount: null, kafkaVersion: null, brokerInstanceType: null, creationTime: null });
  });

  it('reports an unknown broker count with the not-applicable marker', () => {
    const shape = shapeFromV2({ ClusterType: 'PROVISIONED', ClusterName: 'bare' });
    const row = normalizeRow(toDescriptor({ ...shape, clusterName: 'bare' }, context, null), new Map());

    expect(row.NumberOfBrokerNodes).toBe(NOT_APPLICABLE);
    expect(row.BytesInPerSec_Avg).toBe(NO_DATA);
  });
});
