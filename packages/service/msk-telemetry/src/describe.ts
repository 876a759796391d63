import type { BrokerNodeGroupInfo } from '@aws-sdk/client-kafka';
import { asClusterArn, type ApiGeneration, type ClusterDescriptor, type ClusterKind, type RegionId } from '@domain/msk-inventory';
import type { ClusterV1, ClusterV2 } from '@infrastructure/aws-ops';

interface Toggle {
  Enabled?: boolean;
}

/** The parts of the provisioned and serverless auth blocks that matter here. */
export interface AuthenticationBlock {
  Sasl?: { Iam?: Toggle; Scram?: Toggle };
  Tls?: Toggle;
  Unauthenticated?: Toggle;
}

/** One cluster as described by either API generation. */
export interface ClusterShape {
  readonly apiGeneration: ApiGeneration;
  readonly kind: ClusterKind;
  readonly clusterName?: string;
  readonly creationTime?: Date;
  readonly kafkaVersion?: string;
  readonly brokerCount?: number;
  readonly brokerGroup?: BrokerNodeGroupInfo;
  readonly authentication?: AuthenticationBlock;
}

export interface ClusterContext {
  readonly accountId: string;
  readonly region: RegionId;
  readonly clusterArn: string;
}

export const describeAuthentication = (block: AuthenticationBlock | undefined): string | null => {
  if (!block) return null;
  const methods: string[] = [];
  if (block.Sasl?.Iam?.Enabled) methods.push('IAM');
  if (block.Sasl?.Scram?.Enabled) methods.push('SCRAM');
  if (block.Tls?.Enabled) methods.push('mTLS');
  if (block.Unauthenticated?.Enabled) methods.push('Unauthenticated');
  return methods.length ? methods.join(', ') : 'None Enabled';
};

export const shapeFromV2 = (cluster: ClusterV2): ClusterShape => {
  const serverless = cluster.Serverless !== undefined || (cluster.Provisioned === undefined && cluster.ClusterType === 'SERVERLESS');
  if (serverless) {
    return {
      apiGeneration: 'v2',
      kind: 'Serverless',
      clusterName: cluster.ClusterName,
      creationTime: cluster.CreationTime,
      authentication: cluster.Serverless?.ClientAuthentication,
    };
  }

  const provisioned = cluster.Provisioned;
  return {
    apiGeneration: 'v2',
    kind: 'Provisioned',
    clusterName: cluster.ClusterName,
    creationTime: cluster.CreationTime,
    kafkaVersion: provisioned?.CurrentBrokerSoftwareInfo?.KafkaVersion,
    brokerCount: provisioned?.NumberOfBrokerNodes,
    brokerGroup: provisioned?.BrokerNodeGroupInfo,
    authentication: provisioned?.ClientAuthentication,
  };
};

/** The legacy API predates serverless clusters, so everything it returns is provisioned. */
export const shapeFromV1 = (cluster: ClusterV1): ClusterShape => ({
  apiGeneration: 'v1',
  kind: 'Provisioned',
  clusterName: cluster.ClusterName,
  creationTime: cluster.CreationTime,
  kafkaVersion: cluster.CurrentBrokerSoftwareInfo?.KafkaVersion,
  brokerCount: cluster.NumberOfBrokerNodes,
  brokerGroup: cluster.BrokerNodeGroupInfo,
  authentication: cluster.ClientAuthentication,
});

const isoOrNull = (value: Date | undefined): string | null =>
  value instanceof Date && !Number.isNaN(value.getTime()) ? value.toISOString() : null;

/** Subnets to look up when the broker group does not list its zones. */
export const subnetsNeedingLookup = (shape: ClusterShape): string[] => {
  if (shape.kind !== 'Provisioned' || shape.brokerGroup?.ZoneIds?.length) return [];
  return shape.brokerGroup?.ClientSubnets ?? [];
};

export const zoneCountFromShape = (shape: ClusterShape): number | null => {
  const zoneIds = shape.brokerGroup?.ZoneIds;
  return zoneIds?.length ? zoneIds.length : null;
};

/** Requires `shape.clusterName`; callers skip nameless clusters first. */
export const toDescriptor = (
  shape: ClusterShape & { clusterName: string },
  context: ClusterContext,
  availabilityZoneCount: number | null,
): ClusterDescriptor => {
  const identity = {
    accountId: context.accountId,
    region: context.region,
    clusterName: shape.clusterName,
    clusterArn: asClusterArn(context.clusterArn),
    creationTime: isoOrNull(shape.creationTime),
    authentication: describeAuthentication(shape.authentication),
    apiGeneration: shape.apiGeneration,
  };

  if (shape.kind === 'Serverless') {
    return { ...identity, kind: 'Serverless' };
  }

  return {
    ...identity,
    kind: 'Provisioned',
    kafkaVersion: shape.kafkaVersion ?? null,
    brokerCount: shape.brokerCount ?? null,
    brokerInstanceType: shape.brokerGroup?.InstanceType ?? null,
    storagePerBrokerGb: shape.brokerGroup?.StorageInfo?.EbsStorageInfo?.VolumeSize ?? null,
    availabilityZoneCount,
  };
};
