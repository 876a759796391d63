import { ClusterDescribeError, ClusterListError, type ClusterDescriptor, type RegionId } from '@domain/msk-inventory';
import { isEndpointUnavailable, type KafkaInventoryApi, type SubnetZoneLookup } from '@infrastructure/aws-ops';
import type { Logger } from '@platform/logging';
import { mapBounded } from '@shared/core';
import { fail, ok, type Result } from '@shared/result';
import { shapeFromV1, shapeFromV2, subnetsNeedingLookup, toDescriptor, zoneCountFromShape, type ClusterShape } from './describe';

export interface SkippedCluster {
  readonly region: RegionId;
  readonly clusterArn: string;
  readonly reason: string;
}

export interface RegionInventory {
  readonly region: RegionId;
  readonly clusters: readonly ClusterDescriptor[];
  readonly skipped: readonly SkippedCluster[];
}

export interface InventoryBackends {
  readonly inventory: KafkaInventoryApi;
  readonly subnets: SubnetZoneLookup;
}

export interface EnumeratorOptions {
  readonly accountId: string;
  readonly backends: (region: RegionId) => InventoryBackends;
  readonly logger: Logger;
  readonly clusterConcurrency?: number;
}

interface Scope extends InventoryBackends {
  readonly region: RegionId;
}

type Described = { readonly kind: 'described'; readonly cluster: ClusterDescriptor } | { readonly kind: 'skipped'; readonly skipped: SkippedCluster };

export class ClusterEnumerator {
  constructor(private readonly options: EnumeratorOptions) {}

  /**
   * Lists and describes every cluster of the region. A failed listing fails
   * the region unless the service has no endpoint there, which counts as an
   * empty region; a failed describe only drops that cluster.
   */
  async enumerate(region: RegionId): Promise<Result<RegionInventory, ClusterListError>> {
    const { logger } = this.options;
    const scope: Scope = { region, ...this.options.backends(region) };
    const arns = await this.listClusterArns(scope);
    if (!arns.ok) {
      logger.error('could not list clusters, skipping region', arns.error, { region });
      return arns;
    }
    logger.info('clusters listed', { region, clusters: arns.value.length });

    const outcomes = await mapBounded(arns.value, this.options.clusterConcurrency ?? 1, (arn) => this.describe(scope, arn));
    const clusters: ClusterDescriptor[] = [];
    const skipped: SkippedCluster[] = [];
    for (const outcome of outcomes) {
      if (outcome.kind === 'described') clusters.push(outcome.cluster);
      else skipped.push(outcome.skipped);
    }
    return ok({ region, clusters, skipped });
  }

  private async listClusterArns({ inventory, region }: Scope): Promise<Result<string[], ClusterListError>> {
    const { logger } = this.options;
    const current = await inventory.listClustersV2();
    if (current.ok) {
      return ok(arnsOf(current.value));
    }
    if (isEndpointUnavailable(current.error)) {
      logger.info('MSK is not offered in this region', { region, reason: current.error.message });
      return ok([]);
    }

    logger.warn('ListClustersV2 failed, falling back to ListClusters', { region, reason: current.error.message });
    const legacy = await inventory.listClustersV1();
    if (legacy.ok) {
      return ok(arnsOf(legacy.value));
    }
    return fail(new ClusterListError(region, legacy.error));
  }

  private async describe(scope: Scope, clusterArn: string): Promise<Described> {
    const { logger } = this.options;
    const { region } = scope;
    const shape = await this.fetchShape(scope, clusterArn);
    if (!shape.ok) {
      logger.warn('skipping cluster', { region, clusterArn, reason: shape.error.message });
      return { kind: 'skipped', skipped: { region, clusterArn, reason: shape.error.message } };
    }

    const clusterName = shape.value.clusterName;
    if (!clusterName) {
      const reason = 'describe response carried no cluster name';
      logger.warn('skipping cluster', { region, clusterArn, reason });
      return { kind: 'skipped', skipped: { region, clusterArn, reason } };
    }

    const zones = await this.zoneCount(scope, shape.value, clusterArn);
    const cluster = toDescriptor({ ...shape.value, clusterName }, { accountId: this.options.accountId, region, clusterArn }, zones);
    return { kind: 'described', cluster };
  }

  /** V2 is authoritative; V1 is consulted only when V2 yields nothing. */
  private async fetchShape({ inventory, region }: Scope, clusterArn: string): Promise<Result<ClusterShape, ClusterDescribeError>> {
    const { logger } = this.options;
    const current = await inventory.describeClusterV2(clusterArn);
    if (current.ok && current.value) {
      return ok(shapeFromV2(current.value));
    }
    if (!current.ok) {
      logger.debug('DescribeClusterV2 failed, trying DescribeCluster', { region, clusterArn, reason: current.error.message });
    }

    const legacy = await inventory.describeClusterV1(clusterArn);
    if (legacy.ok && legacy.value) {
      return ok(shapeFromV1(legacy.value));
    }
    const cause = legacy.ok ? undefined : legacy.error;
    const detail = cause ? `: ${cause.message}` : ' (empty response)';
    return fail(new ClusterDescribeError(clusterArn, `could not describe cluster with either API generation${detail}`, cause));
  }

  private async zoneCount(scope: Scope, shape: ClusterShape, clusterArn: string): Promise<number | null> {
    if (shape.kind !== 'Provisioned') return null;
    const direct = zoneCountFromShape(shape);
    if (direct !== null) return direct;

    const subnets = subnetsNeedingLookup(shape);
    if (subnets.length === 0) return null;

    const zones = await scope.subnets.zonesFor(subnets);
    if (zones.ok) return zones.value.length;

    this.options.logger.warn('could not resolve subnet zones, counting subnets instead', {
      region: scope.region,
      clusterArn,
      reason: zones.error.message,
    });
    return subnets.length;
  }
}

const arnsOf = (clusters: readonly { ClusterArn?: string }[]): string[] =>
  clusters.map((cluster) => cluster.ClusterArn).filter((arn): arn is string => typeof arn === 'string' && arn.length > 0);
