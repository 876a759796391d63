import type {
  BackendFactory,
  ClusterV1,
  ClusterV2,
  KafkaInventoryApi,
  MetricsBackend,
  RegionBackends,
  RegionCatalog,
  SubnetZoneLookup,
} from '@infrastructure/aws-ops';
import type { MetricDatapoint, MetricQuery } from '@domain/msk-inventory';
import { fail, ok, type Result } from '@shared/result';

export interface FakeInventoryOptions {
  readonly clustersV2?: readonly ClusterV2[];
  readonly clustersV1?: readonly ClusterV1[];
  readonly listV2Error?: Error;
  readonly listV1Error?: Error;
  readonly describeV2Errors?: readonly string[];
  readonly describeV1Errors?: readonly string[];
}

export class FakeInventory implements KafkaInventoryApi {
  readonly calls: string[] = [];

  constructor(private readonly options: FakeInventoryOptions = {}) {}

  async listClustersV2(): Promise<Result<ClusterV2[], Error>> {
    this.calls.push('listClustersV2');
    return this.options.listV2Error ? fail(this.options.listV2Error) : ok([...(this.options.clustersV2 ?? [])]);
  }

  async listClustersV1(): Promise<Result<ClusterV1[], Error>> {
    this.calls.push('listClustersV1');
    return this.options.listV1Error ? fail(this.options.listV1Error) : ok([...(this.options.clustersV1 ?? [])]);
  }

  async describeClusterV2(clusterArn: string): Promise<Result<ClusterV2 | undefined, Error>> {
    this.calls.push(`describeClusterV2:${clusterArn}`);
    if (this.options.describeV2Errors?.includes(clusterArn)) return fail(new Error(`v2 describe denied for ${clusterArn}`));
    return ok(this.options.clustersV2?.find((cluster) => cluster.ClusterArn === clusterArn));
  }

  async describeClusterV1(clusterArn: string): Promise<Result<ClusterV1 | undefined, Error>> {
    this.calls.push(`describeClusterV1:${clusterArn}`);
    if (this.options.describeV1Errors?.includes(clusterArn)) return fail(new Error(`v1 describe denied for ${clusterArn}`));
    return ok(this.options.clustersV1?.find((cluster) => cluster.ClusterArn === clusterArn));
  }
}

const FAKE_SERIES_START = Date.UTC(2026, 0, 1);

export const datapointsOf = (values: readonly number[], stepSeconds = 300): MetricDatapoint[] =>
  values.map((value, index) => ({
    timestamp: new Date(FAKE_SERIES_START + index * stepSeconds * 1000),
    values: { Average: value, Maximum: value, Sum: value },
  }));

const seriesKey = (clusterName: string, cloudWatchName: string, brokerId?: number): string =>
  `${clusterName}|${cloudWatchName}|${brokerId ?? '-'}`;

/** Unknown series answer with no datapoints. */
export class FakeMetricsBackend implements MetricsBackend {
  readonly calls: MetricQuery[] = [];
  private readonly series = new Map<string, MetricDatapoint[] | Error>();

  set(clusterName: string, cloudWatchName: string, data: readonly number[] | MetricDatapoint[] | Error, brokerId?: number): this {
    const entry = data instanceof Error ? data : isDatapoints(data) ? data : datapointsOf(data);
    this.series.set(seriesKey(clusterName, cloudWatchName, brokerId), entry);
    return this;
  }

  async fetch(query: MetricQuery): Promise<Result<MetricDatapoint[], Error>> {
    this.calls.push(query);
    const clusterName = query.dimensions[0]?.value ?? '';
    const entry = this.series.get(seriesKey(clusterName, query.template.cloudWatchName, query.brokerId));
    if (entry instanceof Error) return fail(entry);
    return ok(entry ?? []);
  }
}

const isDatapoints = (data: readonly number[] | MetricDatapoint[]): data is MetricDatapoint[] =>
  data.length > 0 && typeof data[0] !== 'number';

export class FakeSubnets implements SubnetZoneLookup {
  constructor(
    private readonly zones: Readonly<Record<string, string>> = {},
    private readonly error?: Error,
  ) {}

  async zonesFor(subnetIds: readonly string[]): Promise<Result<string[], Error>> {
    if (this.error) return fail(this.error);
    return ok([...new Set(subnetIds.map((id) => this.zones[id]).filter((zone): zone is string => zone !== undefined))]);
  }
}

export class FakeRegionCatalog implements RegionCatalog {
  closed = false;

  constructor(
    private readonly regions: readonly string[] | Error,
    private readonly serviceRegions: readonly string[] | Error = regions,
  ) {}

  async listRegions(): Promise<Result<string[], Error>> {
    return this.regions instanceof Error ? fail(this.regions) : ok([...this.regions]);
  }

  async listServiceRegions(): Promise<Result<string[], Error>> {
    return this.serviceRegions instanceof Error ? fail(this.serviceRegions) : ok([...this.serviceRegions]);
  }

  close(): void {
    this.closed = true;
  }
}

export interface FakeRegion {
  readonly inventory?: KafkaInventoryApi;
  readonly metrics?: MetricsBackend;
  readonly subnets?: SubnetZoneLookup;
}

export class FakeBackendFactory implements BackendFactory {
  readonly opened: string[] = [];
  readonly closed: string[] = [];

  constructor(
    readonly accountId: string,
    private readonly regions: Readonly<Record<string, FakeRegion>>,
    private readonly catalog: FakeRegionCatalog = new FakeRegionCatalog(Object.keys(regions)),
  ) {}

  regionCatalog(): FakeRegionCatalog {
    return this.catalog;
  }

  forRegion(region: string): RegionBackends {
    this.opened.push(region);
    const fake = this.regions[region] ?? {};
    return {
      inventory: fake.inventory ?? new FakeInventory(),
      metrics: fake.metrics ?? new FakeMetricsBackend(),
      subnets: fake.subnets ?? new FakeSubnets(),
      close: () => {
        this.closed.push(region);
      },
    };
  }
}

export const clusterArn = (region: string, name: string): string => `arn:aws:kafka:${region}:111122223333:cluster/${name}/0001`;

export interface ProvisionedFixture {
  readonly region: string;
  readonly name: string;
  readonly brokers?: number;
  readonly instanceType?: string;
  readonly volumeSize?: number;
  readonly kafkaVersion?: string;
  readonly zoneIds?: string[];
  readonly subnets?: string[];
}

export const provisionedV2 = (fixture: ProvisionedFixture): ClusterV2 => ({
  ClusterArn: clusterArn(fixture.region, fixture.name),
  ClusterName: fixture.name,
  ClusterType: 'PROVISIONED',
  CreationTime: new Date('2025-06-01T12:00:00Z'),
  State: 'ACTIVE',
  Provisioned: {
    NumberOfBrokerNodes: fixture.brokers ?? 1,
    CurrentBrokerSoftwareInfo: { KafkaVersion: fixture.kafkaVersion ?? '3.6.0' },
    BrokerNodeGroupInfo: {
      InstanceType: fixture.instanceType ?? 'kafka.m5.large',
      ClientSubnets: fixture.subnets ?? ['subnet-a', 'subnet-b', 'subnet-c'],
      ...(fixture.zoneIds ? { ZoneIds: fixture.zoneIds } : {}),
      StorageInfo: { EbsStorageInfo: { VolumeSize: fixture.volumeSize ?? 100 } },
    },
    ClientAuthentication: { Sasl: { Iam: { Enabled: true }, Scram: { Enabled: false } }, Tls: { Enabled: true } },
  },
});

export const provisionedV1 = (fixture: ProvisionedFixture): ClusterV1 => ({
  ClusterArn: clusterArn(fixture.region, fixture.name),
  ClusterName: fixture.name,
  CreationTime: new Date('2024-02-03T04:05:06Z'),
  NumberOfBrokerNodes: fixture.brokers ?? 1,
  CurrentBrokerSoftwareInfo: { KafkaVersion: fixture.kafkaVersion ?? '2.8.1' },
  BrokerNodeGroupInfo: {
    InstanceType: fixture.instanceType ?? 'kafka.t3.small',
    ClientSubnets: fixture.subnets ?? ['subnet-a', 'subnet-b'],
    StorageInfo: { EbsStorageInfo: { VolumeSize: fixture.volumeSize ?? 50 } },
  },
  ClientAuthentication: { Unauthenticated: { Enabled: true } },
});

export const serverlessV2 = (region: string, name: string): ClusterV2 => ({
  ClusterArn: clusterArn(region, name),
  ClusterName: name,
  ClusterType: 'SERVERLESS',
  CreationTime: new Date('2025-09-10T08:00:00Z'),
  State: 'ACTIVE',
  Serverless: {
    VpcConfigs: [{ SubnetIds: ['subnet-x', 'subnet-y'] }],
    ClientAuthentication: { Sasl: { Iam: { Enabled: true } } },
  },
});
