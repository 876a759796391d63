import { KafkaSdkInventory, type KafkaInventoryApi } from './inventory';
import { CloudWatchMetricsBackend, type MetricsBackend } from './metrics';
import { AwsRegionCatalog, type RegionCatalog } from './regions';
import type { RetryPolicy } from './retry';
import type { AwsSession } from './session';
import { Ec2SubnetZoneLookup, type SubnetZoneLookup } from './subnets';

/** Everything the collector needs to talk to one region. */
export interface RegionBackends {
  readonly inventory: KafkaInventoryApi;
  readonly metrics: MetricsBackend;
  readonly subnets: SubnetZoneLookup;
  close(): void;
}

export interface BackendFactory {
  readonly accountId: string;
  regionCatalog(): RegionCatalog & { close(): void };
  forRegion(region: string): RegionBackends;
}

export interface AwsBackendFactoryOptions {
  readonly retry: RetryPolicy;
  readonly homeRegion: string;
}

export class AwsBackendFactory implements BackendFactory {
  constructor(
    private readonly session: AwsSession,
    private readonly options: AwsBackendFactoryOptions,
  ) {}

  get accountId(): string {
    return this.session.accountId;
  }

  regionCatalog(): AwsRegionCatalog {
    return new AwsRegionCatalog({ region: this.options.homeRegion, credentials: this.session.credentials, retry: this.options.retry });
  }

  forRegion(region: string): RegionBackends {
    const adapterOptions = { region, credentials: this.session.credentials, retry: this.options.retry };
    const inventory = new KafkaSdkInventory(adapterOptions);
    const metrics = new CloudWatchMetricsBackend(adapterOptions);
    const subnets = new Ec2SubnetZoneLookup(adapterOptions);
    return {
      inventory,
      metrics,
      subnets,
      close: () => {
        inventory.close();
        metrics.close();
        subnets.close();
      },
    };
  }
}
