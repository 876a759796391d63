import {
  DescribeClusterCommand,
  DescribeClusterV2Command,
  KafkaClient,
  ListClustersCommand,
  ListClustersV2Command,
  type Cluster,
  type ClusterInfo,
} from '@aws-sdk/client-kafka';
import { fail, ok, toError, type Result } from '@shared/result';
import { withRetry } from './retry';
import { sdkClientConfig, type AdapterOptions } from './types';

export type ClusterV2 = Cluster;
export type ClusterV1 = ClusterInfo;

/**
 * Both generations of the MSK inventory API. V2 knows about serverless
 * clusters; V1 only describes provisioned ones.
 */
export interface KafkaInventoryApi {
  listClustersV2(): Promise<Result<ClusterV2[], Error>>;
  listClustersV1(): Promise<Result<ClusterV1[], Error>>;
  describeClusterV2(clusterArn: string): Promise<Result<ClusterV2 | undefined, Error>>;
  describeClusterV1(clusterArn: string): Promise<Result<ClusterV1 | undefined, Error>>;
}

export class KafkaSdkInventory implements KafkaInventoryApi {
  private readonly client: KafkaClient;

  constructor(private readonly options: AdapterOptions) {
    this.client = new KafkaClient(sdkClientConfig(options));
  }

  async listClustersV2(): Promise<Result<ClusterV2[], Error>> {
    const clusters: ClusterV2[] = [];
    try {
      let nextToken: string | undefined;
      do {
        const token = nextToken;
        const page = await this.call(() => this.client.send(new ListClustersV2Command({ NextToken: token })));
        clusters.push(...(page.ClusterInfoList ?? []));
        nextToken = page.NextToken;
      } while (nextToken);
      return ok(clusters);
    } catch (error) {
      return fail(toError(error, 'list-clusters-v2-failed'));
    }
  }

  async listClustersV1(): Promise<Result<ClusterV1[], Error>> {
    const clusters: ClusterV1[] = [];
    try {
      let nextToken: string | undefined;
      do {
        const token = nextToken;
        const page = await this.call(() => this.client.send(new ListClustersCommand({ NextToken: token })));
        clusters.push(...(page.ClusterInfoList ?? []));
        nextToken = page.NextToken;
      } while (nextToken);
      return ok(clusters);
    } catch (error) {
      return fail(toError(error, 'list-clusters-failed'));
    }
  }

  async describeClusterV2(clusterArn: string): Promise<Result<ClusterV2 | undefined, Error>> {
    try {
      const response = await this.call(() => this.client.send(new DescribeClusterV2Command({ ClusterArn: clusterArn })));
      return ok(response.ClusterInfo);
    } catch (error) {
      return fail(toError(error, 'describe-cluster-v2-failed'));
    }
  }

  async describeClusterV1(clusterArn: string): Promise<Result<ClusterV1 | undefined, Error>> {
    try {
      const response = await this.call(() => this.client.send(new DescribeClusterCommand({ ClusterArn: clusterArn })));
      return ok(response.ClusterInfo);
    } catch (error) {
      return fail(toError(error, 'describe-cluster-failed'));
    }
  }

  close(): void {
    this.client.destroy();
  }

  private call<T>(operation: () => Promise<T>): Promise<T> {
    return withRetry(operation, this.options.retry);
  }
}
