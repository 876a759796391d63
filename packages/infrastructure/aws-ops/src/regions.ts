import { DescribeRegionsCommand, EC2Client } from '@aws-sdk/client-ec2';
import { GetParametersByPathCommand, SSMClient } from '@aws-sdk/client-ssm';
import { fail, ok, toError, type Result } from '@shared/result';
import { withRetry } from './retry';
import { sdkClientConfig, type AdapterOptions } from './types';

/** Public SSM parameters listing every region that offers Amazon MSK. */
export const KAFKA_REGIONS_PARAMETER_PATH = '/aws/service/global-infrastructure/services/kafka/regions';

export interface RegionCatalog {
  /** Regions enabled for the account. */
  listRegions(): Promise<Result<string[], Error>>;
  /** Regions where the MSK service is offered at all. */
  listServiceRegions(): Promise<Result<string[], Error>>;
}

export class AwsRegionCatalog implements RegionCatalog {
  private readonly ec2: EC2Client;
  private readonly ssm: SSMClient;

  constructor(private readonly options: AdapterOptions) {
    this.ec2 = new EC2Client(sdkClientConfig(options));
    this.ssm = new SSMClient(sdkClientConfig(options));
  }

  async listRegions(): Promise<Result<string[], Error>> {
    try {
      const response = await withRetry(() => this.ec2.send(new DescribeRegionsCommand({ AllRegions: false })), this.options.retry);
      const names = (response.Regions ?? [])
        .map((region) => region.RegionName)
        .filter((name): name is string => typeof name === 'string' && name.length > 0);
      return ok(names);
    } catch (error) {
      return fail(toError(error, 'describe-regions-failed'));
    }
  }

  async listServiceRegions(): Promise<Result<string[], Error>> {
    const regions: string[] = [];
    try {
      let nextToken: string | undefined;
      do {
        const token = nextToken;
        const page = await withRetry(
          () => this.ssm.send(new GetParametersByPathCommand({ Path: KAFKA_REGIONS_PARAMETER_PATH, NextToken: token })),
          this.options.retry,
        );
        for (const parameter of page.Parameters ?? []) {
          if (parameter.Value) regions.push(parameter.Value);
        }
        nextToken = page.NextToken;
      } while (nextToken);
      return ok(regions);
    } catch (error) {
      return fail(toError(error, 'service-regions-failed'));
    }
  }

  close(): void {
    this.ec2.destroy();
    this.ssm.destroy();
  }
}
