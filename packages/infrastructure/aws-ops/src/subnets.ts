import { DescribeSubnetsCommand, EC2Client } from '@aws-sdk/client-ec2';
import { chunk } from '@shared/core';
import { fail, ok, toError, type Result } from '@shared/result';
import { withRetry } from './retry';
import { sdkClientConfig, type AdapterOptions } from './types';

export interface SubnetZoneLookup {
  zonesFor(subnetIds: readonly string[]): Promise<Result<string[], Error>>;
}

const SUBNETS_PER_CALL = 100;

export class Ec2SubnetZoneLookup implements SubnetZoneLookup {
  private readonly client: EC2Client;

  constructor(private readonly options: AdapterOptions) {
    this.client = new EC2Client(sdkClientConfig(options));
  }

  async zonesFor(subnetIds: readonly string[]): Promise<Result<string[], Error>> {
    const zones = new Set<string>();
    try {
      for (const batch of chunk(subnetIds, SUBNETS_PER_CALL)) {
        const response = await withRetry(() => this.client.send(new DescribeSubnetsCommand({ SubnetIds: batch })), this.options.retry);
        for (const subnet of response.Subnets ?? []) {
          if (subnet.AvailabilityZone) zones.add(subnet.AvailabilityZone);
        }
      }
      return ok([...zones]);
    } catch (error) {
      return fail(toError(error, 'describe-subnets-failed'));
    }
  }

  close(): void {
    this.client.destroy();
  }
}
