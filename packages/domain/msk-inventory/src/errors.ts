import { AppError } from '@shared/errors';

export class RegionDiscoveryError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('REGION_DISCOVERY', message, { scope: 'fatal', cause });
  }
}

export class ClusterListError extends AppError {
  constructor(region: string, cause?: unknown) {
    super('CLUSTER_LIST', `could not list clusters in ${region} with either API generation`, {
      scope: 'region',
      cause,
      context: { region },
    });
  }
}

export class ClusterDescribeError extends AppError {
  constructor(clusterArn: string, message: string, cause?: unknown) {
    super('CLUSTER_DESCRIBE', message, { scope: 'cluster', cause, context: { clusterArn } });
  }
}
