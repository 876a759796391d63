import { CloudWatchClient, GetMetricStatisticsCommand, type Datapoint } from '@aws-sdk/client-cloudwatch';
import { backendStatistics, type MetricDatapoint, type MetricQuery } from '@domain/msk-inventory';
import { fail, ok, toError, type Result } from '@shared/result';
import { withRetry } from './retry';
import { sdkClientConfig, type AdapterOptions } from './types';

export interface MetricsBackend {
  fetch(query: MetricQuery): Promise<Result<MetricDatapoint[], Error>>;
}

const finite = (value: number | undefined): number | undefined =>
  typeof value === 'number' && Number.isFinite(value) ? value : undefined;

export const toMetricDatapoints = (datapoints: readonly Datapoint[]): MetricDatapoint[] => {
  const out: MetricDatapoint[] = [];
  for (const datapoint of datapoints) {
    if (!(datapoint.Timestamp instanceof Date)) continue;
    const average = finite(datapoint.Average);
    const maximum = finite(datapoint.Maximum);
    const total = finite(datapoint.Sum);
    out.push({
      timestamp: datapoint.Timestamp,
      values: {
        ...(average === undefined ? {} : { Average: average }),
        ...(maximum === undefined ? {} : { Maximum: maximum }),
        ...(total === undefined ? {} : { Sum: total }),
      },
    });
  }
  return out;
};

/** All statistics of one query go out in a single GetMetricStatistics call. */
export class CloudWatchMetricsBackend implements MetricsBackend {
  private readonly client: CloudWatchClient;

  constructor(private readonly options: AdapterOptions) {
    this.client = new CloudWatchClient(sdkClientConfig(options));
  }

  async fetch(query: MetricQuery): Promise<Result<MetricDatapoint[], Error>> {
    const command = new GetMetricStatisticsCommand({
      Namespace: query.template.namespace,
      MetricName: query.template.cloudWatchName,
      Dimensions: query.dimensions.map((dimension) => ({ Name: dimension.name, Value: dimension.value })),
      StartTime: query.window.start,
      EndTime: query.window.end,
      Period: query.window.periodSeconds,
      Statistics: backendStatistics(query.template.statistics),
      Unit: query.template.unit,
    });

    try {
      const response = await withRetry(() => this.client.send(command), this.options.retry);
      return ok(toMetricDatapoints(response.Datapoints ?? []));
    } catch (error) {
      return fail(toError(error, 'get-metric-statistics-failed'));
    }
  }

  close(): void {
    this.client.destroy();
  }
}
