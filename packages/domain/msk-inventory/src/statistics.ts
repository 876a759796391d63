import { NO_DATA, isResolved, type AggregatedStat } from './sentinels';
import type { BrokerRollup, MetricDatapoint, MetricSeries, SeriesPoint, Statistic } from './types';

export const mean = (values: readonly number[]): number | undefined =>
  values.length ? values.reduce((sum, value) => sum + value, 0) / values.length : undefined;

export const sum = (values: readonly number[]): number | undefined =>
  values.length ? values.reduce((acc, value) => acc + value, 0) : undefined;

export const max = (values: readonly number[]): number | undefined =>
  values.length ? values.reduce((acc, value) => (value > acc ? value : acc), values[0]) : undefined;

/** Picks one statistic's values out of raw datapoints, oldest first. */
export const seriesFor = (datapoints: readonly MetricDatapoint[], statistic: Statistic): MetricSeries => {
  const field = statistic === 'Latest' ? 'Maximum' : statistic;
  const points: SeriesPoint[] = [];
  for (const datapoint of datapoints) {
    const value = datapoint.values[field];
    if (typeof value === 'number' && Number.isFinite(value)) {
      points.push({ timestamp: datapoint.timestamp, value });
    }
  }
  return points.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
};

export const reduceSeries = (series: MetricSeries, statistic: Statistic): AggregatedStat => {
  const values = series.map((point) => point.value);
  let reduced: number | undefined;
  switch (statistic) {
    case 'Average':
      reduced = mean(values);
      break;
    case 'Maximum':
      reduced = max(values);
      break;
    case 'Sum':
      reduced = sum(values);
      break;
    case 'Latest':
      reduced = series.length ? series[series.length - 1].value : undefined;
      break;
  }
  return reduced === undefined ? NO_DATA : reduced;
};

/**
 * Combines per-broker values of one statistic into a cluster value. Brokers
 * without data are left out; when none has data the result is NO_DATA.
 * A `mean` rollup averages averages but keeps the highest peak.
 */
export const rollupBrokers = (perBroker: readonly AggregatedStat[], statistic: Statistic, rollup: BrokerRollup): AggregatedStat => {
  const values = perBroker.filter(isResolved);
  let reduced: number | undefined;
  if (rollup === 'sum') {
    reduced = sum(values);
  } else if (statistic === 'Maximum' || statistic === 'Latest') {
    reduced = max(values);
  } else {
    reduced = mean(values);
  }
  return reduced === undefined ? NO_DATA : reduced;
};
