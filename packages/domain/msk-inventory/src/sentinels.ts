/** Empty series: the backend answered but had no datapoints in the window. */
export const NO_DATA = 'N/A';
/** The backend call for the metric failed. */
export const QUERY_FAILED = 'ERROR';
/** The column does not apply to the cluster's kind. */
export const NOT_APPLICABLE = '-';

export type NoData = typeof NO_DATA;
export type QueryFailed = typeof QUERY_FAILED;
export type NotApplicable = typeof NOT_APPLICABLE;

export type AggregatedStat = number | NoData | QueryFailed;
export type CellValue = number | string;

export const isResolved = (stat: AggregatedStat): stat is number => typeof stat === 'number';
