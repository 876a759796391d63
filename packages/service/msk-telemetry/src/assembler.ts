import { METRIC_CATALOG, reportColumns, type ClusterKind, type MetricTemplate, type ReportRow } from '@domain/msk-inventory';
import type { SkippedCluster } from './enumerator';
import type { RegionReport } from './collector';

export interface RunSummary {
  readonly regionsScanned: number;
  readonly regionsFailed: readonly { readonly region: string; readonly error: string }[];
  readonly clustersReported: number;
  readonly clustersSkipped: readonly SkippedCluster[];
  readonly failedMetricCells: number;
}

export interface AssembledReport {
  readonly columns: readonly string[];
  readonly rows: readonly ReportRow[];
  readonly summary: RunSummary;
}

/**
 * Concatenates per-region rows in region order. Rows are unique by
 * (account, region, cluster ARN) already, so nothing is deduplicated.
 */
export const assembleReport = (
  reports: readonly RegionReport[],
  catalog: Readonly<Record<ClusterKind, readonly MetricTemplate[]>> = METRIC_CATALOG,
): AssembledReport => {
  const rows = reports.flatMap((report) => report.rows);
  return {
    columns: reportColumns(catalog),
    rows,
    summary: {
      regionsScanned: reports.filter((report) => report.status === 'scanned').length,
      regionsFailed: reports
        .filter((report) => report.status === 'failed')
        .map((report) => ({ region: report.region, error: report.error ?? 'unknown error' })),
      clustersReported: rows.length,
      clustersSkipped: reports.flatMap((report) => report.skipped),
      failedMetricCells: reports.reduce((acc, report) => acc + report.failedMetricCells, 0),
    },
  };
};
