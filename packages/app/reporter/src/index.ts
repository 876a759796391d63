import { constants } from 'node:fs';
import { access, mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { format } from 'date-fns';
import { toCsv, type ReportTable } from '@domain/reporting';
import type { Logger } from '@platform/logging';
import { AppError } from '@shared/errors';

export class ReportWriteError extends AppError {
  constructor(message: string, cause?: unknown) {
    super('REPORT_WRITE', message, { scope: 'fatal', cause });
  }
}

export interface WriteReportRequest {
  readonly table: ReportTable;
  readonly directory: string;
  readonly prefix: string;
  readonly logger: Logger;
  readonly now?: Date;
}

/** `<prefix>_2026-JAN-05_09-07-03.csv`, in local time. */
export const reportFileName = (prefix: string, at: Date): string =>
  `${prefix}_${format(at, 'yyyy')}-${format(at, 'MMM').toUpperCase()}-${format(at, 'dd_HH-mm-ss')}.csv`;

/** Creates `directory` if needed and fails fast when it cannot be written to. */
export const ensureWritable = async (directory: string): Promise<string> => {
  const absolute = resolve(directory);
  try {
    await mkdir(absolute, { recursive: true });
    await access(absolute, constants.W_OK);
  } catch (error) {
    throw new ReportWriteError(`output directory ${absolute} is not writable`, error);
  }
  return absolute;
};

/**
 * Writes the table as CSV and returns the file path, or null when there
 * were no rows to write.
 */
export const writeReport = async (request: WriteReportRequest): Promise<string | null> => {
  const { table, logger } = request;
  if (table.rows.length === 0) {
    logger.info('no clusters collected, report not written', { directory: request.directory });
    return null;
  }

  const directory = await ensureWritable(request.directory);
  const path = join(directory, reportFileName(request.prefix, request.now ?? new Date()));
  try {
    await writeFile(path, toCsv(table), 'utf8');
  } catch (error) {
    throw new ReportWriteError(`could not write report to ${path}`, error);
  }
  logger.info('report written', { path, rows: table.rows.length });
  return path;
};
