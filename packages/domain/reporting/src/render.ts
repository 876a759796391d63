import { toMatrix, type ReportTable, type TableCell } from './definitions';

const NEEDS_QUOTES = /[",\r\n]/;

export const escapeCsv = (cell: TableCell): string => {
  if (cell === null || cell === undefined) return '';
  const text = typeof cell === 'number' ? `${cell}` : cell;
  return NEEDS_QUOTES.test(text) || text !== text.trim() ? `"${text.replace(/"/g, '""')}"` : text;
};

export const toCsvLine = (cells: readonly TableCell[]): string => cells.map(escapeCsv).join(',');

export const toCsv = (table: ReportTable): string => {
  const lines = [toCsvLine(table.columns), ...toMatrix(table).map(toCsvLine)];
  return `${lines.join('\n')}\n`;
};

