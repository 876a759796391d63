import { describe, expect, it } from 'vitest';
import { toMatrix, type ReportTable } from './definitions';
import { escapeCsv, toCsv } from './render';

const table: ReportTable = {
  columns: ['ClusterName', 'Authentication', 'BytesInPerSec_Avg'],
  rows: [
    { ClusterName: 'orders', Authentication: 'IAM, SCRAM', BytesInPerSec_Avg: 20 },
    { ClusterName: 'clicks', BytesInPerSec_Avg: 'N/A', Extra: 'dropped' },
  ],
};

describe('escapeCsv', () => {
  it('quotes commas, quotes and padded text', () => {
    expect(escapeCsv('IAM, SCRAM')).toBe('"IAM, SCRAM"');
    expect(escapeCsv('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsv(' padded')).toBe('" padded"');
  });

  it('leaves plain values and numbers alone', () => {
    expect(escapeCsv('kafka.m5.large')).toBe('kafka.m5.large');
    expect(escapeCsv(1.5)).toBe('1.5');
    expect(escapeCsv(undefined)).toBe('');
  });
});

describe('toCsv', () => {
  it('writes the header and one line per row in column order', () => {
    expect(toCsv(table)).toBe(
      'ClusterName,Authentication,BytesInPerSec_Avg\norders,"IAM, SCRAM",20\nclicks,,N/A\n',
    );
  });

  it('writes only the header for an empty table', () => {
    expect(toCsv({ columns: ['a', 'b'], rows: [] })).toBe('a,b\n');
  });
});

describe('toMatrix', () => {
  it('drops keys outside the columns', () => {
    expect(toMatrix(table)[1]).toEqual(['clicks', undefined, 'N/A']);
  });
});
