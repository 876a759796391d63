import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { reportColumns } from '@domain/msk-inventory';
import { CredentialsError } from '@infrastructure/aws-ops';
import { FakeBackendFactory, FakeInventory, FakeMetricsBackend, provisionedV2 } from '@service/msk-telemetry/testing';
import { UsageError, parseCliArgs } from './args';
import { EXIT_FATAL, EXIT_OK, EXIT_USAGE, bootstrap, type CliDeps } from './index';

const ACCOUNT = '111122223333';
const NOW = new Date(2026, 0, 8, 6, 30, 0);

const ordersFactory = () =>
  new FakeBackendFactory(ACCOUNT, {
    'us-east-1': {
      inventory: new FakeInventory({ clustersV2: [provisionedV2({ region: 'us-east-1', name: 'orders', zoneIds: ['use1-az1'] })] }),
      metrics: new FakeMetricsBackend().set('orders', 'BytesInPerSec', [10, 20, 30], 1),
    },
    'eu-west-1': {
      inventory: new FakeInventory({ listV2Error: new Error('AccessDenied'), listV1Error: new Error('AccessDenied') }),
    },
  });

describe('parseCliArgs', () => {
  it('maps flags onto config overrides', () => {
    expect(
      parseCliArgs(['--regions', 'us-east-1,eu-west-1', '--lookback-hours', '24', '--period', '300', '--no-validate-regions']),
    ).toEqual({
      help: false,
      overrides: { regions: 'us-east-1,eu-west-1', lookbackHours: 24, periodSeconds: 300, validateRegions: false },
    });
  });

  it('rejects numeric flags that do not hold a number', () => {
    expect(() => parseCliArgs(['--lookback-hours', 'week'])).toThrow(UsageError);
    expect(() => parseCliArgs(['--period', ''])).toThrow('--period expects a number, got ""');
  });

  it('leaves region validation to the config when the flag is absent', () => {
    expect(parseCliArgs(['--profile', 'audit']).overrides).toEqual({ profile: 'audit' });
  });
});

describe('bootstrap', () => {
  let dir: string;
  let lines: string[];
  let deps: CliDeps;
  let openFactory: Mock<() => Promise<FakeBackendFactory>>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'msk-report-cli-'));
    lines = [];
    openFactory = vi.fn<() => Promise<FakeBackendFactory>>(async () => ordersFactory());
    deps = {
      env: {},
      now: () => NOW,
      stdout: (line) => lines.push(line),
      stderr: (line) => lines.push(line),
      openFactory,
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the report and exits 0 even when a region fails', async () => {
    const code = await bootstrap(['--output', dir], deps);

    expect(code).toBe(EXIT_OK);
    const files = await readdir(dir);
    expect(files).toEqual(['msk_cluster_report_2026-JAN-08_06-30-00.csv']);

    const [header, row, trailing] = (await readFile(join(dir, files[0] ?? ''), 'utf8')).split('\n');
    expect(header).toBe(reportColumns().join(','));
    expect(row?.startsWith(`${ACCOUNT},us-east-1,orders,`)).toBe(true);
    expect(trailing).toBe('');
    expect(lines.some((line) => line.includes('could not list clusters, skipping region'))).toBe(true);
  });

  it('exits 2 on an unknown flag without touching AWS', async () => {
    expect(await bootstrap(['--bogus'], deps)).toBe(EXIT_USAGE);
    expect(lines[0]).toContain("Unknown option '--bogus'");
    expect(openFactory).not.toHaveBeenCalled();
  });

  it('exits 2 on a non-numeric flag value', async () => {
    expect(await bootstrap(['--period', 'hourly'], deps)).toBe(EXIT_USAGE);
    expect(lines[0]).toBe('msk-report: --period expects a number, got "hourly"');
    expect(openFactory).not.toHaveBeenCalled();
  });

  it('prints usage for --help', async () => {
    expect(await bootstrap(['--help'], deps)).toBe(EXIT_OK);
    expect(lines[0]?.startsWith('usage: msk-report')).toBe(true);
  });

  it('exits 1 on invalid configuration before opening a session', async () => {
    expect(await bootstrap(['--output', dir, '--period', '90'], deps)).toBe(EXIT_FATAL);
    expect(openFactory).not.toHaveBeenCalled();
    expect(lines.some((line) => line.includes('fatal error, stopping') && line.includes('code=CONFIG'))).toBe(true);
  });

  it('exits 1 when credentials cannot be resolved', async () => {
    openFactory.mockRejectedValueOnce(new CredentialsError('could not resolve AWS credentials from the default credential chain'));

    expect(await bootstrap(['--output', dir], deps)).toBe(EXIT_FATAL);
    expect(await readdir(dir)).toEqual([]);
    expect(lines.some((line) => line.includes('code=CREDENTIALS'))).toBe(true);
  });

  it('exits 1 when the output directory is unusable, before scanning', async () => {
    const blocker = join(dir, 'file');
    await writeFile(blocker, 'x');

    expect(await bootstrap(['--output', join(blocker, 'reports')], deps)).toBe(EXIT_FATAL);
    expect(openFactory).not.toHaveBeenCalled();
  });

  it('reads settings from the config file', async () => {
    const configPath = join(dir, 'report.json');
    await writeFile(configPath, JSON.stringify({ reportPrefix: 'east', regions: ['us-east-1'], outputDirectory: dir }));

    expect(await bootstrap(['--config', configPath], deps)).toBe(EXIT_OK);
    expect((await readdir(dir)).sort()).toEqual(['east_2026-JAN-08_06-30-00.csv', 'report.json']);
  });

  it('writes no file when no cluster was found', async () => {
    openFactory.mockResolvedValueOnce(new FakeBackendFactory(ACCOUNT, { 'us-east-1': {} }));

    expect(await bootstrap(['--output', dir], deps)).toBe(EXIT_OK);
    expect(await readdir(dir)).toEqual([]);
  });
});
