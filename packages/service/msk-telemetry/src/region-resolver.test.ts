import { describe, expect, it } from 'vitest';
import { RegionDiscoveryError } from '@domain/msk-inventory';
import { InMemorySink, Logger, asNamespace } from '@platform/logging';
import { parseRegionList, resolveRegions } from './region-resolver';
import { FakeRegionCatalog } from './testing';

const logger = () => {
  const sink = new InMemorySink();
  return { sink, logger: new Logger(asNamespace('regions'), [sink]) };
};

describe('parseRegionList', () => {
  it('splits, trims and deduplicates while keeping order', () => {
    expect(parseRegionList(' us-east-1, eu-west-1 ,,us-east-1 ')).toEqual(['us-east-1', 'eu-west-1']);
    expect(parseRegionList(['ap-south-1', 'us-east-1,ap-south-1'])).toEqual(['ap-south-1', 'us-east-1']);
    expect(parseRegionList(undefined)).toEqual([]);
  });
});

describe('resolveRegions', () => {
  it('discovers every region when none are given, keeping discovery order', async () => {
    const catalog = new FakeRegionCatalog(['eu-west-1', 'us-east-1', 'eu-west-1']);
    const regions = await resolveRegions({}, catalog, logger().logger);

    expect(regions).toEqual(['eu-west-1', 'us-east-1']);
  });

  it('keeps only enabled regions where MSK is offered', async () => {
    const catalog = new FakeRegionCatalog(['us-east-1', 'xx-test-1', 'eu-west-1'], ['eu-west-1', 'us-east-1', 'ap-south-1']);
    const regions = await resolveRegions({}, catalog, logger().logger);

    expect(regions).toEqual(['us-east-1', 'eu-west-1']);
  });

  it('scans every enabled region when the offering lookup fails', async () => {
    const { sink, logger: log } = logger();
    const catalog = new FakeRegionCatalog(['us-east-1', 'xx-test-1'], new Error('AccessDeniedException'));
    const regions = await resolveRegions({}, catalog, log);

    expect(regions).toEqual(['us-east-1', 'xx-test-1']);
    expect(sink.messages('warn')).toEqual(['could not look up regions offering MSK, scanning every enabled region']);
  });

  it('drops an explicit region that is enabled but does not offer MSK', async () => {
    const catalog = new FakeRegionCatalog(['us-east-1', 'xx-test-1'], ['us-east-1']);
    const regions = await resolveRegions({ regions: 'xx-test-1,us-east-1' }, catalog, logger().logger);

    expect(regions).toEqual(['us-east-1']);
  });

  it('raises a fatal error when discovery fails', async () => {
    const catalog = new FakeRegionCatalog(new Error('UnauthorizedOperation'));

    await expect(resolveRegions({ regions: '' }, catalog, logger().logger)).rejects.toBeInstanceOf(RegionDiscoveryError);
  });

  it('raises a fatal error when discovery finds nothing', async () => {
    await expect(resolveRegions({}, new FakeRegionCatalog([]), logger().logger)).rejects.toThrow(
      'no enabled regions offering MSK were discovered for this account',
    );
  });

  it('drops unknown explicit regions with a warning', async () => {
    const { sink, logger: log } = logger();
    const catalog = new FakeRegionCatalog(['us-east-1', 'eu-west-1']);
    const regions = await resolveRegions({ regions: 'eu-west-1,mars-north-1' }, catalog, log);

    expect(regions).toEqual(['eu-west-1']);
    expect(sink.messages('warn')).toEqual(['skipping unknown, disabled or unsupported regions']);
    expect(sink.read()[0]?.context).toEqual({ regions: ['mars-north-1'] });
  });

  it('fails when no explicit region is valid', async () => {
    const catalog = new FakeRegionCatalog(['us-east-1']);

    await expect(resolveRegions({ regions: ['moon-1'] }, catalog, logger().logger)).rejects.toBeInstanceOf(RegionDiscoveryError);
  });

  it('skips discovery when validation is off', async () => {
    const catalog = new FakeRegionCatalog(new Error('should not be called'));
    const regions = await resolveRegions({ regions: 'us-west-2,us-west-2', validate: false }, catalog, logger().logger);

    expect(regions).toEqual(['us-west-2']);
  });
});
