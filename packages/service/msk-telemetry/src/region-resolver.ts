import { RegionDiscoveryError, asRegionId, type RegionId } from '@domain/msk-inventory';
import type { RegionCatalog } from '@infrastructure/aws-ops';
import type { Logger } from '@platform/logging';
import { uniqueInOrder } from '@shared/core';

export interface RegionSelection {
  /** Explicit regions; empty or missing means every enabled region offering MSK. */
  readonly regions?: readonly string[] | string;
  /** Check explicit regions against the discovered set. */
  readonly validate?: boolean;
}

export const parseRegionList = (input: readonly string[] | string | undefined): string[] => {
  if (input === undefined) return [];
  const parts = typeof input === 'string' ? input.split(',') : input.flatMap((entry) => entry.split(','));
  return uniqueInOrder(parts.map((part) => part.trim()).filter((part) => part.length > 0));
};

/**
 * Enabled regions that also offer MSK. When the offering list cannot be read
 * every enabled region is kept.
 */
const discover = async (catalog: RegionCatalog, logger: Logger): Promise<string[]> => {
  const listed = await catalog.listRegions();
  if (!listed.ok) {
    throw new RegionDiscoveryError(`region discovery failed: ${listed.error.message}`, listed.error);
  }
  const enabled = uniqueInOrder(listed.value);
  const offered = await catalog.listServiceRegions();
  if (!offered.ok) {
    logger.warn('could not look up regions offering MSK, scanning every enabled region', { reason: offered.error.message });
    return enabled;
  }
  const offering = new Set(offered.value);
  return enabled.filter((region) => offering.has(region));
};

/**
 * Turns the operator's selection into the ordered list of regions to scan.
 * Throws RegionDiscoveryError when nothing can be resolved; there is no
 * built-in fallback list.
 */
export const resolveRegions = async (selection: RegionSelection, catalog: RegionCatalog, logger: Logger): Promise<RegionId[]> => {
  const explicit = parseRegionList(selection.regions);

  if (explicit.length === 0) {
    const discovered = await discover(catalog, logger);
    if (discovered.length === 0) {
      throw new RegionDiscoveryError('no enabled regions offering MSK were discovered for this account');
    }
    logger.info('discovered regions', { regions: discovered });
    return discovered.map(asRegionId);
  }

  if (selection.validate === false) {
    return explicit.map(asRegionId);
  }

  const known = new Set(await discover(catalog, logger));
  const valid = explicit.filter((region) => known.has(region));
  const invalid = explicit.filter((region) => !known.has(region));
  if (invalid.length) {
    logger.warn('skipping unknown, disabled or unsupported regions', { regions: invalid });
  }
  if (valid.length === 0) {
    throw new RegionDiscoveryError(`none of the requested regions are available: ${explicit.join(', ')}`);
  }
  return valid.map(asRegionId);
};
