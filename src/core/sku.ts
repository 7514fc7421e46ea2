/**
 * SKU Resolution
 * Maps target license product names to the tenant's SKU identifiers
 */

import { CatalogEntry, SkuResolution } from '../types';
import { REPORT } from '../utils/constants';
import { ConfigurationError } from '../utils/errors';
import { logger } from '../utils/logger';

export const DEFAULT_TARGET_SKUS: readonly string[] = REPORT.TARGET_SKUS;

/**
 * Resolve target product names against the subscribed-SKU catalog.
 *
 * Every catalog entry lands in `namesById`, so licenses outside the target
 * set can still be displayed by name. Target names missing from the catalog
 * stay in `targets` with a `null` id.
 *
 * @throws ConfigurationError when none of the target names is subscribed
 */
export function resolveSkus(
  catalog: CatalogEntry[],
  targetProductNames: readonly string[] = DEFAULT_TARGET_SKUS
): SkuResolution {
  const namesById = new Map<string, string>();
  const idsByName = new Map<string, string>();

  for (const entry of catalog) {
    if (!namesById.has(entry.skuId)) {
      namesById.set(entry.skuId, entry.skuPartNumber);
    }
    if (!idsByName.has(entry.skuPartNumber)) {
      idsByName.set(entry.skuPartNumber, entry.skuId);
    }
  }

  const targets = new Map<string, string | null>();
  const targetSkuIds = new Set<string>();

  for (const name of targetProductNames) {
    const skuId = idsByName.get(name) ?? null;
    targets.set(name, skuId);

    if (skuId) {
      targetSkuIds.add(skuId);
      logger.debug(`Resolved ${name} -> ${skuId}`);
    } else {
      logger.warn(`Target SKU ${name} is not subscribed in this tenant`);
    }
  }

  if (targetSkuIds.size === 0) {
    throw new ConfigurationError(
      `None of the target SKUs (${targetProductNames.join(', ')}) exist in the tenant catalog`,
      catalog.map((e) => e.skuPartNumber)
    );
  }

  logger.info(`Resolved ${targetSkuIds.size} of ${targetProductNames.length} target SKU(s)`);
  return { targets, namesById, targetSkuIds };
}

/**
 * Names of the target SKUs among an identity's assigned SKU ids,
 * in assignment order without repeats.
 */
export function matchTargetSkus(assignedSkuIds: string[], skus: SkuResolution): string[] {
  const matched: string[] = [];

  for (const skuId of assignedSkuIds) {
    if (!skus.targetSkuIds.has(skuId)) continue;

    const name = skus.namesById.get(skuId) ?? skuId;
    if (!matched.includes(name)) {
      matched.push(name);
    }
  }

  return matched;
}

/**
 * Display names for every assigned SKU id; ids missing from the catalog are shown as-is.
 */
export function licenseNames(assignedSkuIds: string[], skus: SkuResolution): string[] {
  const names: string[] = [];
  for (const skuId of assignedSkuIds) {
    const name = skus.namesById.get(skuId) ?? skuId;
    if (!names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}
