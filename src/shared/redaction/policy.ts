import type { DetectedItem, Region, SelectionPolicy } from '../types';
import { buildRegions } from './regions';

/**
 * Sets the initial selection of URL regions. Under `flagQueryParamsOnly` only
 * URLs carrying a query string stay selected; otherwise every URL is. Other
 * regions keep their flag. Regions are updated in place, never removed.
 */
export function applyPolicy(items: readonly DetectedItem[], regions: Region[], policy: SelectionPolicy): Region[] {
  const count = Math.min(items.length, regions.length);

  for (let index = 0; index < count; index += 1) {
    const region = regions[index];
    const item = items[index];
    if (!region || !item || region.piiType !== 'url') {
      continue;
    }

    region.selected = policy.flagQueryParamsOnly ? item.hasQueryParams : true;
  }

  return regions;
}

export function applyTemplatePolicy(items: readonly DetectedItem[], policy: SelectionPolicy): Region[] {
  return applyPolicy(items, buildRegions(items), policy);
}
