import type { DetectedItem, Region } from '../types';

export const MANUAL_REGION_LABEL = 'Manual Region';

/**
 * Smallest rectangle enclosing every box of the item. Gaps between
 * non-adjacent boxes fall inside the region and are redacted with it.
 */
export function mergeBoxes(item: DetectedItem): Region {
  if (item.boxes.length === 0) {
    return {
      piiType: item.piiType,
      label: item.matchedText,
      x: 0,
      y: 0,
      w: 0,
      h: 0,
      selected: true,
      manual: false
    };
  }

  let minX = Number.POSITIVE_INFINITY;
  let minY = Number.POSITIVE_INFINITY;
  let maxX = Number.NEGATIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;

  for (const box of item.boxes) {
    minX = Math.min(minX, box.x);
    minY = Math.min(minY, box.y);
    maxX = Math.max(maxX, box.x + box.w);
    maxY = Math.max(maxY, box.y + box.h);
  }

  return {
    piiType: item.piiType,
    label: item.matchedText,
    x: minX,
    y: minY,
    w: maxX - minX,
    h: maxY - minY,
    selected: true,
    manual: false
  };
}

export function buildRegions(items: readonly DetectedItem[]): Region[] {
  return items.map((item) => mergeBoxes(item));
}

export function createManualRegion(x: number, y: number, w: number, h: number): Region {
  return {
    piiType: null,
    label: MANUAL_REGION_LABEL,
    x,
    y,
    w,
    h,
    selected: true,
    manual: true
  };
}

export function parseRegionSpec(spec: string): Region {
  const parts = spec.split(',').map((part) => part.trim());
  const values = parts.map((part) => Number(part));

  if (values.length !== 4 || parts.some((part) => part === '') || values.some((value) => !Number.isInteger(value))) {
    throw new Error(`Invalid region "${spec}". Expected four integers: x,y,w,h.`);
  }

  const [x = 0, y = 0, w = 0, h = 0] = values;
  return createManualRegion(x, y, w, h);
}
