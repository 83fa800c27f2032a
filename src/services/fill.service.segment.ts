import { ClassifiedLine, isInventoryMarker } from '../core/types';

/**
 * Split `items` at every element matching `isBoundary`. Boundaries are
 * dropped, so N boundaries always yield N + 1 (possibly empty) groups.
 */
export function splitOn<T>(items: readonly T[], isBoundary: (item: T) => boolean): T[][] {
  const groups: T[][] = [[]];
  for (const item of items) {
    if (isBoundary(item)) {
      groups.push([]);
      continue;
    }
    groups[groups.length - 1]?.push(item);
  }
  return groups;
}

/**
 * Partition the classified lines at inventory markers.
 * Segment 0 is the preamble before the first marker.
 */
export function segmentLines(lines: readonly ClassifiedLine[]): ClassifiedLine[][] {
  return splitOn(lines, isInventoryMarker);
}
