import { Catalog } from '../core/catalog';
import { ItemStack, quantitySizer } from '../core/inventory';
import { ClassifiedLine, StackSizer } from '../core/types';
import { StackResolution } from './fill.service.types';

/**
 * Resolve every stack request of a segment against the catalog, keeping
 * unresolved requests in place. Markers and other lines are skipped.
 */
export function resolveRequests(
  catalog: Catalog,
  segment: readonly ClassifiedLine[],
  sizer: StackSizer = quantitySizer
): StackResolution[] {
  const resolutions: StackResolution[] = [];

  for (const line of segment) {
    switch (line.kind) {
      case 'stack': {
        const item = catalog.find(line.itemId);
        resolutions.push(
          item
            ? { status: 'resolved', stack: new ItemStack(item, line.quantity, sizer) }
            : { status: 'unresolved', itemId: line.itemId, quantity: line.quantity }
        );
        break;
      }
      case 'inventory':
      case 'other':
        break;
      default: {
        const unreachable: never = line;
        throw new Error(`Unhandled line: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  return resolutions;
}

/**
 * Item stacks for the resolvable requests of a segment, in request order.
 * Requests naming an unknown item are dropped.
 */
export function resolveStacks(
  catalog: Catalog,
  segment: readonly ClassifiedLine[],
  sizer: StackSizer = quantitySizer
): ItemStack[] {
  return resolveRequests(catalog, segment, sizer).flatMap((resolution) =>
    resolution.status === 'resolved' ? [resolution.stack] : []
  );
}
