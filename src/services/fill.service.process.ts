import { config } from '../core/config';
import { Catalog } from '../core/catalog';
import { Inventory, sizerFor } from '../core/inventory';
import { logger } from '../core/logger';
import { ClassifiedLine } from '../core/types';
import { allocateInventories } from './fill.service.allocate';
import { decide, formatUnresolvedEntry } from './fill.service.audit';
import { resolveRequests } from './fill.service.resolve';
import { segmentLines } from './fill.service.segment';
import { LoggedInventory, ProcessOptions } from './fill.service.types';

/**
 * Pair two sequences element-wise, truncating to the shorter one.
 */
export function pairPositionally<A, B>(left: readonly A[], right: readonly B[]): Array<[A, B]> {
  const length = Math.min(left.length, right.length);
  const pairs: Array<[A, B]> = [];
  for (let i = 0; i < length; i++) {
    pairs.push([left[i], right[i]]);
  }
  return pairs;
}

function fillInventory(
  inventory: Inventory,
  segment: readonly ClassifiedLine[],
  catalog: Catalog,
  options: Required<ProcessOptions>,
  index: number
): LoggedInventory {
  const logged: LoggedInventory = { log: [], inventory, discarded: [], unresolved: [] };

  for (const resolution of resolveRequests(catalog, segment, options.sizer)) {
    if (resolution.status === 'unresolved') {
      logger.warn(
        { inventory: index, itemId: resolution.itemId, quantity: resolution.quantity },
        'Stack request names an unknown item'
      );
      logged.unresolved.push(resolution);
      if (options.unresolvedPolicy === 'report') {
        logged.log.push(formatUnresolvedEntry(resolution));
      }
      continue;
    }

    const { outcome, entry } = decide(inventory, resolution.stack);
    if (outcome === 'Discarded') {
      logged.discarded.push(resolution.stack);
    }
    logged.log.push(entry);
  }

  logger.debug(
    {
      inventory: index,
      capacity: inventory.capacity,
      occupied: inventory.occupancy,
      stored: inventory.stacks.length,
      discarded: logged.discarded.length,
      unresolved: logged.unresolved.length,
    },
    'Inventory filled'
  );

  return logged;
}

/**
 * Run every stack request against its inventory, in marker order.
 * Returns one logged inventory per marker.
 */
export function processInventoryRequests(
  lines: readonly ClassifiedLine[],
  catalog: Catalog,
  options: ProcessOptions = {}
): LoggedInventory[] {
  const resolved: Required<ProcessOptions> = {
    sizer: options.sizer ?? sizerFor(config.STACK_SIZE_POLICY),
    unresolvedPolicy: options.unresolvedPolicy ?? config.UNRESOLVED_POLICY,
  };

  const segments = segmentLines(lines);
  const inventories = allocateInventories(lines);

  // Segment 0 is the preamble before the first marker.
  return pairPositionally(inventories, segments.slice(1)).map(([inventory, segment], index) =>
    fillInventory(inventory, segment, catalog, resolved, index)
  );
}
