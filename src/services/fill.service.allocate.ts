import { Inventory } from '../core/inventory';
import { ClassifiedLine } from '../core/types';

// One inventory per marker, in marker order. Capacities are not filtered.
export function allocateInventories(lines: readonly ClassifiedLine[]): Inventory[] {
  const inventories: Inventory[] = [];
  for (const line of lines) {
    if (line.kind === 'inventory') {
      inventories.push(new Inventory(line.capacity));
    }
  }
  return inventories;
}
