import { Catalog } from '../core/catalog';
import { InventorySummary, InventoryView } from '../core/types';
import { LoggedInventory } from '../services/fill.service.types';

/**
 * Plain-text report: processing log, item list, then each inventory's
 * final contents. Inventories appear in marker order.
 */
export function renderReport(catalog: Catalog, results: readonly LoggedInventory[]): string {
  const lines: string[] = ['Processing Log:'];
  for (const { log } of results) {
    lines.push(...log);
  }
  lines.push('');

  lines.push('Item List:');
  for (const item of catalog) {
    lines.push(`  ${String(item.id).padStart(2)} ${item.name}`);
  }
  lines.push('');

  lines.push('Storage Summary:');
  for (const { inventory } of results) {
    lines.push(inventory.toString());
  }

  return `${lines.join('\n')}\n`;
}

export function toInventoryView({ log, inventory }: LoggedInventory): InventoryView {
  return {
    capacity: inventory.capacity,
    occupied: inventory.occupancy,
    log: [...log],
    stacks: inventory.stacks.map((stack) => ({
      itemId: stack.item.id,
      name: stack.item.name,
      quantity: stack.quantity,
      size: stack.size(),
    })),
  };
}

export function summarize({ inventory, discarded, unresolved }: LoggedInventory): InventorySummary {
  return {
    capacity: inventory.capacity,
    occupied: inventory.occupancy,
    remaining: inventory.remaining,
    stored: inventory.stacks.length,
    discarded: discarded.length,
    unresolved: unresolved.length,
  };
}
