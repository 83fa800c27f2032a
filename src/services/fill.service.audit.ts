import { Inventory, ItemStack } from '../core/inventory';
import { DecisionOutcome, LogEntry } from '../core/types';
import { UnresolvedRequest } from './fill.service.types';

const LABEL_WIDTH = 9;
const SIZE_WIDTH = 2;

/**
 * Fixed-width audit line: `Stored    ( 3) Torch`.
 */
export function formatLogEntry(outcome: DecisionOutcome | 'Unknown', size: number, name: string): LogEntry {
  return `${outcome.padEnd(LABEL_WIDTH)} (${String(size).padStart(SIZE_WIDTH)}) ${name}`;
}

export interface AuditDecision {
  outcome: DecisionOutcome;
  entry: LogEntry;
}

/**
 * Run the capacity decision for one stack and describe it.
 * Must be called once per stack, in resolution order.
 */
export function decide(inventory: Inventory, stack: ItemStack): AuditDecision {
  const outcome: DecisionOutcome = inventory.addItems(stack) ? 'Stored' : 'Discarded';
  return { outcome, entry: formatLogEntry(outcome, stack.size(), stack.item.name) };
}

export function recordDecision(inventory: Inventory, stack: ItemStack): LogEntry {
  return decide(inventory, stack).entry;
}

export function formatUnresolvedEntry(request: UnresolvedRequest): LogEntry {
  return formatLogEntry('Unknown', request.quantity, `#${request.itemId}`);
}
