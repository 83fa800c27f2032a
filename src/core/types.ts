import { z } from 'zod';

// Base types
export type ItemId = number;
export type Quantity = number;
export type Capacity = number;

// Zod schemas for validation
// Integers beyond 2^53 cannot be summed exactly, so every count must be safe.
export const ItemIdSchema = z.number().int().min(0).safe();
export const ItemNameSchema = z.string().trim().min(1);
export const QuantitySchema = z.number().int().min(0).safe();
export const CapacitySchema = z.number().int().safe();

// Catalog item
export interface Item {
  readonly id: ItemId;
  readonly name: string;
}

export const ItemSchema = z.object({
  id: ItemIdSchema,
  name: ItemNameSchema,
});

/**
 * One classified line of the inventories input. Order is significant:
 * a marker opens a new inventory and every record up to the next marker
 * belongs to it.
 */
export type ClassifiedLine = InventoryMarkerLine | StackRequestLine | OtherLine;

export interface InventoryMarkerLine {
  readonly kind: 'inventory';
  readonly capacity: Capacity;
}

export interface StackRequestLine {
  readonly kind: 'stack';
  readonly itemId: ItemId;
  readonly quantity: Quantity;
}

export interface OtherLine {
  readonly kind: 'other';
  readonly text: string;
}

export const InventoryMarkerLineSchema = z.object({
  kind: z.literal('inventory'),
  capacity: CapacitySchema,
});

export const StackRequestLineSchema = z.object({
  kind: z.literal('stack'),
  itemId: ItemIdSchema,
  quantity: QuantitySchema,
});

export const OtherLineSchema = z.object({
  kind: z.literal('other'),
  text: z.string(),
});

export const ClassifiedLineSchema = z.discriminatedUnion('kind', [
  InventoryMarkerLineSchema,
  StackRequestLineSchema,
  OtherLineSchema,
]);

export const isInventoryMarker = (line: ClassifiedLine): line is InventoryMarkerLine =>
  line.kind === 'inventory';

/**
 * Capacity units taken by a stack of `quantity` copies of `item`.
 */
export type StackSizer = (item: Item, quantity: Quantity) => number;

export type StackSizePolicy = 'quantity' | 'slot';
export const STACK_SIZE_POLICIES: readonly StackSizePolicy[] = ['quantity', 'slot'];

export type UnresolvedPolicy = 'drop' | 'report';
export const UNRESOLVED_POLICIES: readonly UnresolvedPolicy[] = ['drop', 'report'];

// Audit log
export type DecisionOutcome = 'Stored' | 'Discarded';
export type LogEntry = string;

// API Request DTOs
export interface SimulationRequest {
  items: string;
  inventories: string;
}

export const SimulationRequestSchema = z.object({
  items: z.string(),
  inventories: z.string(),
});

// API Response DTOs
export interface StoredStackView {
  itemId: ItemId;
  name: string;
  quantity: Quantity;
  size: number;
}

export interface InventoryView {
  capacity: Capacity;
  occupied: number;
  log: LogEntry[];
  stacks: StoredStackView[];
}

export interface InventorySummary {
  capacity: Capacity;
  occupied: number;
  remaining: number;
  stored: number;
  discarded: number;
  unresolved: number;
}
