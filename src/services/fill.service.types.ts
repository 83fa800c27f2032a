import { Catalog } from '../core/catalog';
import { Inventory, ItemStack } from '../core/inventory';
import {
  InventorySummary,
  ItemId,
  LogEntry,
  Quantity,
  SimulationRequest,
  StackSizer,
  UnresolvedPolicy,
} from '../core/types';

// Resolver result for one stack request
export type StackResolution =
  | { readonly status: 'resolved'; readonly stack: ItemStack }
  | { readonly status: 'unresolved'; readonly itemId: ItemId; readonly quantity: Quantity };

export type UnresolvedRequest = Extract<StackResolution, { status: 'unresolved' }>;

// One inventory with its audit log, in marker order
export interface LoggedInventory {
  log: LogEntry[];
  inventory: Inventory;
  discarded: ItemStack[];
  unresolved: UnresolvedRequest[];
}

export interface ProcessOptions {
  sizer?: StackSizer;
  unresolvedPolicy?: UnresolvedPolicy;
}

export interface FillRunInput extends SimulationRequest {
  sources?: {
    items?: string;
    inventories?: string;
  };
}

export interface FillRunResult {
  catalog: Catalog;
  results: LoggedInventory[];
  report: string;
  summary: InventorySummary[];
}

export interface FillService {
  run(input: FillRunInput, options?: ProcessOptions): FillRunResult;
  runFiles(itemsPath: string, inventoriesPath: string, options?: ProcessOptions): Promise<FillRunResult>;
}
