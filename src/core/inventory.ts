import { Capacity, Item, Quantity, StackSizePolicy, StackSizer } from './types';

// Built-in stack size policies
export const quantitySizer: StackSizer = (_item, quantity) => quantity;
export const slotSizer: StackSizer = () => 1;

const SIZERS: Record<StackSizePolicy, StackSizer> = {
  quantity: quantitySizer,
  slot: slotSizer,
};

export function sizerFor(policy: StackSizePolicy): StackSizer {
  return SIZERS[policy];
}

/**
 * A request to store `quantity` of one catalog item as a single indivisible unit.
 * Holds the catalog's own Item reference.
 */
export class ItemStack {
  constructor(
    readonly item: Item,
    readonly quantity: Quantity,
    private readonly sizer: StackSizer = quantitySizer
  ) {}

  size(): number {
    return this.sizer(this.item, this.quantity);
  }
}

const pad = (value: number, width: number): string => String(value).padStart(width);

/**
 * Capacity-bounded container. Capacity is fixed at construction and
 * occupancy only grows.
 */
export class Inventory {
  private readonly stored: ItemStack[] = [];
  private occupied = 0;

  constructor(readonly capacity: Capacity) {}

  /**
   * Store the whole stack if it fits, otherwise leave the inventory untouched.
   */
  addItems(stack: ItemStack): boolean {
    const incoming = stack.size();

    if (!Number.isFinite(incoming) || incoming < 0) {
      return false;
    }

    const total = this.occupied + incoming;
    if (Number.isInteger(incoming) && !Number.isSafeInteger(total)) {
      return false;
    }

    // Written as a negated `<=` so a NaN capacity rejects.
    if (!(total <= this.capacity)) {
      return false;
    }

    this.stored.push(stack);
    this.occupied = total;
    return true;
  }

  get occupancy(): number {
    return this.occupied;
  }

  get remaining(): number {
    return Math.max(0, this.capacity - this.occupied);
  }

  get stacks(): readonly ItemStack[] {
    return [...this.stored];
  }

  toString(): string {
    const lines = [` -Used ${pad(this.occupied, 2)} of ${pad(this.capacity, 2)} slots`];
    for (const stack of this.stored) {
      lines.push(`  (${pad(stack.size(), 2)}) ${stack.item.name}`);
    }
    return lines.join('\n');
  }
}
