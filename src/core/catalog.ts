import { Item, ItemId } from './types';

/**
 * Ordered, read-only registry of known items.
 *
 * Backed by an array rather than a keyed map: identifiers are assumed unique
 * but not enforced, and lookup returns the first (lowest index) match.
 */
export class Catalog implements Iterable<Item> {
  private readonly items: readonly Item[];

  constructor(items: readonly Item[]) {
    this.items = Object.freeze(items.map((item) => Object.freeze({ id: item.id, name: item.name })));
  }

  find(id: ItemId): Item | undefined {
    return this.items.find((item) => item.id === id);
  }

  list(): readonly Item[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<Item> {
    return this.items[Symbol.iterator]();
  }
}
