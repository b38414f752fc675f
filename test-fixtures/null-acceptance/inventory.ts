/**
 * Classes checked by the integration tests. Their declarations are read
 * from this file and their runtime counterparts are imported from it.
 */

import { UnsupportedOperationError } from '../../src/checker/errors.js';
import { requireNonNull } from '../../src/checker/preconditions.js';

export class Item {
  readonly sku: string;

  constructor(sku: string) {
    this.sku = requireNonNull(sku, 'sku');
  }
}

export class Inventory {
  private readonly items = new Map<string, Item>();
  private label: string;
  private readonly owner: string | undefined;

  constructor(name: string, owner?: string) {
    this.label = requireNonNull(name, 'name');
    this.owner = owner;
  }

  static fromItems(items: readonly Item[], label: string): Inventory {
    requireNonNull(items, 'items');
    const inventory = new Inventory(requireNonNull(label, 'label'));
    for (const item of items) {
      inventory.add(item, 1);
    }
    return inventory;
  }

  add(item: Item, quantity: number): this {
    requireNonNull(item, 'item');
    if (quantity > 0) {
      this.items.set(item.sku, item);
    }
    return this;
  }

  /**
   * @nullable fallback returned when the sku is unknown
   */
  find(sku: string, fallback: Item): Item {
    return this.items.get(requireNonNull(sku, 'sku')) ?? fallback;
  }

  rename(name: string | null): void {
    this.label = name ?? `${this.owner ?? 'unowned'} inventory`;
  }

  tag(label: string, ...extra: string[]): string {
    return [requireNonNull(label, 'label'), ...extra].join(',');
  }

  remove(_sku: string): void {
    throw new UnsupportedOperationError('remove');
  }

  onChange(listener: (item: Item) => void): void {
    requireNonNull(listener, 'listener');
  }

  protected audit(item: Item): number {
    return this.items.has(item?.sku) ? 1 : 0;
  }

  /** @internal */
  reindex(item: Item): void {
    this.items.delete(item?.sku);
  }

  private compact(item: Item): void {
    this.items.delete(item.sku);
  }
}

export class LeakyInventory {
  readonly name: string;

  constructor(name: string) {
    this.name = name;
  }

  static from(source: Inventory): LeakyInventory {
    return new LeakyInventory(String(source));
  }

  merge(other: Inventory): void {
    if (!(other instanceof Inventory)) {
      throw new RangeError('not an inventory');
    }
  }
}

export abstract class Store {
  constructor(name: string) {
    requireNonNull(name, 'name');
  }

  abstract open(name: string): void;
}

export class MemoryStore extends Store {
  open(name: string): void {
    requireNonNull(name, 'name');
  }
}
