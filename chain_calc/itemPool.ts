import { Item } from './types';
import { createItem } from './item';

/**
 * Name-keyed quantity accumulator that remembers the order in which names
 * were first added. Entries stay even when their quantity drops to zero.
 */
export class ItemPool {
  private quantities = new Map<string, number>();

  add(name: string, quantity: number): void {
    this.quantities.set(name, (this.quantities.get(name) ?? 0) + quantity);
  }

  /**
   * Removes up to `quantity` units; never goes below zero
   * @returns the amount actually removed
   */
  take(name: string, quantity: number): number {
    const current = this.quantities.get(name);
    if (current === undefined) return 0;
    const taken = Math.min(current, quantity);
    this.quantities.set(name, current - taken);
    return taken;
  }

  get(name: string): number {
    return this.quantities.get(name) ?? 0;
  }

  /**
   * Items in first-insertion order
   */
  toItems(): Item[] {
    return Array.from(this.quantities, ([name, quantity]) => createItem(name, quantity));
  }

  /**
   * Items by quantity, largest first; equal quantities keep first-insertion order
   */
  toSortedItems(): Item[] {
    return this.toItems().sort((a, b) => b.quantity - a.quantity);
  }
}
