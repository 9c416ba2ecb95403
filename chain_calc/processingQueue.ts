import { Item } from './types';
import { createItem } from './item';

/**
 * Pending demand keyed by item name.
 *
 * A name takes a slot the first time it is added while not pending; further
 * adds only grow its quantity. `pop` returns the most recently slotted
 * pending name. Once popped, a name that is added again takes a new slot.
 */
export class ProcessingQueue {
  private slots: string[] = [];
  private pending = new Map<string, number>();

  add(name: string, quantity: number): void {
    const current = this.pending.get(name);
    if (current === undefined) {
      this.slots.push(name);
      this.pending.set(name, quantity);
      return;
    }
    this.pending.set(name, current + quantity);
  }

  pop(): Item | undefined {
    const name = this.slots.pop();
    if (name === undefined) return undefined;
    const quantity = this.pending.get(name) ?? 0;
    this.pending.delete(name);
    return createItem(name, quantity);
  }

  isEmpty(): boolean {
    return this.slots.length === 0;
  }
}
