import { Item } from './types';

/**
 * Creates an item, one unit unless a quantity is given
 *
 * @example
 * createItem('Wood Plank') // { name: 'Wood Plank', quantity: 1 }
 */
export function createItem(name: string, quantity: number = 1): Item {
  return { name, quantity };
}

/**
 * @example
 * formatItem(createItem('Wood Plank', 4)) // 'Wood Plank x4'
 */
export function formatItem(item: Item): string {
  return `${item.name} x${item.quantity}`;
}

export function itemsEqual(a: Item, b: Item): boolean {
  return a.name === b.name && a.quantity === b.quantity;
}

export function scaleItem(item: Item, factor: number): Item {
  return createItem(item.name, item.quantity * factor);
}
