import { createItem, formatItem, itemsEqual, scaleItem } from '../../chain_calc/item';

describe('unit: item', () => {
    test('createItem defaults to one unit', () => {
        expect(createItem('Wood Plank')).toEqual({ name: 'Wood Plank', quantity: 1 });
        expect(createItem('Wood Plank', 4)).toEqual({ name: 'Wood Plank', quantity: 4 });
    });

    test('formatItem renders name and quantity', () => {
        expect(formatItem(createItem('Wood Plank'))).toBe('Wood Plank x1');
        expect(formatItem(createItem('Wood Plank', 4))).toBe('Wood Plank x4');
    });

    test('itemsEqual compares name and quantity', () => {
        expect(itemsEqual(createItem('Log', 2), createItem('Log', 2))).toBe(true);
        expect(itemsEqual(createItem('Log', 2), createItem('Log', 3))).toBe(false);
        expect(itemsEqual(createItem('Log', 2), createItem('log', 2))).toBe(false);
    });

    test('scaleItem multiplies the quantity into a new item', () => {
        const base = createItem('Sawdust', 2);
        expect(scaleItem(base, 3)).toEqual({ name: 'Sawdust', quantity: 6 });
        expect(base.quantity).toBe(2);
    });
});
