import { getTotalCosts } from '../../chain_calc/processSimulator';
import { createRecipe } from '../../chain_calc/recipeCatalog';
import { createItem } from '../../chain_calc/item';
import { setSimulationTraceEnabled } from '../../utils/config';
import logger from '../../utils/logger';
import { FakeRecipeLookup, createWoodCatalog } from '../testHelpers';

describe('unit: process simulator', () => {
    let recipes: FakeRecipeLookup;

    beforeEach(() => {
        recipes = new FakeRecipeLookup();
    });

    test('item without recipe is a raw material', () => {
        const result = getTotalCosts(recipes, createItem('Wood Plank', 5));
        expect(result.totalCosts).toEqual([createItem('Wood Plank', 5)]);
        expect(result.excessItems).toEqual([]);
        expect(result.intermediateHistory).toEqual([]);
    });

    test('single recipe', () => {
        recipes.add(createRecipe(createItem('Wood Plank', 1), [createItem('Wood', 2)]));
        const result = getTotalCosts(recipes, createItem('Wood Plank', 5));
        expect(result.totalCosts).toEqual([createItem('Wood', 10)]);
        expect(result.excessItems).toEqual([]);
        expect(result.intermediateHistory).toEqual([createItem('Wood Plank', 5)]);
    });

    test('chained recipes', () => {
        recipes
            .add(createRecipe(createItem('Wood Plank', 1), [createItem('Wood', 2)]))
            .add(createRecipe(createItem('Wood', 1), [createItem('Tree', 1)]));
        const result = getTotalCosts(recipes, createItem('Wood Plank', 5));
        expect(result.totalCosts).toEqual([createItem('Tree', 10)]);
        expect(result.excessItems).toEqual([]);
        expect(result.intermediateHistory).toEqual([createItem('Wood Plank', 5), createItem('Wood', 10)]);
    });

    test('byproducts are scaled and banked as excess', () => {
        recipes.add(createRecipe(createItem('Wood Plank', 1), [createItem('Wood', 2)], [createItem('Sawdust', 1)]));
        const result = getTotalCosts(recipes, createItem('Wood Plank', 5));
        expect(result.totalCosts).toEqual([createItem('Wood', 10)]);
        expect(result.excessItems).toEqual([createItem('Sawdust', 5)]);
        expect(result.intermediateHistory).toEqual([createItem('Wood Plank', 5)]);
    });

    test('batch overproduction is banked as excess', () => {
        recipes.add(createRecipe(createItem('Wood Plank', 4), [createItem('Wood', 1)]));
        const result = getTotalCosts(recipes, createItem('Wood Plank', 5));
        expect(result.totalCosts).toEqual([createItem('Wood', 2)]);
        expect(result.excessItems).toEqual([createItem('Wood Plank', 3)]);
        expect(result.intermediateHistory).toEqual([createItem('Wood Plank', 5)]);
    });

    test('duplicate requested names are merged', () => {
        recipes.add(createRecipe(createItem('Wood Plank', 4), [createItem('Log', 1)]));
        const result = getTotalCosts(recipes, [createItem('Wood Plank', 2), createItem('Log', 1), createItem('Wood Plank', 3)]);
        expect(result.totalCosts).toEqual([createItem('Log', 3)]);
        expect(result.excessItems).toEqual([createItem('Wood Plank', 3)]);
        expect(result.intermediateHistory).toEqual([createItem('Wood Plank', 5)]);
    });

    test('later demand for a processed item runs a second pass', () => {
        const result = getTotalCosts(createWoodCatalog(), createItem('Wooden Pickaxe'));
        expect(result.totalCosts).toEqual([createItem('Log', 2)]);
        expect(result.excessItems).toEqual([createItem('Wood Plank', 3), createItem('Stick', 2)]);
        expect(result.intermediateHistory).toEqual([
            createItem('Wooden Pickaxe', 1),
            createItem('Wood Plank', 5),
            createItem('Stick', 2)
        ]);
    });

    test('banked surplus covers whole batches of later demand', () => {
        recipes
            .add(createRecipe(createItem('Wood Plank', 4), [createItem('Log', 1)]))
            .add(createRecipe(createItem('Sawmill Run', 1), [createItem('Ore', 1)], [createItem('Wood Plank', 5)]));
        const result = getTotalCosts(recipes, [createItem('Wood Plank', 6), createItem('Sawmill Run', 1)]);
        // 4 of the 5 banked planks cover one batch; the remaining 2 planks need a new batch
        expect(result.totalCosts).toEqual([createItem('Ore', 1), createItem('Log', 1)]);
        expect(result.excessItems).toEqual([createItem('Wood Plank', 3)]);
        expect(result.intermediateHistory).toEqual([createItem('Sawmill Run', 1), createItem('Wood Plank', 2)]);
    });

    test('fully covered demand keeps zero entries', () => {
        recipes
            .add(createRecipe(createItem('Wood Plank', 4), [createItem('Log', 1)]))
            .add(createRecipe(createItem('Sawmill Run', 1), [createItem('Ore', 1)], [createItem('Wood Plank', 4)]));
        const result = getTotalCosts(recipes, [createItem('Wood Plank', 4), createItem('Sawmill Run', 1)]);
        expect(result.totalCosts).toEqual([createItem('Ore', 1), createItem('Log', 0)]);
        expect(result.excessItems).toEqual([createItem('Wood Plank', 0)]);
        expect(result.intermediateHistory).toEqual([createItem('Sawmill Run', 1), createItem('Wood Plank', 0)]);
    });

    test('surplus smaller than a batch is not used', () => {
        recipes.add(createRecipe(createItem('Wood Plank', 4), [createItem('Log', 1)]));
        recipes.add(createRecipe(createItem('Crate', 1), [createItem('Wood Plank', 4)]));
        const result = getTotalCosts(recipes, [createItem('Crate', 1), createItem('Wood Plank', 5)]);
        // planks pass 1: 5 -> 8 (3 banked); crate pass adds 4 more planks, 3 < batch 4
        expect(result.totalCosts).toEqual([createItem('Log', 3)]);
        expect(result.excessItems).toEqual([createItem('Wood Plank', 3)]);
        expect(result.intermediateHistory).toEqual([
            createItem('Wood Plank', 9),
            createItem('Crate', 1)
        ]);
    });

    test('pools are fresh for every call', () => {
        const catalog = createWoodCatalog();
        const first = getTotalCosts(catalog, createItem('Wooden Pickaxe', 2));
        const second = getTotalCosts(catalog, createItem('Wooden Pickaxe', 2));
        expect(second).toEqual(first);
    });

    test('history plus leftover equals what was produced', () => {
        const result = getTotalCosts(createWoodCatalog(), createItem('Wooden Pickaxe'));
        const excess = new Map(result.excessItems.map(i => [i.name, i.quantity]));
        const history = new Map(result.intermediateHistory.map(i => [i.name, i.quantity]));
        // planks: two passes of one batch each; sticks: one batch
        expect((history.get('Wood Plank') ?? 0) + (excess.get('Wood Plank') ?? 0)).toBe(8);
        expect((history.get('Stick') ?? 0) + (excess.get('Stick') ?? 0)).toBe(4);
        expect((history.get('Wooden Pickaxe') ?? 0) + (excess.get('Wooden Pickaxe') ?? 0)).toBe(1);
    });

    test('does not touch the requested items', () => {
        recipes.add(createRecipe(createItem('Wood Plank', 4), [createItem('Log', 1)]));
        const requested = [createItem('Wood Plank', 5)];
        getTotalCosts(recipes, requested);
        expect(requested).toEqual([createItem('Wood Plank', 5)]);
    });
});

describe('unit: process simulator tracing', () => {
    afterEach(() => {
        setSimulationTraceEnabled(false);
        logger.setLevel('SILENT');
        jest.restoreAllMocks();
    });

    test('logs each pass at debug level when tracing is on', () => {
        const spy = jest.spyOn(console, 'log').mockImplementation(() => {});
        logger.setLevel('DEBUG');
        setSimulationTraceEnabled(true);

        const recipes = new FakeRecipeLookup().add(createRecipe(createItem('Wood Plank', 4), [createItem('Log', 1)]));
        getTotalCosts(recipes, createItem('Wood Plank', 5));

        const messages = spy.mock.calls.map(args => String(args[1]));
        expect(messages).toEqual([
            'process Wood Plank: demand 5, from surplus 0, 2x batch of 4 -> 8',
            'raw Log x2'
        ]);
    });

    test('stays quiet when tracing is off', () => {
        const spy = jest.spyOn(console, 'log').mockImplementation(() => {});
        logger.setLevel('DEBUG');

        const recipes = new FakeRecipeLookup().add(createRecipe(createItem('Wood Plank', 4), [createItem('Log', 1)]));
        getTotalCosts(recipes, createItem('Wood Plank', 5));

        expect(spy).not.toHaveBeenCalled();
    });
});
