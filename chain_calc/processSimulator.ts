import { Item, Recipe, RecipeLookup, SimulationResult } from './types';
import { processTimes, requiredQuantity } from './batchMath';
import { ProcessingQueue } from './processingQueue';
import { ItemPool } from './itemPool';
import { getSimulationTraceEnabled } from '../utils/config';
import logger from '../utils/logger';

const log = logger.child('processSimulator');

/**
 * Pools for one simulation run
 */
interface SimulationState {
  queue: ProcessingQueue;
  excessItems: ItemPool;
  totalCosts: ItemPool;
  intermediateHistory: ItemPool;
}

function createSimulationState(items: readonly Item[]): SimulationState {
  const state: SimulationState = {
    queue: new ProcessingQueue(),
    excessItems: new ItemPool(),
    totalCosts: new ItemPool(),
    intermediateHistory: new ItemPool()
  };
  for (const item of items) {
    state.queue.add(item.name, item.quantity);
  }
  return state;
}

/**
 * Offsets demand with banked surplus of the same item, whole batches only
 * @returns the demand left after the offset
 */
function consumeSurplus(state: SimulationState, name: string, quantity: number, batchSize: number): number {
  const available = Math.min(state.excessItems.get(name), quantity);
  const batches = Math.floor(available / batchSize);
  if (batches === 0) return quantity;
  return quantity - state.excessItems.take(name, batches * batchSize);
}

function processRecipe(state: SimulationState, name: string, demand: number, recipe: Recipe, trace: boolean): void {
  const batchSize = recipe.mainProduct.quantity;
  const quantity = consumeSurplus(state, name, demand, batchSize);
  const times = processTimes(quantity, batchSize);
  const actual = requiredQuantity(quantity, batchSize);

  for (const ingredient of recipe.ingredients) {
    state.queue.add(ingredient.name, ingredient.quantity * times);
  }

  for (const byproduct of recipe.byproducts) {
    state.excessItems.add(byproduct.name, byproduct.quantity * times);
  }

  state.intermediateHistory.add(name, quantity);

  if (actual > quantity) {
    state.excessItems.add(name, actual - quantity);
  }

  if (trace) {
    log.debug(`process ${name}: demand ${demand}, from surplus ${demand - quantity}, ${times}x batch of ${batchSize} -> ${actual}`);
  }
}

function isItemList(items: Item | readonly Item[]): items is readonly Item[] {
  return Array.isArray(items);
}

/**
 * Simulates producing the requested items and totals what it takes
 *
 * Demand for the same item is consolidated across the whole chain, and
 * overproduction from batch rounding or byproducts is banked to cover later
 * demand for that item. Items without a recipe are raw materials and end up
 * in `totalCosts`.
 *
 * Pending items are processed last-slotted first. A name gets its slot the
 * first time it is queued while not pending, so an item can be processed in
 * more than one pass when new demand for it shows up after it was handled.
 *
 * The recipe graph must be acyclic, otherwise the run does not terminate.
 *
 * @example
 * ```typescript
 * const catalog = new RecipeCatalog([createRecipe(createItem('Wood Plank', 4), [createItem('Log')])]);
 * getTotalCosts(catalog, createItem('Wood Plank', 5));
 * // totalCosts: [Log x2], excessItems: [Wood Plank x3], intermediateHistory: [Wood Plank x5]
 * ```
 */
export function getTotalCosts(catalog: RecipeLookup, items: Item | readonly Item[]): SimulationResult {
  const requested = isItemList(items) ? items : [items];
  const state = createSimulationState(requested);
  const trace = getSimulationTraceEnabled();

  while (!state.queue.isEmpty()) {
    const next = state.queue.pop();
    if (next === undefined) break;
    const found = catalog.lookup(next.name);

    if (found.kind === 'absent') {
      state.totalCosts.add(next.name, next.quantity);
      if (trace) log.debug(`raw ${next.name} x${next.quantity}`);
      continue;
    }

    processRecipe(state, next.name, next.quantity, found.recipe, trace);
  }

  return {
    totalCosts: state.totalCosts.toSortedItems(),
    excessItems: state.excessItems.toSortedItems(),
    intermediateHistory: state.intermediateHistory.toItems()
  };
}
