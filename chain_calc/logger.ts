import { IngredientTreeNode, Item, SimulationResult } from './types';
import { formatItem } from './item';
import { renderIngredientTree } from './ingredientTree';
import logger from '../utils/logger';

/**
 * Joins items as `A x1, B x2`, or `-` when there are none
 */
export function formatItemList(items: readonly Item[]): string {
  if (items.length === 0) return '-';
  return items.map(formatItem).join(', ');
}

/**
 * Logs the rendered tree, one line per node
 */
export function logIngredientTree(tree: IngredientTreeNode): void {
  for (const line of renderIngredientTree(tree).split('\n')) {
    logger.info(line);
  }
}

export function logSimulationResult(result: SimulationResult): void {
  logger.info(`Total costs: ${formatItemList(result.totalCosts)}`);
  logger.info(`Excess items: ${formatItemList(result.excessItems)}`);
  logger.info(`Intermediate history: ${formatItemList(result.intermediateHistory)}`);
}
