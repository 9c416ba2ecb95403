/**
 * Type definitions for recipes, ingredient trees and simulation results
 */

/**
 * A named quantity of an item
 */
export interface Item {
  readonly name: string;
  readonly quantity: number;
}

/**
 * Turns one batch of ingredients into `mainProduct.quantity` units of the
 * main product, plus the byproducts of that batch
 */
export interface Recipe {
  readonly mainProduct: Item;
  readonly ingredients: readonly Item[];
  readonly byproducts: readonly Item[];
}

export type RecipeLookupResult =
  | { kind: 'found'; recipe: Recipe }
  | { kind: 'absent' };

/**
 * The only catalog operation the tree builder and the simulator need
 */
export interface RecipeLookup {
  lookup(name: string): RecipeLookupResult;
}

/**
 * One node of a per-branch ingredient breakdown
 */
export interface IngredientTreeNode {
  item: Item;
  /** Amount actually produced, rounded up to whole batches */
  actualQuantity: number;
  children: IngredientTreeNode[];
  /** Side output of producing this node; never fed back into the tree */
  byproducts: Item[];
}

export interface SimulationResult {
  /** Raw materials consumed, largest first */
  totalCosts: Item[];
  /** Surplus left at the end, largest first */
  excessItems: Item[];
  /** Amount processed per craftable item, in processing order */
  intermediateHistory: Item[];
}
