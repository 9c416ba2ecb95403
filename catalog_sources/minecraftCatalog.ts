/**
 * Recipe catalogs from minecraft-data
 *
 * Turns a Minecraft version's crafting recipes into a RecipeCatalog keyed by
 * item name. Each item keeps a single recipe: the batch size is the recipe's
 * result count and the ingredients are the counted cells of the crafting
 * grid (or the shapeless ingredient list). Recipes that convert back and forth
 * with one of their ingredients are left out, so such items become raw
 * materials when no other recipe remains.
 */

import minecraftData from 'minecraft-data';
import { Item } from '../chain_calc/types';
import { RecipeCatalog } from '../chain_calc/recipeCatalog';
import { createItem } from '../chain_calc/item';
import { RecipeChoice, getDefaultMinecraftVersion, getRecipeChoice } from '../utils/config';
import logger from '../utils/logger';

/**
 * The parts of a minecraft-data instance the loader reads
 */
export interface RecipeSourceData {
  items: Record<number, { name: string } | undefined>;
  recipes: Record<number, readonly unknown[] | undefined>;
}

export interface MinecraftCatalogOptions {
  /** Which of an item's recipes to keep (default from config) */
  recipeChoice?: RecipeChoice;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRecipeSourceData(value: unknown): value is RecipeSourceData {
  return isRecord(value) && isRecord(value.items) && isRecord(value.recipes);
}

/**
 * Resolves minecraft-data for a version string (e.g. '1.20.1')
 */
export function resolveMinecraftData(version: string = getDefaultMinecraftVersion()): RecipeSourceData {
  let data: unknown;
  try {
    data = minecraftData(version);
  } catch (err) {
    throw new Error(`Could not resolve Minecraft data for version ${version}`, { cause: err });
  }
  if (!isRecipeSourceData(data)) {
    throw new Error(`Could not resolve Minecraft data for version ${version}`);
  }
  return data;
}

/**
 * Reads an item id from a recipe cell: a bare id, an `[id, metadata]` pair
 * or an `{ id }` object. Empty cells give null.
 */
function cellItemId(cell: unknown): number | null {
  if (typeof cell === 'number') return cell >= 0 ? cell : null;
  if (Array.isArray(cell)) return cellItemId(cell[0]);
  if (isRecord(cell)) return cellItemId(cell.id);
  return null;
}

function recipeResult(recipe: Record<string, unknown>): { id: number; count: number } | null {
  const { result } = recipe;
  if (isRecord(result)) {
    const id = cellItemId(result.id);
    const count = typeof result.count === 'number' ? result.count : 1;
    return id === null ? null : { id, count };
  }
  const id = cellItemId(result);
  return id === null ? null : { id, count: 1 };
}

function recipeCells(recipe: Record<string, unknown>): unknown[] {
  if (Array.isArray(recipe.ingredients)) return recipe.ingredients;
  if (Array.isArray(recipe.inShape)) {
    return recipe.inShape.flatMap((row: unknown) => (Array.isArray(row) ? row : []));
  }
  return [];
}

/**
 * Counts how many of each ingredient id a recipe uses, ids ascending
 */
export function getIngredientCounts(recipe: unknown): Map<number, number> {
  const counts = new Map<number, number>();
  if (!isRecord(recipe)) return counts;

  const ids = recipeCells(recipe)
    .map(cellItemId)
    .filter((id): id is number => id !== null)
    .sort((a, b) => a - b);
  for (const id of ids) {
    counts.set(id, (counts.get(id) || 0) + 1);
  }
  return counts;
}

export function getItemName(data: RecipeSourceData, id: number): string | undefined {
  return data.items[id]?.name;
}

function toIngredients(data: RecipeSourceData, counts: Map<number, number>): Item[] | null {
  const ingredients: Item[] = [];
  for (const [id, count] of counts) {
    const name = getItemName(data, id);
    if (!name) return null;
    ingredients.push(createItem(name, count));
  }
  return ingredients;
}

/**
 * True when one of `ingredientId`'s recipes uses `itemId`, i.e. the two items
 * convert into each other (ingot and block, ingot and nugget)
 */
export function hasCircularDependency(data: RecipeSourceData, itemId: number, ingredientId: number): boolean {
  const ingredientRecipes = data.recipes[ingredientId] || [];
  return ingredientRecipes.some(r => getIngredientCounts(r).has(itemId));
}

function formsConversionCycle(data: RecipeSourceData, itemId: number, recipe: unknown): boolean {
  for (const ingredientId of getIngredientCounts(recipe).keys()) {
    if (hasCircularDependency(data, itemId, ingredientId)) return true;
  }
  return false;
}

function pickRecipe(recipes: readonly unknown[], choice: RecipeChoice): unknown {
  return choice === 'last' ? recipes[recipes.length - 1] : recipes[0];
}

/**
 * Builds a catalog with one recipe per craftable item
 *
 * @example
 * ```typescript
 * const catalog = buildCatalogFromMinecraftData(resolveMinecraftData('1.20.1'));
 * catalog.getRecipe('stick')?.mainProduct.quantity // 4
 * ```
 */
export function buildCatalogFromMinecraftData(
  data: RecipeSourceData,
  options: MinecraftCatalogOptions = {}
): RecipeCatalog {
  const choice = options.recipeChoice ?? getRecipeChoice();
  const catalog = new RecipeCatalog();
  let skipped = 0;

  for (const key of Object.keys(data.recipes)) {
    const itemId = Number(key);
    const recipes = data.recipes[itemId];
    if (!recipes || recipes.length === 0) continue;

    const candidates = recipes.filter(r => !formsConversionCycle(data, itemId, r));
    if (candidates.length === 0) {
      logger.warn(`Skipping recipes for item id ${itemId}: every recipe forms a conversion cycle`);
      skipped++;
      continue;
    }

    const recipe = pickRecipe(candidates, choice);
    const result = isRecord(recipe) ? recipeResult(recipe) : null;
    const productName = result ? getItemName(data, result.id) : undefined;
    const ingredients = toIngredients(data, getIngredientCounts(recipe));

    if (!result || !productName || !ingredients || result.count < 1) {
      logger.warn(`Skipping recipe for item id ${itemId}: unknown item or malformed recipe`);
      skipped++;
      continue;
    }

    catalog.addRecipe(createItem(productName, result.count), ingredients);
  }

  logger.debug(`Loaded ${catalog.size} recipes from minecraft-data (${skipped} skipped)`);
  return catalog;
}

export function loadMinecraftCatalog(
  version: string = getDefaultMinecraftVersion(),
  options: MinecraftCatalogOptions = {}
): RecipeCatalog {
  return buildCatalogFromMinecraftData(resolveMinecraftData(version), options);
}
