/**
 * Recipe catalogs from JSON recipe files
 *
 * A recipe file holds an array of entries:
 * ```json
 * [
 *   { "product": { "name": "Wood Plank", "quantity": 4 }, "ingredients": [{ "name": "Log" }] },
 *   { "product": { "name": "Cake" }, "ingredients": [{ "name": "Wheat", "quantity": 3 }], "byproducts": [{ "name": "Bucket", "quantity": 3 }] }
 * ]
 * ```
 * A missing quantity means 1.
 */

import * as fs from 'fs';
import { Item, Recipe } from '../chain_calc/types';
import { RecipeCatalog, createRecipe } from '../chain_calc/recipeCatalog';
import { createItem } from '../chain_calc/item';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseItem(value: unknown, where: string): Item {
  if (!isRecord(value)) {
    throw new Error(`${where}: expected an object with a name`);
  }
  const { name, quantity } = value;
  if (typeof name !== 'string' || name.length === 0) {
    throw new Error(`${where}: name must be a non-empty string`);
  }
  if (quantity === undefined) return createItem(name);
  if (typeof quantity !== 'number' || !Number.isInteger(quantity) || quantity < 0) {
    throw new Error(`${where}: quantity must be a non-negative integer`);
  }
  return createItem(name, quantity);
}

function parseItemList(value: unknown, where: string): Item[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new Error(`${where}: expected an array`);
  }
  return value.map((entry, idx) => parseItem(entry, `${where}[${idx}]`));
}

/**
 * Parses recipe entries from already decoded JSON
 */
export function parseRecipes(data: unknown): Recipe[] {
  if (!Array.isArray(data)) {
    throw new Error('Recipe file must contain an array of recipes');
  }
  return data.map((entry, idx) => {
    const where = `recipe #${idx}`;
    if (!isRecord(entry)) {
      throw new Error(`${where}: expected an object`);
    }
    const product = parseItem(entry.product, `${where} product`);
    if (product.quantity < 1) {
      throw new Error(`${where} product: batch size must be at least 1`);
    }
    return createRecipe(
      product,
      parseItemList(entry.ingredients, `${where} ingredients`),
      parseItemList(entry.byproducts, `${where} byproducts`)
    );
  });
}

export function loadCatalogFromJson(text: string): RecipeCatalog {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Recipe file is not valid JSON: ${reason}`);
  }
  return new RecipeCatalog(parseRecipes(data));
}

export function loadCatalogFromFile(filePath: string): RecipeCatalog {
  return loadCatalogFromJson(fs.readFileSync(filePath, 'utf8'));
}
