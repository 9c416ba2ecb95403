import { Item, Recipe, RecipeLookup, RecipeLookupResult } from './types';
import { createItem } from './item';

const ABSENT: RecipeLookupResult = { kind: 'absent' };

/**
 * Builds a recipe. Ingredients and byproducts are copied, so callers may
 * reuse their arrays.
 */
export function createRecipe(mainProduct: Item, ingredients: readonly Item[], byproducts: readonly Item[] = []): Recipe {
  return {
    mainProduct: createItem(mainProduct.name, mainProduct.quantity),
    ingredients: ingredients.map(i => createItem(i.name, i.quantity)),
    byproducts: byproducts.map(b => createItem(b.name, b.quantity))
  };
}

/**
 * Name-keyed recipe table. At most one recipe per output name; the last
 * registration for a name wins.
 *
 * @example
 * ```typescript
 * const catalog = new RecipeCatalog([
 *   createRecipe(createItem('Wood Plank', 4), [createItem('Log')]),
 *   createRecipe(createItem('Stick', 4), [createItem('Wood Plank', 2)])
 * ]);
 * catalog.getRecipe('Stick')?.mainProduct.quantity // 4
 * ```
 */
export class RecipeCatalog implements RecipeLookup {
  private recipes = new Map<string, Recipe>();

  constructor(recipes: readonly Recipe[] = []) {
    this.addRecipes(recipes);
  }

  addRecipe(mainProduct: Item, ingredients: readonly Item[], byproducts: readonly Item[] = []): this {
    if (!Number.isInteger(mainProduct.quantity) || mainProduct.quantity < 1) {
      throw new Error(`Recipe for ${mainProduct.name} has invalid batch size ${mainProduct.quantity}`);
    }
    this.recipes.set(mainProduct.name, createRecipe(mainProduct, ingredients, byproducts));
    return this;
  }

  addRecipes(recipes: readonly Recipe[]): this {
    for (const recipe of recipes) {
      this.addRecipe(recipe.mainProduct, recipe.ingredients, recipe.byproducts);
    }
    return this;
  }

  lookup(name: string): RecipeLookupResult {
    const recipe = this.recipes.get(name);
    return recipe ? { kind: 'found', recipe } : ABSENT;
  }

  getRecipe(name: string): Recipe | undefined {
    return this.recipes.get(name);
  }

  has(name: string): boolean {
    return this.recipes.has(name);
  }

  get size(): number {
    return this.recipes.size;
  }

  names(): string[] {
    return Array.from(this.recipes.keys());
  }
}
