export * from './types';
export { createItem, formatItem, itemsEqual, scaleItem } from './item';
export { processTimes, requiredQuantity } from './batchMath';
export { RecipeCatalog, createRecipe } from './recipeCatalog';
export { buildIngredientTree, renderIngredientTree } from './ingredientTree';
export { computeTreeMaxDepth, countTreeNodes } from './metrics';
export { getTotalCosts } from './processSimulator';
export { formatItemList, logIngredientTree, logSimulationResult } from './logger';
