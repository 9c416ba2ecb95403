import { IngredientTreeNode } from './types';

/**
 * Computes the maximum depth of the tree
 * @returns 1 for a single leaf
 */
export function computeTreeMaxDepth(node: IngredientTreeNode): number {
  let maxChild = 0;
  for (const child of node.children) {
    const d = computeTreeMaxDepth(child);
    if (d > maxChild) maxChild = d;
  }
  return 1 + maxChild;
}

/**
 * Counts every node in the tree, the root included
 */
export function countTreeNodes(node: IngredientTreeNode): number {
  let total = 1;
  for (const child of node.children) {
    total += countTreeNodes(child);
  }
  return total;
}
