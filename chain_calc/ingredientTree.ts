import { IngredientTreeNode, Item, RecipeLookup } from './types';
import { createItem, formatItem, scaleItem } from './item';
import { processTimes, requiredQuantity } from './batchMath';

/**
 * Builds the per-branch ingredient breakdown for an item
 *
 * Every occurrence of an item is resolved on its own, so shared
 * intermediates are rounded up to whole batches separately in each branch.
 * Byproducts are recorded on the node that produces them and take no part
 * in the computation.
 *
 * The recipe graph must be acyclic; a cycle recurses until the stack runs out.
 *
 * @example
 * ```typescript
 * const tree = buildIngredientTree(createItem('Wooden Pickaxe'), catalog);
 * tree.children.map(c => c.item.name) // ['Stick', 'Wood Plank']
 * ```
 */
export function buildIngredientTree(item: Item, catalog: RecipeLookup): IngredientTreeNode {
  const found = catalog.lookup(item.name);

  if (found.kind === 'absent') {
    return {
      item: createItem(item.name, item.quantity),
      actualQuantity: item.quantity,
      children: [],
      byproducts: []
    };
  }

  const { recipe } = found;
  const batchSize = recipe.mainProduct.quantity;
  const times = processTimes(item.quantity, batchSize);

  return {
    item: createItem(item.name, item.quantity),
    actualQuantity: requiredQuantity(item.quantity, batchSize),
    children: recipe.ingredients.map(ingredient =>
      buildIngredientTree(scaleItem(ingredient, times), catalog)
    ),
    byproducts: recipe.byproducts.map(byproduct => scaleItem(byproduct, times))
  };
}

function formatNodeLine(node: IngredientTreeNode): string {
  let line = formatItem(node.item);

  if (node.actualQuantity !== node.item.quantity) {
    line += ` (+${node.actualQuantity - node.item.quantity})`;
  }

  if (node.byproducts.length > 0) {
    line += ` [${node.byproducts.map(formatItem).join(' + ')}]`;
  }

  return line;
}

function renderChildren(node: IngredientTreeNode, prefix: string, lines: string[]): void {
  node.children.forEach((child, idx) => {
    const isLast = idx === node.children.length - 1;
    lines.push(`${prefix}${isLast ? '\\-' : '|-'}${formatNodeLine(child)}`);
    renderChildren(child, prefix + (isLast ? '  ' : '| '), lines);
  });
}

/**
 * Renders a tree as text, one node per line, depth-first
 *
 * @example
 * ```
 * Wooden Pickaxe x1
 * |-Stick x2 (+2)
 * | \-Wood Plank x2 (+2)
 * |   \-Log x1
 * \-Wood Plank x3 (+1)
 *   \-Log x1
 * ```
 */
export function renderIngredientTree(root: IngredientTreeNode): string {
  const lines = [formatNodeLine(root)];
  renderChildren(root, '', lines);
  return lines.join('\n');
}
