/**
 * Batch arithmetic shared by the ingredient tree and the process simulator
 */

function assertBatchSize(batchSize: number): void {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new Error(`Invalid batch size: ${batchSize} (must be an integer >= 1)`);
  }
}

/**
 * Number of recipe runs needed to get at least `minQuantity` items
 *
 * @example
 * processTimes(3, 4) // 1
 * processTimes(5, 4) // 2
 * processTimes(0, 4) // 0
 */
export function processTimes(minQuantity: number, batchSize: number): number {
  assertBatchSize(batchSize);
  return Math.ceil(minQuantity / batchSize);
}

/**
 * Amount actually produced when `minQuantity` is requested: the smallest
 * multiple of `batchSize` not below it
 *
 * @example
 * requiredQuantity(3, 4) // 4
 * requiredQuantity(5, 4) // 8
 */
export function requiredQuantity(minQuantity: number, batchSize: number): number {
  return processTimes(minQuantity, batchSize) * batchSize;
}
