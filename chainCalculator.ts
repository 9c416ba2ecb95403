#!/usr/bin/env node
import * as path from 'path';
import {
  Item,
  RecipeLookup,
  buildIngredientTree,
  computeTreeMaxDepth,
  createItem,
  getTotalCosts,
  logIngredientTree,
  logSimulationResult
} from './chain_calc';
import { loadCatalogFromFile } from './catalog_sources/jsonCatalog';
import { loadMinecraftCatalog } from './catalog_sources/minecraftCatalog';
import { getRuntimeConfig, setSimulationTraceEnabled } from './utils/config';
import logger from './utils/logger';

const DEFAULT_RECIPES_FILE = path.join('data', 'example_recipes.json');

export interface CalculatorArgs {
  targets: Item[];
  recipesFile: string | null;
  minecraftVersion: string | null;
  trace: boolean;
}

/**
 * Parses a target such as `Cake:5` or `Wooden Pickaxe` (one unit)
 */
export function parseTarget(arg: string): Item {
  const idx = arg.lastIndexOf(':');
  if (idx === -1) return createItem(arg);

  const name = arg.slice(0, idx);
  const count = Number(arg.slice(idx + 1));
  if (!name || !Number.isInteger(count) || count < 0) {
    throw new Error(`Invalid target "${arg}", expected <item>[:<count>]`);
  }
  return createItem(name, count);
}

/**
 * Usage: chainCalculator <item>[:<count>] ... [--recipes <file>] [--mc <version>] [--trace]
 */
export function parseArgs(argv: string[]): CalculatorArgs {
  const args: CalculatorArgs = { targets: [], recipesFile: null, minecraftVersion: null, trace: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--recipes' || arg === '--mc') {
      const value = argv[i + 1];
      if (value === undefined) throw new Error(`Missing value for ${arg}`);
      if (arg === '--recipes') args.recipesFile = value;
      else args.minecraftVersion = value;
      i++;
    } else if (arg === '--trace') {
      args.trace = true;
    } else {
      args.targets.push(parseTarget(arg));
    }
  }

  if (args.targets.length === 0) {
    throw new Error('No target item given');
  }
  return args;
}

function loadCatalog(args: CalculatorArgs): RecipeLookup {
  if (args.minecraftVersion) {
    logger.info(`Loading recipes from minecraft-data ${args.minecraftVersion}`);
    return loadMinecraftCatalog(args.minecraftVersion);
  }
  const file = args.recipesFile || DEFAULT_RECIPES_FILE;
  logger.info(`Loading recipes from ${file}`);
  return loadCatalogFromFile(file);
}

/**
 * Prints the ingredient tree of every target, then the simulation over all
 * targets together
 */
export function runCalculator(args: CalculatorArgs): void {
  setSimulationTraceEnabled(args.trace);
  const catalog = loadCatalog(args);

  for (const target of args.targets) {
    const tree = buildIngredientTree(target, catalog);
    logger.info(`Ingredient tree for ${target.name} x${target.quantity} (depth ${computeTreeMaxDepth(tree)}):`);
    logIngredientTree(tree);
  }

  logSimulationResult(getTotalCosts(catalog, args.targets));
}

function main(): void {
  const config = getRuntimeConfig();
  logger.setLevel(config.logLevel);

  try {
    const args = parseArgs(process.argv.slice(2));
    args.recipesFile = args.recipesFile || config.recipesFile;
    args.minecraftVersion = args.minecraftVersion || config.minecraftVersion;
    runCalculator(args);
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main();
}
