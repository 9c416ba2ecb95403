/**
 * Global configuration for catalog loading and simulation tracing
 */

export type RecipeChoice = 'first' | 'last';

let defaultMinecraftVersion = '1.20.1';
let recipeChoice: RecipeChoice = 'first';
let simulationTraceEnabled = false;

export function setDefaultMinecraftVersion(v: string): void {
  if (/^\d+\.\d+(\.\d+)?$/.test(v)) {
    defaultMinecraftVersion = v;
  }
}

export function getDefaultMinecraftVersion(): string {
  return defaultMinecraftVersion;
}

export function setRecipeChoice(v: string): void {
  if (v === 'first' || v === 'last') {
    recipeChoice = v;
  }
}

export function getRecipeChoice(): RecipeChoice {
  return recipeChoice;
}

export function setSimulationTraceEnabled(v: boolean): void {
  simulationTraceEnabled = !!v;
}

export function getSimulationTraceEnabled(): boolean {
  return !!simulationTraceEnabled;
}

export interface RuntimeConfig {
  logLevel: string;
  minecraftVersion: string | null;
  recipesFile: string | null;
}

/**
 * Reads the CLI runtime settings from the environment
 */
export function getRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return {
    logLevel: env.LOG_LEVEL || 'INFO',
    minecraftVersion: env.CHAIN_MC_VERSION || null,
    recipesFile: env.CHAIN_RECIPES_FILE || null
  };
}
