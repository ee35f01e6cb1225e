import type { FunctionalPhase } from "../planner/phaseModels";
import type { Recipe } from "./query";
import { buildRecipeIndex, type RecipeIndex } from "./query";

export type RecipeLoader = (phase: FunctionalPhase) => Promise<Recipe[]>;

export interface RecipeCache {
  load(phase: FunctionalPhase, loader: RecipeLoader): Promise<RecipeIndex>;
  has(phase: FunctionalPhase): boolean;
  clear(): void;
}

/**
 * Per-phase cache of recipe load promises, owned by whoever composes the
 * recipe service. Concurrent loads of one phase share a single promise; a
 * rejected load is dropped so the next call starts a fresh one.
 */
export const createRecipeCache = (): RecipeCache => {
  const loads = new Map<FunctionalPhase, Promise<RecipeIndex>>();

  return {
    load: (phase, loader) => {
      const pending = loads.get(phase);
      if (pending) return pending;

      const loadPromise: Promise<RecipeIndex> = loader(phase).then(buildRecipeIndex, (error: unknown) => {
        if (loads.get(phase) === loadPromise) {
          loads.delete(phase);
        }
        throw error;
      });
      loads.set(phase, loadPromise);
      return loadPromise;
    },
    has: (phase) => loads.has(phase),
    clear: () => loads.clear(),
  };
};
