import { subDays } from "date-fns";
import { getKeyIngredient, tallyIngredients } from "../data/ingredients";
import type { MealType, Recipe } from "../data/query";
import { getRecipesByMealType as recipesForMealType } from "../data/query";
import { createRecipeCache, type RecipeCache } from "../data/recipeCache";
import type { RecipeCatalog } from "../data/recipeCatalog";
import { RECIPE_DEFAULTS, type RecipeDefaults } from "../data/recipeDefaults";
import type { RecipeHistoryEntry, RecipeHistoryStore } from "../data/recipeHistory";
import { toRecipeCard } from "../data/viewModel";
import { describeError, RecipeHistoryError } from "../lib/errors";
import { logger } from "../lib/logger";
import type { FunctionalPhase } from "./phaseModels";
import type { MealRecommendation, RecipeRecommendations } from "./planTypes";

/**
 * Picks up to `count` recipes spread across key ingredients. Recipes are
 * grouped by their first significant ingredient; each round takes the
 * quickest remaining recipe of every group, so a group contributes a second
 * recipe only once every other group is exhausted.
 */
export const selectDiverseRecipes = (candidates: Recipe[], count: number): Recipe[] => {
  const groups = new Map<string, Recipe[]>();
  candidates.forEach((recipe) => {
    const key = getKeyIngredient(recipe.ingredients) || recipe.id;
    groups.set(key, [...(groups.get(key) ?? []), recipe]);
  });

  const queues = Array.from(groups.values()).map((recipes) =>
    [...recipes].sort((left, right) => left.prepTime - right.prepTime)
  );

  const picks: Recipe[] = [];
  let round = 0;
  while (picks.length < count) {
    const roundPicks = queues.flatMap((queue) => (queue[round] ? [queue[round]] : []));
    if (!roundPicks.length) break;
    picks.push(...roundPicks.slice(0, count - picks.length));
    round += 1;
  }
  return picks;
};

export type RecipeServiceOptions = {
  catalog: RecipeCatalog;
  history?: RecipeHistoryStore;
  cache?: RecipeCache;
  config?: RecipeDefaults;
  now?: () => Date;
};

export type RecommendationRequestOptions = {
  /** Write the picks to the user's history; off for recipes that will not be shown. */
  record?: boolean;
};

export interface RecipeService {
  getRecipesByMealType(phase: FunctionalPhase, mealType: MealType, userId?: string): Promise<Recipe[]>;
  getRecipeRecommendations(
    phase: FunctionalPhase,
    userId?: string,
    options?: RecommendationRequestOptions
  ): Promise<RecipeRecommendations>;
  saveRecipeHistory(userId: string, recipeId: string, mealType: MealType, phase: FunctionalPhase): Promise<void>;
  /** Records every recipe of `meals` as shown. Store failures are logged, not thrown. */
  recordRecommendations(userId: string, phase: FunctionalPhase, meals: MealRecommendation[]): Promise<void>;
}

export const createRecipeService = ({
  catalog,
  history,
  cache = createRecipeCache(),
  config = RECIPE_DEFAULTS,
  now = () => new Date(),
}: RecipeServiceOptions): RecipeService => {
  const loadRecipes = (phase: FunctionalPhase) => cache.load(phase, (target) => catalog.getRecipes(target));

  // recipeId -> most recent time it was shown inside the rotation window
  const recentlyShown = async (userId: string | undefined): Promise<Map<string, number>> => {
    const shown = new Map<string, number>();
    if (!userId || !history) return shown;

    let entries: RecipeHistoryEntry[];
    try {
      entries = await history.getRecent(userId, subDays(now(), config.rotationWindowDays));
    } catch (error) {
      throw new RecipeHistoryError("Recipe history could not be read", { cause: error });
    }

    entries.forEach((entry) => {
      shown.set(entry.recipeId, Math.max(shown.get(entry.recipeId) ?? 0, entry.shownAt.getTime()));
    });
    return shown;
  };

  const pickRecipes = async (
    phase: FunctionalPhase,
    mealType: MealType,
    shown: Map<string, number>,
    userId: string | undefined
  ): Promise<Recipe[]> => {
    const candidates = recipesForMealType(await loadRecipes(phase), mealType);
    if (!candidates.length) return [];

    const fresh = candidates.filter((recipe) => !shown.has(recipe.id));
    const picks = selectDiverseRecipes(fresh, config.recipesPerMealType);

    // Least recently shown first, so repetition cycles through the whole set.
    const backfill = candidates
      .filter((recipe) => shown.has(recipe.id))
      .sort((left, right) => (shown.get(left.id) ?? 0) - (shown.get(right.id) ?? 0))
      .slice(0, Math.max(0, config.recipesPerMealType - picks.length));

    logger.info(
      "LOG.RECIPE_ROTATION",
      { mealType, candidates: candidates.length, fresh: fresh.length, backfilled: backfill.length },
      { userId, phase }
    );
    return [...picks, ...backfill];
  };

  const getRecipesByMealType: RecipeService["getRecipesByMealType"] = async (phase, mealType, userId) =>
    pickRecipes(phase, mealType, await recentlyShown(userId), userId);

  const saveRecipeHistory: RecipeService["saveRecipeHistory"] = async (userId, recipeId, mealType, phase) => {
    if (!history) return;
    try {
      await history.recordShown({ userId, recipeId, mealType, phase, shownAt: now() });
    } catch (error) {
      throw new RecipeHistoryError(`Recipe history could not record ${recipeId}`, { cause: error });
    }
    logger.info("LOG.RECIPE_HISTORY_RECORDED", { recipeId, mealType }, { userId, phase });
  };

  const recordRecommendations: RecipeService["recordRecommendations"] = async (userId, phase, meals) => {
    try {
      for (const meal of meals) {
        for (const recipe of meal.recipes) {
          await saveRecipeHistory(userId, recipe.id, meal.mealType, phase);
        }
      }
    } catch (error) {
      logger.warn("LOG.HISTORY_UNAVAILABLE", describeError(error), { userId, phase });
    }
  };

  const getRecipeRecommendations: RecipeService["getRecipeRecommendations"] = async (
    phase,
    userId,
    { record = true } = {}
  ) => {
    const meals: MealRecommendation[] = [];
    const picked: Recipe[] = [];
    const shown = await recentlyShown(userId);

    for (const mealType of config.mealTypes) {
      const recipes = await pickRecipes(phase, mealType, shown, userId);
      if (!recipes.length) continue;
      meals.push({ mealType, recipes: recipes.map(toRecipeCard) });
      picked.push(...recipes);
      // Picks count as shown for the remaining meal types, newer than any stored entry.
      const pickedAt = now().getTime();
      recipes.forEach((recipe) => shown.set(recipe.id, pickedAt));
    }

    const selected = Array.from(new Map(picked.map((recipe) => [recipe.id, recipe])).values());
    const shoppingPreview = tallyIngredients(
      selected.map((recipe) => recipe.ingredients),
      config.shoppingPreviewSize
    );

    if (userId && record) {
      await recordRecommendations(userId, phase, meals);
    }

    return { meals, shoppingPreview, selected };
  };

  return { getRecipesByMealType, getRecipeRecommendations, saveRecipeHistory, recordRecommendations };
};
