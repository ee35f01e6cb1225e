import { describeError } from "../lib/errors";
import { logger } from "../lib/logger";
import type { RecipeService } from "./diversity";
import { FUNCTIONAL_PHASE_DETAILS, titleCase } from "./guidance";
import type { FunctionalPhase } from "./phaseModels";
import type { MealRecommendation, PhaseRecommendations, RecommendFn } from "./planTypes";

const MEAL_ICONS: Record<string, string> = {
  breakfast: "🥞",
  lunch: "🥗",
  dinner: "🍽️",
  snack: "🍿",
};

export const mealIcon = (mealType: string): string => MEAL_ICONS[mealType] ?? "🍴";

export type RecommendationOptions = {
  recipeService?: RecipeService;
  userId?: string;
  /** Record the picked recipes in the user's history; defaults to true. */
  record?: boolean;
};

const staticRecommendations = (functionalPhase: FunctionalPhase): PhaseRecommendations => {
  const details = FUNCTIONAL_PHASE_DETAILS[functionalPhase];
  return {
    fastingProtocol: details.fastingProtocol,
    foods: details.foodRecommendations.slice(0, 3),
    activities: details.activityRecommendations.slice(0, 3),
    supplements: details.supplementRecommendations ? [...details.supplementRecommendations] : undefined,
  };
};

/**
 * Static guidance for the phase, plus rotated recipes when a recipe service
 * is available. Recipe failures leave only the static fields.
 */
export const createPhaseRecommendations = async (
  functionalPhase: FunctionalPhase,
  { recipeService, userId, record }: RecommendationOptions = {}
): Promise<PhaseRecommendations> => {
  const base = staticRecommendations(functionalPhase);
  if (!recipeService) {
    return base;
  }

  try {
    const { meals, shoppingPreview } = await recipeService.getRecipeRecommendations(functionalPhase, userId, { record });
    return {
      ...base,
      recipeSuggestions: meals,
      mealPlanPreview: createMealPlanPreview(meals),
      shoppingPreview,
    };
  } catch (error) {
    logger.warn("LOG.RECOMMENDATIONS_FALLBACK", describeError(error), { userId, phase: functionalPhase });
    return base;
  }
};

/** One recommendation per functional phase for the lifetime of the returned function. */
export const createRecommender = (options: RecommendationOptions = {}): RecommendFn => {
  const byPhase = new Map<FunctionalPhase, Promise<PhaseRecommendations>>();
  return (functionalPhase) => {
    const existing = byPhase.get(functionalPhase);
    if (existing) return existing;
    const pending = createPhaseRecommendations(functionalPhase, options);
    byPhase.set(functionalPhase, pending);
    return pending;
  };
};

const describeRecipe = (recipe: { title: string; prepTime: number }) => `${recipe.title} (${recipe.prepTime} min)`;

export const formatRecipeSuggestions = (meals: MealRecommendation[]): string[] =>
  meals.flatMap((meal) => [
    `${mealIcon(meal.mealType)} ${titleCase(meal.mealType)}:`,
    ...meal.recipes.map((recipe) => `  • ${describeRecipe(recipe)}${recipe.url ? ` ${recipe.url}` : ""}`),
  ]);

// "🍽️ Dinner: A (15 min) or B (20 min)"
export const createMealPlanPreview = (meals: MealRecommendation[]): string[] =>
  meals
    .filter((meal) => meal.recipes.length)
    .map(
      (meal) =>
        `${mealIcon(meal.mealType)} ${titleCase(meal.mealType)}: ${meal.recipes.map(describeRecipe).join(" or ")}`
    );
