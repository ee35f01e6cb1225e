import type { FunctionalPhase } from "../planner/phaseModels";

export type MealType = "breakfast" | "lunch" | "dinner" | "snack";

export type Recipe = {
  id: string;
  title: string;
  phase?: FunctionalPhase;
  prepTime: number;
  tags: string[];
  ingredients: string[];
  instructions: string[];
  notes?: string;
  url?: string;
  filePath: string;
};

export type RecipeIndex = {
  recipes: Recipe[];
  byMealType: Record<string, number[]>;
};

const normalizeTag = (value: string) => value.toLowerCase().trim();

export const buildRecipeIndex = (recipes: Recipe[]): RecipeIndex => {
  const byMealType: Record<string, number[]> = {};

  recipes.forEach((recipe, index) => {
    new Set(recipe.tags.map(normalizeTag)).forEach((tag) => {
      (byMealType[tag] ||= []).push(index);
    });
  });

  return { recipes, byMealType };
};

export const indicesByMealType = (index: RecipeIndex, mealType: string): number[] =>
  index.byMealType[normalizeTag(mealType)] ?? [];

export const getRecipesByMealType = (index: RecipeIndex, mealType: string): Recipe[] =>
  indicesByMealType(index, mealType).flatMap((position) => {
    const recipe = index.recipes[position];
    return recipe ? [recipe] : [];
  });
