import recipeDefaultsData from "../config/recipeDefaults.v1.json";
import { asNumber } from "../lib/cycle";
import type { MealType } from "./query";

export type RecipeDefaults = {
  rotationWindowDays: number;
  historyTtlDays: number;
  recipesPerMealType: number;
  shoppingPreviewSize: number;
  transitionPreviewDays: number;
  mealTypes: MealType[];
};

const DEFAULT_MEAL_TYPES: MealType[] = ["breakfast", "lunch", "dinner", "snack"];

const isMealType = (value: unknown): value is MealType =>
  typeof value === "string" && DEFAULT_MEAL_TYPES.some((mealType) => mealType === value);

const asMealTypes = (value: unknown): MealType[] => {
  if (!Array.isArray(value)) {
    return DEFAULT_MEAL_TYPES;
  }
  const mealTypes = value.filter(isMealType);
  return mealTypes.length ? mealTypes : DEFAULT_MEAL_TYPES;
};

export const RECIPE_DEFAULTS: RecipeDefaults = {
  rotationWindowDays: asNumber(recipeDefaultsData?.rotationWindowDays, 14),
  historyTtlDays: asNumber(recipeDefaultsData?.historyTtlDays, 30),
  recipesPerMealType: asNumber(recipeDefaultsData?.recipesPerMealType, 2),
  shoppingPreviewSize: asNumber(recipeDefaultsData?.shoppingPreviewSize, 8),
  transitionPreviewDays: asNumber(recipeDefaultsData?.transitionPreviewDays, 3),
  mealTypes: asMealTypes(recipeDefaultsData?.mealTypes),
};
