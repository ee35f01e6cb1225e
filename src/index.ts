export * from "./lib/dates";
export * from "./lib/errors";
export { logger } from "./lib/logger";
export type { LogContext, LogEvent } from "./lib/logger";
export {
  CYCLE_DEFAULTS,
  INSUFFICIENT_DATA_WARNING,
  IRREGULAR_CYCLE_WARNING,
  calculateCycleDay,
  calculateNextCycle,
  findBlockStart,
  findPeriodBlockStart,
  getMenstruationEvents,
  getPeriodStartDates,
} from "./lib/cycle";
export * from "./lib/history";
export * from "./lib/shopping";

export * from "./planner/phaseModels";
export * from "./planner/cycleEngine";
export { FUNCTIONAL_PHASE_DETAILS, PHASE_EMOJI, getPhaseDetails } from "./planner/guidance";
export * from "./planner/phaseMapper";
export * from "./planner/dailyPhases";
export * from "./planner/phaseGroups";
export * from "./planner/diversity";
export * from "./planner/recommendations";
export * from "./planner/planner";
export * from "./planner/formatPlan";
export * from "./planner/weekAnalysis";
export * from "./planner/scoring";
export type * from "./planner/planTypes";

export * from "./data/eventStore";
export * from "./data/recipeCatalog";
export * from "./data/recipeCache";
export * from "./data/recipeHistory";
export { RECIPE_DEFAULTS } from "./data/recipeDefaults";
export type { RecipeDefaults } from "./data/recipeDefaults";
export type { MealType, Recipe } from "./data/query";
export { cleanIngredientName, getKeyIngredient, tallyIngredients } from "./data/ingredients";
