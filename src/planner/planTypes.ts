import type { MealType, Recipe } from "../data/query";
import type { RecipeCardViewModel } from "../data/viewModel";
import type { DateISO } from "../lib/dates";
import type { FunctionalPhase, TraditionalPhase } from "./phaseModels";

export type RecipeSuggestion = RecipeCardViewModel;

export type MealRecommendation = {
  mealType: MealType;
  recipes: RecipeSuggestion[];
};

export type PhaseRecommendations = {
  fastingProtocol: string;
  foods: string[];
  activities: string[];
  supplements?: string[];
  recipeSuggestions?: MealRecommendation[];
  mealPlanPreview?: string[];
  shoppingPreview?: string[];
};

export type PhaseGroup = {
  startDate: DateISO;
  endDate: DateISO;
  traditionalPhase: TraditionalPhase;
  functionalPhase: FunctionalPhase;
  functionalPhaseStart: DateISO;
  functionalPhaseEnd: DateISO;
  functionalPhaseDuration: number;
  isPowerPhaseSecondOccurrence: boolean;
  nextTraditionalPhase: TraditionalPhase;
  nextFunctionalPhase: FunctionalPhase;
  nextPhaseRecommendations: PhaseRecommendations;
  hasPhaseTransition: boolean;
  transitionMessage?: string;
  recommendations: PhaseRecommendations;
};

export type WeeklyPlan = {
  startDate: DateISO;
  endDate: DateISO;
  nextCycleDate: DateISO | null;
  avgCycleDuration: number | null;
  warning: string | null;
  phaseGroups: PhaseGroup[];
};

export type RecipeRecommendations = {
  meals: MealRecommendation[];
  shoppingPreview: string[];
  selected: Recipe[];
};

/** Produces the recommendation payload for a functional phase. */
export type RecommendFn = (functionalPhase: FunctionalPhase) => Promise<PhaseRecommendations>;
