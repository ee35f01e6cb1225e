import { CYCLE_DEFAULTS, calculateNextCycle } from "../lib/cycle";
import type { DateISO } from "../lib/dates";
import { addDays, todayISO } from "../lib/dates";
import { InsufficientDataError } from "../lib/errors";
import { logger } from "../lib/logger";
import { getDailyPhases } from "./dailyPhases";
import type { RecipeService } from "./diversity";
import { groupPhases } from "./phaseGroups";
import type { CycleEvent, FunctionalPhase } from "./phaseModels";
import type { PhaseGroup, WeeklyPlan } from "./planTypes";
import { createRecommender } from "./recommendations";

export type WeeklyPlanOptions = {
  /** First day of the plan; tomorrow when omitted. */
  startDate?: DateISO;
  userId?: string;
  recipes?: RecipeService;
};

// Successor-only recommendations are never rendered with recipes, so only
// phases with a segment inside the window count as shown.
const recordShownRecipes = async (recipes: RecipeService, userId: string, phaseGroups: PhaseGroup[]) => {
  const byPhase = new Map<FunctionalPhase, PhaseGroup>();
  phaseGroups.forEach((group) => {
    if (!byPhase.has(group.functionalPhase)) byPhase.set(group.functionalPhase, group);
  });

  for (const [phase, group] of byPhase) {
    await recipes.recordRecommendations(userId, phase, group.recommendations.recipeSuggestions ?? []);
  }
};

export const generateWeeklyPlan = async (
  events: CycleEvent[],
  { startDate, userId, recipes }: WeeklyPlanOptions = {}
): Promise<WeeklyPlan> => {
  if (!events.length) {
    throw new InsufficientDataError("No events provided for plan generation");
  }

  const planStart = startDate ?? addDays(todayISO(), 1);
  const planLength = CYCLE_DEFAULTS.planLengthDays;
  const planEnd = addDays(planStart, planLength - 1);

  const prediction = calculateNextCycle(events);
  const predictionInWindow = prediction.nextDate >= planStart && prediction.nextDate <= planEnd;

  const dailyPhases = getDailyPhases(events, planStart, planLength);
  const phaseGroups = await groupPhases(
    dailyPhases,
    createRecommender({ recipeService: recipes, userId, record: false })
  );
  if (recipes && userId) {
    await recordShownRecipes(recipes, userId, phaseGroups);
  }

  logger.info(
    "LOG.WEEKLY_PLAN_GENERATED",
    { startDate: planStart, endDate: planEnd, segments: phaseGroups.length, predictionInWindow },
    { userId }
  );

  return {
    startDate: planStart,
    endDate: planEnd,
    nextCycleDate: predictionInWindow ? prediction.nextDate : null,
    avgCycleDuration: predictionInWindow ? prediction.avgDuration : null,
    warning: predictionInWindow ? prediction.warning : null,
    phaseGroups,
  };
};
