import type { DateISO } from "../lib/dates";
import { addDays, daysBetween, formatDate } from "../lib/dates";
import { RECIPE_DEFAULTS } from "../data/recipeDefaults";
import { PHASE_EMOJI, titleCase } from "./guidance";
import type { FunctionalPhase } from "./phaseModels";
import type { PhaseGroup, WeeklyPlan } from "./planTypes";

type FunctionalRun = {
  functionalPhase: FunctionalPhase;
  groups: PhaseGroup[];
};

const bullet = (items: string[]) => items.map((item) => `  - ${item}`);

const formatRange = (startDate: DateISO, endDate: DateISO): string =>
  startDate === endDate
    ? formatDate(startDate, "EEEE dd")
    : `${formatDate(startDate, "EEE dd")}-${formatDate(endDate, "EEE dd")}`;

const pluralDays = (count: number) => `${count} ${count === 1 ? "day" : "days"}`;

export const groupByFunctionalPhase = (groups: PhaseGroup[]): FunctionalRun[] =>
  groups.reduce<FunctionalRun[]>((runs, group) => {
    const current = runs[runs.length - 1];
    if (current && current.functionalPhase === group.functionalPhase) {
      current.groups.push(group);
    } else {
      runs.push({ functionalPhase: group.functionalPhase, groups: [group] });
    }
    return runs;
  }, []);

const formatRun = ({ functionalPhase, groups }: FunctionalRun): string[] => {
  const first = groups[0];
  const last = groups[groups.length - 1];
  if (!first || !last) return [];

  const { recommendations } = first;
  const lines = [
    "",
    `${formatRange(first.startDate, last.endDate)}: ${titleCase(functionalPhase)} Phase ${PHASE_EMOJI[functionalPhase]}`,
    `⏳ ${pluralDays(first.functionalPhaseDuration)} remaining in ${titleCase(functionalPhase)} Phase`,
    `⏱️ Fasting: ${recommendations.fastingProtocol}`,
    "🥗 Key Foods:",
    ...bullet(recommendations.foods),
  ];

  if (recommendations.mealPlanPreview?.length) {
    lines.push("🍽️ Meal Ideas:", ...recommendations.mealPlanPreview.map((line) => `  ${line}`));
  }

  groups.forEach((group) => {
    lines.push(
      `💪 Activities (${titleCase(group.traditionalPhase)}, ${formatRange(group.startDate, group.endDate)}):`,
      ...bullet(group.recommendations.activities)
    );
  });

  if (recommendations.supplements?.length) {
    lines.push("💊 Supplements:", ...bullet(recommendations.supplements));
  }

  const transitionDate = addDays(last.functionalPhaseEnd, 1);
  if (daysBetween(first.startDate, transitionDate) <= RECIPE_DEFAULTS.transitionPreviewDays) {
    const next = last.nextPhaseRecommendations;
    lines.push(
      "",
      `🔜 Next Phase: ${titleCase(last.nextFunctionalPhase)} ${PHASE_EMOJI[last.nextFunctionalPhase]} (from ${formatDate(
        transitionDate,
        "EEE, MMM d"
      )})`,
      `  ⏱️ Fasting: ${next.fastingProtocol}`,
      `  🥗 Foods: ${next.foods.join(", ")}`
    );
  }

  return lines;
};

/** Renders a plan as message lines, one functional-phase block per run. */
export const formatWeeklyPlan = (plan: WeeklyPlan): string[] => {
  const lines = [
    `📅 Next Week's Plan (${formatDate(plan.startDate, "MMM dd")} - ${formatDate(plan.endDate, "MMM dd")})`,
    "------------------------",
  ];

  if (plan.nextCycleDate) {
    lines.push(
      "🔮 Cycle Prediction:",
      `• Next cycle expected to start: ${formatDate(plan.nextCycleDate, "EEEE, MMM dd")}`,
      `• Average cycle length: ${plan.avgCycleDuration} days`,
      ""
    );
    if (plan.warning) {
      lines.push(`⚠️ Note: ${plan.warning}`, "");
    }
  }

  lines.push("🌙 Phase Schedule:");
  groupByFunctionalPhase(plan.phaseGroups).forEach((run) => lines.push(...formatRun(run)));
  return lines;
};
