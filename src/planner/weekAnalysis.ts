import type { DateISO } from "../lib/dates";
import { daysBetween } from "../lib/dates";
import { PHASE_EMOJI, titleCase } from "./guidance";
import type { FunctionalPhase } from "./phaseModels";
import { FUNCTIONAL_PHASES } from "./phaseModels";
import type { PhaseGroup } from "./planTypes";

export type PhaseDistribution = {
  days: number;
  percentage: number;
};

export type WeekAnalysis = {
  totalDays: number;
  startDate: DateISO | null;
  endDate: DateISO | null;
  /** Only phases present in the plan. */
  phaseDistribution: Partial<Record<FunctionalPhase, PhaseDistribution>>;
};

export const calculateWeekAnalysis = (phaseGroups: PhaseGroup[]): WeekAnalysis => {
  if (!phaseGroups.length) {
    return { totalDays: 0, startDate: null, endDate: null, phaseDistribution: {} };
  }

  const startDate = phaseGroups.map((group) => group.startDate).sort()[0];
  const endDate = phaseGroups.map((group) => group.endDate).sort().reverse()[0];
  const totalDays = daysBetween(startDate, endDate) + 1;

  const phaseDays = new Map<FunctionalPhase, number>();
  phaseGroups.forEach((group) => {
    const days = daysBetween(group.startDate, group.endDate) + 1;
    phaseDays.set(group.functionalPhase, (phaseDays.get(group.functionalPhase) || 0) + days);
  });

  const phaseDistribution: Partial<Record<FunctionalPhase, PhaseDistribution>> = {};
  FUNCTIONAL_PHASES.forEach((phase) => {
    const days = phaseDays.get(phase) || 0;
    if (days > 0) {
      phaseDistribution[phase] = { days, percentage: days / totalDays };
    }
  });

  return { totalDays, startDate, endDate, phaseDistribution };
};

/** Share of `totalRecipes` for a phase; at least one when the phase occurs. */
export const getRecommendedRecipeCount = (
  analysis: WeekAnalysis,
  phase: FunctionalPhase,
  totalRecipes: number
): number => {
  const distribution = analysis.phaseDistribution[phase];
  if (!distribution) return 0;
  return Math.max(1, Math.round(distribution.percentage * totalRecipes));
};

const byDaysDescending = (analysis: WeekAnalysis) =>
  FUNCTIONAL_PHASES.flatMap((phase) => {
    const distribution = analysis.phaseDistribution[phase];
    return distribution ? [{ phase, ...distribution }] : [];
  }).sort((left, right) => right.days - left.days);

const percent = (value: number) => `${Math.round(value * 100)}%`;

export const formatWeekAnalysis = (analysis: WeekAnalysis): string[] => {
  const entries = byDaysDescending(analysis);
  const lines = ["📊 Week Analysis:"];

  entries.forEach(({ phase, days, percentage }) => {
    lines.push(
      `- ${titleCase(phase)} Phase ${PHASE_EMOJI[phase]}: ${days} ${days === 1 ? "day" : "days"} (${percent(percentage)} of week)`
    );
  });

  if (entries.length > 1) {
    lines.push("", "🍽️ Recipe Distribution Strategy:");
    entries.forEach(({ phase, percentage }) => {
      lines.push(`- Select ~${percent(percentage)} ${titleCase(phase)} phase recipes ${PHASE_EMOJI[phase]}`);
    });
  }

  return lines;
};
