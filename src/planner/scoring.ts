import type { CycleEvent, FunctionalPhase, Phase } from "./phaseModels";
import { compareDates } from "../lib/dates";

export type RecommendationCategory = "nutrition" | "activity" | "rest" | "emotional";

export type RecommendationItem = {
  category: RecommendationCategory;
  /** 1 (lowest) to 5 (highest). */
  priority: number;
  description: string;
};

type WellbeingPattern = {
  avgPain: number | null;
  avgEnergy: number | null;
};

// Roughly three cycles of daily logs.
const RECENT_EVENT_LIMIT = 90;

const clamp = (value: number, min: number, max: number): number => Math.min(Math.max(value, min), max);

const average = (values: number[]): number | null =>
  values.length ? values.reduce((sum, value) => sum + value, 0) / values.length : null;

export const analyzeWellbeing = (events: CycleEvent[]): WellbeingPattern => {
  const recent = [...events].sort((left, right) => compareDates(right.date, left.date)).slice(0, RECENT_EVENT_LIMIT);
  return {
    avgPain: average(recent.flatMap((event) => (event.painLevel === undefined ? [] : [event.painLevel]))),
    avgEnergy: average(recent.flatMap((event) => (event.energyLevel === undefined ? [] : [event.energyLevel]))),
  };
};

const isHighPain = ({ avgPain }: WellbeingPattern) => avgPain !== null && avgPain > 3;
const isLowEnergy = ({ avgEnergy }: WellbeingPattern) => avgEnergy !== null && avgEnergy < 3;
const isHighEnergy = ({ avgEnergy }: WellbeingPattern) => avgEnergy !== null && avgEnergy > 3;

export const baseRecommendationItems = (phase: Phase): RecommendationItem[] => [
  { category: "nutrition", priority: 5, description: `Dietary style: ${phase.dietaryStyle}` },
  { category: "nutrition", priority: 4, description: `Fasting protocol: ${phase.fastingProtocol}` },
  ...phase.foodRecommendations.map((food): RecommendationItem => ({ category: "nutrition", priority: 4, description: food })),
  ...phase.activityRecommendations.map(
    (activity): RecommendationItem => ({ category: "activity", priority: 3, description: activity })
  ),
  ...(phase.supplementRecommendations ?? []).map(
    (supplement): RecommendationItem => ({
      category: "nutrition",
      priority: 3,
      description: `Consider supplementing with ${supplement}`,
    })
  ),
];

const adjustPriority = (item: RecommendationItem, pattern: WellbeingPattern, phase: FunctionalPhase): number => {
  let delta = 0;
  const mentionsFasting = item.description.toLowerCase().includes("fasting");

  if (item.category === "activity") {
    if (isHighPain(pattern)) delta -= 1;
    if (isLowEnergy(pattern)) delta -= 1;
  }
  if (item.category === "rest") {
    if (isHighPain(pattern)) delta += 1;
    if (isLowEnergy(pattern)) delta += 1;
  }

  if (phase === "power") {
    if (item.category === "nutrition") delta += 1;
    if (mentionsFasting) delta += 1;
  } else if (phase === "manifestation") {
    if (item.category === "activity") delta += 1;
  } else {
    if (item.category === "rest") delta += 1;
    if (mentionsFasting) delta -= 2;
  }

  return clamp(item.priority + delta, 1, 5);
};

const additionalItems = (pattern: WellbeingPattern, phase: FunctionalPhase): RecommendationItem[] => {
  const items: RecommendationItem[] = [];
  if (isHighPain(pattern)) {
    items.push({ category: "rest", priority: 5, description: "Consider pain management techniques and additional rest" });
  }
  if (isLowEnergy(pattern)) {
    items.push({ category: "nutrition", priority: 4, description: "Focus on energy-rich foods and supplements" });
  }
  if (phase === "power" && isHighEnergy(pattern)) {
    items.push({ category: "nutrition", priority: 4, description: "Take advantage of high energy levels for fasting" });
  }
  if (phase === "nurture") {
    items.push({ category: "emotional", priority: 4, description: "Practice self-care and emotional connection techniques" });
  }
  return items;
};

/**
 * Phase guidance as prioritized items, highest priority first. Recent pain
 * and energy logs shift priorities and add items.
 */
export const scoreRecommendations = (phase: Phase, events: CycleEvent[]): RecommendationItem[] => {
  const pattern = analyzeWellbeing(events);
  const adjusted = baseRecommendationItems(phase).map((item) => ({
    ...item,
    priority: adjustPriority(item, pattern, phase.functionalPhase),
  }));

  return [...adjusted, ...additionalItems(pattern, phase.functionalPhase)].sort(
    (left, right) => right.priority - left.priority
  );
};
