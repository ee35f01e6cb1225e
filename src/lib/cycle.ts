import cycleDefaultsData from "../config/cycleDefaults.v1.json";
import type { CycleEvent, FunctionalPhase, NextCyclePrediction, TraditionalPhase } from "../planner/phaseModels";
import { FUNCTIONAL_PHASES, TRADITIONAL_PHASES } from "../planner/phaseModels";
import type { DateISO } from "./dates";
import { addDays, daysBetween, todayISO } from "./dates";
import { InsufficientDataError } from "./errors";

type FunctionalRange = {
  startDay: number;
  endDay: number;
  phase: FunctionalPhase;
};

type CycleDefaults = {
  phaseDurations: Record<TraditionalPhase, number>;
  functionalPhaseMapping: FunctionalRange[];
  defaultCycleLength: number;
  eventLookaroundDays: number;
  periodGapDays: number;
  irregularityVarianceThreshold: number;
  minGapsForIrregularity: number;
  planLengthDays: number;
};

const DEFAULT_PHASE_DURATIONS: Record<TraditionalPhase, number> = {
  menstruation: 5,
  follicular: 9,
  ovulation: 3,
  luteal: 11,
};

const DEFAULT_FUNCTIONAL_MAPPING: FunctionalRange[] = [
  { startDay: 1, endDay: 10, phase: "power" },
  { startDay: 11, endDay: 15, phase: "manifestation" },
  { startDay: 16, endDay: 19, phase: "power" },
  { startDay: 20, endDay: 28, phase: "nurture" },
];

const DEFAULTS: CycleDefaults = {
  phaseDurations: DEFAULT_PHASE_DURATIONS,
  functionalPhaseMapping: DEFAULT_FUNCTIONAL_MAPPING,
  defaultCycleLength: 28,
  eventLookaroundDays: 3,
  periodGapDays: 1,
  irregularityVarianceThreshold: 10,
  minGapsForIrregularity: 3,
  planLengthDays: 7,
};

export const asNumber = (value: unknown, fallback: number): number =>
  typeof value === "number" && Number.isFinite(value) ? value : fallback;

const isFunctionalPhase = (value: unknown): value is FunctionalPhase =>
  typeof value === "string" && FUNCTIONAL_PHASES.some((phase) => phase === value);

const asPhaseDurations = (value: unknown): Record<TraditionalPhase, number> => {
  if (!value || typeof value !== "object") {
    return DEFAULT_PHASE_DURATIONS;
  }

  const input = new Map(Object.entries(value));
  return TRADITIONAL_PHASES.reduce<Record<TraditionalPhase, number>>(
    (durations, phase) => ({ ...durations, [phase]: asNumber(input.get(phase), DEFAULT_PHASE_DURATIONS[phase]) }),
    { ...DEFAULT_PHASE_DURATIONS }
  );
};

const asFunctionalMapping = (value: unknown): FunctionalRange[] => {
  if (!Array.isArray(value)) {
    return DEFAULT_FUNCTIONAL_MAPPING;
  }

  const ranges = value.flatMap((item: unknown): FunctionalRange[] => {
    if (!item || typeof item !== "object") return [];
    const entry = new Map(Object.entries(item));
    const phase = entry.get("phase");
    const startDay = entry.get("startDay");
    const endDay = entry.get("endDay");
    if (!isFunctionalPhase(phase) || typeof startDay !== "number" || typeof endDay !== "number") return [];
    return [{ startDay, endDay, phase }];
  });

  return ranges.length ? ranges : DEFAULT_FUNCTIONAL_MAPPING;
};

export const CYCLE_DEFAULTS: CycleDefaults = {
  phaseDurations: asPhaseDurations(cycleDefaultsData?.phaseDurations),
  functionalPhaseMapping: asFunctionalMapping(cycleDefaultsData?.functionalPhaseMapping),
  defaultCycleLength: asNumber(cycleDefaultsData?.defaultCycleLength, DEFAULTS.defaultCycleLength),
  eventLookaroundDays: asNumber(cycleDefaultsData?.eventLookaroundDays, DEFAULTS.eventLookaroundDays),
  periodGapDays: asNumber(cycleDefaultsData?.periodGapDays, DEFAULTS.periodGapDays),
  irregularityVarianceThreshold: asNumber(
    cycleDefaultsData?.irregularityVarianceThreshold,
    DEFAULTS.irregularityVarianceThreshold
  ),
  minGapsForIrregularity: asNumber(cycleDefaultsData?.minGapsForIrregularity, DEFAULTS.minGapsForIrregularity),
  planLengthDays: asNumber(cycleDefaultsData?.planLengthDays, DEFAULTS.planLengthDays),
};

export const INSUFFICIENT_DATA_WARNING = "Prediction based on insufficient data (fewer than two recorded periods)";
export const IRREGULAR_CYCLE_WARNING = "Irregular cycle detected";

const uniqueSortedDates = (dates: DateISO[], order: "asc" | "desc"): DateISO[] => {
  const sorted = Array.from(new Set(dates)).sort();
  return order === "desc" ? sorted.reverse() : sorted;
};

export const getMenstruationEvents = (events: CycleEvent[], order: "asc" | "desc" = "asc"): CycleEvent[] => {
  const byDate = new Map<DateISO, CycleEvent>();
  events
    .filter((event) => event.state === "menstruation")
    .forEach((event) => byDate.set(event.date, event));

  return uniqueSortedDates(Array.from(byDate.keys()), order).flatMap((date) => {
    const event = byDate.get(date);
    return event ? [event] : [];
  });
};

/**
 * First date of the contiguous block of `state` events that contains, or most
 * recently precedes, the target date. Events after the target are ignored.
 */
export const findBlockStart = (
  events: CycleEvent[],
  targetDate: DateISO,
  state: TraditionalPhase = "menstruation"
): DateISO | null => {
  const dates = uniqueSortedDates(
    events.filter((event) => event.state === state && event.date <= targetDate).map((event) => event.date),
    "desc"
  );
  if (!dates.length) {
    return null;
  }

  let blockStart = dates[0];
  for (const date of dates.slice(1)) {
    if (daysBetween(date, blockStart) > CYCLE_DEFAULTS.periodGapDays) {
      break;
    }
    blockStart = date;
  }
  return blockStart;
};

export const findPeriodBlockStart = (events: CycleEvent[], targetDate: DateISO): DateISO | null =>
  findBlockStart(events, targetDate, "menstruation");

export const calculateCycleDay = (events: CycleEvent[], targetDate: DateISO = todayISO()): number => {
  const blockStart = findPeriodBlockStart(events, targetDate);
  if (!blockStart) {
    return 1;
  }
  return daysBetween(blockStart, targetDate) + 1;
};

export const getPeriodStartDates = (events: CycleEvent[]): DateISO[] => {
  const dates = getMenstruationEvents(events, "asc").map((event) => event.date);
  return dates.filter((date, index) => index === 0 || daysBetween(dates[index - 1], date) > CYCLE_DEFAULTS.periodGapDays);
};

const mean = (values: number[]): number => values.reduce((sum, value) => sum + value, 0) / values.length;

const sampleVariance = (values: number[]): number => {
  const average = mean(values);
  return values.reduce((sum, value) => sum + (value - average) ** 2, 0) / (values.length - 1);
};

export const calculateNextCycle = (events: CycleEvent[]): NextCyclePrediction => {
  if (!events.length) {
    throw new InsufficientDataError("No events provided for prediction");
  }

  const starts = getPeriodStartDates(events);
  const defaultLength = CYCLE_DEFAULTS.defaultCycleLength;

  if (starts.length < 2) {
    const anchor = starts[0] ?? uniqueSortedDates(events.map((event) => event.date), "desc")[0];
    return {
      nextDate: addDays(anchor, defaultLength),
      avgDuration: defaultLength,
      warning: INSUFFICIENT_DATA_WARNING,
    };
  }

  const gaps = starts.slice(1).map((date, index) => daysBetween(starts[index], date));
  const avgDuration = Math.round(mean(gaps));

  let warning: string | null = null;
  if (
    gaps.length >= CYCLE_DEFAULTS.minGapsForIrregularity &&
    sampleVariance(gaps) > CYCLE_DEFAULTS.irregularityVarianceThreshold
  ) {
    warning = IRREGULAR_CYCLE_WARNING;
  }

  return {
    nextDate: addDays(starts[starts.length - 1], avgDuration),
    avgDuration,
    warning,
  };
};
