import { CYCLE_DEFAULTS } from "../lib/cycle";
import type {
  CycleDayClassification,
  FunctionalPhase,
  FunctionalWindow,
  TraditionalPhase,
  TraditionalPhaseRange,
} from "./phaseModels";
import { TRADITIONAL_PHASES } from "./phaseModels";

export const PHASE_TRANSITIONS: Record<TraditionalPhase, TraditionalPhase> = {
  menstruation: "follicular",
  follicular: "ovulation",
  ovulation: "luteal",
  luteal: "menstruation",
};

// First cycle day of each traditional phase, used when a phase is synthesized.
export const REPRESENTATIVE_CYCLE_DAY: Record<TraditionalPhase, number> = {
  menstruation: 1,
  follicular: 6,
  ovulation: 15,
  luteal: 18,
};

export const getTotalCycleDuration = (): number =>
  TRADITIONAL_PHASES.reduce((total, phase) => total + CYCLE_DEFAULTS.phaseDurations[phase], 0);

export const normalizeCycleDay = (cycleDay: number, totalDuration = getTotalCycleDuration()): number => {
  const total = Math.max(1, Math.floor(totalDuration));
  const day = Math.floor(cycleDay);
  return ((((day - 1) % total) + total) % total) + 1;
};

export const getTraditionalPhaseRange = (phase: TraditionalPhase): TraditionalPhaseRange => {
  let startDay = 1;
  for (const candidate of TRADITIONAL_PHASES) {
    const duration = CYCLE_DEFAULTS.phaseDurations[candidate];
    if (candidate === phase) {
      return { phase, duration, startDay, endDay: startDay + duration - 1 };
    }
    startDay += duration;
  }
  return { phase, duration: CYCLE_DEFAULTS.phaseDurations[phase], startDay, endDay: startDay };
};

export const determineTraditionalPhase = (cycleDay: number): TraditionalPhaseRange => {
  for (const phase of TRADITIONAL_PHASES) {
    const range = getTraditionalPhaseRange(phase);
    if (cycleDay <= range.endDay) {
      return range;
    }
  }
  return getTraditionalPhaseRange("luteal");
};

/** Calendar lookup of the functional phase, ignoring the traditional phase. */
export const mapToFunctionalPhase = (cycleDay: number): FunctionalPhase => {
  const match = CYCLE_DEFAULTS.functionalPhaseMapping.find(
    (range) => cycleDay >= range.startDay && cycleDay <= range.endDay
  );
  return match ? match.phase : "nurture";
};

const functionalPhaseFor = (traditionalPhase: TraditionalPhase, cycleDay: number): FunctionalPhase => {
  if ((traditionalPhase === "menstruation" || traditionalPhase === "follicular") && cycleDay <= 10) {
    return "power";
  }
  if (traditionalPhase === "ovulation" || (cycleDay >= 11 && cycleDay <= 15)) {
    return "manifestation";
  }
  if (cycleDay >= 16) {
    return cycleDay <= 19 ? "power" : "nurture";
  }
  return "nurture";
};

/**
 * Classifies a cycle day into its traditional and functional phase.
 *
 * Days past the end of the nominal cycle wrap around. When the traditional
 * phase is already known (a logged event), it replaces the day-range lookup
 * and the functional phase is derived from it together with the day.
 */
export const classifyCycleDay = (
  cycleDay: number,
  traditionalOverride?: TraditionalPhase
): CycleDayClassification => {
  const normalizedDay = normalizeCycleDay(cycleDay);
  const traditionalPhase = traditionalOverride ?? determineTraditionalPhase(normalizedDay).phase;

  return {
    cycleDay: normalizedDay,
    traditionalPhase,
    functionalPhase: functionalPhaseFor(traditionalPhase, normalizedDay),
  };
};

export const getFunctionalWindow = (cycleDay: number, functionalPhase: FunctionalPhase): FunctionalWindow => {
  const total = getTotalCycleDuration();
  const day = normalizeCycleDay(cycleDay, total);

  if (classifyCycleDay(day).functionalPhase !== functionalPhase) {
    return { phase: functionalPhase, startDay: day, endDay: day, isSecondOccurrence: day >= 16 && functionalPhase === "power" };
  }

  let startDay = day;
  while (startDay > 1 && classifyCycleDay(startDay - 1).functionalPhase === functionalPhase) {
    startDay -= 1;
  }
  let endDay = day;
  while (endDay < total && classifyCycleDay(endDay + 1).functionalPhase === functionalPhase) {
    endDay += 1;
  }

  return {
    phase: functionalPhase,
    startDay,
    endDay,
    isSecondOccurrence: functionalPhase === "power" && startDay >= 16,
  };
};

export const nextFunctionalPhase = (window: FunctionalWindow): FunctionalPhase => {
  // Power comes twice per cycle; only the second one hands over to nurture.
  if (window.isSecondOccurrence) {
    return "nurture";
  }
  return classifyCycleDay(window.endDay + 1).functionalPhase;
};
