import { CYCLE_DEFAULTS, calculateCycleDay, findBlockStart } from "../lib/cycle";
import type { DateISO } from "../lib/dates";
import { compareDates, dateRange, daysBetween } from "../lib/dates";
import { determineTraditionalPhase, normalizeCycleDay } from "./cycleEngine";
import { buildPhase } from "./phaseMapper";
import type { CycleEvent, DailyPhase, TraditionalPhase } from "./phaseModels";

export type PhaseInferenceContext = {
  events: CycleEvent[];
  date: DateISO;
  cycleDay: number;
};

export type PhaseInferenceStrategy = {
  name: "follicularExtension" | "recentEvent" | "upcomingEvent" | "calendar";
  infer: (context: PhaseInferenceContext) => TraditionalPhase | null;
};

const lookaround = () => CYCLE_DEFAULTS.eventLookaroundDays;

/** A logged follicular block carries through its nominal length, then ovulation. */
export const follicularExtension: PhaseInferenceStrategy = {
  name: "follicularExtension",
  infer: ({ events, date }) => {
    const blockStart = findBlockStart(events, date, "follicular");
    if (!blockStart) return null;

    const elapsed = daysBetween(blockStart, date);
    const { follicular, ovulation } = CYCLE_DEFAULTS.phaseDurations;
    if (elapsed <= follicular) return "follicular";
    if (elapsed <= follicular + ovulation) return "ovulation";
    return null;
  },
};

export const recentEvent: PhaseInferenceStrategy = {
  name: "recentEvent",
  infer: ({ events, date }) => {
    const latest = events
      .filter((event) => {
        const age = daysBetween(event.date, date);
        return age >= 0 && age <= lookaround();
      })
      .sort((left, right) => compareDates(right.date, left.date))[0];
    return latest ? latest.state : null;
  },
};

export const upcomingEvent: PhaseInferenceStrategy = {
  name: "upcomingEvent",
  infer: ({ events, date }) => {
    const nearest = events
      .filter((event) => {
        const lead = daysBetween(date, event.date);
        return lead >= 1 && lead <= lookaround();
      })
      .sort((left, right) => compareDates(left.date, right.date))[0];
    return nearest ? nearest.state : null;
  },
};

export const calendar: PhaseInferenceStrategy = {
  name: "calendar",
  infer: ({ cycleDay }) => determineTraditionalPhase(normalizeCycleDay(cycleDay)).phase,
};

// Evaluated in order; the first strategy with an answer wins.
export const PHASE_INFERENCE_STRATEGIES: readonly PhaseInferenceStrategy[] = [
  follicularExtension,
  recentEvent,
  upcomingEvent,
  calendar,
];

export const inferTraditionalPhase = (
  context: PhaseInferenceContext,
  strategies: readonly PhaseInferenceStrategy[] = PHASE_INFERENCE_STRATEGIES
): { phase: TraditionalPhase; strategy: PhaseInferenceStrategy["name"] } => {
  for (const strategy of strategies) {
    const phase = strategy.infer(context);
    if (phase) {
      return { phase, strategy: strategy.name };
    }
  }
  return { phase: calendar.infer(context) ?? "menstruation", strategy: "calendar" };
};

/**
 * Projects a phase onto every date of the window. Logged events pull nearby
 * days toward the reported state; the cycle-day calendar covers the rest.
 */
export const getDailyPhases = (
  events: CycleEvent[],
  startDate: DateISO,
  days: number = CYCLE_DEFAULTS.planLengthDays
): DailyPhase[] =>
  dateRange(startDate, days).map((date) => {
    const cycleDay = calculateCycleDay(events, date);
    const { phase } = inferTraditionalPhase({ events, date, cycleDay });
    return { date, phase: buildPhase(date, cycleDay, phase) };
  });
