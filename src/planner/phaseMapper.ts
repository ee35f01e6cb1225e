import { calculateCycleDay, getMenstruationEvents } from "../lib/cycle";
import type { DateISO } from "../lib/dates";
import { addDays, compareDates, todayISO } from "../lib/dates";
import { InsufficientDataError } from "../lib/errors";
import {
  PHASE_TRANSITIONS,
  REPRESENTATIVE_CYCLE_DAY,
  classifyCycleDay,
  getFunctionalWindow,
  getTraditionalPhaseRange,
} from "./cycleEngine";
import { getPhaseDetails, titleCase } from "./guidance";
import type { CycleEvent, Phase, TraditionalPhase } from "./phaseModels";

/**
 * Builds the phase value object for one date.
 *
 * `cycleDay` may be outside the nominal cycle; it is normalized first. When
 * `traditionalOverride` disagrees with the calendar, the traditional phase is
 * taken to start on `date`.
 */
export const buildPhase = (date: DateISO, cycleDay: number, traditionalOverride?: TraditionalPhase): Phase => {
  const classification = classifyCycleDay(cycleDay, traditionalOverride);
  const day = classification.cycleDay;
  const range = getTraditionalPhaseRange(classification.traditionalPhase);
  const withinRange = day >= range.startDay && day <= range.endDay;
  const startDate = withinRange ? addDays(date, range.startDay - day) : date;

  const window = getFunctionalWindow(day, classification.functionalPhase);

  return {
    traditionalPhase: classification.traditionalPhase,
    functionalPhase: classification.functionalPhase,
    cycleDay: day,
    startDate,
    endDate: addDays(startDate, range.duration - 1),
    duration: range.duration,
    functionalPhaseStart: addDays(date, window.startDay - day),
    functionalPhaseEnd: addDays(date, window.endDay - day),
    functionalPhaseDuration: window.endDay - day + 1,
    isPowerPhaseSecondOccurrence: window.isSecondOccurrence,
    ...getPhaseDetails(classification.traditionalPhase, classification.functionalPhase),
  };
};

export const getCurrentPhase = (events: CycleEvent[], targetDate: DateISO = todayISO()): Phase => {
  if (!getMenstruationEvents(events).length) {
    throw new InsufficientDataError("No menstruation events found");
  }

  return buildPhase(targetDate, calculateCycleDay(events, targetDate));
};

export const predictNextPhase = (currentPhase: Phase): Phase => {
  const next = PHASE_TRANSITIONS[currentPhase.traditionalPhase];
  return buildPhase(addDays(currentPhase.endDate, 1), REPRESENTATIVE_CYCLE_DAY[next]);
};

const listLines = (items: string[]) => items.map((item) => `• ${item}`);

export const generatePhaseReport = (phase: Phase, events: CycleEvent[]): string => {
  const report = [
    "🌙 Phase Report",
    `Traditional Phase: ${titleCase(phase.traditionalPhase)} (${phase.duration} days total)`,
    `Functional Phase: ${titleCase(phase.functionalPhase)} (${phase.functionalPhaseDuration} days remaining)`,
    `Period: ${phase.startDate} to ${phase.endDate} (traditional) | ${phase.functionalPhaseStart} to ${phase.functionalPhaseEnd} (functional)`,
    "",
    "🩺 Common Symptoms:",
    ...listLines(phase.typicalSymptoms),
    "",
    "✅ Phase Tips:",
    ...listLines(phase.phaseTips),
    "",
    "🍽️ Dietary Style:",
    `• ${phase.dietaryStyle}`,
    "",
    "⏱️ Fasting Protocol:",
    `• ${phase.fastingProtocol}`,
    "",
    "🥗 Recommended Foods:",
    ...listLines(phase.foodRecommendations),
    "",
    "💪 Recommended Activities:",
    ...listLines(phase.activityRecommendations),
  ];

  if (phase.supplementRecommendations?.length) {
    report.push("", "💊 Supplements to Consider:", ...listLines(phase.supplementRecommendations));
  }

  const notes = events
    .filter((event) => event.notes && event.date >= phase.startDate)
    .sort((left, right) => compareDates(left.date, right.date));
  if (notes.length) {
    report.push("", "📝 Recent Notes:", ...notes.map((event) => `• ${event.date}: ${event.notes}`));
  }

  return report.join("\n");
};
