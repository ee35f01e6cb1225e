import type { DateISO } from "../lib/dates";
import { addDays, daysBetween, formatDate } from "../lib/dates";
import { PHASE_TRANSITIONS, REPRESENTATIVE_CYCLE_DAY, classifyCycleDay } from "./cycleEngine";
import { PHASE_EMOJI, titleCase } from "./guidance";
import type { DailyPhase, FunctionalPhase, TraditionalPhase } from "./phaseModels";
import type { PhaseGroup, RecommendFn } from "./planTypes";

type SegmentDraft = Omit<
  PhaseGroup,
  | "nextTraditionalPhase"
  | "nextFunctionalPhase"
  | "nextPhaseRecommendations"
  | "hasPhaseTransition"
  | "transitionMessage"
  | "recommendations"
>;

const openSegment = ({ date, phase }: DailyPhase): SegmentDraft => ({
  startDate: date,
  endDate: date,
  traditionalPhase: phase.traditionalPhase,
  functionalPhase: phase.functionalPhase,
  functionalPhaseStart: phase.functionalPhaseStart,
  functionalPhaseEnd: phase.functionalPhaseEnd,
  functionalPhaseDuration: phase.functionalPhaseDuration,
  isPowerPhaseSecondOccurrence: phase.isPowerPhaseSecondOccurrence,
});

const extendSegment = (segment: SegmentDraft, { date, phase }: DailyPhase): void => {
  segment.endDate = date;
  if (phase.functionalPhase === segment.functionalPhase && phase.functionalPhaseEnd > segment.functionalPhaseEnd) {
    segment.functionalPhaseEnd = phase.functionalPhaseEnd;
    segment.functionalPhaseDuration = daysBetween(segment.startDate, phase.functionalPhaseEnd) + 1;
  }
};

const successorOf = (
  segment: SegmentDraft,
  nextDay: DailyPhase | undefined
): { traditional: TraditionalPhase; functional: FunctionalPhase } => {
  const traditional = nextDay ? nextDay.phase.traditionalPhase : PHASE_TRANSITIONS[segment.traditionalPhase];
  const functional = nextDay
    ? nextDay.phase.functionalPhase
    : classifyCycleDay(REPRESENTATIVE_CYCLE_DAY[traditional], traditional).functionalPhase;

  // The second power window of a cycle always hands over to nurture.
  return { traditional, functional: segment.isPowerPhaseSecondOccurrence ? "nurture" : functional };
};

export const transitionMessageFor = (functionalPhaseEnd: DateISO, nextFunctionalPhase: FunctionalPhase): string =>
  `Transition to ${titleCase(nextFunctionalPhase)} Phase ${PHASE_EMOJI[nextFunctionalPhase]} on ${formatDate(
    addDays(functionalPhaseEnd, 1),
    "EEE, MMM d"
  )}`;

/**
 * Collapses a date-ordered daily projection into maximal runs of one
 * traditional phase. Every segment, the last one included, carries its
 * successor phase and that phase's recommendations.
 */
export const groupPhases = async (dailyPhases: DailyPhase[], recommend: RecommendFn): Promise<PhaseGroup[]> => {
  const drafts: Array<{ segment: SegmentDraft; nextDay?: DailyPhase }> = [];

  dailyPhases.forEach((day) => {
    const current = drafts[drafts.length - 1];
    if (current && current.segment.traditionalPhase === day.phase.traditionalPhase) {
      extendSegment(current.segment, day);
      return;
    }
    if (current) {
      current.nextDay = day;
    }
    drafts.push({ segment: openSegment(day) });
  });

  const groups: PhaseGroup[] = [];
  for (const { segment, nextDay } of drafts) {
    const next = successorOf(segment, nextDay);
    const hasPhaseTransition = segment.functionalPhaseEnd <= segment.endDate;

    groups.push({
      ...segment,
      recommendations: await recommend(segment.functionalPhase),
      nextTraditionalPhase: next.traditional,
      nextFunctionalPhase: next.functional,
      nextPhaseRecommendations: await recommend(next.functional),
      hasPhaseTransition,
      transitionMessage: hasPhaseTransition ? transitionMessageFor(segment.functionalPhaseEnd, next.functional) : undefined,
    });
  }
  return groups;
};
