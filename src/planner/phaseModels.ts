import type { DateISO } from "../lib/dates";

export type TraditionalPhase = "menstruation" | "follicular" | "ovulation" | "luteal";

export type FunctionalPhase = "power" | "manifestation" | "nurture";

export const TRADITIONAL_PHASES: readonly TraditionalPhase[] = ["menstruation", "follicular", "ovulation", "luteal"];

export const FUNCTIONAL_PHASES: readonly FunctionalPhase[] = ["power", "manifestation", "nurture"];

export interface CycleEvent {
  userId: string;
  date: DateISO;
  state: TraditionalPhase;
  painLevel?: number;
  energyLevel?: number;
  notes?: string;
}

export interface TraditionalPhaseRange {
  phase: TraditionalPhase;
  duration: number;
  startDay: number;
  endDay: number;
}

export interface FunctionalWindow {
  phase: FunctionalPhase;
  startDay: number;
  endDay: number;
  isSecondOccurrence: boolean;
}

export interface CycleDayClassification {
  cycleDay: number;
  traditionalPhase: TraditionalPhase;
  functionalPhase: FunctionalPhase;
}

export interface PhaseDetails {
  typicalSymptoms: string[];
  /** Self-care tips for the traditional phase. */
  phaseTips: string[];
  dietaryStyle: string;
  fastingProtocol: string;
  foodRecommendations: string[];
  activityRecommendations: string[];
  supplementRecommendations?: string[];
}

export interface Phase extends PhaseDetails {
  traditionalPhase: TraditionalPhase;
  functionalPhase: FunctionalPhase;
  cycleDay: number;
  startDate: DateISO;
  endDate: DateISO;
  duration: number;
  functionalPhaseStart: DateISO;
  functionalPhaseEnd: DateISO;
  /** Days left in the functional phase, the phase's own date included. */
  functionalPhaseDuration: number;
  isPowerPhaseSecondOccurrence: boolean;
}

export interface DailyPhase {
  date: DateISO;
  phase: Phase;
}

export interface NextCyclePrediction {
  nextDate: DateISO;
  avgDuration: number;
  warning: string | null;
}
