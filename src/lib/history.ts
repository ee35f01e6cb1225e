import { subDays } from "date-fns";
import type { CycleEvent, TraditionalPhase } from "../planner/phaseModels";
import { CYCLE_DEFAULTS } from "./cycle";
import type { DateISO } from "./dates";
import { daysBetween, toDate, toDateISO, todayISO } from "./dates";

export type StateBlock = {
  startDate: DateISO;
  endDate: DateISO;
  duration: number;
};

export type PhaseStatistics = {
  occurrenceCount: number;
  averageDuration: number;
  averagePainLevel: number | null;
  averageEnergyLevel: number | null;
};

export type CycleStatistics = {
  averagePeriodDuration: number;
  averageDaysBetween: number;
  totalCycles: number;
  /** Newest first. */
  lastTwoPeriods: StateBlock[];
};

const mean = (values: number[]): number | null =>
  values.length ? values.reduce((sum, value) => sum + value, 0) / values.length : null;

/** Contiguous runs of days logged with `state`, oldest first. */
export const getStateBlocks = (events: CycleEvent[], state: TraditionalPhase): StateBlock[] => {
  const dates = Array.from(new Set(events.filter((event) => event.state === state).map((event) => event.date))).sort();

  return dates.reduce<StateBlock[]>((blocks, date) => {
    const current = blocks[blocks.length - 1];
    if (current && daysBetween(current.endDate, date) <= CYCLE_DEFAULTS.periodGapDays) {
      current.endDate = date;
      current.duration = daysBetween(current.startDate, date) + 1;
    } else {
      blocks.push({ startDate: date, endDate: date, duration: 1 });
    }
    return blocks;
  }, []);
};

type PeriodHistoryOptions = {
  /** Look-back in 30-day months; `null` disables the time limit. */
  months?: number | null;
  periods?: number;
  today?: DateISO;
};

/** Recent periods, newest first, limited by time and/or count. */
export const getPeriodHistory = (
  events: CycleEvent[],
  { months = 6, periods, today = todayISO() }: PeriodHistoryOptions = {}
): StateBlock[] => {
  const cutoff = months ? toDateISO(subDays(toDate(today), 30 * months)) : null;

  const history = getStateBlocks(events, "menstruation")
    .reverse()
    .filter((block) => !cutoff || block.endDate >= cutoff);

  return periods === undefined ? history : history.slice(0, Math.max(0, periods));
};

const phaseStatistics = (events: CycleEvent[], phase: TraditionalPhase): PhaseStatistics => {
  const phaseEvents = events.filter((event) => event.state === phase);
  return {
    occurrenceCount: phaseEvents.length,
    averageDuration: mean(getStateBlocks(phaseEvents, phase).map((block) => block.duration)) ?? 0,
    averagePainLevel: mean(phaseEvents.flatMap((event) => (event.painLevel === undefined ? [] : [event.painLevel]))),
    averageEnergyLevel: mean(
      phaseEvents.flatMap((event) => (event.energyLevel === undefined ? [] : [event.energyLevel]))
    ),
  };
};

/** Per traditional phase: logged days, mean block length and mean pain/energy. */
export const calculatePhaseStatistics = (events: CycleEvent[]): Record<TraditionalPhase, PhaseStatistics> => ({
  menstruation: phaseStatistics(events, "menstruation"),
  follicular: phaseStatistics(events, "follicular"),
  ovulation: phaseStatistics(events, "ovulation"),
  luteal: phaseStatistics(events, "luteal"),
});

const RECENT_WINDOW_DAYS = 365;

/**
 * Period length and spacing over the past year. Days between periods count
 * the days strictly between one period's end and the next one's start.
 */
export const calculateCycleStatistics = (events: CycleEvent[], today: DateISO = todayISO()): CycleStatistics => {
  const cutoff = toDateISO(subDays(toDate(today), RECENT_WINDOW_DAYS));
  const periods = getStateBlocks(
    events.filter((event) => event.date >= cutoff),
    "menstruation"
  );

  const gaps = periods.slice(1).map((period, index) => daysBetween(periods[index].endDate, period.startDate) - 1);

  return {
    averagePeriodDuration: mean(periods.map((period) => period.duration)) ?? 0,
    averageDaysBetween: mean(gaps) ?? 0,
    totalCycles: periods.length,
    lastTwoPeriods: periods.slice(-2).reverse(),
  };
};
