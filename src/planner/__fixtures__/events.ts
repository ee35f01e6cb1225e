import { addDays, type DateISO } from "../../lib/dates";
import type { CycleEvent, TraditionalPhase } from "../phaseModels";

export const USER_ID = "user-1";

export const makeEvent = (
  date: DateISO,
  state: TraditionalPhase = "menstruation",
  extra: Partial<CycleEvent> = {}
): CycleEvent => ({ userId: USER_ID, date, state, ...extra });

/** One event per day for `days` consecutive days. */
export const makeBlock = (start: DateISO, days: number, state: TraditionalPhase = "menstruation"): CycleEvent[] =>
  Array.from({ length: days }, (_, index) => makeEvent(addDays(start, index), state));
