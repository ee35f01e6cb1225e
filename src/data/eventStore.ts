import { z } from "zod";
import type { DateISO } from "../lib/dates";
import { compareDates, daysBetween, dateRange, isDateISO } from "../lib/dates";
import { EventValidationError } from "../lib/errors";
import { logger } from "../lib/logger";
import type { CycleEvent } from "../planner/phaseModels";

export interface EventStore {
  getEvents(userId: string): Promise<CycleEvent[]>;
  /** Stores the event under `(userId, date)`, replacing any event already there. */
  putEvent(event: CycleEvent): Promise<void>;
}

export const MAX_REGISTRATION_RANGE_DAYS = 31;

const dateSchema = z.string().refine(isDateISO, { message: "Expected a YYYY-MM-DD date" });

const levelSchema = z.number().int().min(0).max(5);

export const registrationSchema = z
  .object({
    userId: z.string().trim().min(1),
    startDate: dateSchema,
    endDate: dateSchema.optional(),
    state: z.enum(["menstruation", "follicular", "ovulation", "luteal"]),
    painLevel: levelSchema.optional(),
    energyLevel: levelSchema.optional(),
    notes: z.string().trim().min(1).optional(),
  })
  .superRefine((input, ctx) => {
    if (!input.endDate) return;
    const span = daysBetween(input.startDate, input.endDate);
    if (span < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["endDate"], message: "Start date must be before end date" });
    } else if (span > MAX_REGISTRATION_RANGE_DAYS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["endDate"],
        message: `Date range cannot exceed ${MAX_REGISTRATION_RANGE_DAYS} days`,
      });
    }
  });

export type RegistrationInput = z.input<typeof registrationSchema>;

/**
 * Validates a registration and writes one event per day of the inclusive
 * range (a single day when `endDate` is absent). Returns the stored events.
 */
export const registerEvents = async (store: EventStore, input: RegistrationInput): Promise<CycleEvent[]> => {
  const parsed = registrationSchema.safeParse(input);
  if (!parsed.success) {
    throw new EventValidationError(
      "Invalid event registration",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`)
    );
  }

  const { userId, startDate, endDate, state, painLevel, energyLevel, notes } = parsed.data;
  const dates = dateRange(startDate, daysBetween(startDate, endDate ?? startDate) + 1);
  const events = dates.map((date): CycleEvent => ({ userId, date, state, painLevel, energyLevel, notes }));

  for (const event of events) {
    await store.putEvent(event);
  }

  logger.info("LOG.EVENTS_REGISTERED", { count: events.length, state, startDate, endDate: dates[dates.length - 1] }, { userId });
  return events;
};

export const createInMemoryEventStore = (seed: CycleEvent[] = []): EventStore => {
  const byUser = new Map<string, Map<DateISO, CycleEvent>>();

  const put = (event: CycleEvent) => {
    const events = byUser.get(event.userId) ?? new Map<DateISO, CycleEvent>();
    events.set(event.date, { ...event });
    byUser.set(event.userId, events);
  };

  seed.forEach(put);

  return {
    getEvents: async (userId) =>
      Array.from(byUser.get(userId)?.values() ?? [])
        .sort((left, right) => compareDates(left.date, right.date))
        .map((event) => ({ ...event })),
    putEvent: async (event) => {
      put(event);
    },
  };
};
