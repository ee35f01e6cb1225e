import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { EventValidationError } from "../lib/errors";
import { createInMemoryEventStore, registerEvents } from "./eventStore";

describe("registerEvents", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes one event per day of the range", async () => {
    const store = createInMemoryEventStore();
    const events = await registerEvents(store, {
      userId: "user-1",
      startDate: "2024-01-01",
      endDate: "2024-01-03",
      state: "menstruation",
      painLevel: 3,
    });

    expect(events.map((event) => event.date)).toEqual(["2024-01-01", "2024-01-02", "2024-01-03"]);
    expect((await store.getEvents("user-1")).map((event) => event.painLevel)).toEqual([3, 3, 3]);
    expect(await store.getEvents("user-2")).toEqual([]);
  });

  it("registers a single day without an end date", async () => {
    const store = createInMemoryEventStore();
    const events = await registerEvents(store, { userId: "user-1", startDate: "2024-01-10", state: "follicular" });
    expect(events).toHaveLength(1);
  });

  it("replaces an event logged on the same date", async () => {
    const store = createInMemoryEventStore();
    await registerEvents(store, { userId: "user-1", startDate: "2024-01-10", state: "follicular" });
    await registerEvents(store, { userId: "user-1", startDate: "2024-01-10", state: "ovulation", notes: "mild cramps" });

    expect(await store.getEvents("user-1")).toEqual([
      { userId: "user-1", date: "2024-01-10", state: "ovulation", notes: "mild cramps" },
    ]);
  });

  it("accepts a range of exactly 31 days", async () => {
    const events = await registerEvents(createInMemoryEventStore(), {
      userId: "user-1",
      startDate: "2024-01-01",
      endDate: "2024-02-01",
      state: "luteal",
    });
    expect(events).toHaveLength(32);
  });

  it.each([
    {
      input: { userId: "user-1", startDate: "2024-01-05", endDate: "2024-01-01", state: "luteal" as const },
      issue: "endDate: Start date must be before end date",
    },
    {
      input: { userId: "user-1", startDate: "2024-01-01", endDate: "2024-02-02", state: "luteal" as const },
      issue: "endDate: Date range cannot exceed 31 days",
    },
    {
      input: { userId: "user-1", startDate: "2024-02-30", state: "luteal" as const },
      issue: "startDate: Expected a YYYY-MM-DD date",
    },
    {
      input: { userId: "user-1", startDate: "2024-01-01", state: "luteal" as const, painLevel: 7 },
      issue: "painLevel: Number must be less than or equal to 5",
    },
  ])("rejects $issue", async ({ input, issue }) => {
    const store = createInMemoryEventStore();
    const error = await registerEvents(store, input).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(EventValidationError);
    expect(error instanceof EventValidationError ? error.issues : []).toContain(issue);
    expect(await store.getEvents("user-1")).toEqual([]);
  });
});
