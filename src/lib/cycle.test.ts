import { describe, expect, it } from "vitest";
import { makeBlock, makeEvent } from "../planner/__fixtures__/events";
import {
  IRREGULAR_CYCLE_WARNING,
  calculateCycleDay,
  calculateNextCycle,
  findPeriodBlockStart,
  getMenstruationEvents,
  getPeriodStartDates,
} from "./cycle";
import { InsufficientDataError } from "./errors";

describe("calculateCycleDay", () => {
  const august = makeBlock("2025-08-21", 5);

  it("counts from the first day of the period block", () => {
    expect(calculateCycleDay(august, "2025-08-24")).toBe(4);
  });

  it("keeps counting after the block ends", () => {
    expect(calculateCycleDay(august, "2025-08-26")).toBe(6);
  });

  it("uses the most recent block at or before the target", () => {
    const events = [...makeBlock("2025-07-24", 3), ...august];
    expect(calculateCycleDay(events, "2025-08-10")).toBe(18);
  });

  it("falls back to day 1 without a preceding menstruation event", () => {
    expect(calculateCycleDay([], "2025-08-24")).toBe(1);
    expect(calculateCycleDay(august, "2025-08-01")).toBe(1);
  });
});

describe("findPeriodBlockStart", () => {
  it("ignores duplicate dates and other states", () => {
    const events = [
      makeEvent("2024-03-02"),
      makeEvent("2024-03-01"),
      makeEvent("2024-03-02"),
      makeEvent("2024-02-29", "luteal"),
    ];
    expect(findPeriodBlockStart(events, "2024-03-05")).toBe("2024-03-01");
  });

  it("returns null when nothing precedes the target", () => {
    expect(findPeriodBlockStart([makeEvent("2024-03-10")], "2024-03-05")).toBeNull();
  });
});

describe("getMenstruationEvents", () => {
  it("sorts and dedupes by date", () => {
    const events = [makeEvent("2024-01-02"), makeEvent("2024-01-01"), makeEvent("2024-01-02"), makeEvent("2024-01-05", "follicular")];
    expect(getMenstruationEvents(events).map((event) => event.date)).toEqual(["2024-01-01", "2024-01-02"]);
    expect(getMenstruationEvents(events, "desc").map((event) => event.date)).toEqual(["2024-01-02", "2024-01-01"]);
  });
});

describe("getPeriodStartDates", () => {
  it("keeps the first date of each contiguous block", () => {
    const events = [...makeBlock("2024-01-01", 2), ...makeBlock("2024-01-29", 2), makeEvent("2024-02-26")];
    expect(getPeriodStartDates(events)).toEqual(["2024-01-01", "2024-01-29", "2024-02-26"]);
  });
});

describe("calculateNextCycle", () => {
  it("throws on an empty history", () => {
    expect(() => calculateNextCycle([])).toThrow(InsufficientDataError);
  });

  it("predicts 28 days after a single period", () => {
    const prediction = calculateNextCycle([makeEvent("2024-01-01")]);
    expect(prediction.nextDate).toBe("2024-01-29");
    expect(prediction.avgDuration).toBe(28);
    expect(prediction.warning).toContain("insufficient data");
  });

  it("anchors on the latest event when no period is logged", () => {
    const prediction = calculateNextCycle([makeEvent("2024-03-10", "follicular"), makeEvent("2024-03-20", "luteal")]);
    expect(prediction.nextDate).toBe("2024-04-17");
  });

  it("warns about irregular gaps", () => {
    // gaps of 24, 31 and 26 days
    const events = ["2024-01-01", "2024-01-25", "2024-02-25", "2024-03-22"].map((date) => makeEvent(date));
    expect(calculateNextCycle(events)).toEqual({
      nextDate: "2024-04-18",
      avgDuration: 27,
      warning: IRREGULAR_CYCLE_WARNING,
    });
  });

  it("does not warn about steady gaps", () => {
    // gaps of 28, 28 and 29 days
    const events = ["2024-01-01", "2024-01-29", "2024-02-26", "2024-03-26"].map((date) => makeEvent(date));
    expect(calculateNextCycle(events)).toEqual({ nextDate: "2024-04-23", avgDuration: 28, warning: null });
  });

  it("needs three gaps before judging regularity", () => {
    const events = ["2024-01-01", "2024-01-21", "2024-03-01"].map((date) => makeEvent(date));
    expect(calculateNextCycle(events).warning).toBeNull();
  });

  it("measures gaps between block starts", () => {
    const events = [...makeBlock("2024-01-01", 5), ...makeBlock("2024-01-29", 4)];
    expect(calculateNextCycle(events)).toEqual({ nextDate: "2024-02-26", avgDuration: 28, warning: null });
  });
});
