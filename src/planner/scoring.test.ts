import { describe, expect, it } from "vitest";
import { makeEvent } from "./__fixtures__/events";
import { buildPhase } from "./phaseMapper";
import { analyzeWellbeing, scoreRecommendations } from "./scoring";

describe("analyzeWellbeing", () => {
  it("averages logged levels and leaves missing ones null", () => {
    expect(
      analyzeWellbeing([
        makeEvent("2024-01-01", "menstruation", { painLevel: 4 }),
        makeEvent("2024-01-02", "menstruation", { painLevel: 2 }),
      ])
    ).toEqual({ avgPain: 3, avgEnergy: null });
  });
});

describe("scoreRecommendations", () => {
  it("raises nutrition and fasting during power", () => {
    const items = scoreRecommendations(buildPhase("2024-01-03", 3), []);

    expect(items).toHaveLength(14);
    expect(items[0]).toEqual({ category: "nutrition", priority: 5, description: "Dietary style: Ketobiotic" });
    expect(items.find((item) => item.description.startsWith("Fasting protocol"))?.priority).toBe(5);
    expect(items.filter((item) => item.category === "activity").map((item) => item.priority)).toEqual([3, 3, 3, 3, 3]);
  });

  it("favors rest and drops fasting when nurture is painful and tiring", () => {
    const phase = buildPhase("2024-01-22", 22);
    const items = scoreRecommendations(phase, [makeEvent("2024-01-20", "luteal", { painLevel: 4, energyLevel: 2 })]);

    expect(phase.functionalPhase).toBe("nurture");
    expect(items.slice(0, 2).map((item) => item.description)).toEqual([
      "Dietary style: Extended hormone feasting",
      "Consider pain management techniques and additional rest",
    ]);
    expect(items.find((item) => item.description.startsWith("Fasting protocol"))?.priority).toBe(2);
    expect(items.filter((item) => item.category === "activity").every((item) => item.priority === 1)).toBe(true);
    expect(items.map((item) => item.description)).toContain("Practice self-care and emotional connection techniques");
    expect(items).toHaveLength(20);
  });
});
