import type { PhaseGroup, PhaseRecommendations } from "../planTypes";

export const makeRecommendations = (overrides: Partial<PhaseRecommendations> = {}): PhaseRecommendations => ({
  fastingProtocol: "F1",
  foods: ["a"],
  activities: ["walk"],
  ...overrides,
});

export const makeGroup = (overrides: Partial<PhaseGroup> & Pick<PhaseGroup, "startDate" | "endDate">): PhaseGroup => ({
  traditionalPhase: "luteal",
  functionalPhase: "nurture",
  functionalPhaseStart: overrides.startDate,
  functionalPhaseEnd: overrides.endDate,
  functionalPhaseDuration: 1,
  isPowerPhaseSecondOccurrence: false,
  nextTraditionalPhase: "menstruation",
  nextFunctionalPhase: "power",
  nextPhaseRecommendations: makeRecommendations({ fastingProtocol: "F2" }),
  hasPhaseTransition: false,
  recommendations: makeRecommendations(),
  ...overrides,
});
