import { z } from "zod";
import phaseGuidanceData from "../config/phaseGuidance.v1.json";
import type { FunctionalPhase, PhaseDetails, TraditionalPhase } from "./phaseModels";

const traditionalGuidanceSchema = z.object({
  symptoms: z.array(z.string()),
  recommendations: z.array(z.string()),
});

const functionalGuidanceSchema = z.object({
  dietaryStyle: z.string(),
  fastingProtocol: z.string(),
  foodRecommendations: z.array(z.string()),
  activityRecommendations: z.array(z.string()),
  supplementRecommendations: z.array(z.string()).optional(),
});

const phaseGuidanceSchema = z.object({
  traditional: z.object({
    menstruation: traditionalGuidanceSchema,
    follicular: traditionalGuidanceSchema,
    ovulation: traditionalGuidanceSchema,
    luteal: traditionalGuidanceSchema,
  }),
  functional: z.object({
    power: functionalGuidanceSchema,
    manifestation: functionalGuidanceSchema,
    nurture: functionalGuidanceSchema,
  }),
});

export type FunctionalGuidance = z.infer<typeof functionalGuidanceSchema>;

export type TraditionalGuidance = z.infer<typeof traditionalGuidanceSchema>;

// A malformed guidance file is a packaging bug, so it fails at import time.
export const PHASE_GUIDANCE = phaseGuidanceSchema.parse(phaseGuidanceData);

export const FUNCTIONAL_PHASE_DETAILS: Record<FunctionalPhase, FunctionalGuidance> = PHASE_GUIDANCE.functional;

export const TRADITIONAL_PHASE_GUIDANCE: Record<TraditionalPhase, TraditionalGuidance> = PHASE_GUIDANCE.traditional;

export const PHASE_EMOJI: Record<FunctionalPhase, string> = {
  power: "⚡",
  manifestation: "✨",
  nurture: "🌱",
};

export const getPhaseDetails = (traditionalPhase: TraditionalPhase, functionalPhase: FunctionalPhase): PhaseDetails => {
  const functional = FUNCTIONAL_PHASE_DETAILS[functionalPhase];
  return {
    typicalSymptoms: [...TRADITIONAL_PHASE_GUIDANCE[traditionalPhase].symptoms],
    phaseTips: [...TRADITIONAL_PHASE_GUIDANCE[traditionalPhase].recommendations],
    dietaryStyle: functional.dietaryStyle,
    fastingProtocol: functional.fastingProtocol,
    foodRecommendations: [...functional.foodRecommendations],
    activityRecommendations: [...functional.activityRecommendations],
    supplementRecommendations: functional.supplementRecommendations
      ? [...functional.supplementRecommendations]
      : undefined,
  };
};

export const titleCase = (value: string): string =>
  value ? value.charAt(0).toUpperCase() + value.slice(1).toLowerCase() : value;
