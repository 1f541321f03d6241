import type { ConfidenceLevel, ISODateString, ISODateTimeString } from "./Primitives";

export type CyclePhase = "menstrual" | "follicular" | "ovulatory" | "luteal" | "unknown";

export interface PhaseInfo {
  readonly phase: CyclePhase;

  // 1-based. Day 1 is the first day of the most recent period.
  // null when the reference date falls before that day.
  readonly dayInCycle: number | null;

  // offset / averageCycleLength, clamped to [0, 1].
  readonly cycleProgress: number;

  // The expected next start has passed without a new cycle record.
  readonly overdue: boolean;

  readonly averageCycleLength: number;
  readonly periodLength: number;
  readonly daysUntilNextPeriod: number;
  readonly lastCycleStart: ISODateString;
}

export interface CyclePrediction {
  readonly nextPeriodStart: ISODateString;
  readonly ovulationDate: ISODateString;
  readonly fertileWindowStart: ISODateString;
  readonly fertileWindowEnd: ISODateString;

  // Within [0, 1].
  readonly confidence: number;
  readonly confidenceLevel: ConfidenceLevel;

  // Number of completed cycle lengths the estimate is based on.
  readonly basedOnCycles: number;

  readonly averageCycleLength: number;
  readonly overdue: boolean;
  readonly computedAt: ISODateTimeString;
}

export const PHASE_DESCRIPTIONS: Readonly<Record<CyclePhase, string>> = {
  menstrual: "Your period is here. Focus on rest and self-care.",
  follicular: "Energy is building. Great time for new activities.",
  ovulatory: "Peak fertility window. You might feel most confident.",
  luteal: "Winding down phase. Listen to your body's needs.",
  unknown: "Track more data to get personalized insights.",
};
