import type { CycleRecord } from "../domain/CycleRecord";
import type { CyclePrediction, PhaseInfo } from "../domain/CyclePrediction";
import type { ConfidenceLevel, ISODateString, ISODateTimeString } from "../domain/Primitives";
import { InsufficientDataError } from "../domain/errors";
import { clamp, computeCycleStatistics, type CycleStatistics } from "./cycleStatistics";
import { addDays } from "./dateMath";
import { LUTEAL_PHASE_DAYS, inferPhaseFromStatistics } from "./PhaseInferenceEngine";

// =========================================================================
// Cycle Prediction
//
// next period   = last start + round(L)
// ovulation     = next period − 14
// fertile window = [ovulation − 5, ovulation + 1]
//
// Confidence comes from the coefficient of variation of completed lengths:
//   max(0.3, min(0.99, 1 − stddev / mean))
// and is capped at 0.5 until three completed cycles exist.
// DETERMINISTIC: no model, no randomness.
// =========================================================================

export const MIN_CONFIDENCE = 0.3;
export const MAX_CONFIDENCE = 0.99;
export const SPARSE_HISTORY_CONFIDENCE_CAP = 0.5;
export const CYCLES_FOR_FULL_CONFIDENCE = 3;

export const FERTILE_DAYS_BEFORE_OVULATION = 5;
export const FERTILE_DAYS_AFTER_OVULATION = 1;

export function computeConfidence(cycleLengths: readonly number[], standardDeviation: number, average: number): number {
  if (cycleLengths.length === 0 || average <= 0) return MIN_CONFIDENCE;

  let confidence = clamp(1 - standardDeviation / average, MIN_CONFIDENCE, MAX_CONFIDENCE);
  if (cycleLengths.length < CYCLES_FOR_FULL_CONFIDENCE) {
    confidence = Math.min(confidence, SPARSE_HISTORY_CONFIDENCE_CAP);
  }
  return confidence;
}

export function confidenceLevelFor(confidence: number): ConfidenceLevel {
  if (confidence >= 0.8) return "high";
  if (confidence >= 0.5) return "medium";
  return "low";
}

export function predictFromStatistics(
  stats: CycleStatistics,
  phase: PhaseInfo,
  computedAt: ISODateTimeString,
): CyclePrediction {
  if (!stats.lastCycleStart) {
    throw new InsufficientDataError("Cycle prediction needs at least one cycle record.");
  }

  const cycleDays = Math.round(stats.averageCycleLength);
  const nextPeriodStart = addDays(stats.lastCycleStart, cycleDays);
  const ovulationDate = addDays(stats.lastCycleStart, cycleDays - LUTEAL_PHASE_DAYS);
  const confidence = computeConfidence(stats.cycleLengths, stats.standardDeviation, stats.averageCycleLength);

  return {
    nextPeriodStart,
    ovulationDate,
    fertileWindowStart: addDays(ovulationDate, -FERTILE_DAYS_BEFORE_OVULATION),
    fertileWindowEnd: addDays(ovulationDate, FERTILE_DAYS_AFTER_OVULATION),
    confidence,
    confidenceLevel: confidenceLevelFor(confidence),
    basedOnCycles: stats.cycleLengths.length,
    averageCycleLength: stats.averageCycleLength,
    overdue: phase.overdue,
    computedAt,
  };
}

/**
 * Forecast the next period and fertile window.
 * Throws InsufficientDataError on an empty history.
 */
export function predictCycle(
  history: readonly CycleRecord[],
  referenceDate: ISODateString,
  computedAt: ISODateTimeString = new Date().toISOString(),
  phase?: PhaseInfo,
): CyclePrediction {
  if (history.length === 0) {
    throw new InsufficientDataError("Cycle prediction needs at least one cycle record.");
  }
  const stats = computeCycleStatistics(history);
  return predictFromStatistics(stats, phase ?? inferPhaseFromStatistics(stats, referenceDate), computedAt);
}
