import type { CycleRecord } from "../domain/CycleRecord";
import type { CyclePhase, PhaseInfo } from "../domain/CyclePrediction";
import type { ISODateString } from "../domain/Primitives";
import { InsufficientDataError } from "../domain/errors";
import { clamp, computeCycleStatistics, type CycleStatistics } from "./cycleStatistics";
import { daysBetween } from "./dateMath";

// =========================================================================
// Phase Inference
//
// Places the reference date inside the current cycle:
//   menstrual   offset in [0, periodLength)
//   ovulatory   offset within ±2 days of (L − 14)
//   follicular  between the two
//   luteal      after the ovulatory window, through day L
//   unknown     offset > L (overdue) or reference before the last start
//
// An overdue cycle is NOT wrapped into a projected new cycle.
// =========================================================================

export const LUTEAL_PHASE_DAYS = 14;
export const OVULATORY_HALF_WIDTH = 2;

export function classifyPhase(offset: number, averageCycleLength: number, periodLength: number): CyclePhase {
  if (offset < 0 || offset > averageCycleLength) return "unknown";
  if (offset < periodLength) return "menstrual";

  const ovulationDay = averageCycleLength - LUTEAL_PHASE_DAYS;
  if (offset < ovulationDay - OVULATORY_HALF_WIDTH) return "follicular";
  if (offset <= ovulationDay + OVULATORY_HALF_WIDTH) return "ovulatory";
  return "luteal";
}

export function inferPhaseFromStatistics(stats: CycleStatistics, referenceDate: ISODateString): PhaseInfo {
  if (!stats.lastCycleStart) {
    throw new InsufficientDataError("Phase inference needs at least one cycle record.");
  }

  const L = stats.averageCycleLength;
  const offset = daysBetween(stats.lastCycleStart, referenceDate);

  return {
    phase: classifyPhase(offset, L, stats.averagePeriodLength),
    dayInCycle: offset >= 0 ? offset + 1 : null,
    cycleProgress: clamp(offset / L, 0, 1),
    overdue: offset > L,
    averageCycleLength: L,
    periodLength: stats.averagePeriodLength,
    daysUntilNextPeriod: Math.max(0, Math.round(L) - offset),
    lastCycleStart: stats.lastCycleStart,
  };
}

export function inferPhase(history: readonly CycleRecord[], referenceDate: ISODateString): PhaseInfo {
  return inferPhaseFromStatistics(computeCycleStatistics(history), referenceDate);
}
