import type { CycleRecord } from "../domain/CycleRecord";
import type { RiskFactorId } from "../domain/ConditionDefinition";
import type { ISODateString } from "../domain/Primitives";
import { daysBetween } from "./dateMath";

// =========================================================================
// Cycle statistics shared by phase inference, prediction and risk scoring.
//
// A completed cycle is the gap between two consecutive start dates.
// Only the most recent RECENT_CYCLE_LIMIT lengths count toward averages.
// =========================================================================

export const DEFAULT_CYCLE_LENGTH = 28;
export const DEFAULT_PERIOD_LENGTH = 5;
export const RECENT_CYCLE_LIMIT = 6;

export interface CycleStatistics {
  // Completed cycle lengths, oldest first, limited to the recent window.
  cycleLengths: number[];
  averageCycleLength: number;
  standardDeviation: number;
  averagePeriodLength: number;
  usedDefaultCycleLength: boolean;
  lastCycleStart: ISODateString | null;
  recordCount: number;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

// Population standard deviation.
export function standardDeviation(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const variance = values.reduce((sum, v) => sum + Math.pow(v - avg, 2), 0) / values.length;
  return Math.sqrt(variance);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function sortByStartDate(history: readonly CycleRecord[]): CycleRecord[] {
  return [...history].sort((a, b) => {
    if (a.startDate === b.startDate) return a.id.localeCompare(b.id);
    return a.startDate < b.startDate ? -1 : 1;
  });
}

export function completedCycleLengths(history: readonly CycleRecord[]): number[] {
  const sorted = sortByStartDate(history);
  const lengths: number[] = [];
  for (let i = 1; i < sorted.length; i++) {
    lengths.push(daysBetween(sorted[i - 1].startDate, sorted[i].startDate));
  }
  return lengths.slice(-RECENT_CYCLE_LIMIT);
}

// Inclusive bleeding duration; null for an open record.
export function periodLengthOf(record: CycleRecord): number | null {
  if (!record.endDate) return null;
  return daysBetween(record.startDate, record.endDate) + 1;
}

export function computeCycleStatistics(history: readonly CycleRecord[]): CycleStatistics {
  const sorted = sortByStartDate(history);
  const cycleLengths = completedCycleLengths(sorted);

  const periodLengths = sorted
    .slice(-RECENT_CYCLE_LIMIT)
    .map(periodLengthOf)
    .filter((v): v is number => v !== null && v > 0);

  const usedDefaultCycleLength = cycleLengths.length === 0;

  return {
    cycleLengths,
    averageCycleLength: usedDefaultCycleLength ? DEFAULT_CYCLE_LENGTH : mean(cycleLengths),
    standardDeviation: standardDeviation(cycleLengths),
    averagePeriodLength: periodLengths.length > 0 ? Math.round(mean(periodLengths)) : DEFAULT_PERIOD_LENGTH,
    usedDefaultCycleLength,
    lastCycleStart: sorted.length > 0 ? sorted[sorted.length - 1].startDate : null,
    recordCount: sorted.length,
  };
}

/**
 * Irregularity signal in [0, 1] from cycle-length spread.
 * A standard deviation of 2 days or less reads as regular (0); 8 days or more saturates at 1.
 * Needs at least two completed cycles.
 */
export function computeIrregularitySignal(stats: CycleStatistics): number {
  if (stats.cycleLengths.length < 2) return 0;
  return clamp((stats.standardDeviation - 2) / 6, 0, 1);
}

const HEAVY_FLOWS = new Set(["heavy", "very_heavy"]);
const ABSENT_PERIOD_DAYS = 90;

/**
 * Risk factors that can be read off the cycle history itself.
 * They are merged with self-reported factors before scoring.
 */
export function deriveCycleRiskFactors(
  history: readonly CycleRecord[],
  referenceDate: ISODateString,
): RiskFactorId[] {
  if (history.length === 0) return [];

  const stats = computeCycleStatistics(history);
  const factors: RiskFactorId[] = [];

  if (!stats.usedDefaultCycleLength) {
    if (stats.averageCycleLength > 35) factors.push("long_cycles");
    if (stats.averageCycleLength < 21) factors.push("short_cycles");
  }
  if (stats.cycleLengths.length >= 2 && stats.standardDeviation > 4) {
    factors.push("irregular_cycles");
  }

  const recent = sortByStartDate(history).slice(-RECENT_CYCLE_LIMIT);
  const heavy = recent.filter((r) => HEAVY_FLOWS.has(r.flowIntensity)).length;
  if (heavy > recent.length / 2) factors.push("heavy_periods");

  if (stats.averagePeriodLength > 7) factors.push("prolonged_periods");

  if (stats.lastCycleStart && daysBetween(stats.lastCycleStart, referenceDate) >= ABSENT_PERIOD_DAYS) {
    factors.push("absent_periods");
  }

  return factors;
}
