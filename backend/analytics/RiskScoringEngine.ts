import type { ConditionDefinition, RiskFactorId } from "../domain/ConditionDefinition";
import type { ISODateString, ISODateTimeString } from "../domain/Primitives";
import type { RiskScore } from "../domain/RiskScore";
import { isSymptomType, type SymptomEntry, type SymptomType } from "../domain/SymptomEntry";
import { InvalidSymptomDataError } from "../domain/errors";
import type { ConditionCatalog } from "../catalog/ConditionCatalog";
import { SymptomEntrySchema } from "../validation/schemas";
import { clamp } from "./cycleStatistics";
import { daysBetween } from "./dateMath";

// =========================================================================
// Risk Scoring Engine
//
// Scores every cataloged condition against the trailing symptom window.
//
//   raw = 0.7 · symptomMatchRatio      (weight of matched symptoms / total symptom weight)
//       + 0.2 · riskFactorRatio        (weight of matched risk factors / total risk-factor weight)
//       + 0.1 · irregularityBonus      (only for irregularity-associated conditions)
//
// Output order: score desc → catalog priorityRank asc → conditionId asc.
// DETERMINISTIC and side-effect free: computedAt comes from the caller.
// =========================================================================

export const SYMPTOM_WEIGHT = 0.7;
export const RISK_FACTOR_WEIGHT = 0.2;
export const IRREGULARITY_WEIGHT = 0.1;

export const DEFAULT_SYMPTOM_WINDOW_DAYS = 90;

const SCORE_PRECISION = 10_000;

export interface RiskScoringInput {
  symptoms: readonly unknown[];
  referenceDate: ISODateString;
  computedAt: ISODateTimeString;
  catalog: ConditionCatalog;

  // Cycle irregularity signal in [0, 1].
  irregularity?: number;

  // Self-reported and cycle-derived risk factor ids.
  riskFactors?: readonly RiskFactorId[];

  windowDays?: number;
}

export interface RiskScoringResult {
  scores: RiskScore[];
  entriesInWindow: number;
  skipped: InvalidSymptomDataError[];
}

function roundScore(value: number): number {
  return Math.round(value * SCORE_PRECISION) / SCORE_PRECISION;
}

// Truncated so the reported score never exceeds the raw value: a raw 0.39995
// stays below a 0.40 threshold. The epsilon absorbs float noise on exact values.
function truncateScore(value: number): number {
  return Math.floor(value * SCORE_PRECISION + 1e-9) / SCORE_PRECISION;
}

function entryIdOf(raw: unknown): string | null {
  if (typeof raw === "object" && raw !== null && "id" in raw && typeof raw.id === "string") {
    return raw.id;
  }
  return null;
}

/**
 * Keeps well-formed entries whose date falls in (referenceDate − windowDays, referenceDate].
 * Malformed entries are reported and skipped; they never fail the run.
 */
export function selectSymptomWindow(
  symptoms: readonly unknown[],
  referenceDate: ISODateString,
  windowDays: number = DEFAULT_SYMPTOM_WINDOW_DAYS,
): { entries: SymptomEntry[]; skipped: InvalidSymptomDataError[] } {
  const entries: SymptomEntry[] = [];
  const skipped: InvalidSymptomDataError[] = [];

  for (const raw of symptoms) {
    const parsed = SymptomEntrySchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      skipped.push(new InvalidSymptomDataError(
        `Skipped symptom entry: ${issue.path.join(".") || "entry"} ${issue.message}`,
        entryIdOf(raw),
      ));
      continue;
    }

    const age = daysBetween(parsed.data.date, referenceDate);
    if (age >= 0 && age < windowDays) entries.push(parsed.data);
  }

  return { entries, skipped };
}

function weightedMatch(
  weights: Readonly<Record<string, number | undefined>>,
  present: ReadonlySet<string>,
): { ratio: number; matched: string[] } {
  let total = 0;
  let hit = 0;
  const matched: string[] = [];

  // Sorted keys keep matched lists stable regardless of source ordering.
  const entries = Object.entries(weights).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [key, weight = 0] of entries) {
    total += weight;
    if (present.has(key)) {
      hit += weight;
      matched.push(key);
    }
  }

  return { ratio: total > 0 ? hit / total : 0, matched };
}

export function scoreCondition(
  condition: ConditionDefinition,
  presentSymptoms: ReadonlySet<SymptomType>,
  riskFactors: ReadonlySet<RiskFactorId>,
  irregularity: number,
  computedAt: ISODateTimeString,
): RiskScore {
  const symptomMatch = weightedMatch(condition.symptomWeights, presentSymptoms);
  const riskMatch = weightedMatch(condition.riskFactorWeights, riskFactors);
  const irregularityBonus = condition.irregularityAssociated ? clamp(irregularity, 0, 1) : 0;

  const raw =
    SYMPTOM_WEIGHT * symptomMatch.ratio +
    RISK_FACTOR_WEIGHT * riskMatch.ratio +
    IRREGULARITY_WEIGHT * irregularityBonus;

  return {
    conditionId: condition.conditionId,
    score: truncateScore(clamp(raw, 0, 1)),
    symptomMatchRatio: roundScore(symptomMatch.ratio),
    riskFactorRatio: roundScore(riskMatch.ratio),
    irregularityBonus: roundScore(irregularityBonus),
    matchedSymptoms: symptomMatch.matched.filter(isSymptomType),
    matchedRiskFactors: riskMatch.matched,
    computedAt,
  };
}

export function compareRiskScores(catalog: ConditionCatalog): (a: RiskScore, b: RiskScore) => number {
  return (a, b) => {
    if (a.score !== b.score) return b.score - a.score;
    const rankA = catalog.get(a.conditionId)?.priorityRank ?? Number.MAX_SAFE_INTEGER;
    const rankB = catalog.get(b.conditionId)?.priorityRank ?? Number.MAX_SAFE_INTEGER;
    if (rankA !== rankB) return rankA - rankB;
    return a.conditionId < b.conditionId ? -1 : a.conditionId > b.conditionId ? 1 : 0;
  };
}

/**
 * Score every condition in the catalog. An empty symptom window yields no scores.
 */
export function scoreConditions(input: RiskScoringInput): RiskScoringResult {
  const { entries, skipped } = selectSymptomWindow(
    input.symptoms,
    input.referenceDate,
    input.windowDays ?? DEFAULT_SYMPTOM_WINDOW_DAYS,
  );

  if (entries.length === 0) {
    return { scores: [], entriesInWindow: 0, skipped };
  }

  const present = new Set<SymptomType>(entries.map((e) => e.symptomType));
  const riskFactors = new Set<RiskFactorId>(input.riskFactors ?? []);
  const irregularity = input.irregularity ?? 0;

  const scores = input.catalog
    .all()
    .map((condition) => scoreCondition(condition, present, riskFactors, irregularity, input.computedAt))
    .sort(compareRiskScores(input.catalog));

  return { scores, entriesInWindow: entries.length, skipped };
}
