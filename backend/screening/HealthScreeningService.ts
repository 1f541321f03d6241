import type { RiskFactorId } from "../domain/ConditionDefinition";
import type { CycleRecord } from "../domain/CycleRecord";
import { PHASE_DESCRIPTIONS, type CyclePrediction, type PhaseInfo } from "../domain/CyclePrediction";
import type { Diagnosis } from "../domain/Diagnosis";
import type { ISODateString, ISODateTimeString, UserId } from "../domain/Primitives";
import type { RiskScore } from "../domain/RiskScore";
import type { SymptomEntry } from "../domain/SymptomEntry";
import { DiagnosisNotFoundError, InsufficientDataError } from "../domain/errors";
import { getDefaultCatalog, type ConditionCatalog } from "../catalog/ConditionCatalog";
import {
  computeCycleStatistics,
  computeIrregularitySignal,
  deriveCycleRiskFactors,
} from "../analytics/cycleStatistics";
import { addDays, toISODate } from "../analytics/dateMath";
import { inferPhaseFromStatistics } from "../analytics/PhaseInferenceEngine";
import { predictFromStatistics } from "../analytics/PredictionEngine";
import { scoreConditions } from "../analytics/RiskScoringEngine";
import { DEFAULT_SCREENING_POLICY, type ScreeningPolicy } from "../config/screeningPolicy";
import { DiagnosisLifecycleManager } from "../diagnosis/DiagnosisLifecycleManager";
import type { FollowUpNotifier } from "../notifications/FollowUpNotifier";
import { ConsoleFollowUpNotifier } from "../notifications/FollowUpNotifier";
import type { HealthDataRepository } from "../repository/HealthDataRepository";
import { UserExecutionQueue } from "./UserExecutionQueue";

// =========================================================================
// Health Screening Service
//
// The one entry point callers use. A screening run:
//   1. reads history, symptom log and existing diagnoses (one snapshot)
//   2. infers phase → predicts cycle, and scores conditions
//   3. turns qualifying scores into new diagnoses
//   4. only then persists the prediction and the new diagnoses, atomically
//
// Steps 2–3 are pure. Runs and lifecycle mutations are serialized per user.
// Persistence errors propagate unchanged.
// =========================================================================

export interface ScreeningOptions {
  // Day the screening is evaluated for. Defaults to today (UTC).
  referenceDate?: ISODateString;
  riskFactors?: readonly RiskFactorId[];
}

export interface SkippedSymptomEntry {
  entryId: string | null;
  reason: string;
}

export interface ScreeningSnapshot {
  userId: UserId;
  referenceDate: ISODateString;
  now: ISODateTimeString;
  history: readonly CycleRecord[];
  symptoms: readonly unknown[];
  existingDiagnoses: readonly Diagnosis[];
  riskFactors: readonly RiskFactorId[];
}

export interface ScreeningResult {
  userId: UserId;
  referenceDate: ISODateString;
  computedAt: ISODateTimeString;
  phase: PhaseInfo | null;
  prediction: CyclePrediction | null;
  riskScores: RiskScore[];
  diagnoses: Diagnosis[];
  riskFactorsConsidered: RiskFactorId[];
  skippedSymptomEntries: SkippedSymptomEntry[];
}

export interface CycleStatus {
  userId: UserId;
  referenceDate: ISODateString;
  phase: PhaseInfo;
  prediction: CyclePrediction;
  description: string;
}

export interface FollowUpDispatchResult {
  notified: Diagnosis[];
  failed: { diagnosisId: string; reason: string }[];
}

export interface HealthScreeningServiceDeps {
  repository: HealthDataRepository;
  notifier?: FollowUpNotifier;
  catalog?: ConditionCatalog;
  policy?: ScreeningPolicy;
  clock?: () => Date;
  generateId?: () => string;
}

/**
 * Pure evaluation of one snapshot. No I/O, no clock, no mutation.
 */
export function evaluateScreening(
  snapshot: ScreeningSnapshot,
  catalog: ConditionCatalog,
  lifecycle: DiagnosisLifecycleManager,
  policy: ScreeningPolicy,
): ScreeningResult {
  const stats = computeCycleStatistics(snapshot.history);

  let phase: PhaseInfo | null = null;
  let prediction: CyclePrediction | null = null;
  try {
    phase = inferPhaseFromStatistics(stats, snapshot.referenceDate);
    prediction = predictFromStatistics(stats, phase, snapshot.now);
  } catch (err) {
    // No cycle records: screen on symptoms alone.
    if (!(err instanceof InsufficientDataError)) throw err;
  }

  const riskFactors = [...new Set([
    ...snapshot.riskFactors,
    ...deriveCycleRiskFactors(snapshot.history, snapshot.referenceDate),
  ])].sort();

  const scoring = scoreConditions({
    symptoms: snapshot.symptoms,
    referenceDate: snapshot.referenceDate,
    computedAt: snapshot.now,
    catalog,
    irregularity: computeIrregularitySignal(stats),
    riskFactors,
    windowDays: policy.symptomWindowDays,
  });

  const diagnoses = lifecycle.createDiagnoses(scoring.scores, snapshot.existingDiagnoses, {
    userId: snapshot.userId,
    now: snapshot.now,
    cycleRecordsAnalyzed: snapshot.history.length,
    symptomEntriesAnalyzed: scoring.entriesInWindow,
  });

  return {
    userId: snapshot.userId,
    referenceDate: snapshot.referenceDate,
    computedAt: snapshot.now,
    phase,
    prediction,
    riskScores: scoring.scores,
    diagnoses,
    riskFactorsConsidered: riskFactors,
    skippedSymptomEntries: scoring.skipped.map((e) => ({ entryId: e.entryId, reason: e.message })),
  };
}

export class HealthScreeningService {
  private readonly repository: HealthDataRepository;
  private readonly notifier: FollowUpNotifier;
  private readonly catalog: ConditionCatalog;
  private readonly policy: ScreeningPolicy;
  private readonly clock: () => Date;
  private readonly lifecycle: DiagnosisLifecycleManager;
  private readonly queue = new UserExecutionQueue();

  constructor(deps: HealthScreeningServiceDeps) {
    this.repository = deps.repository;
    this.notifier = deps.notifier ?? new ConsoleFollowUpNotifier();
    this.catalog = deps.catalog ?? getDefaultCatalog();
    this.policy = deps.policy ?? DEFAULT_SCREENING_POLICY;
    this.clock = deps.clock ?? (() => new Date());
    this.lifecycle = new DiagnosisLifecycleManager(this.catalog, {
      policy: this.policy,
      generateId: deps.generateId,
    });
  }

  get conditionCatalog(): ConditionCatalog {
    return this.catalog;
  }

  async performHealthScreening(userId: UserId, options: ScreeningOptions = {}): Promise<ScreeningResult> {
    return this.queue.run(userId, async () => {
      const now = this.clock();
      const referenceDate = options.referenceDate ?? toISODate(now);
      const since = addDays(referenceDate, -(this.policy.symptomWindowDays - 1));

      const [history, symptoms, existingDiagnoses] = await Promise.all([
        this.repository.getCycleHistory(userId),
        this.repository.getSymptomLog(userId, since),
        this.repository.getExistingDiagnoses(userId),
      ]);

      const result = evaluateScreening(
        {
          userId,
          referenceDate,
          now: now.toISOString(),
          history,
          symptoms,
          existingDiagnoses,
          riskFactors: options.riskFactors ?? [],
        },
        this.catalog,
        this.lifecycle,
        this.policy,
      );

      // Apply: nothing above touched storage. One atomic write.
      await this.repository.persistScreeningResult(userId, result.prediction, result.diagnoses);

      if (result.skippedSymptomEntries.length > 0) {
        console.warn(`[Screening] Skipped ${result.skippedSymptomEntries.length} malformed symptom entr(ies) for user ${userId.slice(0, 8)}...`);
      }
      console.log(
        `[Screening] user ${userId.slice(0, 8)}...: ${result.riskScores.length} condition(s) scored, ${result.diagnoses.length} new diagnosis(es)`,
      );

      return result;
    });
  }

  async getCycleStatus(userId: UserId, referenceDate?: ISODateString): Promise<CycleStatus> {
    const history = await this.repository.getCycleHistory(userId);
    if (history.length === 0) {
      throw new InsufficientDataError("No cycle records logged yet. Log a period to see cycle status.");
    }

    const now = this.clock();
    const day = referenceDate ?? toISODate(now);
    const stats = computeCycleStatistics(history);
    const phase = inferPhaseFromStatistics(stats, day);

    return {
      userId,
      referenceDate: day,
      phase,
      prediction: predictFromStatistics(stats, phase, now.toISOString()),
      description: PHASE_DESCRIPTIONS[phase.phase],
    };
  }

  async getCycleHistory(userId: UserId): Promise<readonly CycleRecord[]> {
    return this.repository.getCycleHistory(userId);
  }

  async getDiagnoses(userId: UserId): Promise<readonly Diagnosis[]> {
    return this.repository.getExistingDiagnoses(userId);
  }

  async getDiagnosesDueForFollowUp(userId: UserId): Promise<Diagnosis[]> {
    const diagnoses = await this.repository.getExistingDiagnoses(userId);
    return this.lifecycle.dueForFollowUp(diagnoses, this.clock().toISOString());
  }

  async getHighRiskDiagnoses(userId: UserId): Promise<Diagnosis[]> {
    const diagnoses = await this.repository.getExistingDiagnoses(userId);
    return this.lifecycle.highRisk(diagnoses);
  }

  async markReviewed(userId: UserId, diagnosisId: string): Promise<Diagnosis> {
    return this.queue.run(userId, async () => {
      const diagnosis = await this.requireDiagnosis(userId, diagnosisId);
      const updated = this.lifecycle.markReviewed(diagnosis, this.clock().toISOString());
      await this.repository.persistDiagnosis(updated);
      return updated;
    });
  }

  // Dismisses the diagnosis. The record is kept; it no longer blocks new screenings.
  async deleteDiagnosis(userId: UserId, diagnosisId: string): Promise<Diagnosis> {
    return this.queue.run(userId, async () => {
      const diagnosis = await this.requireDiagnosis(userId, diagnosisId);
      const updated = this.lifecycle.dismiss(diagnosis, this.clock().toISOString());
      await this.repository.persistDiagnosis(updated);
      return updated;
    });
  }

  async sendFollowUpReminders(userId: UserId): Promise<FollowUpDispatchResult> {
    const due = await this.getDiagnosesDueForFollowUp(userId);

    const outcomes = await Promise.allSettled(due.map((d) => this.notifier.notifyFollowUpDue(d)));

    const result: FollowUpDispatchResult = { notified: [], failed: [] };
    outcomes.forEach((outcome, i) => {
      if (outcome.status === "fulfilled") {
        result.notified.push(due[i]);
      } else {
        const reason = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        console.error(`[FollowUp] Notification failed for diagnosis ${due[i].id}:`, reason);
        result.failed.push({ diagnosisId: due[i].id, reason });
      }
    });

    return result;
  }

  async logCycles(userId: UserId, records: readonly CycleRecord[]): Promise<void> {
    await this.repository.appendCycleRecords(userId, records);
  }

  async logSymptoms(userId: UserId, entries: readonly SymptomEntry[]): Promise<void> {
    await this.repository.appendSymptomEntries(userId, entries);
  }

  private async requireDiagnosis(userId: UserId, diagnosisId: string): Promise<Diagnosis> {
    const diagnosis = await this.repository.getDiagnosis(userId, diagnosisId);
    if (!diagnosis) throw new DiagnosisNotFoundError(`Diagnosis ${diagnosisId} not found.`);
    return diagnosis;
  }
}
