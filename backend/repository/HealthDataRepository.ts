import type { CycleRecord } from "../domain/CycleRecord";
import type { CyclePrediction } from "../domain/CyclePrediction";
import type { Diagnosis } from "../domain/Diagnosis";
import type { ISODateString, UserId } from "../domain/Primitives";
import type { SymptomEntry } from "../domain/SymptomEntry";

// Repository Boundary
// - This is the ONLY layer that reads/writes tracking data and diagnoses.
// - Repository does not interpret health data; it enforces structural invariants only.
// - Failures surface as PersistenceError and are propagated to the caller unchanged.
//
// Tracking data is append-only:
// - Cycle records and symptom entries are never updated or deleted here.
// - Duplicate ids are rejected.
//
// Diagnoses are written by id (insert or replace). Removal is not offered:
// dismissal is a status change the caller asks for explicitly.

export type { UserId };

export interface HealthDataRepository {
  // Ordered by startDate.
  getCycleHistory(userId: UserId): Promise<readonly CycleRecord[]>;

  // Entries dated on or after `since`, ordered by date, as stored.
  // Not validated here: scoring skips and reports entries that are malformed.
  getSymptomLog(userId: UserId, since: ISODateString): Promise<readonly unknown[]>;

  getExistingDiagnoses(userId: UserId): Promise<readonly Diagnosis[]>;

  getDiagnosis(userId: UserId, diagnosisId: string): Promise<Diagnosis | null>;

  persistDiagnosis(diagnosis: Diagnosis): Promise<void>;

  persistPrediction(userId: UserId, prediction: CyclePrediction): Promise<void>;

  // All or nothing: the prediction (when present) and every new diagnosis are
  // stored together, or the call rejects and nothing is stored.
  persistScreeningResult(
    userId: UserId,
    prediction: CyclePrediction | null,
    diagnoses: readonly Diagnosis[],
  ): Promise<void>;

  getLatestPrediction(userId: UserId): Promise<CyclePrediction | null>;

  appendCycleRecords(userId: UserId, records: readonly CycleRecord[]): Promise<void>;

  appendSymptomEntries(userId: UserId, entries: readonly SymptomEntry[]): Promise<void>;
}

export function findDuplicateId(existing: readonly { id: string }[], incoming: readonly { id: string }[], kind: string): string | null {
  const seen = new Set<string>();
  for (const e of existing) seen.add(e.id);
  for (const e of incoming) {
    if (seen.has(e.id)) return `Append rejected: duplicate ${kind} id detected (${e.id}).`;
    seen.add(e.id);
  }
  return null;
}

// Structural checks on a screening result before any of it is written.
export function findScreeningResultProblem(
  userId: UserId,
  existingIds: ReadonlySet<string>,
  diagnoses: readonly Diagnosis[],
): string | null {
  const seen = new Set<string>();
  for (const d of diagnoses) {
    if (d.userId !== userId) return `Screening result rejected: diagnosis ${d.id} belongs to another user.`;
    if (existingIds.has(d.id) || seen.has(d.id)) return `Screening result rejected: duplicate diagnosis id (${d.id}).`;
    seen.add(d.id);
  }
  return null;
}
