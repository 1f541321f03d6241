import type { CycleRecord } from "../domain/CycleRecord";
import type { CyclePrediction } from "../domain/CyclePrediction";
import type { Diagnosis } from "../domain/Diagnosis";
import type { ISODateString } from "../domain/Primitives";
import type { SymptomEntry } from "../domain/SymptomEntry";
import { PersistenceError } from "../domain/errors";
import { sortByStartDate } from "../analytics/cycleStatistics";
import { findOverlap } from "../validation/schemas";
import { UserExecutionQueue } from "../screening/UserExecutionQueue";
import {
  findDuplicateId,
  findScreeningResultProblem,
  type HealthDataRepository,
  type UserId,
} from "./HealthDataRepository";

// In-memory repository (reference implementation)
// - For local development, unit tests, and demos.
// - NOT production storage.
//
// Enforcement:
// - Tracking data is append-only; insertion keeps cycles ordered and non-overlapping.
// - Stores immutable snapshots (clones) to prevent mutation through shared references.
// - Diagnoses are keyed by id; writing an existing id replaces it.

function cloneSnapshot<T>(value: T): T {
  return structuredClone(value);
}

interface UserData {
  cycles: CycleRecord[];
  symptoms: SymptomEntry[];
  diagnoses: Map<string, Diagnosis>;
  predictions: CyclePrediction[];
}

export class InMemoryHealthDataRepository implements HealthDataRepository {
  private readonly store = new Map<UserId, UserData>();

  // Serialize writes per-user to preserve ordering checks under concurrent calls.
  private readonly writes = new UserExecutionQueue();

  private enqueue<T>(userId: UserId, op: () => Promise<T>): Promise<T> {
    return this.writes.run(userId, op);
  }

  // Users with a write still queued or running.
  get pendingWriters(): number {
    return this.writes.activeUsers;
  }

  private data(userId: UserId): UserData {
    let data = this.store.get(userId);
    if (!data) {
      data = { cycles: [], symptoms: [], diagnoses: new Map(), predictions: [] };
      this.store.set(userId, data);
    }
    return data;
  }

  async getCycleHistory(userId: UserId): Promise<readonly CycleRecord[]> {
    return cloneSnapshot(this.store.get(userId)?.cycles ?? []);
  }

  async getSymptomLog(userId: UserId, since: ISODateString): Promise<readonly SymptomEntry[]> {
    const entries = this.store.get(userId)?.symptoms ?? [];
    return cloneSnapshot(entries.filter((e) => e.date >= since));
  }

  async getExistingDiagnoses(userId: UserId): Promise<readonly Diagnosis[]> {
    const diagnoses = this.store.get(userId)?.diagnoses;
    if (!diagnoses) return [];
    return cloneSnapshot([...diagnoses.values()].sort((a, b) => a.createdAt.localeCompare(b.createdAt)));
  }

  async getDiagnosis(userId: UserId, diagnosisId: string): Promise<Diagnosis | null> {
    const found = this.store.get(userId)?.diagnoses.get(diagnosisId);
    return found ? cloneSnapshot(found) : null;
  }

  async persistDiagnosis(diagnosis: Diagnosis): Promise<void> {
    return this.enqueue(diagnosis.userId, async () => {
      this.data(diagnosis.userId).diagnoses.set(diagnosis.id, cloneSnapshot(diagnosis));
    });
  }

  async persistPrediction(userId: UserId, prediction: CyclePrediction): Promise<void> {
    return this.enqueue(userId, async () => {
      this.data(userId).predictions.push(cloneSnapshot(prediction));
    });
  }

  async persistScreeningResult(
    userId: UserId,
    prediction: CyclePrediction | null,
    diagnoses: readonly Diagnosis[],
  ): Promise<void> {
    return this.enqueue(userId, async () => {
      const data = this.data(userId);

      // Validate the whole batch first; commit only once nothing can fail.
      const problem = findScreeningResultProblem(userId, new Set(data.diagnoses.keys()), diagnoses);
      if (problem) throw new PersistenceError(problem);

      if (prediction) data.predictions.push(cloneSnapshot(prediction));
      for (const d of diagnoses) data.diagnoses.set(d.id, cloneSnapshot(d));
    });
  }

  async getLatestPrediction(userId: UserId): Promise<CyclePrediction | null> {
    const predictions = this.store.get(userId)?.predictions ?? [];
    const latest = predictions[predictions.length - 1];
    return latest ? cloneSnapshot(latest) : null;
  }

  async appendCycleRecords(userId: UserId, records: readonly CycleRecord[]): Promise<void> {
    if (!records.length) return;

    return this.enqueue(userId, async () => {
      const data = this.data(userId);

      const dupe = findDuplicateId(data.cycles, records, "cycle record");
      if (dupe) throw new PersistenceError(dupe);

      const merged = sortByStartDate(data.cycles.concat(records));
      const overlap = findOverlap(merged);
      if (overlap) throw new PersistenceError(`Append rejected: ${overlap}`);

      data.cycles = merged.map((r) => cloneSnapshot(r));
    });
  }

  async appendSymptomEntries(userId: UserId, entries: readonly SymptomEntry[]): Promise<void> {
    if (!entries.length) return;

    return this.enqueue(userId, async () => {
      const data = this.data(userId);

      const dupe = findDuplicateId(data.symptoms, entries, "symptom entry");
      if (dupe) throw new PersistenceError(dupe);

      // Stable sort keeps insertion order within a day.
      data.symptoms = data.symptoms
        .concat(entries.map((e) => cloneSnapshot(e)))
        .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
    });
  }
}
