import type { z } from "zod";
import type { CycleRecord } from "../domain/CycleRecord";
import type { CyclePrediction } from "../domain/CyclePrediction";
import type { Diagnosis } from "../domain/Diagnosis";
import type { ISODateString } from "../domain/Primitives";
import type { SymptomEntry } from "../domain/SymptomEntry";
import { HealthEngineError, PersistenceError } from "../domain/errors";
import { sortByStartDate } from "../analytics/cycleStatistics";
import { query, withUserTransaction, type SqlClient } from "../database/connection";
import {
  CyclePredictionSchema,
  CycleRecordSchema,
  DiagnosisStatusSchema,
  DiagnosisTypeSchema,
  DiagnosticDataSchema,
  RiskScoreSchema,
  SeverityBandSchema,
  findOverlap,
} from "../validation/schemas";
import {
  findDuplicateId,
  findScreeningResultProblem,
  type HealthDataRepository,
  type UserId,
} from "./HealthDataRepository";

// =========================================================================
// PostgreSQL Health Data Repository
//
// Production storage backend. Implements the same HealthDataRepository
// interface as InMemoryHealthDataRepository, preserving all invariants:
// - Append-only tracking data
// - Duplicate ID rejection
// - Ordered, non-overlapping cycles
//
// Cycle, diagnosis and prediction rows are validated on the way out; a row
// that no longer matches the domain contract surfaces as PersistenceError.
// Symptom rows are handed back as stored: scoring skips the malformed ones.
// Check-then-write operations run in withUserTransaction.
// See database/schema.sql.
// =========================================================================

// --- Row ↔ Domain mapping ---

type CycleRow = {
  id: string;
  start_date: string;
  end_date: string | null;
  flow_intensity: string;
};

type SymptomRow = {
  id: string;
  entry_date: string;
  symptom_type: string;
  severity: number;
  mood_tag: string | null;
  notes: string | null;
};

type DiagnosisRow = {
  id: string;
  user_id: string;
  condition_id: string;
  condition_name: string;
  diagnosis_type: string;
  risk_score: unknown;
  severity: string;
  assessment: string;
  recommendation: string;
  created_at: Date;
  follow_up_date: Date | null;
  requires_professional_consultation: boolean;
  status: string;
  reviewed: boolean;
  reviewed_at: Date | null;
  dismissed_at: Date | null;
  diagnostic_data: unknown;
};

type PredictionRow = {
  prediction: unknown;
};

const CYCLE_COLUMNS = `id, to_char(start_date, 'YYYY-MM-DD') AS start_date,
  to_char(end_date, 'YYYY-MM-DD') AS end_date, flow_intensity`;

const SYMPTOM_COLUMNS = `id, to_char(entry_date, 'YYYY-MM-DD') AS entry_date,
  symptom_type, severity, mood_tag, notes`;

function parseRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new PersistenceError(`Stored ${what} failed validation: ${parsed.error.message}`);
  }
  return parsed.data;
}

function rowToCycle(row: CycleRow): CycleRecord {
  return parseRow(CycleRecordSchema, {
    id: row.id,
    startDate: row.start_date,
    endDate: row.end_date,
    flowIntensity: row.flow_intensity,
  }, `cycle record ${row.id}`);
}

// Unchecked: symptom_type and severity may hold values outside the vocabulary.
export interface StoredSymptomEntry {
  id: string;
  date: string;
  symptomType: string;
  severity: number;
  moodTag?: string;
  notes?: string;
}

function rowToSymptom(row: SymptomRow): StoredSymptomEntry {
  return {
    id: row.id,
    date: row.entry_date,
    symptomType: row.symptom_type,
    severity: row.severity,
    ...(row.mood_tag ? { moodTag: row.mood_tag } : {}),
    ...(row.notes ? { notes: row.notes } : {}),
  };
}

function rowToDiagnosis(row: DiagnosisRow): Diagnosis {
  const what = `diagnosis ${row.id}`;
  return {
    id: row.id,
    userId: row.user_id,
    conditionId: row.condition_id,
    conditionName: row.condition_name,
    type: parseRow(DiagnosisTypeSchema, row.diagnosis_type, what),
    riskScore: parseRow(RiskScoreSchema, row.risk_score, what),
    severity: parseRow(SeverityBandSchema, row.severity, what),
    assessment: row.assessment,
    recommendation: row.recommendation,
    createdAt: row.created_at.toISOString(),
    followUpDate: row.follow_up_date ? row.follow_up_date.toISOString() : null,
    requiresProfessionalConsultation: row.requires_professional_consultation,
    status: parseRow(DiagnosisStatusSchema, row.status, what),
    reviewed: row.reviewed,
    ...(row.reviewed_at ? { reviewedAt: row.reviewed_at.toISOString() } : {}),
    ...(row.dismissed_at ? { dismissedAt: row.dismissed_at.toISOString() } : {}),
    diagnosticData: parseRow(DiagnosticDataSchema, row.diagnostic_data, what),
  };
}

// Driver and network failures become PersistenceError; domain errors pass through.
async function guarded<T>(action: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof HealthEngineError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new PersistenceError(`${action} failed: ${message}`, { cause: err });
  }
}

const DIAGNOSIS_INSERT = `INSERT INTO diagnoses
  (id, user_id, condition_id, condition_name, diagnosis_type, risk_score, severity,
   assessment, recommendation, created_at, follow_up_date, requires_professional_consultation,
   status, reviewed, reviewed_at, dismissed_at, diagnostic_data)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17)`;

// Only lifecycle fields change after creation.
const DIAGNOSIS_UPSERT = `${DIAGNOSIS_INSERT}
  ON CONFLICT (id) DO UPDATE SET
    status = EXCLUDED.status,
    reviewed = EXCLUDED.reviewed,
    reviewed_at = EXCLUDED.reviewed_at,
    dismissed_at = EXCLUDED.dismissed_at`;

const PREDICTION_INSERT = `INSERT INTO cycle_predictions (user_id, computed_at, prediction) VALUES ($1, $2, $3)`;

function diagnosisParams(d: Diagnosis): unknown[] {
  return [
    d.id,
    d.userId,
    d.conditionId,
    d.conditionName,
    d.type,
    JSON.stringify(d.riskScore),
    d.severity,
    d.assessment,
    d.recommendation,
    d.createdAt,
    d.followUpDate,
    d.requiresProfessionalConsultation,
    d.status,
    d.reviewed,
    d.reviewedAt ?? null,
    d.dismissedAt ?? null,
    JSON.stringify(d.diagnosticData),
  ];
}

function predictionParams(userId: UserId, prediction: CyclePrediction): unknown[] {
  return [userId, prediction.computedAt, JSON.stringify(prediction)];
}

async function loadCycles(client: SqlClient, userId: UserId): Promise<CycleRecord[]> {
  const result = await client.query<CycleRow>(
    `SELECT ${CYCLE_COLUMNS} FROM cycle_records WHERE user_id = $1 ORDER BY start_date ASC`,
    [userId],
  );
  return result.rows.map(rowToCycle);
}

export class PostgresHealthDataRepository implements HealthDataRepository {

  async getCycleHistory(userId: UserId): Promise<readonly CycleRecord[]> {
    return guarded("Loading cycle history", async () => {
      const result = await query<CycleRow>(
        `SELECT ${CYCLE_COLUMNS} FROM cycle_records WHERE user_id = $1 ORDER BY start_date ASC`,
        [userId],
      );
      return result.rows.map(rowToCycle);
    });
  }

  async getSymptomLog(userId: UserId, since: ISODateString): Promise<readonly StoredSymptomEntry[]> {
    return guarded("Loading symptom log", async () => {
      const result = await query<SymptomRow>(
        `SELECT ${SYMPTOM_COLUMNS} FROM symptom_entries
         WHERE user_id = $1 AND entry_date >= $2::date
         ORDER BY entry_date ASC, created_at ASC`,
        [userId, since],
      );
      return result.rows.map(rowToSymptom);
    });
  }

  async getExistingDiagnoses(userId: UserId): Promise<readonly Diagnosis[]> {
    return guarded("Loading diagnoses", async () => {
      const result = await query<DiagnosisRow>(
        `SELECT * FROM diagnoses WHERE user_id = $1 ORDER BY created_at ASC`,
        [userId],
      );
      return result.rows.map(rowToDiagnosis);
    });
  }

  async getDiagnosis(userId: UserId, diagnosisId: string): Promise<Diagnosis | null> {
    return guarded("Loading diagnosis", async () => {
      const result = await query<DiagnosisRow>(
        `SELECT * FROM diagnoses WHERE user_id = $1 AND id = $2 LIMIT 1`,
        [userId, diagnosisId],
      );
      return result.rows.length > 0 ? rowToDiagnosis(result.rows[0]) : null;
    });
  }

  async persistDiagnosis(d: Diagnosis): Promise<void> {
    await guarded("Saving diagnosis", () => query(DIAGNOSIS_UPSERT, diagnosisParams(d)));
  }

  async persistPrediction(userId: UserId, prediction: CyclePrediction): Promise<void> {
    await guarded("Saving prediction", () => query(PREDICTION_INSERT, predictionParams(userId, prediction)));
  }

  async persistScreeningResult(
    userId: UserId,
    prediction: CyclePrediction | null,
    diagnoses: readonly Diagnosis[],
  ): Promise<void> {
    await guarded("Saving screening result", () => withUserTransaction(userId, async (client) => {
      const existingIds = new Set<string>();
      if (diagnoses.length > 0) {
        const found = await client.query<{ id: string }>(
          `SELECT id FROM diagnoses WHERE id = ANY($1::text[])`,
          [diagnoses.map((d) => d.id)],
        );
        for (const row of found.rows) existingIds.add(row.id);
      }
      const problem = findScreeningResultProblem(userId, existingIds, diagnoses);
      if (problem) throw new PersistenceError(problem);

      if (prediction) {
        await client.query(PREDICTION_INSERT, predictionParams(userId, prediction));
      }
      for (const d of diagnoses) {
        await client.query(DIAGNOSIS_INSERT, diagnosisParams(d));
      }
    }));
  }

  async getLatestPrediction(userId: UserId): Promise<CyclePrediction | null> {
    return guarded("Loading prediction", async () => {
      const result = await query<PredictionRow>(
        `SELECT prediction FROM cycle_predictions
         WHERE user_id = $1
         ORDER BY computed_at DESC, id DESC
         LIMIT 1`,
        [userId],
      );
      if (result.rows.length === 0) return null;
      return parseRow(CyclePredictionSchema, result.rows[0].prediction, "cycle prediction");
    });
  }

  async appendCycleRecords(userId: UserId, records: readonly CycleRecord[]): Promise<void> {
    if (!records.length) return;

    await guarded("Appending cycle records", () => withUserTransaction(userId, async (client) => {
      const existing = await loadCycles(client, userId);

      const dupe = findDuplicateId(existing, records, "cycle record");
      if (dupe) throw new PersistenceError(dupe);

      const overlap = findOverlap(sortByStartDate(existing.concat(records)));
      if (overlap) throw new PersistenceError(`Append rejected: ${overlap}`);

      for (const r of records) {
        await client.query(
          `INSERT INTO cycle_records (id, user_id, start_date, end_date, flow_intensity)
           VALUES ($1, $2, $3, $4, $5)`,
          [r.id, userId, r.startDate, r.endDate ?? null, r.flowIntensity],
        );
      }
    }));
  }

  async appendSymptomEntries(userId: UserId, entries: readonly SymptomEntry[]): Promise<void> {
    if (!entries.length) return;

    await guarded("Appending symptom entries", () => withUserTransaction(userId, async (client) => {
      const dupeCheck = await client.query<{ id: string }>(
        `SELECT id FROM symptom_entries WHERE user_id = $1 AND id = ANY($2::text[])`,
        [userId, entries.map((e) => e.id)],
      );
      const dupe = findDuplicateId(dupeCheck.rows, entries, "symptom entry");
      if (dupe) throw new PersistenceError(dupe);

      for (const e of entries) {
        await client.query(
          `INSERT INTO symptom_entries (id, user_id, entry_date, symptom_type, severity, mood_tag, notes)
           VALUES ($1, $2, $3, $4, $5, $6, $7)`,
          [e.id, userId, e.date, e.symptomType, e.severity, e.moodTag ?? null, e.notes ?? null],
        );
      }
    }));
  }
}
