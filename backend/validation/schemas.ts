import { z } from "zod";
import { FLOW_INTENSITIES } from "../domain/CycleRecord";
import { DIAGNOSIS_STATUSES, SEVERITY_BANDS } from "../domain/Diagnosis";
import { MOOD_TAGS, SYMPTOM_TYPES } from "../domain/SymptomEntry";
import { isValidISODate } from "../analytics/dateMath";

// Cycle Insight — Input Validation Schemas (Zod)
//
// Validates incoming API payloads, stored rows and catalog files before they
// reach domain logic. These schemas mirror the domain types but enforce runtime
// constraints that TypeScript types alone cannot guarantee.

// --- Shared ---

export const ISODateSchema = z.string().refine(
  (val: string) => /^\d{4}-\d{2}-\d{2}$/.test(val) && isValidISODate(val),
  { message: "Must be a calendar date in YYYY-MM-DD form" },
);

export const ISODateTimeSchema = z.string().refine(
  (val: string) => !isNaN(Date.parse(val)),
  { message: "Must be a valid ISO 8601 datetime string" },
);

export const FlowIntensitySchema = z.enum(FLOW_INTENSITIES);

export const SymptomTypeSchema = z.enum(SYMPTOM_TYPES);

export const MoodTagSchema = z.enum(MOOD_TAGS);

export const SymptomSeveritySchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
]);

const IdSchema = z.string().min(1, "ID is required").max(128);

const RiskFactorIdSchema = z.string().regex(/^[a-z0-9_]+$/, "Risk factors are snake_case identifiers").max(64);

// --- Tracking data ---

export const CycleRecordSchema = z.object({
  id: IdSchema,
  startDate: ISODateSchema,
  endDate: ISODateSchema.nullable().optional(),
  flowIntensity: FlowIntensitySchema,
}).refine(
  (data: { startDate: string; endDate?: string | null }) => !data.endDate || data.endDate >= data.startDate,
  { message: "endDate must be on or after startDate", path: ["endDate"] },
);

export const SymptomEntrySchema = z.object({
  id: IdSchema,
  date: ISODateSchema,
  symptomType: SymptomTypeSchema,
  severity: SymptomSeveritySchema,
  moodTag: MoodTagSchema.optional(),
  notes: z.string().max(2000, "Notes must be 2000 characters or less").optional(),
});

type CycleRecordInput = z.infer<typeof CycleRecordSchema>;

// Records must be ordered by startDate and must not overlap.
// An open record (no endDate) ends implicitly when the next one starts.
export function findOverlap(records: readonly Pick<CycleRecordInput, "id" | "startDate" | "endDate">[]): string | null {
  for (let i = 1; i < records.length; i++) {
    const prev = records[i - 1];
    const curr = records[i];
    if (curr.startDate <= prev.startDate) {
      return `Cycle ${curr.id} must start after cycle ${prev.id}.`;
    }
    if (prev.endDate && curr.startDate <= prev.endDate) {
      return `Cycle ${curr.id} overlaps cycle ${prev.id}.`;
    }
  }
  return null;
}

// --- API request schemas ---

export const AppendCyclesRequestSchema = z.object({
  records: z.array(CycleRecordSchema).min(1).max(500).optional(),
  record: CycleRecordSchema.optional(),
}).refine(
  (data: { records?: unknown; record?: unknown }) => data.records || data.record,
  { message: "Request body must contain 'records' array or 'record' object." },
).superRefine((data, ctx) => {
  const overlap = data.records ? findOverlap(data.records) : null;
  if (overlap) ctx.addIssue({ code: z.ZodIssueCode.custom, message: overlap, path: ["records"] });
});

export const AppendSymptomsRequestSchema = z.object({
  entries: z.array(SymptomEntrySchema).min(1).max(1000).optional(),
  entry: SymptomEntrySchema.optional(),
}).refine(
  (data: { entries?: unknown; entry?: unknown }) => data.entries || data.entry,
  { message: "Request body must contain 'entries' array or 'entry' object." },
);

export const ScreeningRequestSchema = z.object({
  referenceDate: ISODateSchema.optional(),
  riskFactors: z.array(RiskFactorIdSchema).max(50).optional(),
}).default({});

export const CycleStatusQuerySchema = z.object({
  referenceDate: ISODateSchema.optional(),
});

export const TokenRequestSchema = z.object({
  deviceId: z.string().min(8).max(128),
});

export const RefreshTokenRequestSchema = z.object({
  refreshToken: z.string().min(1),
});

// --- Stored values ---

export const RiskScoreSchema = z.object({
  conditionId: z.string().min(1),
  score: z.number().min(0).max(1),
  symptomMatchRatio: z.number().min(0).max(1),
  riskFactorRatio: z.number().min(0).max(1),
  irregularityBonus: z.number().min(0).max(1),
  matchedSymptoms: z.array(SymptomTypeSchema),
  matchedRiskFactors: z.array(z.string()),
  computedAt: ISODateTimeSchema,
});

export const SeverityBandSchema = z.enum(SEVERITY_BANDS);

export const DiagnosisStatusSchema = z.enum(DIAGNOSIS_STATUSES);

export const DiagnosisTypeSchema = z.enum(["screening", "assessment", "followUp", "monitoring"]);

export const DiagnosticDataSchema = z.object({
  algorithmVersion: z.string(),
  analysisDate: ISODateTimeSchema,
  cycleRecordsAnalyzed: z.number().int().min(0),
  symptomEntriesAnalyzed: z.number().int().min(0),
});

// --- Condition catalog file ---

const RecommendationTemplatesSchema = z.object({
  monitor: z.string().min(1),
  discuss: z.string().min(1),
  consult: z.string().min(1),
});

const TextTemplatesSchema = z.object({
  assessment: z.string().min(1),
  recommendations: RecommendationTemplatesSchema,
});

const WeightSchema = z.number().positive().finite();

export const ConditionEntrySchema = z.object({
  conditionId: z.string().regex(/^[a-z0-9_]+$/),
  displayName: z.string().min(1),
  description: z.string().min(1),
  priorityRank: z.number().int().positive(),
  irregularityAssociated: z.boolean(),
  symptomWeights: z.record(SymptomTypeSchema, WeightSchema).refine(
    (weights) => Object.keys(weights).length > 0,
    { message: "A condition needs at least one characteristic symptom" },
  ),
  riskFactorWeights: z.record(RiskFactorIdSchema, WeightSchema),
  urgentSymptoms: z.array(SymptomTypeSchema),
  templates: z.object({
    assessment: z.string().min(1).optional(),
    recommendations: RecommendationTemplatesSchema.partial().optional(),
  }).optional(),
});

export const ConditionCatalogFileSchema = z.object({
  version: z.string().min(1),
  defaultTemplates: TextTemplatesSchema,
  conditions: z.array(ConditionEntrySchema).min(1),
});

export type ConditionEntryInput = z.infer<typeof ConditionEntrySchema>;
export type ConditionCatalogFile = z.infer<typeof ConditionCatalogFileSchema>;

export const CyclePredictionSchema = z.object({
  nextPeriodStart: ISODateSchema,
  ovulationDate: ISODateSchema,
  fertileWindowStart: ISODateSchema,
  fertileWindowEnd: ISODateSchema,
  confidence: z.number().min(0).max(1),
  confidenceLevel: z.enum(["low", "medium", "high"]),
  basedOnCycles: z.number().int().min(0),
  averageCycleLength: z.number().positive(),
  overdue: z.boolean(),
  computedAt: ISODateTimeSchema,
});
