import type { ConditionId } from "./ConditionDefinition";
import type { ISODateTimeString, UserId } from "./Primitives";
import type { RiskScore } from "./RiskScore";

export type DiagnosisType = "screening" | "assessment" | "followUp" | "monitoring";

// Ordered from least to most severe.
export const SEVERITY_BANDS = ["low", "mild", "moderate", "high", "critical"] as const;

export type SeverityBand = (typeof SEVERITY_BANDS)[number];

export const DIAGNOSIS_STATUSES = ["active", "reviewed", "dismissed"] as const;

export type DiagnosisStatus = (typeof DIAGNOSIS_STATUSES)[number];

export interface DiagnosticData {
  readonly algorithmVersion: string;
  readonly analysisDate: ISODateTimeString;
  readonly cycleRecordsAnalyzed: number;
  readonly symptomEntriesAnalyzed: number;
}

// A heuristic risk indicator, not a clinical finding.
// Created only by a screening run; mutated only by markReviewed / dismiss.
export interface Diagnosis {
  readonly id: string;
  readonly userId: UserId;
  readonly conditionId: ConditionId;
  readonly conditionName: string;
  readonly type: DiagnosisType;

  readonly riskScore: RiskScore;
  readonly severity: SeverityBand;

  readonly assessment: string;
  readonly recommendation: string;

  readonly createdAt: ISODateTimeString;
  readonly followUpDate: ISODateTimeString | null;
  readonly requiresProfessionalConsultation: boolean;

  readonly status: DiagnosisStatus;
  readonly reviewed: boolean;
  readonly reviewedAt?: ISODateTimeString;
  readonly dismissedAt?: ISODateTimeString;

  readonly diagnosticData: DiagnosticData;
}

export function severityRank(severity: SeverityBand): number {
  return SEVERITY_BANDS.indexOf(severity);
}
