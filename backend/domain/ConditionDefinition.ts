import type { SymptomType } from "./SymptomEntry";

// Catalog entries are pure data. Scoring reads weights from here and
// never branches on a particular conditionId.

export type ConditionId = string;

export type RiskFactorId = string;

export interface RecommendationTemplates {
  // Severity low / mild.
  readonly monitor: string;
  // Severity moderate.
  readonly discuss: string;
  // Severity high / critical, or an urgent symptom was matched.
  readonly consult: string;
}

export interface ConditionTextTemplates {
  readonly assessment: string;
  readonly recommendations: RecommendationTemplates;
}

export interface ConditionDefinition {
  readonly conditionId: ConditionId;
  readonly displayName: string;
  readonly description: string;

  readonly symptomWeights: Readonly<Partial<Record<SymptomType, number>>>;
  readonly riskFactorWeights: Readonly<Record<RiskFactorId, number>>;

  // 1 is the highest clinical priority. Used to break score ties.
  readonly priorityRank: number;

  // Receives the cycle irregularity bonus when true.
  readonly irregularityAssociated: boolean;

  // Any of these in the matched set forces a professional-consultation flag.
  readonly urgentSymptoms: readonly SymptomType[];

  readonly templates: ConditionTextTemplates;
}
