import type { ConditionId, RiskFactorId } from "./ConditionDefinition";
import type { ISODateTimeString } from "./Primitives";
import type { SymptomType } from "./SymptomEntry";

// Pure computed value. Never persisted on its own; a Diagnosis keeps a snapshot.
export interface RiskScore {
  readonly conditionId: ConditionId;

  // Always within [0, 1].
  readonly score: number;

  readonly symptomMatchRatio: number;
  readonly riskFactorRatio: number;
  readonly irregularityBonus: number;

  readonly matchedSymptoms: readonly SymptomType[];
  readonly matchedRiskFactors: readonly RiskFactorId[];

  readonly computedAt: ISODateTimeString;
}
