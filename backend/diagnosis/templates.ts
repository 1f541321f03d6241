import type { ConditionDefinition } from "../domain/ConditionDefinition";
import type { SeverityBand } from "../domain/Diagnosis";
import type { SymptomType } from "../domain/SymptomEntry";
import { riskLevelLabel } from "./severity";

const PLACEHOLDER = /\{\{\s*(\w+)\s*\}\}/g;
const LISTED_SYMPTOMS = 3;

// Unknown placeholders are left in place so a typo in the catalog is visible.
export function renderTemplate(template: string, vars: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER, (whole: string, key: string) => vars[key] ?? whole);
}

export function humanizeSymptom(symptom: SymptomType): string {
  return symptom.replace(/_/g, " ");
}

// Heaviest-weighted symptoms first, so the text names the most telling ones.
export function describeMatchedSymptoms(condition: ConditionDefinition, matched: readonly SymptomType[]): string {
  if (matched.length === 0) return "none of the characteristic symptoms";
  const ranked = [...matched].sort((a, b) => {
    const diff = (condition.symptomWeights[b] ?? 0) - (condition.symptomWeights[a] ?? 0);
    return diff !== 0 ? diff : a.localeCompare(b);
  });
  return ranked.slice(0, LISTED_SYMPTOMS).map(humanizeSymptom).join(", ");
}

export function renderAssessment(
  condition: ConditionDefinition,
  severity: SeverityBand,
  matched: readonly SymptomType[],
): string {
  return renderTemplate(condition.templates.assessment, {
    conditionName: condition.displayName,
    description: condition.description,
    riskLevel: riskLevelLabel(severity),
    matchedSymptoms: describeMatchedSymptoms(condition, matched),
  });
}

export function renderRecommendation(
  condition: ConditionDefinition,
  severity: SeverityBand,
  requiresConsultation: boolean,
): string {
  const { recommendations } = condition.templates;
  let template = recommendations.monitor;
  if (requiresConsultation) template = recommendations.consult;
  else if (severity === "moderate") template = recommendations.discuss;

  return renderTemplate(template, {
    conditionName: condition.displayName,
    description: condition.description,
    riskLevel: riskLevelLabel(severity),
  });
}
