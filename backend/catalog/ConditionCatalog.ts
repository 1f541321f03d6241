import type { ConditionDefinition, ConditionId, RiskFactorId } from "../domain/ConditionDefinition";
import { CatalogValidationError, UnknownConditionError } from "../domain/errors";
import {
  ConditionCatalogFileSchema,
  type ConditionCatalogFile,
  type ConditionEntryInput,
} from "../validation/schemas";
import conditionsFile from "./conditions.json";

// =========================================================================
// Condition Catalog
//
// Static, read-only registry of screenable menstrual health conditions.
// Entries are data only: adding or tuning a condition means editing
// conditions.json, never the scoring code.
// =========================================================================

function toDefinition(entry: ConditionEntryInput, defaults: ConditionCatalogFile["defaultTemplates"]): ConditionDefinition {
  const symptoms = new Set(Object.keys(entry.symptomWeights));
  for (const urgent of entry.urgentSymptoms) {
    if (!symptoms.has(urgent)) {
      throw new CatalogValidationError(
        `Condition "${entry.conditionId}" flags "${urgent}" as urgent but does not list it as a characteristic symptom.`,
      );
    }
  }

  return Object.freeze({
    conditionId: entry.conditionId,
    displayName: entry.displayName,
    description: entry.description,
    symptomWeights: Object.freeze({ ...entry.symptomWeights }),
    riskFactorWeights: Object.freeze({ ...entry.riskFactorWeights }),
    priorityRank: entry.priorityRank,
    irregularityAssociated: entry.irregularityAssociated,
    urgentSymptoms: Object.freeze([...entry.urgentSymptoms]),
    templates: Object.freeze({
      assessment: entry.templates?.assessment ?? defaults.assessment,
      recommendations: Object.freeze({
        ...defaults.recommendations,
        ...entry.templates?.recommendations,
      }),
    }),
  });
}

export class ConditionCatalog {
  private readonly byId: ReadonlyMap<ConditionId, ConditionDefinition>;

  constructor(definitions: readonly ConditionDefinition[], readonly version: string = "custom") {
    const map = new Map<ConditionId, ConditionDefinition>();
    for (const def of definitions) {
      if (map.has(def.conditionId)) {
        throw new CatalogValidationError(`Duplicate conditionId in catalog: ${def.conditionId}`);
      }
      map.set(def.conditionId, def);
    }
    this.byId = map;
  }

  static fromFile(raw: unknown): ConditionCatalog {
    const parsed = ConditionCatalogFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new CatalogValidationError(
        `Invalid condition catalog at ${issue.path.join(".") || "<root>"}: ${issue.message}`,
      );
    }
    const file = parsed.data;
    return new ConditionCatalog(
      file.conditions.map((entry) => toDefinition(entry, file.defaultTemplates)),
      file.version,
    );
  }

  get size(): number {
    return this.byId.size;
  }

  has(conditionId: ConditionId): boolean {
    return this.byId.has(conditionId);
  }

  get(conditionId: ConditionId): ConditionDefinition | undefined {
    return this.byId.get(conditionId);
  }

  require(conditionId: ConditionId): ConditionDefinition {
    const def = this.byId.get(conditionId);
    if (!def) throw new UnknownConditionError(`Unknown condition: ${conditionId}`);
    return def;
  }

  // Insertion order of the source file.
  all(): readonly ConditionDefinition[] {
    return [...this.byId.values()];
  }

  knownRiskFactors(): RiskFactorId[] {
    const ids = new Set<RiskFactorId>();
    for (const def of this.byId.values()) {
      for (const id of Object.keys(def.riskFactorWeights)) ids.add(id);
    }
    return [...ids].sort();
  }
}

let defaultCatalog: ConditionCatalog | undefined;

export function getDefaultCatalog(): ConditionCatalog {
  if (!defaultCatalog) {
    defaultCatalog = ConditionCatalog.fromFile(conditionsFile);
  }
  return defaultCatalog;
}
