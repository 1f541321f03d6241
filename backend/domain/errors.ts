// Error taxonomy for the screening engine.
// Every error carries a stable code and the HTTP status the API maps it to.

export type HealthEngineErrorCode =
  | "insufficient_data"
  | "invalid_symptom_data"
  | "concurrent_modification"
  | "persistence_failure"
  | "diagnosis_not_found"
  | "invalid_diagnosis_transition"
  | "unknown_condition"
  | "invalid_catalog";

export abstract class HealthEngineError extends Error {
  abstract readonly code: HealthEngineErrorCode;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Not enough cycle history to predict. Screening degrades instead of failing.
export class InsufficientDataError extends HealthEngineError {
  readonly code = "insufficient_data";
  readonly status = 422;
}

// A malformed symptom entry. Scoring skips the entry and keeps going.
export class InvalidSymptomDataError extends HealthEngineError {
  readonly code = "invalid_symptom_data";
  readonly status = 400;

  constructor(
    message: string,
    readonly entryId: string | null,
  ) {
    super(message);
  }
}

// Two non-dismissed diagnoses for one condition exist inside the dedup window.
// The caller must reconcile and retry.
export class ConcurrentModificationError extends HealthEngineError {
  readonly code = "concurrent_modification";
  readonly status = 409;

  constructor(
    message: string,
    readonly conditionId: string,
    readonly diagnosisIds: readonly string[],
  ) {
    super(message);
  }
}

// Raised by storage collaborators and propagated unchanged.
export class PersistenceError extends HealthEngineError {
  readonly code = "persistence_failure";
  readonly status = 503;
}

export class DiagnosisNotFoundError extends HealthEngineError {
  readonly code = "diagnosis_not_found";
  readonly status = 404;
}

export class InvalidDiagnosisTransitionError extends HealthEngineError {
  readonly code = "invalid_diagnosis_transition";
  readonly status = 409;
}

export class UnknownConditionError extends HealthEngineError {
  readonly code = "unknown_condition";
  readonly status = 404;
}

export class CatalogValidationError extends HealthEngineError {
  readonly code = "invalid_catalog";
  readonly status = 500;
}
