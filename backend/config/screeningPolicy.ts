import { z } from "zod";

// Screening policy constants.
// Defaults are product policy, overridable per deployment through the environment.

export interface ScreeningPolicy {
  // A risk score at or above this creates a diagnosis.
  activationThreshold: number;

  // Lower bounds of the mild / moderate / high / critical bands.
  mildCutpoint: number;
  moderateCutpoint: number;
  highCutpoint: number;
  criticalCutpoint: number;

  // A non-dismissed diagnosis younger than this suppresses a new one for the same condition.
  dedupWindowDays: number;

  // Diagnoses of moderate severity or above are re-screened after this many days.
  followUpDays: number;

  symptomWindowDays: number;
}

export const DEFAULT_SCREENING_POLICY: Readonly<ScreeningPolicy> = Object.freeze({
  activationThreshold: 0.4,
  mildCutpoint: 0.55,
  moderateCutpoint: 0.7,
  highCutpoint: 0.85,
  criticalCutpoint: 0.93,
  dedupWindowDays: 30,
  followUpDays: 30,
  symptomWindowDays: 90,
});

const ScoreEnv = z.coerce.number().min(0).max(1);
const DaysEnv = z.coerce.number().int().positive().max(3650);

const PolicyEnvSchema = z.object({
  SCREENING_ACTIVATION_THRESHOLD: ScoreEnv.optional(),
  SCREENING_CRITICAL_CUTPOINT: ScoreEnv.optional(),
  SCREENING_DEDUP_WINDOW_DAYS: DaysEnv.optional(),
  SCREENING_FOLLOW_UP_DAYS: DaysEnv.optional(),
  SCREENING_SYMPTOM_WINDOW_DAYS: DaysEnv.optional(),
});

// Cut-points must rise strictly, otherwise banding stops being monotonic.
export function assertPolicyMonotonic(policy: ScreeningPolicy): void {
  const cuts = [
    policy.activationThreshold,
    policy.mildCutpoint,
    policy.moderateCutpoint,
    policy.highCutpoint,
    policy.criticalCutpoint,
  ];
  for (let i = 1; i < cuts.length; i++) {
    if (!(cuts[i] > cuts[i - 1])) {
      throw new Error(`Screening policy cut-points must increase strictly (got ${cuts.join(", ")}).`);
    }
  }
  if (policy.criticalCutpoint > 1) {
    throw new Error("Screening policy critical cut-point must not exceed 1.");
  }
}

export function loadScreeningPolicy(env: NodeJS.ProcessEnv = process.env): ScreeningPolicy {
  const parsed = PolicyEnvSchema.safeParse({
    SCREENING_ACTIVATION_THRESHOLD: env.SCREENING_ACTIVATION_THRESHOLD || undefined,
    SCREENING_CRITICAL_CUTPOINT: env.SCREENING_CRITICAL_CUTPOINT || undefined,
    SCREENING_DEDUP_WINDOW_DAYS: env.SCREENING_DEDUP_WINDOW_DAYS || undefined,
    SCREENING_FOLLOW_UP_DAYS: env.SCREENING_FOLLOW_UP_DAYS || undefined,
    SCREENING_SYMPTOM_WINDOW_DAYS: env.SCREENING_SYMPTOM_WINDOW_DAYS || undefined,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid screening policy setting ${issue.path.join(".")}: ${issue.message}`);
  }

  const e = parsed.data;
  const policy: ScreeningPolicy = {
    ...DEFAULT_SCREENING_POLICY,
    activationThreshold: e.SCREENING_ACTIVATION_THRESHOLD ?? DEFAULT_SCREENING_POLICY.activationThreshold,
    criticalCutpoint: e.SCREENING_CRITICAL_CUTPOINT ?? DEFAULT_SCREENING_POLICY.criticalCutpoint,
    dedupWindowDays: e.SCREENING_DEDUP_WINDOW_DAYS ?? DEFAULT_SCREENING_POLICY.dedupWindowDays,
    followUpDays: e.SCREENING_FOLLOW_UP_DAYS ?? DEFAULT_SCREENING_POLICY.followUpDays,
    symptomWindowDays: e.SCREENING_SYMPTOM_WINDOW_DAYS ?? DEFAULT_SCREENING_POLICY.symptomWindowDays,
  };

  assertPolicyMonotonic(policy);
  return policy;
}
