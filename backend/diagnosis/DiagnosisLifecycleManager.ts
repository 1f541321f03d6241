import { randomUUID } from "crypto";
import type { ConditionId } from "../domain/ConditionDefinition";
import { severityRank, type Diagnosis, type DiagnosisStatus } from "../domain/Diagnosis";
import type { ISODateTimeString, UserId } from "../domain/Primitives";
import type { RiskScore } from "../domain/RiskScore";
import { ConcurrentModificationError, InvalidDiagnosisTransitionError } from "../domain/errors";
import type { ConditionCatalog } from "../catalog/ConditionCatalog";
import { DAY_MS, addDaysToTimestamp } from "../analytics/dateMath";
import { DEFAULT_SCREENING_POLICY, type ScreeningPolicy } from "../config/screeningPolicy";
import { classifySeverity } from "./severity";
import { renderAssessment, renderRecommendation } from "./templates";

// =========================================================================
// Diagnosis Lifecycle
//
// Per (user, condition) state machine:
//   none      → active     screening score ≥ activation threshold and no active/reviewed
//                          diagnosis for the condition created inside the dedup window
//   active    → reviewed   markReviewed
//   active    → dismissed  dismiss
//   reviewed  → dismissed  dismiss
//
// Follow-up is derived, not a state: severity ≥ moderate gets
// followUpDate = createdAt + followUpDays.
//
// Every method returns new objects. Nothing here persists.
// =========================================================================

export const ALGORITHM_VERSION = "2.0";

export type LifecycleState = "none" | DiagnosisStatus;

export interface ScreeningContext {
  userId: UserId;
  now: ISODateTimeString;
  cycleRecordsAnalyzed: number;
  symptomEntriesAnalyzed: number;
}

export interface DiagnosisLifecycleOptions {
  policy?: ScreeningPolicy;
  generateId?: () => string;
}

function isOpen(d: Diagnosis): boolean {
  return d.status !== "dismissed";
}

function byCreatedAtDesc(a: Diagnosis, b: Diagnosis): number {
  return Date.parse(b.createdAt) - Date.parse(a.createdAt);
}

export class DiagnosisLifecycleManager {
  private readonly policy: ScreeningPolicy;
  private readonly generateId: () => string;

  constructor(
    private readonly catalog: ConditionCatalog,
    options: DiagnosisLifecycleOptions = {},
  ) {
    this.policy = options.policy ?? DEFAULT_SCREENING_POLICY;
    this.generateId = options.generateId ?? randomUUID;
  }

  private withinDedupWindow(d: Diagnosis, now: ISODateTimeString): boolean {
    const age = Date.parse(now) - Date.parse(d.createdAt);
    return age < this.policy.dedupWindowDays * DAY_MS;
  }

  // Open diagnoses inside the dedup window, grouped by condition.
  private blockingByCondition(existing: readonly Diagnosis[], now: ISODateTimeString): Map<ConditionId, Diagnosis[]> {
    const blocking = new Map<ConditionId, Diagnosis[]>();
    for (const d of existing) {
      if (!isOpen(d) || !this.withinDedupWindow(d, now)) continue;
      const group = blocking.get(d.conditionId) ?? [];
      group.push(d);
      blocking.set(d.conditionId, group);
    }
    return blocking;
  }

  assertNoDuplicateOpen(existing: readonly Diagnosis[], now: ISODateTimeString): void {
    for (const [conditionId, group] of this.blockingByCondition(existing, now)) {
      if (group.length > 1) {
        throw new ConcurrentModificationError(
          `Found ${group.length} open diagnoses for condition "${conditionId}" inside the dedup window.`,
          conditionId,
          group.map((d) => d.id),
        );
      }
    }
  }

  // Most recent diagnosis state for a condition; "none" if there is none.
  stateOf(existing: readonly Diagnosis[], conditionId: ConditionId): LifecycleState {
    const latest = existing.filter((d) => d.conditionId === conditionId).sort(byCreatedAtDesc)[0];
    return latest ? latest.status : "none";
  }

  /**
   * none → active for every qualifying score.
   * Throws ConcurrentModificationError when the existing set already breaks the
   * one-open-diagnosis-per-condition rule; nothing is created in that case.
   */
  createDiagnoses(scores: readonly RiskScore[], existing: readonly Diagnosis[], ctx: ScreeningContext): Diagnosis[] {
    this.assertNoDuplicateOpen(existing, ctx.now);
    const blocking = this.blockingByCondition(existing, ctx.now);

    const created: Diagnosis[] = [];
    for (const score of scores) {
      const severity = classifySeverity(score.score, this.policy);
      if (!severity) continue;
      if (blocking.has(score.conditionId)) continue;

      const condition = this.catalog.require(score.conditionId);
      const urgent = new Set(condition.urgentSymptoms);
      const requiresProfessionalConsultation =
        severityRank(severity) >= severityRank("high") ||
        score.matchedSymptoms.some((s) => urgent.has(s));

      created.push({
        id: this.generateId(),
        userId: ctx.userId,
        conditionId: condition.conditionId,
        conditionName: condition.displayName,
        type: "screening",
        riskScore: score,
        severity,
        assessment: renderAssessment(condition, severity, score.matchedSymptoms),
        recommendation: renderRecommendation(condition, severity, requiresProfessionalConsultation),
        createdAt: ctx.now,
        followUpDate: severityRank(severity) >= severityRank("moderate")
          ? addDaysToTimestamp(ctx.now, this.policy.followUpDays)
          : null,
        requiresProfessionalConsultation,
        status: "active",
        reviewed: false,
        diagnosticData: {
          algorithmVersion: ALGORITHM_VERSION,
          analysisDate: ctx.now,
          cycleRecordsAnalyzed: ctx.cycleRecordsAnalyzed,
          symptomEntriesAnalyzed: ctx.symptomEntriesAnalyzed,
        },
      });
    }

    return created;
  }

  markReviewed(diagnosis: Diagnosis, now: ISODateTimeString): Diagnosis {
    if (diagnosis.status !== "active") {
      throw new InvalidDiagnosisTransitionError(
        `Diagnosis ${diagnosis.id} is ${diagnosis.status}; only active diagnoses can be marked reviewed.`,
      );
    }
    return { ...diagnosis, status: "reviewed", reviewed: true, reviewedAt: now };
  }

  dismiss(diagnosis: Diagnosis, now: ISODateTimeString): Diagnosis {
    if (diagnosis.status === "dismissed") {
      throw new InvalidDiagnosisTransitionError(`Diagnosis ${diagnosis.id} is already dismissed.`);
    }
    return { ...diagnosis, status: "dismissed", dismissedAt: now };
  }

  // Unreviewed, not dismissed, follow-up date reached. Soonest first.
  dueForFollowUp(diagnoses: readonly Diagnosis[], now: ISODateTimeString): Diagnosis[] {
    const nowMs = Date.parse(now);
    return diagnoses
      .filter((d) => isOpen(d) && !d.reviewed && d.followUpDate !== null && Date.parse(d.followUpDate) <= nowMs)
      .sort((a, b) => {
        const diff = Date.parse(a.followUpDate ?? now) - Date.parse(b.followUpDate ?? now);
        return diff !== 0 ? diff : a.id.localeCompare(b.id);
      });
  }

  // Open high/critical diagnoses that call for a professional. Highest score first.
  highRisk(diagnoses: readonly Diagnosis[]): Diagnosis[] {
    return diagnoses
      .filter((d) => isOpen(d) && d.requiresProfessionalConsultation && severityRank(d.severity) >= severityRank("high"))
      .sort((a, b) => b.riskScore.score - a.riskScore.score || byCreatedAtDesc(a, b));
  }
}
