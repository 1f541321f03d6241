import { describe, it, expect } from "vitest";
import { DiagnosisLifecycleManager } from "./DiagnosisLifecycleManager";
import { classifySeverity } from "./severity";
import { DEFAULT_SCREENING_POLICY } from "../config/screeningPolicy";
import type { RiskScore } from "../domain/RiskScore";
import type { SymptomType } from "../domain/SymptomEntry";
import { ConcurrentModificationError, InvalidDiagnosisTransitionError } from "../domain/errors";
import { TEST_USER, catalogOf, condition, diagnosis, sequentialIds } from "../testing/builders";

const NOW = "2024-03-10T12:00:00.000Z";

const catalog = catalogOf(
  condition({ conditionId: "pcos", priorityRank: 3, symptomWeights: { irregular_periods: 1 } }),
  condition({
    conditionId: "menorrhagia",
    priorityRank: 1,
    symptomWeights: { heavy_bleeding: 2, dizziness: 1 },
    urgentSymptoms: ["dizziness"],
  }),
);

const ctx = { userId: TEST_USER, now: NOW, cycleRecordsAnalyzed: 4, symptomEntriesAnalyzed: 7 };

function score(conditionId: string, value: number, matchedSymptoms: SymptomType[] = []): RiskScore {
  return {
    conditionId,
    score: value,
    symptomMatchRatio: 0,
    riskFactorRatio: 0,
    irregularityBonus: 0,
    matchedSymptoms,
    matchedRiskFactors: [],
    computedAt: NOW,
  };
}

function manager(): DiagnosisLifecycleManager {
  return new DiagnosisLifecycleManager(catalog, { generateId: sequentialIds() });
}

describe("classifySeverity", () => {
  it.each([
    { value: 0.399, band: null },
    { value: 0.4, band: "low" },
    { value: 0.5499, band: "low" },
    { value: 0.55, band: "mild" },
    { value: 0.7, band: "moderate" },
    { value: 0.85, band: "high" },
    { value: 0.93, band: "critical" },
    { value: 1, band: "critical" },
  ])("$value is $band", ({ value, band }) => {
    expect(classifySeverity(value, DEFAULT_SCREENING_POLICY)).toBe(band);
  });
});

describe("DiagnosisLifecycleManager.createDiagnoses", () => {
  it("creates a low-severity diagnosis exactly at the activation threshold", () => {
    const [created, ...rest] = manager().createDiagnoses([score("pcos", 0.4)], [], ctx);

    expect(rest).toEqual([]);
    expect(created).toEqual({
      id: "diag-1",
      userId: TEST_USER,
      conditionId: "pcos",
      conditionName: "PCOS",
      type: "screening",
      riskScore: score("pcos", 0.4),
      severity: "low",
      assessment: "low risk of PCOS: none of the characteristic symptoms",
      recommendation: "monitor PCOS",
      createdAt: NOW,
      followUpDate: null,
      requiresProfessionalConsultation: false,
      status: "active",
      reviewed: false,
      diagnosticData: {
        algorithmVersion: "2.0",
        analysisDate: NOW,
        cycleRecordsAnalyzed: 4,
        symptomEntriesAnalyzed: 7,
      },
    });
  });

  it("creates nothing just below the threshold", () => {
    expect(manager().createDiagnoses([score("pcos", 0.399)], [], ctx)).toEqual([]);
  });

  it("schedules a follow-up for moderate severity without requiring consultation", () => {
    const [created] = manager().createDiagnoses([score("pcos", 0.73, ["irregular_periods"])], [], ctx);

    expect(created.severity).toBe("moderate");
    expect(created.followUpDate).toBe("2024-04-09T12:00:00.000Z");
    expect(created.requiresProfessionalConsultation).toBe(false);
    expect(created.recommendation).toBe("discuss PCOS");
    expect(created.assessment).toBe("moderate risk of PCOS: irregular periods");
  });

  it("requires consultation for high severity", () => {
    const [created] = manager().createDiagnoses([score("pcos", 0.86)], [], ctx);

    expect(created.severity).toBe("high");
    expect(created.requiresProfessionalConsultation).toBe(true);
    expect(created.recommendation).toBe("consult about PCOS");
  });

  it("requires consultation when an urgent symptom matched, whatever the severity", () => {
    const [created] = manager().createDiagnoses([score("menorrhagia", 0.45, ["dizziness"])], [], ctx);

    expect(created.severity).toBe("low");
    expect(created.requiresProfessionalConsultation).toBe(true);
    expect(created.assessment).toBe("low risk of MENORRHAGIA: dizziness");
  });

  it("does not duplicate an active or reviewed diagnosis inside the dedup window", () => {
    const active = diagnosis({ id: "old-1", conditionId: "pcos", createdAt: "2024-03-01T12:00:00.000Z" });
    const reviewed = diagnosis({ id: "old-2", conditionId: "menorrhagia", status: "reviewed", reviewed: true });

    const created = manager().createDiagnoses(
      [score("pcos", 0.8), score("menorrhagia", 0.8)],
      [active, reviewed],
      ctx,
    );

    expect(created).toEqual([]);
  });

  it("ignores dismissed diagnoses and ones older than the window", () => {
    const dismissed = diagnosis({ id: "old-1", conditionId: "pcos", status: "dismissed", createdAt: "2024-03-09T12:00:00.000Z" });
    const expired = diagnosis({ id: "old-2", conditionId: "menorrhagia", createdAt: "2024-02-09T12:00:00.000Z" });

    const created = manager().createDiagnoses(
      [score("menorrhagia", 0.8), score("pcos", 0.5)],
      [dismissed, expired],
      ctx,
    );

    expect(created.map((d) => d.conditionId)).toEqual(["menorrhagia", "pcos"]);
  });

  it("refuses to act on a history that already holds two open diagnoses for one condition", () => {
    const existing = [
      diagnosis({ id: "dup-a", conditionId: "pcos", createdAt: "2024-03-01T12:00:00.000Z" }),
      diagnosis({ id: "dup-b", conditionId: "pcos", createdAt: "2024-03-02T12:00:00.000Z" }),
    ];

    let caught: unknown;
    try {
      manager().createDiagnoses([score("pcos", 0.9)], existing, ctx);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConcurrentModificationError);
    if (caught instanceof ConcurrentModificationError) {
      expect(caught.conditionId).toBe("pcos");
      expect(caught.diagnosisIds).toEqual(["dup-a", "dup-b"]);
    }
  });
});

describe("DiagnosisLifecycleManager transitions", () => {
  const lifecycle = manager();

  it("moves active to reviewed", () => {
    const reviewed = lifecycle.markReviewed(diagnosis({ id: "d1", conditionId: "pcos" }), NOW);

    expect(reviewed.status).toBe("reviewed");
    expect(reviewed.reviewed).toBe(true);
    expect(reviewed.reviewedAt).toBe(NOW);
  });

  it("rejects reviewing a diagnosis that is not active", () => {
    const reviewed = diagnosis({ id: "d1", conditionId: "pcos", status: "reviewed", reviewed: true });
    expect(() => lifecycle.markReviewed(reviewed, NOW)).toThrow(InvalidDiagnosisTransitionError);
  });

  it("dismisses active and reviewed diagnoses once", () => {
    const reviewed = diagnosis({ id: "d1", conditionId: "pcos", status: "reviewed", reviewed: true });
    const dismissed = lifecycle.dismiss(reviewed, NOW);

    expect(dismissed.status).toBe("dismissed");
    expect(dismissed.dismissedAt).toBe(NOW);
    expect(() => lifecycle.dismiss(dismissed, NOW)).toThrow(InvalidDiagnosisTransitionError);
  });

  it("reports the most recent state per condition", () => {
    const history = [
      diagnosis({ id: "d1", conditionId: "pcos", status: "dismissed", createdAt: "2024-01-01T00:00:00.000Z" }),
      diagnosis({ id: "d2", conditionId: "pcos", status: "reviewed", reviewed: true, createdAt: "2024-02-01T00:00:00.000Z" }),
    ];

    expect(lifecycle.stateOf(history, "pcos")).toBe("reviewed");
    expect(lifecycle.stateOf(history, "menorrhagia")).toBe("none");
  });
});

describe("DiagnosisLifecycleManager queries", () => {
  const lifecycle = manager();

  it("lists unreviewed open diagnoses whose follow-up is due, soonest first", () => {
    const diagnoses = [
      diagnosis({ id: "later", conditionId: "pcos", followUpDate: "2024-03-05T00:00:00.000Z" }),
      diagnosis({ id: "sooner", conditionId: "menorrhagia", followUpDate: "2024-03-01T00:00:00.000Z" }),
      diagnosis({ id: "future", conditionId: "pcos", followUpDate: "2024-03-20T00:00:00.000Z" }),
      diagnosis({ id: "reviewed", conditionId: "pcos", followUpDate: "2024-03-01T00:00:00.000Z", status: "reviewed", reviewed: true }),
      diagnosis({ id: "dismissed", conditionId: "pcos", followUpDate: "2024-03-01T00:00:00.000Z", status: "dismissed" }),
      diagnosis({ id: "no-follow-up", conditionId: "pcos" }),
    ];

    expect(lifecycle.dueForFollowUp(diagnoses, NOW).map((d) => d.id)).toEqual(["sooner", "later"]);
  });

  it("treats a follow-up date equal to now as due", () => {
    const due = diagnosis({ id: "exact", conditionId: "pcos", followUpDate: NOW });
    expect(lifecycle.dueForFollowUp([due], NOW).map((d) => d.id)).toEqual(["exact"]);
  });

  it("lists open high-risk diagnoses that need a professional, highest score first", () => {
    const high = diagnosis({
      id: "high",
      conditionId: "pcos",
      severity: "high",
      requiresProfessionalConsultation: true,
      riskScore: score("pcos", 0.88),
    });
    const critical = diagnosis({
      id: "critical",
      conditionId: "menorrhagia",
      severity: "critical",
      requiresProfessionalConsultation: true,
      riskScore: score("menorrhagia", 0.95),
    });
    const lowUrgent = diagnosis({ id: "low-urgent", conditionId: "menorrhagia", severity: "low", requiresProfessionalConsultation: true });
    const dismissed = diagnosis({ ...high, id: "dismissed", status: "dismissed" });

    expect(lifecycle.highRisk([high, lowUrgent, critical, dismissed]).map((d) => d.id)).toEqual(["critical", "high"]);
  });
});
