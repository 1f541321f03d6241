import { describe, it, expect, beforeEach } from "vitest";
import { HealthScreeningService } from "./HealthScreeningService";
import type { Diagnosis } from "../domain/Diagnosis";
import { DiagnosisNotFoundError, InsufficientDataError, InvalidDiagnosisTransitionError, PersistenceError } from "../domain/errors";
import type { FollowUpNotifier } from "../notifications/FollowUpNotifier";
import { InMemoryHealthDataRepository } from "../repository/InMemoryHealthDataRepository";
import { TEST_USER, cycle, scenarioCatalog, sequentialIds, symptom } from "../testing/builders";

const REFERENCE_DATE = "2024-02-10";

class RecordingNotifier implements FollowUpNotifier {
  readonly notified: string[] = [];

  async notifyFollowUpDue(diagnosis: Diagnosis): Promise<void> {
    this.notified.push(diagnosis.id);
  }
}

class FailingNotifier implements FollowUpNotifier {
  async notifyFollowUpDue(): Promise<void> {
    throw new Error("push gateway unavailable");
  }
}

class FailingScreeningRepository extends InMemoryHealthDataRepository {
  async persistScreeningResult(): Promise<void> {
    throw new PersistenceError("Saving screening result failed: connection reset");
  }
}

describe("HealthScreeningService", () => {
  let repository: InMemoryHealthDataRepository;
  let notifier: RecordingNotifier;
  let now: Date;
  let service: HealthScreeningService;

  function build(
    overrides: { repository?: InMemoryHealthDataRepository; notifier?: FollowUpNotifier; generateId?: () => string } = {},
  ): HealthScreeningService {
    return new HealthScreeningService({
      repository: overrides.repository ?? repository,
      notifier: overrides.notifier ?? notifier,
      catalog: scenarioCatalog(),
      clock: () => now,
      generateId: overrides.generateId ?? sequentialIds(),
    });
  }

  async function seed(repo: InMemoryHealthDataRepository = repository): Promise<void> {
    await repo.appendCycleRecords(TEST_USER, [
      cycle("c1", "2024-01-01", "2024-01-05"),
      cycle("c2", "2024-02-01", "2024-02-05"),
    ]);
    await repo.appendSymptomEntries(TEST_USER, [symptom("s1", "2024-02-08", "pelvic_pain", 4)]);
  }

  beforeEach(() => {
    repository = new InMemoryHealthDataRepository();
    notifier = new RecordingNotifier();
    now = new Date("2024-03-10T12:00:00.000Z");
    service = build();
  });

  describe("performHealthScreening", () => {
    it("infers phase, predicts the cycle and creates diagnoses for qualifying scores", async () => {
      await seed();

      const result = await service.performHealthScreening(TEST_USER, {
        referenceDate: REFERENCE_DATE,
        riskFactors: ["family_history_endometriosis"],
      });

      expect(result.phase?.phase).toBe("follicular");
      expect(result.prediction?.nextPeriodStart).toBe("2024-03-03");
      expect(result.riskScores.map((s) => [s.conditionId, s.score])).toEqual([
        ["endometriosis", 0.73],
        ["pcos", 0],
      ]);
      expect(result.riskFactorsConsidered).toEqual(["family_history_endometriosis"]);
      expect(result.diagnoses).toHaveLength(1);
      expect(result.diagnoses[0]).toMatchObject({
        id: "diag-1",
        conditionId: "endometriosis",
        severity: "moderate",
        requiresProfessionalConsultation: false,
        followUpDate: "2024-04-09T12:00:00.000Z",
        diagnosticData: { cycleRecordsAnalyzed: 2, symptomEntriesAnalyzed: 1 },
      });
      expect(result.computedAt).toBe("2024-03-10T12:00:00.000Z");
      expect(result.skippedSymptomEntries).toEqual([]);
    });

    it("persists the prediction and the new diagnoses", async () => {
      await seed();

      await service.performHealthScreening(TEST_USER, { referenceDate: REFERENCE_DATE, riskFactors: ["family_history_endometriosis"] });

      expect((await repository.getExistingDiagnoses(TEST_USER)).map((d) => d.id)).toEqual(["diag-1"]);
      expect((await repository.getLatestPrediction(TEST_USER))?.nextPeriodStart).toBe("2024-03-03");
    });

    it("creates nothing new when run twice on the same data", async () => {
      await seed();
      const options = { referenceDate: REFERENCE_DATE, riskFactors: ["family_history_endometriosis"] };

      await service.performHealthScreening(TEST_USER, options);
      const second = await service.performHealthScreening(TEST_USER, options);

      expect(second.diagnoses).toEqual([]);
      expect(await repository.getExistingDiagnoses(TEST_USER)).toHaveLength(1);
    });

    it("serializes concurrent runs for one user", async () => {
      await seed();
      const options = { referenceDate: REFERENCE_DATE, riskFactors: ["family_history_endometriosis"] };

      const [a, b] = await Promise.all([
        service.performHealthScreening(TEST_USER, options),
        service.performHealthScreening(TEST_USER, options),
      ]);

      expect(a.diagnoses.length + b.diagnoses.length).toBe(1);
      expect(await repository.getExistingDiagnoses(TEST_USER)).toHaveLength(1);
    });

    it("screens on symptoms alone when no cycle has been logged", async () => {
      await repository.appendSymptomEntries(TEST_USER, [symptom("s1", "2024-03-09", "pelvic_pain")]);

      const result = await service.performHealthScreening(TEST_USER);

      expect(result.referenceDate).toBe("2024-03-10");
      expect(result.phase).toBeNull();
      expect(result.prediction).toBeNull();
      expect(result.diagnoses.map((d) => [d.conditionId, d.severity])).toEqual([["endometriosis", "mild"]]);
      expect(await repository.getLatestPrediction(TEST_USER)).toBeNull();
    });

    it("returns no scores and no diagnoses without symptoms", async () => {
      await repository.appendCycleRecords(TEST_USER, [cycle("c1", "2024-03-01")]);

      const result = await service.performHealthScreening(TEST_USER);

      expect(result.riskScores).toEqual([]);
      expect(result.diagnoses).toEqual([]);
      expect(result.phase?.phase).toBe("follicular");
    });

    it("propagates persistence failures unchanged", async () => {
      const failing = new FailingScreeningRepository();
      await seed(failing);

      await expect(
        build({ repository: failing }).performHealthScreening(TEST_USER, { referenceDate: REFERENCE_DATE }),
      ).rejects.toThrow("Saving screening result failed: connection reset");
      expect(await failing.getExistingDiagnoses(TEST_USER)).toEqual([]);
    });

    it("stores nothing when the second of two diagnoses cannot be written", async () => {
      await seed();
      await repository.appendSymptomEntries(TEST_USER, [symptom("s2", "2024-02-09", "hirsutism")]);
      const options = { referenceDate: REFERENCE_DATE, riskFactors: ["family_history_endometriosis"] };

      await expect(
        build({ generateId: () => "same-id" }).performHealthScreening(TEST_USER, options),
      ).rejects.toThrow("Screening result rejected: duplicate diagnosis id (same-id).");
      expect(await repository.getExistingDiagnoses(TEST_USER)).toEqual([]);
      expect(await repository.getLatestPrediction(TEST_USER)).toBeNull();

      const retry = await service.performHealthScreening(TEST_USER, options);
      expect(retry.diagnoses.map((d) => [d.id, d.conditionId, d.severity])).toEqual([
        ["diag-1", "endometriosis", "moderate"],
        ["diag-2", "pcos", "low"],
      ]);
    });
  });

  describe("diagnosis lifecycle", () => {
    beforeEach(async () => {
      await seed();
      await service.performHealthScreening(TEST_USER, { referenceDate: REFERENCE_DATE, riskFactors: ["family_history_endometriosis"] });
    });

    it("marks a diagnosis reviewed and stores it", async () => {
      const reviewed = await service.markReviewed(TEST_USER, "diag-1");

      expect(reviewed.status).toBe("reviewed");
      expect((await repository.getDiagnosis(TEST_USER, "diag-1"))?.reviewedAt).toBe("2024-03-10T12:00:00.000Z");
      await expect(service.markReviewed(TEST_USER, "diag-1")).rejects.toThrow(InvalidDiagnosisTransitionError);
    });

    it("dismisses a diagnosis so the next screening may raise it again", async () => {
      const dismissed = await service.deleteDiagnosis(TEST_USER, "diag-1");
      expect(dismissed.status).toBe("dismissed");

      const rerun = await service.performHealthScreening(TEST_USER, { referenceDate: REFERENCE_DATE, riskFactors: ["family_history_endometriosis"] });
      expect(rerun.diagnoses.map((d) => d.id)).toEqual(["diag-2"]);
      expect(await service.getDiagnoses(TEST_USER)).toHaveLength(2);
    });

    it("throws DiagnosisNotFoundError for an unknown id", async () => {
      await expect(service.markReviewed(TEST_USER, "missing")).rejects.toThrow(DiagnosisNotFoundError);
      await expect(service.deleteDiagnosis(TEST_USER, "missing")).rejects.toThrow(DiagnosisNotFoundError);
    });

    it("lists a diagnosis as due once its follow-up date passes", async () => {
      expect(await service.getDiagnosesDueForFollowUp(TEST_USER)).toEqual([]);

      now = new Date("2024-04-09T12:00:00.000Z");
      expect((await service.getDiagnosesDueForFollowUp(TEST_USER)).map((d) => d.id)).toEqual(["diag-1"]);
    });

    it("notifies due follow-ups", async () => {
      now = new Date("2024-04-10T00:00:00.000Z");

      const result = await service.sendFollowUpReminders(TEST_USER);

      expect(result.notified.map((d) => d.id)).toEqual(["diag-1"]);
      expect(result.failed).toEqual([]);
      expect(notifier.notified).toEqual(["diag-1"]);
    });

    it("reports notifier failures per diagnosis", async () => {
      now = new Date("2024-04-10T00:00:00.000Z");

      const result = await build({ notifier: new FailingNotifier() }).sendFollowUpReminders(TEST_USER);

      expect(result.notified).toEqual([]);
      expect(result.failed).toEqual([{ diagnosisId: "diag-1", reason: "push gateway unavailable" }]);
    });

    it("leaves moderate diagnoses out of the high-risk list", async () => {
      expect(await service.getHighRiskDiagnoses(TEST_USER)).toEqual([]);
    });
  });

  describe("getCycleStatus", () => {
    it("reports phase and prediction for the reference date", async () => {
      await seed();

      const status = await service.getCycleStatus(TEST_USER, REFERENCE_DATE);

      expect(status.phase.phase).toBe("follicular");
      expect(status.prediction.ovulationDate).toBe("2024-02-18");
      expect(status.description).toBe("Energy is building. Great time for new activities.");
    });

    it("throws InsufficientDataError before any cycle is logged", async () => {
      await expect(service.getCycleStatus(TEST_USER)).rejects.toThrow(InsufficientDataError);
    });
  });
});

describe("HealthScreeningService with the bundled catalog", () => {
  it("starts without an injected catalog and screens heavy-bleeding symptoms", async () => {
    const repository = new InMemoryHealthDataRepository();
    await repository.appendSymptomEntries(TEST_USER, [
      symptom("s1", "2024-03-01", "heavy_bleeding"),
      symptom("s2", "2024-03-01", "prolonged_bleeding"),
      symptom("s3", "2024-03-02", "large_clots"),
      symptom("s4", "2024-03-02", "pelvic_pressure"),
      symptom("s5", "2024-03-03", "dizziness"),
    ]);
    const service = new HealthScreeningService({
      repository,
      notifier: new RecordingNotifier(),
      clock: () => new Date("2024-03-10T12:00:00.000Z"),
      generateId: sequentialIds(),
    });

    const result = await service.performHealthScreening(TEST_USER);

    expect(service.conditionCatalog.version).toBe("2.0");
    expect(result.riskScores.slice(0, 2).map((s) => [s.conditionId, s.score])).toEqual([
      ["menorrhagia", 0.5478],
      ["fibroids", 0.4827],
    ]);
    expect(result.diagnoses.map((d) => [d.id, d.conditionId, d.severity, d.requiresProfessionalConsultation])).toEqual([
      ["diag-1", "menorrhagia", "low", true],
      ["diag-2", "fibroids", "low", true],
    ]);
    expect(await repository.getExistingDiagnoses(TEST_USER)).toHaveLength(2);
  });
});
