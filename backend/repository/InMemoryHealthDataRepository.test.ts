import { describe, it, expect } from "vitest";
import { InMemoryHealthDataRepository } from "./InMemoryHealthDataRepository";
import { PersistenceError } from "../domain/errors";
import { TEST_USER, cycle, diagnosis, symptom } from "../testing/builders";

describe("InMemoryHealthDataRepository", () => {
  it("returns cycle history ordered by start date", async () => {
    const repo = new InMemoryHealthDataRepository();
    await repo.appendCycleRecords(TEST_USER, [cycle("c2", "2024-02-01", "2024-02-05")]);
    await repo.appendCycleRecords(TEST_USER, [cycle("c1", "2024-01-01", "2024-01-05")]);

    const history = await repo.getCycleHistory(TEST_USER);
    expect(history.map((c) => c.id)).toEqual(["c1", "c2"]);
  });

  it("rejects duplicate ids and overlapping cycles", async () => {
    const repo = new InMemoryHealthDataRepository();
    await repo.appendCycleRecords(TEST_USER, [cycle("c1", "2024-01-01", "2024-01-05")]);

    await expect(repo.appendCycleRecords(TEST_USER, [cycle("c1", "2024-02-01")])).rejects.toThrow(PersistenceError);
    await expect(repo.appendCycleRecords(TEST_USER, [cycle("c2", "2024-01-04")])).rejects.toThrow(
      "Append rejected: Cycle c2 overlaps cycle c1.",
    );
    expect(await repo.getCycleHistory(TEST_USER)).toHaveLength(1);
  });

  it("lets an open cycle end when the next one starts", async () => {
    const repo = new InMemoryHealthDataRepository();
    await repo.appendCycleRecords(TEST_USER, [cycle("c1", "2024-01-01")]);
    await repo.appendCycleRecords(TEST_USER, [cycle("c2", "2024-01-29")]);

    expect(await repo.getCycleHistory(TEST_USER)).toHaveLength(2);
  });

  it("filters the symptom log by date", async () => {
    const repo = new InMemoryHealthDataRepository();
    await repo.appendSymptomEntries(TEST_USER, [
      symptom("s2", "2024-03-05", "fatigue"),
      symptom("s1", "2024-02-01", "bloating"),
    ]);

    const log = await repo.getSymptomLog(TEST_USER, "2024-03-01");
    expect(log.map((s) => s.id)).toEqual(["s2"]);
    await expect(repo.appendSymptomEntries(TEST_USER, [symptom("s1", "2024-03-06", "fatigue")])).rejects.toThrow(
      "Append rejected: duplicate symptom entry id detected (s1).",
    );
  });

  it("replaces a diagnosis written twice under one id", async () => {
    const repo = new InMemoryHealthDataRepository();
    await repo.persistDiagnosis(diagnosis({ id: "d1", conditionId: "pcos" }));
    await repo.persistDiagnosis(diagnosis({ id: "d1", conditionId: "pcos", status: "reviewed", reviewed: true }));

    const all = await repo.getExistingDiagnoses(TEST_USER);
    expect(all).toHaveLength(1);
    expect(all[0].status).toBe("reviewed");
    expect(await repo.getDiagnosis(TEST_USER, "missing")).toBeNull();
  });

  it("hands out copies, never its own state", async () => {
    const repo = new InMemoryHealthDataRepository();
    await repo.persistDiagnosis(diagnosis({ id: "d1", conditionId: "pcos" }));

    const first = await repo.getDiagnosis(TEST_USER, "d1");
    const second = await repo.getDiagnosis(TEST_USER, "d1");
    expect(first).toEqual(second);
    expect(first).not.toBe(second);
  });

  it("keeps the most recent prediction", async () => {
    const repo = new InMemoryHealthDataRepository();
    expect(await repo.getLatestPrediction(TEST_USER)).toBeNull();

    const base = {
      nextPeriodStart: "2024-03-03",
      ovulationDate: "2024-02-18",
      fertileWindowStart: "2024-02-13",
      fertileWindowEnd: "2024-02-19",
      confidence: 0.5,
      confidenceLevel: "medium" as const,
      basedOnCycles: 1,
      averageCycleLength: 31,
      overdue: false,
    };
    await repo.persistPrediction(TEST_USER, { ...base, computedAt: "2024-02-10T08:00:00.000Z" });
    await repo.persistPrediction(TEST_USER, { ...base, computedAt: "2024-02-11T08:00:00.000Z" });

    expect((await repo.getLatestPrediction(TEST_USER))?.computedAt).toBe("2024-02-11T08:00:00.000Z");
  });

  it("stores a screening result whole or not at all", async () => {
    const repo = new InMemoryHealthDataRepository();
    const prediction = {
      nextPeriodStart: "2024-03-03",
      ovulationDate: "2024-02-18",
      fertileWindowStart: "2024-02-13",
      fertileWindowEnd: "2024-02-19",
      confidence: 0.5,
      confidenceLevel: "medium" as const,
      basedOnCycles: 1,
      averageCycleLength: 31,
      overdue: false,
      computedAt: "2024-02-10T08:00:00.000Z",
    };

    await expect(repo.persistScreeningResult(TEST_USER, prediction, [
      diagnosis({ id: "d1", conditionId: "pcos" }),
      diagnosis({ id: "d2", conditionId: "endometriosis", userId: "someone-else-01" }),
    ])).rejects.toThrow("Screening result rejected: diagnosis d2 belongs to another user.");
    expect(await repo.getExistingDiagnoses(TEST_USER)).toEqual([]);
    expect(await repo.getLatestPrediction(TEST_USER)).toBeNull();

    await repo.persistScreeningResult(TEST_USER, prediction, [
      diagnosis({ id: "d1", conditionId: "pcos" }),
      diagnosis({ id: "d2", conditionId: "endometriosis" }),
    ]);
    expect((await repo.getExistingDiagnoses(TEST_USER)).map((d) => d.id)).toEqual(["d1", "d2"]);
    expect(await repo.getLatestPrediction(TEST_USER)).toEqual(prediction);

    await expect(repo.persistScreeningResult(TEST_USER, null, [diagnosis({ id: "d2", conditionId: "pcos" })])).rejects.toThrow(
      "Screening result rejected: duplicate diagnosis id (d2).",
    );
  });

  it("drops a user's write queue once it drains", async () => {
    const repo = new InMemoryHealthDataRepository();
    await repo.appendCycleRecords(TEST_USER, [cycle("c1", "2024-01-01")]);
    await repo.appendCycleRecords("test-user-0002", [cycle("c1", "2024-01-01")]);
    await new Promise((resolve) => setImmediate(resolve));

    expect(repo.pendingWriters).toBe(0);
  });
});
