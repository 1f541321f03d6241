import type { HealthDataRepository } from "./HealthDataRepository";
import { InMemoryHealthDataRepository } from "./InMemoryHealthDataRepository";
import { PostgresHealthDataRepository } from "./PostgresHealthDataRepository";

// Repository Factory
// - The ONLY place where the storage implementation is selected.
// - Selects PostgreSQL when DATABASE_URL is set, otherwise falls back to in-memory.

let singleton: HealthDataRepository | undefined;

export function getHealthDataRepository(): HealthDataRepository {
  if (!singleton) {
    if (process.env.DATABASE_URL) {
      console.log("[CycleInsight] Using PostgreSQL repository");
      singleton = new PostgresHealthDataRepository();
    } else {
      console.log("[CycleInsight] Using in-memory repository (no DATABASE_URL set)");
      singleton = new InMemoryHealthDataRepository();
    }
  }
  return singleton;
}
