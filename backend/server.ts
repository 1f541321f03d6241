import dotenv from "dotenv";
import { existsSync } from "fs";
import { resolve as pathResolve } from "path";

// Load .env before any module that reads process.env.
// Resolve from deterministic locations so startup cwd does not matter.
const envPathCandidates = [
  pathResolve(__dirname, "..", ".env"),
  pathResolve(__dirname, "..", "..", ".env"),
  pathResolve(process.cwd(), ".env"),
];

const resolvedEnvPath = envPathCandidates.find((p) => existsSync(p));
if (resolvedEnvPath) {
  dotenv.config({ path: resolvedEnvPath });
} else {
  dotenv.config();
}

import { createApp, DEFAULT_ORIGINS } from "./app";
import { loadScreeningPolicy } from "./config/screeningPolicy";
import { closeDatabasePool } from "./database/connection";
import { getHealthDataRepository } from "./repository/RepositoryFactory";
import { HealthScreeningService } from "./screening/HealthScreeningService";

const PORT = parseInt(process.env.PORT || "3001", 10);

const ALLOWED_ORIGINS: string[] = process.env.CORS_ORIGINS
  ? process.env.CORS_ORIGINS.split(",").map(s => s.trim()).filter(Boolean)
  : DEFAULT_ORIGINS;

const authEnabled = process.env.DISABLE_AUTH !== "true";

const service = new HealthScreeningService({
  repository: getHealthDataRepository(),
  policy: loadScreeningPolicy(process.env),
});

const app = createApp({ service, authEnabled, allowedOrigins: ALLOWED_ORIGINS });

console.log("[CycleInsight] CORS allowed origins:", ALLOWED_ORIGINS);

const server = app.listen(PORT, "0.0.0.0", () => {
  console.log(`[CycleInsight] Server running on port ${PORT}`);
  console.log(`[CycleInsight] API health check: http://0.0.0.0:${PORT}/api/health`);
  console.log(`[CycleInsight] Environment: ${process.env.NODE_ENV || "development"}`);
  console.log(`[CycleInsight] Database: ${process.env.DATABASE_URL ? "PostgreSQL" : "In-memory"}`);
  console.log(`[CycleInsight] Auth: ${authEnabled ? "JWT enabled" : "DISABLED (dev mode)"}`);
  console.log(`[CycleInsight] Condition catalog v${service.conditionCatalog.version} (${service.conditionCatalog.size} conditions)`);
});

// ---- Graceful shutdown ----
async function shutdown(signal: string): Promise<void> {
  console.log(`[CycleInsight] ${signal} received, shutting down gracefully`);
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await closeDatabasePool();
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((err) => {
    console.error("[CycleInsight] Shutdown failed:", err);
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
