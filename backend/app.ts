import express, { Request, Response, NextFunction } from "express";
import cors, { CorsOptions } from "cors";
import { z } from "zod";

import type { UserId } from "./domain/Primitives";
import { HealthEngineError } from "./domain/errors";
import type { HealthScreeningService } from "./screening/HealthScreeningService";
import {
  AppendCyclesRequestSchema,
  AppendSymptomsRequestSchema,
  CycleStatusQuerySchema,
  ScreeningRequestSchema,
} from "./validation/schemas";
import { authMiddleware, handleTokenRefresh, handleTokenRequest, requireOwnUser } from "./middleware/auth";
import { dataEntryRateLimiter, generalRateLimiter, screeningRateLimiter } from "./middleware/rateLimiter";
import { auditMiddleware } from "./middleware/audit";

export const API_VERSION = "2.0.0";

export const DEFAULT_ORIGINS = [
  "http://localhost:5500",
  "http://127.0.0.1:5500",
  "http://localhost:3000",
  "http://localhost:3001",
];

export interface AppOptions {
  service: HealthScreeningService;
  authEnabled?: boolean;
  rateLimitEnabled?: boolean;
  allowedOrigins?: readonly string[];
}

// ---- UserId validation helper (Privacy-critical) ----
export function validateUserId(userId: string | undefined): UserId | null {
  if (!userId) return null;
  const trimmed = userId.trim();
  if (trimmed !== userId || trimmed.length < 8 || trimmed === "demo-user" || trimmed === "undefined" || trimmed === "null") {
    return null;
  }
  return trimmed;
}

// ---- Async error wrapper ----
function asyncHandler(fn: (req: Request, res: Response) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

// Sends 400 with the zod issues and returns null when the value does not parse.
function parseOr400<S extends z.ZodTypeAny>(schema: S, value: unknown, res: Response): z.output<S> | null {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    res.status(400).json({
      error: "Request validation failed.",
      issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
    return null;
  }
  return parsed.data;
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "body" in err;
}

export function createApp(options: AppOptions): express.Express {
  const { service } = options;
  const catalog = service.conditionCatalog;
  const allowedOrigins = options.allowedOrigins ?? DEFAULT_ORIGINS;
  const noLimit = (_req: Request, _res: Response, next: NextFunction) => next();
  const limit = options.rateLimitEnabled === false
    ? { general: noLimit, screening: noLimit, dataEntry: noLimit }
    : { general: generalRateLimiter, screening: screeningRateLimiter, dataEntry: dataEntryRateLimiter };

  const app = express();

  // ---- CORS ----
  const corsOptions: CorsOptions = {
    origin(requestOrigin, callback) {
      // Allow server-to-server / curl / health-pings (no Origin header)
      if (!requestOrigin) return callback(null, true);
      if (allowedOrigins.includes(requestOrigin)) {
        return callback(null, requestOrigin);
      }
      console.warn(`[CORS] Blocked request from origin: ${requestOrigin}`);
      callback(new Error(`Origin ${requestOrigin} not allowed by CORS`));
    },
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
    credentials: true,
  };
  app.use(cors(corsOptions));
  app.options("*", cors(corsOptions));

  app.use(express.json({ limit: "1mb" }));

  // ---- Privacy headers (prevent response caching of health data) ----
  app.use((_req, res, next) => {
    res.setHeader("Cache-Control", "no-store, no-cache, must-revalidate, private");
    res.setHeader("Pragma", "no-cache");
    res.setHeader("Expires", "0");
    next();
  });

  app.use(limit.general);
  if (options.authEnabled !== false) {
    app.use(authMiddleware);
  }
  app.use(auditMiddleware);

  app.param("userId", (req, res, next, value: string) => {
    if (!validateUserId(value)) {
      res.status(400).json({ error: "Valid userId required. 'demo-user' is not accepted." });
      return;
    }
    requireOwnUser(req, res, next);
  });

  // ===============================
  // GET /api/health
  // ===============================
  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      version: API_VERSION,
      catalogVersion: catalog.version,
      timestamp: new Date().toISOString(),
      features: ["phase-inference", "cycle-prediction", "risk-screening", "follow-up"],
    });
  });

  // ===============================
  // POST /api/auth/token, /api/auth/refresh
  // ===============================
  app.post("/api/auth/token", asyncHandler(handleTokenRequest));
  app.post("/api/auth/refresh", asyncHandler(handleTokenRefresh));

  // ===============================
  // GET /api/conditions — screening catalog
  // ===============================
  app.get("/api/conditions", (_req, res) => {
    const conditions = catalog.all().map((c) => ({
      conditionId: c.conditionId,
      displayName: c.displayName,
      description: c.description,
      priorityRank: c.priorityRank,
    }));
    res.json({ version: catalog.version, conditions, count: conditions.length });
  });

  app.get("/api/conditions/:conditionId", (req, res) => {
    res.json(catalog.require(req.params.conditionId));
  });

  // ===============================
  // Cycles
  // ===============================
  app.get("/api/cycles/:userId", asyncHandler(async (req, res) => {
    const records = await service.getCycleHistory(req.params.userId);
    res.json({ userId: req.params.userId, records, count: records.length });
  }));

  app.post("/api/cycles/:userId", limit.dataEntry, asyncHandler(async (req, res) => {
    const body = parseOr400(AppendCyclesRequestSchema, req.body, res);
    if (!body) return;

    const records = body.records ?? (body.record ? [body.record] : []);
    await service.logCycles(req.params.userId, records);
    res.status(201).json({ appended: records.length });
  }));

  // ===============================
  // POST /api/symptoms/:userId
  // ===============================
  app.post("/api/symptoms/:userId", limit.dataEntry, asyncHandler(async (req, res) => {
    const body = parseOr400(AppendSymptomsRequestSchema, req.body, res);
    if (!body) return;

    const entries = body.entries ?? (body.entry ? [body.entry] : []);
    await service.logSymptoms(req.params.userId, entries);
    res.status(201).json({ appended: entries.length });
  }));

  // ===============================
  // GET /api/cycle-status/:userId — phase + prediction
  // ===============================
  app.get("/api/cycle-status/:userId", asyncHandler(async (req, res) => {
    const q = parseOr400(CycleStatusQuerySchema, req.query, res);
    if (!q) return;

    res.json(await service.getCycleStatus(req.params.userId, q.referenceDate));
  }));

  // ===============================
  // POST /api/screening/:userId
  // ===============================
  app.post("/api/screening/:userId", limit.screening, asyncHandler(async (req, res) => {
    const body = parseOr400(ScreeningRequestSchema, req.body, res);
    if (!body) return;

    res.json(await service.performHealthScreening(req.params.userId, body));
  }));

  // ===============================
  // Diagnoses
  // ===============================
  app.get("/api/diagnoses/:userId", asyncHandler(async (req, res) => {
    const diagnoses = await service.getDiagnoses(req.params.userId);
    res.json({ userId: req.params.userId, diagnoses, count: diagnoses.length });
  }));

  app.get("/api/diagnoses/:userId/follow-up", asyncHandler(async (req, res) => {
    const diagnoses = await service.getDiagnosesDueForFollowUp(req.params.userId);
    res.json({ userId: req.params.userId, diagnoses, count: diagnoses.length });
  }));

  app.post("/api/diagnoses/:userId/follow-up/notify", asyncHandler(async (req, res) => {
    const result = await service.sendFollowUpReminders(req.params.userId);
    res.json({
      notified: result.notified.map((d) => d.id),
      failed: result.failed,
    });
  }));

  app.get("/api/diagnoses/:userId/high-risk", asyncHandler(async (req, res) => {
    const diagnoses = await service.getHighRiskDiagnoses(req.params.userId);
    res.json({ userId: req.params.userId, diagnoses, count: diagnoses.length });
  }));

  app.post("/api/diagnoses/:userId/:diagnosisId/review", asyncHandler(async (req, res) => {
    res.json(await service.markReviewed(req.params.userId, req.params.diagnosisId));
  }));

  app.delete("/api/diagnoses/:userId/:diagnosisId", asyncHandler(async (req, res) => {
    res.json(await service.deleteDiagnosis(req.params.userId, req.params.diagnosisId));
  }));

  // ---- Global error handler ----
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof HealthEngineError) {
      if (err.status >= 500) console.error(`[CycleInsight] ${err.name}:`, err.message);
      res.status(err.status).json({ error: err.message, code: err.code });
      return;
    }
    if (isBodyParseError(err)) {
      res.status(400).json({ error: "Malformed JSON body." });
      return;
    }
    console.error("[CycleInsight Server Error]", err);
    res.status(500).json({ error: "Internal server error." });
  });

  return app;
}
