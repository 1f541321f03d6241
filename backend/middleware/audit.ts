import { Request, Response, NextFunction } from "express";
import { query } from "../database/connection";

// Cycle Insight — Audit Logging Middleware
//
// Records all state-changing operations.
// Append-only: no deletes, no updates.
// Never records request bodies: symptom content stays out of the log.

export type AuditAction =
  | "cycles_logged"
  | "symptoms_logged"
  | "screening_performed"
  | "diagnosis_reviewed"
  | "diagnosis_dismissed"
  | "follow_up_notified"
  | "token_issued"
  | "token_refreshed"
  | "unknown";

export interface AuditEntry {
  userId?: string;
  action: AuditAction;
  resource?: string;
  detail?: Record<string, unknown>;
  ipAddress?: string;
  userAgent?: string;
}

const IN_MEMORY_AUDIT_CAP = 10000;

// In-memory fallback when no database is available
const inMemoryAuditLog: AuditEntry[] = [];

export async function writeAuditLog(entry: AuditEntry): Promise<void> {
  if (!process.env.DATABASE_URL) {
    inMemoryAuditLog.push(entry);
    if (inMemoryAuditLog.length > IN_MEMORY_AUDIT_CAP) {
      inMemoryAuditLog.splice(0, inMemoryAuditLog.length - IN_MEMORY_AUDIT_CAP);
    }
    return;
  }

  await query(
    `INSERT INTO audit_log (user_id, action, resource, detail, ip_address, user_agent)
     VALUES ($1, $2, $3, $4, $5, $6)`,
    [
      entry.userId || null,
      entry.action,
      entry.resource || null,
      entry.detail ? JSON.stringify(entry.detail) : null,
      entry.ipAddress || null,
      entry.userAgent || null,
    ],
  );
}

export function getInMemoryAuditLog(): readonly AuditEntry[] {
  return inMemoryAuditLog;
}

export function classifyAuditAction(method: string, path: string): { action: AuditAction; resource: string } {
  if (path.startsWith("/api/auth/token")) return { action: "token_issued", resource: "auth" };
  if (path.startsWith("/api/auth/refresh")) return { action: "token_refreshed", resource: "auth" };
  if (path.startsWith("/api/cycles/")) return { action: "cycles_logged", resource: "cycles" };
  if (path.startsWith("/api/symptoms/")) return { action: "symptoms_logged", resource: "symptoms" };
  if (path.startsWith("/api/screening/")) return { action: "screening_performed", resource: "screening" };
  if (path.startsWith("/api/diagnoses/")) {
    if (path.endsWith("/follow-up/notify")) return { action: "follow_up_notified", resource: "diagnosis" };
    if (path.endsWith("/review")) return { action: "diagnosis_reviewed", resource: "diagnosis" };
    if (method === "DELETE") return { action: "diagnosis_dismissed", resource: "diagnosis" };
  }
  return { action: "unknown", resource: "unknown" };
}

// Middleware: auto-logs state-changing requests
export function auditMiddleware(req: Request, res: Response, next: NextFunction): void {
  if (req.method !== "POST" && req.method !== "PUT" && req.method !== "PATCH" && req.method !== "DELETE") {
    return next();
  }

  const { action, resource } = classifyAuditAction(req.method, req.path);

  const entry: AuditEntry = {
    userId: req.auth?.deviceId,
    action,
    resource,
    detail: { method: req.method, path: req.path },
    ipAddress: req.ip || req.socket.remoteAddress,
    userAgent: req.headers["user-agent"],
  };

  // Does not block the response; failures are logged only.
  writeAuditLog(entry).catch((err) => {
    console.error("[Audit] Failed to write audit log:", err);
  });

  next();
}
