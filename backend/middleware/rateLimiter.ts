import rateLimit from "express-rate-limit";
import type { Request } from "express";

// Cycle Insight — Rate Limiting Middleware
//
// Three tiers:
// 1. General API: 100 req/min per device
// 2. Screening runs: 20 req/min per device
// 3. Data entry (cycles, symptoms): 200 req/hour per device
//
// Key extraction: uses auth payload deviceId, falls back to IP.

function extractKey(req: Request): string {
  if (req.auth?.deviceId) return req.auth.deviceId;
  if (req.params.userId) return req.params.userId;
  return req.ip || req.socket.remoteAddress || "unknown";
}

export const generalRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 100,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: extractKey,
  message: { error: "Too many requests. Please try again later.", retryAfterMs: 60000 },
});

export const screeningRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 20,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: extractKey,
  message: { error: "Screening limit reached. Please wait before trying again.", retryAfterMs: 60000 },
});

export const dataEntryRateLimiter = rateLimit({
  windowMs: 60 * 60 * 1000,
  max: 200,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: extractKey,
  message: { error: "Data entry limit reached. Maximum 200 submissions per hour.", retryAfterMs: 3600000 },
});
