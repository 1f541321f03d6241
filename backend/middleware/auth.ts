import { Request, Response, NextFunction } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { query } from "../database/connection";
import { RefreshTokenRequestSchema, TokenRequestSchema } from "../validation/schemas";

// Cycle Insight — JWT Authentication Middleware
//
// Device UUID is the identity. Server issues a JWT on first contact.
// The device id doubles as the userId of every /:userId route.
//
// Token scheme: HS256 with a shared secret.
// Access token: 15 minutes. Refresh token: 7 days.

const DEV_SECRET = "dev-secret-change-in-production";
const ACCESS_TOKEN_EXPIRY = "15m";
const REFRESH_TOKEN_EXPIRY = "7d";
const ACCESS_TOKEN_TTL_SECONDS = 15 * 60;

const AuthPayloadSchema = z.object({
  deviceId: z.string().min(1),
  accountId: z.string().optional(),
  type: z.literal("refresh").optional(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export type AuthPayload = z.infer<typeof AuthPayloadSchema>;

declare global {
  namespace Express {
    interface Request {
      auth?: AuthPayload;
    }
  }
}

// Read at call time so the secret follows whatever dotenv loaded.
function jwtSecret(): string {
  return process.env.JWT_SECRET || DEV_SECRET;
}

// --- Token generation ---

export function generateAccessToken(payload: { deviceId: string; accountId?: string }): string {
  return jwt.sign(payload, jwtSecret(), { expiresIn: ACCESS_TOKEN_EXPIRY });
}

export function generateRefreshToken(payload: { deviceId: string; accountId?: string }): string {
  return jwt.sign({ ...payload, type: "refresh" }, jwtSecret(), { expiresIn: REFRESH_TOKEN_EXPIRY });
}

export function verifyToken(token: string): AuthPayload {
  const decoded = jwt.verify(token, jwtSecret());
  const parsed = AuthPayloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new jwt.JsonWebTokenError("Token payload is missing deviceId.");
  }
  return parsed.data;
}

// --- Device registration/lookup ---

export async function ensureDevice(deviceUuid: string): Promise<void> {
  if (!process.env.DATABASE_URL) return; // in-memory mode keeps no device table

  await query(
    `INSERT INTO user_devices (device_uuid, last_seen_at)
     VALUES ($1, NOW())
     ON CONFLICT (device_uuid)
     DO UPDATE SET last_seen_at = NOW()`,
    [deviceUuid],
  );
}

// --- Middleware ---

const PUBLIC_PATHS = new Set(["/api/health", "/api/auth/token", "/api/auth/refresh"]);

export function authMiddleware(req: Request, res: Response, next: NextFunction): void {
  if (PUBLIC_PATHS.has(req.path) || req.path.startsWith("/api/conditions")) {
    return next();
  }

  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    res.status(401).json({ error: "Missing or invalid Authorization header. Expected: Bearer <token>" });
    return;
  }

  const token = authHeader.slice(7);

  try {
    const payload = verifyToken(token);
    if (payload.type === "refresh") {
      res.status(401).json({ error: "Refresh tokens cannot be used for API access." });
      return;
    }
    req.auth = payload;
    next();
  } catch (err) {
    if (err instanceof jwt.TokenExpiredError) {
      res.status(401).json({ error: "Token expired. Please refresh your token." });
    } else if (err instanceof jwt.JsonWebTokenError) {
      res.status(401).json({ error: "Invalid token." });
    } else {
      next(err);
    }
  }
}

// A token only grants access to its own device's data.
// No-op when auth is disabled (req.auth is never set).
export function requireOwnUser(req: Request, res: Response, next: NextFunction): void {
  if (req.auth && req.auth.deviceId !== req.params.userId) {
    res.status(403).json({ error: "Token does not grant access to this user." });
    return;
  }
  next();
}

// --- Token issuance endpoint handlers ---

export async function handleTokenRequest(req: Request, res: Response): Promise<void> {
  const parsed = TokenRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ error: "Valid deviceId required (min 8 characters)." });
    return;
  }

  const trimmed = parsed.data.deviceId.trim();

  if (trimmed.length < 8 || ["demo-user", "undefined", "null"].includes(trimmed)) {
    res.status(400).json({ error: "Invalid deviceId." });
    return;
  }

  try {
    await ensureDevice(trimmed);

    res.json({
      accessToken: generateAccessToken({ deviceId: trimmed }),
      refreshToken: generateRefreshToken({ deviceId: trimmed }),
      expiresIn: ACCESS_TOKEN_TTL_SECONDS,
    });
  } catch (err) {
    console.error("[Auth] Token generation failed:", err);
    res.status(500).json({ error: "Failed to generate token." });
  }
}

export async function handleTokenRefresh(req: Request, res: Response): Promise<void> {
  const parsed = RefreshTokenRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ error: "refreshToken required." });
    return;
  }

  let payload: AuthPayload;
  try {
    payload = verifyToken(parsed.data.refreshToken);
  } catch (err) {
    console.warn("[Auth] Refresh rejected:", err instanceof Error ? err.message : err);
    res.status(401).json({ error: "Invalid or expired refresh token." });
    return;
  }

  if (payload.type !== "refresh") {
    res.status(400).json({ error: "Invalid token type. Expected refresh token." });
    return;
  }

  const identity = { deviceId: payload.deviceId, accountId: payload.accountId };
  res.json({
    accessToken: generateAccessToken(identity),
    refreshToken: generateRefreshToken(identity),
    expiresIn: ACCESS_TOKEN_TTL_SECONDS,
  });
}
