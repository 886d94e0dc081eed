// backend/services/shared/utils/logger.ts
import type { Request } from "express";
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

/**
 * Shared Logger (authoritative)
 *
 * ❗️Each service MUST call `initLogger(SERVICE_NAME)` at bootstrap
 *    BEFORE creating any request loggers (e.g., pino-http).
 *
 * Usage:
 *   import { initLogger } from "@shared/utils/logger";
 *   initLogger(SERVICE_NAME);
 */

// ─────────────────────────── Env (fail fast for required) ─────────────────────
function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v || v.trim() === "")
    throw new Error(`Missing required env var: ${name}`);
  return v.trim();
}

const validLevels: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function parseLevel(raw: string): LevelWithSilent {
  const level = validLevels.find((l) => l === raw);
  if (!level) throw new Error(`Invalid LOG_LEVEL: "${raw}"`);
  return level;
}

const LOG_LEVEL = parseLevel(requireEnv("LOG_LEVEL"));

// ────────────────────────────── Service name & Pino init ──────────────────────
// NOTE: Avoid stamping "service":"unknown". Start with NO base.service.
//       After initLogger(), we recreate the logger with base.service set.
let SERVICE_NAME = "";

const pinoOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "res.headers['set-cookie']",
    ],
  },
};

export let logger: Logger = pino(pinoOptions);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string): void {
  SERVICE_NAME = String(serviceName || "").trim();
  if (!SERVICE_NAME) throw new Error("initLogger requires serviceName");
  logger = pino({ ...pinoOptions, base: { service: SERVICE_NAME } });
}

// ───────────────────────────── Request context helper ─────────────────────────
export interface LogContext {
  requestId: string | null;
  path: string;
  method: string;
  ip: string | undefined;
  service: string | undefined;
}

export function extractLogContext(req: Request): LogContext {
  const hdr =
    req.headers["x-request-id"] ||
    req.headers["x-correlation-id"] ||
    req.headers["x-amzn-trace-id"];
  const hdrId = Array.isArray(hdr) ? hdr[0] : hdr;
  return {
    requestId: req.id ? String(req.id) : hdrId || null,
    path: req.originalUrl,
    method: req.method,
    ip: req.ip,
    service: SERVICE_NAME || undefined,
  };
}
