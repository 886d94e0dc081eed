// backend/services/shared/middleware/requestId.ts

/**
 * Notes:
 * - Order matters. This must run **before** any logger or error formatter.
 *   Otherwise downstream log records will lack the request ID.
 * - Idempotent: never overwrite a caller-supplied ID. We only mint a UUID if
 *   the incoming request lacks all recognized headers.
 * - Headers honored: `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 *   We standardize on `x-request-id` for the response header and the
 *   internal `req.id` field.
 */

import type { RequestHandler } from "express";
import { randomUUID } from "crypto";

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const hdr =
      req.headers["x-request-id"] ||
      req.headers["x-correlation-id"] ||
      req.headers["x-amzn-trace-id"];

    const id = (Array.isArray(hdr) ? hdr[0] : hdr) || randomUUID();

    req.id = String(id);
    res.setHeader("x-request-id", String(id));

    next();
  };
}
