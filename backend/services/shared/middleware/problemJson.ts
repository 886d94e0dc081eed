// backend/services/shared/middleware/problemJson.ts

/**
 * RFC 7807 Problem+JSON formatting for 404s and unhandled errors.
 *
 * Notes:
 * - This middleware is *transport-level* formatting, not business logic.
 * - Error detail stays minimal: status/title/detail/code plus the request id.
 * - 404s are only formatted as Problem+JSON under known prefixes; static and
 *   health-check noise gets a bare 404.
 */

import type { Request, Response, NextFunction } from "express";
import { extractLogContext } from "../utils/logger";
import type { Problem } from "../contracts/common";

export interface ErrorShape {
  status: number;
  type?: string;
  title?: string;
  code?: string;
  message?: string;
}

/** Pull the RFC 7807-relevant fields off anything that was thrown. */
export function describeError(err: unknown): ErrorShape {
  if (typeof err !== "object" || err === null) {
    return { status: 500, message: err == null ? undefined : String(err) };
  }

  let status = 500;
  if ("statusCode" in err && typeof err.statusCode === "number") {
    status = err.statusCode;
  } else if ("status" in err && typeof err.status === "number") {
    status = err.status;
  }
  if (!Number.isInteger(status) || status < 400 || status > 599) status = 500;

  return {
    status,
    type: "type" in err && typeof err.type === "string" ? err.type : undefined,
    title:
      "title" in err && typeof err.title === "string" ? err.title : undefined,
    code: "code" in err && typeof err.code === "string" ? err.code : undefined,
    message:
      "message" in err && typeof err.message === "string"
        ? err.message
        : undefined,
  };
}

/**
 * 404 formatter: only emits Problem+JSON for known prefixes.
 * Everything else returns a bare 404.
 */
export function notFoundProblemJson(validPrefixes: string[]) {
  return (req: Request, res: Response) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      const body: Problem = {
        type: "about:blank",
        title: "Not Found",
        status: 404,
        detail: "Route not found",
        instance: String(req.id),
      };
      return res.status(404).type("application/problem+json").json(body);
    }
    return res.status(404).end();
  };
}

/** Error formatter: converts any thrown/next(err) into Problem+JSON. */
export function errorProblemJson() {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const shape = describeError(err);
    const ctx = extractLogContext(req);

    if (shape.status >= 500) {
      req.log.error({ ...ctx, status: shape.status, err }, "request error");
    } else {
      req.log.warn({ ...ctx, status: shape.status, code: shape.code }, "request rejected");
    }

    const body: Problem = {
      type: shape.type ?? "about:blank",
      title:
        shape.title ??
        (shape.status >= 500 ? "Internal Server Error" : "Request Error"),
      status: shape.status,
      detail: shape.message ?? "Unexpected error",
      instance: String(req.id),
      code: shape.code,
    };

    res.status(shape.status).type("application/problem+json").json(body);
  };
}
