// backend/services/shared/middleware/core.ts
import express from "express";
import cors from "cors";

export interface CoreMiddlewareOptions {
  /** Max JSON/urlencoded body size, e.g. "2mb". */
  bodyLimit: string;
}

export function coreMiddleware(opts: CoreMiddlewareOptions) {
  return [
    cors({ origin: true, credentials: true }),
    express.json({ limit: opts.bodyLimit }),
    express.urlencoded({ extended: true, limit: opts.bodyLimit }),
  ];
}
