// backend/services/shared/app/createServiceApp.ts

/**
 * Shared app builder. Assembles the service stack in a fixed order:
 *   requestId → http logger → health (open) → cors + body parsers →
 *   routes → 404 → error handler.
 *
 * Notes:
 * - Services only supply their routes (via `mountRoutes`) and health checks.
 * - 404s become Problem+JSON only under `notFoundPrefixes` and the health paths.
 * - `errorTails` run before the Problem+JSON formatter, scoped by path, so a
 *   service can render its own error shape for a route family. They also see
 *   body-parser failures, which happen before any service router runs.
 */

import express, { type ErrorRequestHandler, type Express } from "express";
import { requestIdMiddleware } from "../middleware/requestId";
import { makeHttpLogger } from "../middleware/httpLogger";
import { coreMiddleware } from "../middleware/core";
import {
  notFoundProblemJson,
  errorProblemJson,
} from "../middleware/problemJson";
import {
  createHealthRouter,
  LIVENESS_PATHS,
  READINESS_PATHS,
  type HealthCheck,
} from "../health";

export type CreateServiceAppOptions = {
  /** Service slug (e.g., "pages"). Used in logs & health payloads. */
  serviceName: string;
  /** Mount point for the service router (default "/"). */
  apiPrefix?: string;
  /** Mounts the service's routes onto the provided Router. */
  mountRoutes: (router: express.Router) => void;
  /** Prefixes under which unmatched paths get a Problem+JSON 404. */
  notFoundPrefixes?: string[];
  /** Dependencies reported by the readiness routes. */
  healthChecks?: readonly HealthCheck[];
  /** Error handlers mounted under a path ahead of the Problem+JSON tail. */
  errorTails?: readonly { path: string; handler: ErrorRequestHandler }[];
  /** JSON body limit (default "2mb"). */
  bodyLimit?: string;
};

const HEALTH_PREFIXES = [...LIVENESS_PATHS, ...READINESS_PATHS];

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const {
    serviceName,
    apiPrefix = "/",
    mountRoutes,
    notFoundPrefixes = [],
    healthChecks = [],
    errorTails = [],
    bodyLimit = "2mb",
  } = opts;

  const app = express();
  app.disable("x-powered-by");

  // ── Transport & Telemetry ───────────────────────────────────────────────────
  app.use(requestIdMiddleware());
  app.use(makeHttpLogger(serviceName));

  // ── Health (public, no auth) ────────────────────────────────────────────────
  app.use(createHealthRouter(serviceName, healthChecks));

  // ── Body parsers ────────────────────────────────────────────────────────────
  app.use(coreMiddleware({ bodyLimit }));

  // ── Routes ──────────────────────────────────────────────────────────────────
  const api = express.Router();
  mountRoutes(api);
  app.use(apiPrefix, api);

  // ── Tails: 404 + error formatter ────────────────────────────────────────────
  app.use(notFoundProblemJson([...notFoundPrefixes, ...HEALTH_PREFIXES]));
  for (const tail of errorTails) app.use(tail.path, tail.handler);
  app.use(errorProblemJson());

  return app;
}
