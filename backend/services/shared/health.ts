// backend/services/shared/health.ts
import { Router, type Request, type Response } from "express";

/** A named dependency. `check` throws (or rejects) while it is unusable. */
export interface HealthCheck {
  name: string;
  check: () => void | Promise<void>;
}

export type CheckResult = { ok: true } | { ok: false; error: string };

export const LIVENESS_PATHS = ["/health", "/healthz"] as const;
export const READINESS_PATHS = ["/health/ready", "/readyz"] as const;

async function run(c: HealthCheck): Promise<[string, CheckResult]> {
  try {
    await c.check();
    return [c.name, { ok: true }];
  } catch (err) {
    return [
      c.name,
      { ok: false, error: err instanceof Error ? err.message : String(err) },
    ];
  }
}

/**
 * Liveness answers while the process serves requests. Readiness runs every
 * check and answers 503 when any fails, naming each check's outcome.
 */
export function createHealthRouter(
  service: string,
  checks: readonly HealthCheck[] = []
): Router {
  const router = Router();

  const live = (req: Request, res: Response) => {
    res.json({ service, ok: true, requestId: String(req.id) });
  };

  const ready = async (req: Request, res: Response) => {
    const results = await Promise.all(checks.map(run));
    const ok = results.every(([, r]) => r.ok);
    res.status(ok ? 200 : 503).json({
      service,
      ok,
      requestId: String(req.id),
      checks: Object.fromEntries(results),
    });
  };

  for (const p of LIVENESS_PATHS) router.get(p, live);
  for (const p of READINESS_PATHS) {
    router.get(p, (req, res, next) => {
      ready(req, res).catch(next);
    });
  }

  return router;
}
