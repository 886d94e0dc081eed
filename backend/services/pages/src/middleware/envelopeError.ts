// backend/services/pages/src/middleware/envelopeError.ts
import type { Request, Response, NextFunction } from "express";
import { extractLogContext } from "@shared/utils/logger";
import { describeError } from "@shared/middleware/problemJson";
import { fail } from "../contracts/envelope";

/** body-parser's `type` for a request body that is not valid JSON. */
const BODY_PARSE_FAILED = "entity.parse.failed";

/**
 * Error tail for the config routes: same fields as Problem+JSON, rendered in
 * the amis envelope (`status: -1`) with HTTP 200. Mounted at app level so it
 * also catches body-parser failures on these routes.
 */
export function envelopeError() {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const described = describeError(err);
    const shape =
      described.type === BODY_PARSE_FAILED
        ? { ...described, message: "request body must be valid JSON" }
        : described;
    const ctx = extractLogContext(req);

    if (shape.status >= 500) {
      req.log.error({ ...ctx, status: shape.status, err }, "[pages.config] request failed");
    } else {
      req.log.warn({ ...ctx, code: shape.code, detail: shape.message }, "[pages.config] request rejected");
    }

    res.status(200).json(fail(shape.message ?? "unexpected error"));
  };
}
