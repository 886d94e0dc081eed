// backend/services/pages/src/controllers/config/handlers/get.ts
import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { PageConfigRepo } from "../../../repo/pageConfigRepo";
import { pageNameParams, parseOrThrow } from "../../../validators/page.dto";

/** Raw stored document (or the fallback page); never wrapped in an envelope. */
export function makeGet(repo: PageConfigRepo): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      const { name } = parseOrThrow(pageNameParams, req.params);
      req.log.debug({ requestId: req.id, name }, "[pages.config.get] enter");

      res.type("application/json").send(repo.get(name));
    } catch (err) {
      next(err);
    }
  };
}
