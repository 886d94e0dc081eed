// backend/services/pages/src/controllers/config/handlers/remove.ts
import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { PageConfigRepo } from "../../../repo/pageConfigRepo";
import { ok } from "../../../contracts/envelope";
import { pageNameParams, parseOrThrow } from "../../../validators/page.dto";

/** Idempotent: deleting an absent page still reports success. */
export function makeRemove(repo: PageConfigRepo): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      const { name } = parseOrThrow(pageNameParams, req.params);
      req.log.debug({ requestId: req.id, name }, "[pages.config.remove] enter");

      repo.remove(name);

      req.log.info({ requestId: req.id, name }, "[pages.config.remove] removed");
      res.json(ok("delete page config successfully"));
    } catch (err) {
      next(err);
    }
  };
}
