// backend/services/pages/src/controllers/config/handlers/list.ts
import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { PageConfigRepo } from "../../../repo/pageConfigRepo";
import { ok, type PageItem } from "../../../contracts/envelope";

export function makeList(repo: PageConfigRepo): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    req.log.debug({ requestId: req.id }, "[pages.config.list] enter");
    try {
      const { items, total } = repo.list();
      const pages: PageItem[] = items.map((e) => ({
        name: e.name,
        config: e.document.toString("utf8"),
      }));
      req.log.debug({ requestId: req.id, total }, "[pages.config.list] exit");
      res.json(ok("", { items: pages, total }));
    } catch (err) {
      next(err);
    }
  };
}
