// backend/services/pages/src/controllers/config/handlers/save.ts
import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { PageConfigRepo } from "../../../repo/pageConfigRepo";
import { ok } from "../../../contracts/envelope";
import { parseOrThrow, savePageDto } from "../../../validators/page.dto";

export function makeSave(repo: PageConfigRepo): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      const dto = parseOrThrow(savePageDto, req.body);
      req.log.debug({ requestId: req.id, name: dto.name }, "[pages.config.save] enter");

      repo.save(dto.name, dto.config);

      req.log.info({ requestId: req.id, name: dto.name }, "[pages.config.save] saved");
      res.json(ok("save page config successfully"));
    } catch (err) {
      next(err);
    }
  };
}
