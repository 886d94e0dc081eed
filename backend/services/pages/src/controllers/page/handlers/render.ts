// backend/services/pages/src/controllers/page/handlers/render.ts
import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { PageRenderer } from "../../../render/pageRenderer";
import { pageNameParams, parseOrThrow } from "../../../validators/page.dto";

export function makeRender(renderer: PageRenderer): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      const { name } = parseOrThrow(pageNameParams, req.params);
      res.type("html").send(renderer.render(name));
    } catch (err) {
      next(err);
    }
  };
}
