// backend/services/pages/src/routes/pageRoutes.ts
import { Router } from "express";
import type { PageRenderer } from "../render/pageRenderer";
import { makeRender } from "../controllers/page/handlers/render";
import { makeRedirectIndex } from "../controllers/page/handlers/redirectIndex";

export function pageRoutes(renderer: PageRenderer, indexPage: string): Router {
  const router = Router();

  router.get("/", makeRedirectIndex(indexPage));
  router.get("/page/:name", makeRender(renderer));

  return router;
}
