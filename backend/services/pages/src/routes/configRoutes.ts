// backend/services/pages/src/routes/configRoutes.ts
import { Router } from "express";
import type { PageConfigRepo } from "../repo/pageConfigRepo";
import { makeList } from "../controllers/config/handlers/list";
import { makeGet } from "../controllers/config/handlers/get";
import { makeSave } from "../controllers/config/handlers/save";
import { makeRemove } from "../controllers/config/handlers/remove";

export function configRoutes(repo: PageConfigRepo): Router {
  const router = Router();

  router.get("/list", makeList(repo));
  router.get("/get/:name", makeGet(repo));
  router.get("/delete/:name", makeRemove(repo));
  router.post("/save", makeSave(repo));

  return router;
}
