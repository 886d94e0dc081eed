// backend/services/pages/src/controllers/page/handlers/redirectIndex.ts
import type { Request, Response, RequestHandler } from "express";

export function makeRedirectIndex(indexPage: string): RequestHandler {
  const target = `/page/${encodeURIComponent(indexPage)}`;
  return (_req: Request, res: Response) => {
    res.redirect(308, target);
  };
}
