// backend/services/pages/src/app.ts
/**
 * Assembles the pages service on the shared builder. Dependencies are
 * injected so the entrypoint owns the single store handle and tests can
 * build the app over a temp store.
 */

import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import type { KeyValueStore } from "./store/KeyValueStore";
import type { PageConfigRepo } from "./repo/pageConfigRepo";
import type { PageRenderer } from "./render/pageRenderer";
import { configRoutes } from "./routes/configRoutes";
import { pageRoutes } from "./routes/pageRoutes";
import { envelopeError } from "./middleware/envelopeError";
import { SERVICE_NAME } from "./serviceName";

export interface PagesAppDeps {
  store: KeyValueStore;
  repo: PageConfigRepo;
  renderer: PageRenderer;
  indexPage: string;
}

export function createPagesApp(deps: PagesAppDeps): Express {
  const { store, repo, renderer, indexPage } = deps;

  return createServiceApp({
    serviceName: SERVICE_NAME,
    notFoundPrefixes: ["/config", "/page"],
    healthChecks: [
      {
        name: "store",
        check: () => {
          if (!store.isOpen()) throw new Error("store is closed");
        },
      },
    ],
    errorTails: [{ path: "/config", handler: envelopeError() }],
    mountRoutes: (api) => {
      api.use("/config", configRoutes(repo));
      api.use(pageRoutes(renderer, indexPage));
    },
  });
}
