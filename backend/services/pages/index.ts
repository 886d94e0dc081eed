// backend/services/pages/index.ts
import "./src/bootstrap"; // loads env + asserts required vars
import "./src/log.init";

import { logger } from "@shared/utils/logger";
import { startHttpService } from "@shared/bootstrap/startHttpService";
import { config } from "./src/config";
import { openPageStore } from "./src/db";
import { createPagesApp } from "./src/app";
import { PageRenderer } from "./src/render/pageRenderer";
import { SERVICE_NAME } from "./src/serviceName";

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, `[${SERVICE_NAME}] Unhandled Promise Rejection`);
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, `[${SERVICE_NAME}] Uncaught Exception`);
});

async function start(): Promise<void> {
  try {
    const { store, repo } = await openPageStore({
      dbPath: config.dbPath,
      seedDir: config.seedDir,
      timeoutMs: config.dbTimeoutMs,
    });
    const app = createPagesApp({
      store,
      repo,
      renderer: PageRenderer.fromFile(config.templateFile),
      indexPage: config.indexPage,
    });
    startHttpService({
      app,
      port: config.port,
      serviceName: SERVICE_NAME,
      logger,
      onShutdown: () => store.close(),
    });
  } catch (err) {
    logger.fatal({ err }, `failed to start ${SERVICE_NAME} service`);
    process.exit(1);
  }
}

void start();
