// backend/services/pages/src/log.init.ts
import { initLogger } from "@shared/utils/logger";
import { SERVICE_NAME } from "./serviceName";

/**
 * Side-effect module: initializes the shared logger with this service's name.
 * Import this ONCE, right after ./bootstrap, at the start of index.ts.
 */
initLogger(SERVICE_NAME);
