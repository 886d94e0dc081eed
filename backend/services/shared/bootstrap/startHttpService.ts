// backend/services/shared/bootstrap/startHttpService.ts

/**
 * Binds the service app and wires signal shutdown.
 *
 * Notes:
 * - Uses `process.once` for SIGINT/SIGTERM so multiple calls don't multiply handlers.
 * - `onShutdown` runs after the server has closed (e.g. to close the store).
 * - headersTimeout must stay above keepAliveTimeout.
 */

import type { Express } from "express";
import type { Server } from "node:http";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  /** Allow 0 in tests to get an ephemeral port. */
  port: number;
  serviceName: string;
  logger: Pick<Logger, "info" | "error">;
  onShutdown?: () => void;
}

export interface StartedService {
  server: Server;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): StartedService {
  const { app, port, serviceName, logger, onShutdown } = opts;

  const server = app.listen(port, () => {
    const addr = server.address();
    const boundPort = addr !== null && typeof addr === "object" ? addr.port : port;
    logger.info({ service: serviceName, port: boundPort }, "service listening");
  });

  server.keepAliveTimeout = 7_000;
  server.headersTimeout = 9_000;

  server.on("error", (err) => {
    logger.error({ err, service: serviceName }, "http server error");
    process.exit(1);
  });

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) return reject(err);
        onShutdown?.();
        resolve();
      });
    });

  const shutdown = (signal: string) => {
    logger.info({ signal, service: serviceName }, "shutting down service");
    stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err, service: serviceName }, "shutdown failed");
        process.exit(1);
      }
    );
    // Fail-safe in case close hangs
    setTimeout(() => process.exit(1), 10_000).unref();
  };

  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  return { server, stop };
}
