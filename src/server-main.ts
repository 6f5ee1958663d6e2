/**
 * Bootstrap config + logger + runtime + server
 */

import "dotenv/config";
import { loadConfig } from "./core/config";
import { initializeLogger } from "./core/logger";
import { toErrorMessage } from "./core/errors";
import { createRuntime } from "./runtime";
import { RunningServer, startServer } from "./server/index";

export interface ServeOptions {
  port?: number;
  configFile?: string;
}

export async function serve(options: ServeOptions = {}): Promise<RunningServer> {
  const config = loadConfig({ file: options.configFile });
  if (options.port !== undefined) config.server.port = options.port;

  const logger = initializeLogger(config.logger);

  const runtime = createRuntime(config, { logger });
  logger.info("Starting toolcast", {
    port: config.server.port,
    backend: runtime.backendKind,
    maxConcurrentTools: config.pool.maxConcurrentTools,
  });

  const running = await startServer({
    registry: runtime.registry,
    pool: runtime.pool,
    executor: runtime.executor,
    port: config.server.port,
    allowedOrigins: config.server.allowedOrigins,
    streaming: config.streaming,
    sessionRetentionMs: config.streaming.sessionRetentionMs,
    logger,
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    running
      .close()
      .then(() => logger.flush())
      .then(
        () => process.exit(0),
        (error) => {
          logger.error(`Shutdown failed: ${toErrorMessage(error)}`);
          process.exit(1);
        }
      );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  return running;
}

if (require.main === module) {
  serve().catch((error) => {
    console.error("Fatal error:", toErrorMessage(error));
    process.exit(1);
  });
}
