import http from "http";
import { createHttpServer } from "./http";
import { SessionManager } from "./sessionManager";
import { toolsRoutes, StreamingSettings } from "./routes/tools";
import { sessionsRoutes } from "./routes/sessions";
import { ToolcastLogger, getLogger } from "../core/logger";
import { ToolRegistry } from "../core/tool-engine/registry";
import { ToolExecutor } from "../core/tool-engine/toolExecutor";
import { ToolExecutionPool } from "../core/tool-engine/toolExecutionPool";

export interface StartServerOptions {
  registry: ToolRegistry;
  pool: ToolExecutionPool;
  executor: ToolExecutor;
  port: number;
  host?: string;
  allowedOrigins: string[];
  streaming: StreamingSettings;
  sessionRetentionMs: number;
  logger?: ToolcastLogger;
}

export interface RunningServer {
  server: http.Server;
  port: number;
  url: string;
  sessions: SessionManager;
  close(): Promise<void>;
}

export async function startServer(options: StartServerOptions): Promise<RunningServer> {
  const logger = (options.logger ?? getLogger()).child({ source: "server" });
  const sessions = new SessionManager({ retentionMs: options.sessionRetentionMs });

  const app = createHttpServer({
    allowedOrigins: options.allowedOrigins,
    routes: {
      tools: toolsRoutes({
        registry: options.registry,
        executor: options.executor,
        sessions,
        streaming: options.streaming,
        logger,
      }),
      sessions: sessionsRoutes(sessions),
    },
    poolStats: () => options.pool.getStats(),
    logger,
  });

  const server = http.createServer(app);

  await new Promise<void>((resolve, reject) => {
    const onError = (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE") {
        logger.error(`Port ${options.port} is already in use; set PORT to another value`);
      }
      sessions.dispose();
      reject(error);
    };
    server.once("error", onError);
    server.listen(options.port, options.host, () => {
      server.off("error", onError);
      resolve();
    });
  });

  server.on("error", (error) => {
    logger.error(error, { event: "server_error" });
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : options.port;
  const url = `http://${options.host ?? "localhost"}:${port}`;

  logger.info(`toolcast server listening on ${url}`, {
    tools: options.registry.list().map((t) => t.name),
    maxConcurrent: options.pool.getStats().maxConcurrent,
  });

  return {
    server,
    port,
    url,
    sessions,
    close: () =>
      new Promise<void>((resolve, reject) => {
        sessions.dispose();
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
