import express, { NextFunction, Request, Response, Router } from "express";
import cors from "cors";
import bodyParser from "body-parser";
import { ToolcastError, toErrorMessage } from "../core/errors";
import { ToolcastLogger } from "../core/logger";
import { PoolStats } from "../core/tool-engine/toolExecutionPool";

export const API_VERSION = "0.1.0";

export interface HttpServerDeps {
  allowedOrigins: string[];
  routes: {
    tools: Router;
    sessions: Router;
  };
  poolStats: () => PoolStats;
  logger: ToolcastLogger;
}

const ENDPOINTS = [
  "GET /",
  "GET /health",
  "GET /tools/list",
  "POST /tools/execute",
  "POST /tools/execute/stream",
  "GET /sessions/:id",
];

function statusOf(error: unknown): number {
  if (error instanceof ToolcastError && error.statusCode) return error.statusCode;
  // body-parser errors carry an http status
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return 500;
}

export function createHttpServer(deps: HttpServerDeps) {
  const app = express();
  const { allowedOrigins, logger } = deps;

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(new Error("Not allowed by CORS"));
        }
      },
      credentials: true,
    })
  );

  app.use(bodyParser.json({ limit: "5mb" }));

  app.use((req, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      logger.traceRequest(req.method, req.originalUrl, res.statusCode, Date.now() - startedAt);
    });
    next();
  });

  app.get("/", (req, res) => {
    const host = req.get("host") || "localhost";
    res.json({
      name: "toolcast",
      version: API_VERSION,
      status: "running",
      endpoints: ENDPOINTS,
      examples: {
        listTools: `GET http://${host}/tools/list`,
        execute: `POST http://${host}/tools/execute`,
        stream: `POST http://${host}/tools/execute/stream`,
      },
    });
  });

  app.get("/health", (req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString(), pool: deps.poolStats() });
  });

  app.use("/tools", deps.routes.tools);
  app.use("/sessions", deps.routes.sessions);

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      ok: false,
      error: {
        code: "not_found",
        message: `Route ${req.method} ${req.path} not found`,
        details: { availableEndpoints: ENDPOINTS },
      },
    });
  });

  // Error handler; express recognises it by its four parameters
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(error);
    const code = error instanceof ToolcastError ? error.code : status === 400 ? "bad_request" : "internal_error";
    if (status >= 500) {
      logger.error(error instanceof Error ? error : new Error(toErrorMessage(error)), { path: req.path });
    }
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(status).json({
      ok: false,
      error: {
        code,
        message: toErrorMessage(error),
        details: error instanceof ToolcastError ? error.details : undefined,
      },
    });
  });

  return app;
}
