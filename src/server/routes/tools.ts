import { Request, Response, Router } from "express";
import { BatchRequest, BatchRequestSchema } from "./schemas";
import { validateBody } from "../middleware/validation";
import { SessionManager } from "../sessionManager";
import { ToolcastLogger } from "../../core/logger";
import { ToolCancelledError, toErrorMessage } from "../../core/errors";
import { ToolRegistry } from "../../core/tool-engine/registry";
import { ToolExecutor } from "../../core/tool-engine/toolExecutor";
import { runBatch, serializeBatchResult } from "../../core/tool-engine/batchRunner";
import { LoggingStreamHandler, StreamingSession } from "../../core/streaming/streamingSession";
import { SseHandler } from "../../core/streaming/sseHandler";
import { StreamEventBuilder } from "../../core/streaming/streamTypes";

export interface StreamingSettings {
  heartbeatIntervalMs: number;
  bufferSize: number;
  includeMetadata: boolean;
}

export interface ToolsRouteDeps {
  registry: ToolRegistry;
  executor: ToolExecutor;
  sessions: SessionManager;
  streaming: StreamingSettings;
  logger: ToolcastLogger;
}

export function toolsRoutes(deps: ToolsRouteDeps): Router {
  const { registry, executor, sessions, streaming, logger } = deps;
  const r = Router();

  // A session id may be reused once its previous batch has finished
  const rejectBusySession = (body: BatchRequest, res: Response): boolean => {
    if (body.session_id && sessions.get(body.session_id)?.status === "processing") {
      res.status(409).json({
        ok: false,
        error: { code: "session_busy", message: `Session ${body.session_id} is still processing` },
      });
      return true;
    }
    return false;
  };

  const openSession = (body: BatchRequest): StreamingSession => {
    const session = new StreamingSession({ sessionId: body.session_id, logger });
    session.addHandler(new LoggingStreamHandler(logger));
    sessions.begin(session, body.tool_calls.length);
    return session;
  };

  r.get("/list", (req, res) => {
    res.json({ ok: true, tools: registry.list() });
  });

  r.post(
    "/execute",
    validateBody(BatchRequestSchema, async (body, req: Request, res: Response) => {
      if (rejectBusySession(body, res)) return;
      const session = openSession(body);

      try {
        const result = await runBatch(executor, body.tool_calls, session);
        sessions.complete(session.sessionId, result);
        res.json({ ok: true, ...serializeBatchResult(result) });
      } catch (error) {
        sessions.fail(session.sessionId, toErrorMessage(error));
        throw error;
      } finally {
        await session.close();
      }
    })
  );

  r.post(
    "/execute/stream",
    validateBody(BatchRequestSchema, async (body, req: Request, res: Response) => {
      if (rejectBusySession(body, res)) return;

      res.status(200).set({
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
        "X-Accel-Buffering": "no",
      });
      res.flushHeaders();

      const session = openSession(body);
      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableFinished) {
          logger.info("SSE client disconnected, cancelling batch", { sessionId: session.sessionId });
          controller.abort(new ToolCancelledError());
        }
      });

      const sse = new SseHandler({
        writer: (chunk) => {
          if (!res.destroyed && !res.writableEnded) res.write(chunk);
        },
        includeMetadata: streaming.includeMetadata,
        bufferSize: streaming.bufferSize,
        heartbeatIntervalMs: streaming.heartbeatIntervalMs,
        logger,
      });

      session.addHandler(sse);
      sse.sendConnectionEvent(session.sessionId, {
        total_calls: body.tool_calls.length,
        heartbeat_interval: streaming.heartbeatIntervalMs,
      });
      session.emit(
        StreamEventBuilder.processingStatus(session.sessionId, `Processing ${body.tool_calls.length} tool call(s)`)
      );

      try {
        const result = await runBatch(executor, body.tool_calls, session, { signal: controller.signal });
        sessions.complete(session.sessionId, result);
        sse.sendCompletionEvent(serializeBatchResult(result));
      } catch (error) {
        const message = toErrorMessage(error);
        sessions.fail(session.sessionId, message);
        logger.error(`Streaming batch failed: ${message}`, { sessionId: session.sessionId });
        session.emit(StreamEventBuilder.error(session.sessionId, message));
      } finally {
        await session.close();
        res.end();
      }
    })
  );

  return r;
}
