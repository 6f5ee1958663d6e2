import { Router } from "express";
import { SessionManager } from "../sessionManager";

export function sessionsRoutes(sessions: SessionManager): Router {
  const r = Router();

  r.get("/:id", (req, res) => {
    const record = sessions.get(req.params.id);
    if (!record) {
      res.status(404).json({
        ok: false,
        error: { code: "session_not_found", message: `Session ${req.params.id} not found` },
      });
      return;
    }
    res.json({ ok: true, session: record });
  });

  return r;
}
