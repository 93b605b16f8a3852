import express, { type Request, type Response, type NextFunction } from "express";
import { z } from "zod";

import { userIdFromClaims } from "../auth/jwt";
import type { ModerationClient } from "../core/client";
import { formatTimestamp, saveMaliciousMessage, type VerdictSink } from "../core/sink";
import { requireJwt } from "../middleware/auth";
import { setupMiddlewares } from "../middleware/setup";
import { logger } from "../util/logger";

export interface AppOptions {
  client: ModerationClient;
  jwtSecret?: string;
  trustedProxies?: string[];
  sink?: VerdictSink;
  /** Deadline for one classifier call. */
  checkTimeoutMs?: number;
}

// ---- Schemas ----
const ModerateBody = z.object({
  text: z.string().min(1, "text is required"),
});

const MessageBody = z.object({
  to_user_id: z.number().int().nonnegative(),
  text: z.string().min(1, "text is required"),
});

function checkSignal(timeoutMs: number | undefined): AbortSignal | undefined {
  return timeoutMs && timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined;
}

export function createApp(opts: AppOptions): express.Express {
  const app = express();
  app.use(express.json({ limit: "64kb" }));
  setupMiddlewares(app, { jwtSecret: opts.jwtSecret, trustedProxies: opts.trustedProxies });

  // ---- Routes ----
  app.get("/live", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.post("/moderate", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = ModerateBody.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: "invalid_request", details: parsed.error.flatten() });
        return;
      }

      const { verdict, error } = await opts.client.checkMessage(parsed.data.text, {
        signal: checkSignal(opts.checkTimeoutMs),
      });
      res.json(error ? { ...verdict, error: error.message } : verdict);
    } catch (err) {
      next(err);
    }
  });

  if (opts.jwtSecret) {
    const secret = opts.jwtSecret;
    app.post("/messages", requireJwt(secret), async (req: Request, res: Response, next: NextFunction) => {
      try {
        const parsed = MessageBody.safeParse(req.body);
        if (!parsed.success) {
          res.status(400).json({ error: "invalid_request", details: parsed.error.flatten() });
          return;
        }

        const { to_user_id: toUserId, text } = parsed.data;
        const { verdict } = await opts.client.checkMessage(text, { signal: checkSignal(opts.checkTimeoutMs) });

        if (!verdict.isMalicious) {
          res.status(202).json({ accepted: true });
          return;
        }

        const fromUserId = req.user ? userIdFromClaims(req.user) : 0;
        await saveMaliciousMessage(
          opts.sink,
          fromUserId,
          toUserId,
          text,
          verdict.errorCode,
          verdict.reason,
          formatTimestamp(),
        );
        res.status(422).json({ accepted: false, error_code: verdict.errorCode, reason: verdict.reason });
      } catch (err) {
        next(err);
      }
    });
  }

  // ---- Error handler (no message text in logs) ----
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status =
      typeof err === "object" && err !== null && "statusCode" in err && typeof err.statusCode === "number"
        ? err.statusCode
        : 502;
    logger.error({ err, path: req.path, status }, "request failed");
    res.status(status).json({
      error: "moderation_failed",
      message: err instanceof Error ? err.message : "Upstream error",
    });
  });

  return app;
}
