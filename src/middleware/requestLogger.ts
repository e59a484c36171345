// src/middleware/requestLogger.ts
import type { RequestHandler } from "express";
import type { Logger } from "pino";

export function requestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const startedAt = Date.now();
    const log = logger.child({ requestId: req.id });
    req.log = log;

    res.on("finish", () => {
      log.info(
        {
          event: "request_completed",
          method: req.method,
          path: req.originalUrl.split("?")[0],
          status: res.statusCode,
          durationMs: Date.now() - startedAt,
        },
        "Request completed"
      );
    });

    next();
  };
}
