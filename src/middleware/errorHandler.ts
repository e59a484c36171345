// src/middleware/errorHandler.ts
import type { ErrorRequestHandler, RequestHandler } from "express";
import type { Logger } from "pino";
import { AppError, ForbiddenError, NotFoundError } from "../domain/errors";
import { serializeError } from "../config/logger";

function isBodyParseError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(new NotFoundError(`Endpoint not found: ${req.method} ${req.path}`));
};

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const log = req.log ?? logger;

    if (err instanceof ForbiddenError) {
      return res.status(err.status).json({ error: "Forbidden", reason: err.message, code: err.code });
    }

    if (err instanceof AppError) {
      if (err.status >= 500) {
        log.error({ event: "request_failed", error: serializeError(err) }, err.message);
      }
      return res.status(err.status).json({ error: err.message, code: err.code });
    }

    if (isBodyParseError(err)) {
      return res.status(400).json({ error: "Malformed JSON body", code: "VALIDATION_ERROR" });
    }

    log.error({ event: "request_failed", error: serializeError(err) }, "Unhandled error");
    return res.status(500).json({ error: "Internal server error", code: "INTERNAL" });
  };
}
