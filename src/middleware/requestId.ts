// src/middleware/requestId.ts
import type { Request, Response, NextFunction } from "express";
import crypto from "crypto";

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction) {
  // Accept upstream ID if provided (useful behind nginx/Cloudflare)
  const header = req.headers["x-request-id"] ?? req.headers["x-correlation-id"];
  const incoming = typeof header === "string" ? header.trim() : "";

  const id = incoming || crypto.randomUUID();

  req.id = id;
  res.setHeader("x-request-id", id);

  next();
}
