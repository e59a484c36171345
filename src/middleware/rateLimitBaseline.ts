// src/middleware/rateLimitBaseline.ts
import { rateLimit } from "express-rate-limit";
import type { AppConfig } from "../config/env";

export function limitApiBaseline({ windowMs, max }: AppConfig["rateLimit"]) {
  return rateLimit({
    windowMs,
    limit: max,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    message: { error: "Too many requests, please try again later." },
  });
}
