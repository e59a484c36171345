//src/middleware/requireSession.ts
import type { Request, RequestHandler } from "express";
import type { SessionTokens } from "../auth/tokens";
import type { UserRepository } from "../repositories/types";
import type { UserRecord } from "../domain/types";
import { NotAuthenticatedError } from "../domain/errors";
import { serializeError } from "../config/logger";
import { asyncHandler } from "./asyncHandler";

export interface SessionDeps {
  tokens: SessionTokens;
  users: Pick<UserRepository, "findById">;
}

export interface SessionMiddleware {
  /** 401 unless a valid bearer token for an existing user is presented. */
  requireSession: RequestHandler;
  /** Attaches the actor when the token checks out; otherwise continues anonymously. */
  optionalSession: RequestHandler;
}

function readBearer(req: Request): string | null {
  const auth = req.headers.authorization;
  if (!auth || typeof auth !== "string") return null;

  const match = /^Bearer\s+(\S+)$/i.exec(auth.trim());
  return match ? match[1] : null;
}

export function createSessionMiddleware({ tokens, users }: SessionDeps): SessionMiddleware {
  async function loadActor(token: string): Promise<UserRecord | null> {
    const payload = tokens.verify(token);
    if (!payload) return null;
    return users.findById(payload.sub);
  }

  const requireSession = asyncHandler(async (req, _res, next) => {
    const token = readBearer(req);
    if (!token) throw new NotAuthenticatedError("Authorization token is required");

    const actor = await loadActor(token);
    // expired, tampered and deleted-user tokens look the same to the caller
    if (!actor) throw new NotAuthenticatedError("Invalid or expired token");

    req.actor = actor;
    next();
  });

  const optionalSession = asyncHandler(async (req, _res, next) => {
    const token = readBearer(req);
    if (token) {
      try {
        const actor = await loadActor(token);
        if (actor) req.actor = actor;
      } catch (err) {
        req.log?.warn(
          { event: "optional_session_failed", error: serializeError(err) },
          "Could not resolve optional session; continuing anonymously"
        );
      }
    }
    next();
  });

  return { requireSession, optionalSession };
}
