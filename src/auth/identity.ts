//src/auth/identity.ts
import type { Request } from "express";
import type { UserRecord } from "../domain/types";
import { NotAuthenticatedError } from "../domain/errors";

export function getActor(req: Request): UserRecord | null {
  return req.actor ?? null;
}

export function mustGetActor(req: Request): UserRecord {
  const actor = getActor(req);
  if (!actor) throw new NotAuthenticatedError("Authorization token is required");
  return actor;
}
