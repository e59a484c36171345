// src/routes/params.ts
import { NotFoundError } from "../domain/errors";

/**
 * Path ids are positive integers; anything else names nothing that exists.
 */
export function parseIdParam(raw: string | undefined, what: string): number {
  if (!raw || !/^\d+$/.test(raw)) throw new NotFoundError(`${what} not found`);
  const id = Number(raw);
  if (!Number.isSafeInteger(id) || id < 1) throw new NotFoundError(`${what} not found`);
  return id;
}
