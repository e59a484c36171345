// src/middleware/asyncHandler.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";

/**
 * Express 4 does not await handlers; route rejections to the error middleware.
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}
