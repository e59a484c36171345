// src/types/express.d.ts
import type { Logger } from "pino";
import type { UserRecord } from "../domain/types";

declare global {
  namespace Express {
    interface Request {
      actor?: UserRecord; // set by the session middleware
      id?: string; // requestIdMiddleware uses this
      log?: Logger;
    }
  }
}

export { };
