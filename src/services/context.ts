// src/services/context.ts
import type { Logger } from "pino";
import type { SessionTokens } from "../auth/tokens";
import type { Store } from "../repositories/types";
import type { NotificationDispatcher } from "./notifier";

/** Handles every service is constructed with. */
export interface ServiceContext {
  store: Store;
  notifications: NotificationDispatcher;
  tokens: SessionTokens;
  logger: Logger;
  now?: () => Date;
}
