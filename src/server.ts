// src/server.ts
import express, { type Express } from "express";
import cors from "cors";
import helmet from "helmet";
import swaggerUi from "swagger-ui-express";
import type { Logger } from "pino";
import type { AppConfig } from "./config/env";
import { createLogger, serializeError } from "./config/logger";
import { connectMongo, disconnectMongo } from "./config/mongo";
import { createSwaggerSpec } from "./config/swagger";
import { SessionTokens } from "./auth/tokens";
import type { Store } from "./repositories/types";
import { MongoStore } from "./repositories/mongo";
import { createNotifier, NotificationDispatcher, type Notifier } from "./services/notifier";
import { createServices } from "./services";
import { ensureAdminAccount } from "./services/admin.service";
import { requestIdMiddleware } from "./middleware/requestId";
import { requestLogger } from "./middleware/requestLogger";
import { limitApiBaseline } from "./middleware/rateLimitBaseline";
import { createSessionMiddleware } from "./middleware/requireSession";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { asyncHandler } from "./middleware/asyncHandler";
import { createAuthRouter } from "./routes/auth";
import { createJobsRouter } from "./routes/jobs";
import { createApplicationsRouter } from "./routes/applications";
import { createAdminRouter } from "./routes/admin";

export interface AppDeps {
  config: AppConfig;
  store: Store;
  notifier: Notifier;
  logger: Logger;
  now?: () => Date;
}

export function createApp({ config, store, notifier, logger, now }: AppDeps): Express {
  const app = express();

  const clock = now;
  const tokens = new SessionTokens({
    secret: config.session.secret,
    ttlDays: config.session.ttlDays,
    now: clock ? () => clock().getTime() : undefined,
  });
  const services = createServices({
    store,
    notifications: new NotificationDispatcher(notifier, logger),
    tokens,
    logger,
    now,
  });
  const session = createSessionMiddleware({ tokens, users: store.users });

  // 0) Proxy awareness (needed for correct req.ip behind a load balancer)
  if (config.trustProxy) {
    app.set("trust proxy", 1);
  }

  // 1) Request correlation id early
  app.use(requestIdMiddleware);

  // 2) Security headers early
  app.use(helmet());

  // 3) CORS early
  app.use(
    cors({
      origin: config.corsOrigin,
      credentials: true,
    })
  );
  app.use(express.json({ limit: "2mb" }));
  app.use(requestLogger(logger));

  app.use("/api/docs", swaggerUi.serve, swaggerUi.setup(createSwaggerSpec(config)));

  app.use("/api/v1", limitApiBaseline(config.rateLimit));

  app.use("/api/v1/auth", createAuthRouter(services, session));
  app.use("/api/v1/jobs", createJobsRouter(services, session));
  app.use("/api/v1/applications", createApplicationsRouter(services, session));
  app.use("/api/v1/admin", createAdminRouter(services, session));

  app.get(
    "/api/health",
    asyncHandler(async (req, res) => {
      const database = await store.ping().catch((err: unknown) => {
        req.log?.warn({ event: "health_db_failed", error: serializeError(err) }, "Database ping failed");
        return false;
      });
      res.json({ status: "ok", database: database ? "connected" : "disconnected" });
    })
  );

  app.use(notFoundHandler);
  app.use(errorHandler(logger));

  return app;
}

export async function startServer(config: AppConfig) {
  const logger = createLogger(config);

  // 1) connect first
  await connectMongo(config.mongoUri, logger);

  const store = new MongoStore();
  if (config.admin) {
    await ensureAdminAccount({ store, logger }, config.admin);
  }

  const app = createApp({ config, store, notifier: createNotifier(config.mail, logger), logger });

  const server = app.listen(config.port, () => {
    logger.info({ port: config.port }, `API listening on http://localhost:${config.port}`);
    logger.info(`Swagger UI at http://localhost:${config.port}/api/docs`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    server.close(() => {
      disconnectMongo()
        .then(() => {
          logger.info("Server closed. MongoDB disconnected.");
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ error: serializeError(err) }, "MongoDB disconnect failed");
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  return app;
}
