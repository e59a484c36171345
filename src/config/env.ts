import dotenv from "dotenv";
import { z } from "zod";

const DEV_MONGO_URI = "mongodb://127.0.0.1:27017/jobboard?replicaSet=rs0";
const DEV_SESSION_SECRET = "dev-session-secret";

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(4000),
  MONGO_URI: optionalString,
  SESSION_SECRET: optionalString,
  SESSION_TTL_DAYS: z.coerce.number().positive().default(7),
  CORS_ORIGIN: optionalString,
  TRUST_PROXY: z
    .enum(["true", "false"])
    .default("false")
    .transform((v) => v === "true"),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(LOG_LEVELS))
    .default("info"),
  LOG_SERVICE_NAME: z.string().trim().default("jobboard-api"),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(300),
  MAIL_API_URL: optionalString.pipe(z.string().url().optional()),
  MAIL_API_KEY: optionalString,
  MAIL_FROM: z.string().trim().default("noreply@jobboard.local"),
  ADMIN_EMAIL: optionalString,
  ADMIN_PASSWORD: optionalString,
  PUBLIC_BASE_URL: optionalString,
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  mongoUri: string;
  session: { secret: string; ttlDays: number };
  corsOrigin?: string;
  trustProxy: boolean;
  log: { level: LogLevel; service: string };
  rateLimit: { windowMs: number; max: number };
  mail: { apiUrl?: string; apiKey?: string; from: string };
  admin?: { email: string; password: string };
  publicBaseUrl?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join("; ")}`);
  }

  const e = parsed.data;
  const production = e.NODE_ENV === "production";

  // In production, do NOT silently fallback.
  if (production && !e.MONGO_URI) throw new ConfigError("MONGO_URI is required in production");
  if (production && !e.SESSION_SECRET) {
    throw new ConfigError("SESSION_SECRET is required in production");
  }

  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    mongoUri: e.MONGO_URI ?? DEV_MONGO_URI,
    session: { secret: e.SESSION_SECRET ?? DEV_SESSION_SECRET, ttlDays: e.SESSION_TTL_DAYS },
    corsOrigin: e.CORS_ORIGIN,
    trustProxy: e.TRUST_PROXY,
    log: { level: e.LOG_LEVEL, service: e.LOG_SERVICE_NAME },
    rateLimit: { windowMs: e.RATE_LIMIT_WINDOW_MS, max: e.RATE_LIMIT_MAX },
    mail: { apiUrl: e.MAIL_API_URL, apiKey: e.MAIL_API_KEY, from: e.MAIL_FROM },
    admin:
      e.ADMIN_EMAIL && e.ADMIN_PASSWORD
        ? { email: e.ADMIN_EMAIL, password: e.ADMIN_PASSWORD }
        : undefined,
    publicBaseUrl: e.PUBLIC_BASE_URL,
  };
}

export const configEnv = (): AppConfig => {
  dotenv.config();
  return loadConfig();
};
