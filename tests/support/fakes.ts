// tests/support/fakes.ts
import pino from "pino";
import { loadConfig, type AppConfig } from "../../src/config/env";
import { hashPassword } from "../../src/auth/credentials";
import { SessionTokens } from "../../src/auth/tokens";
import type { JobRecord, NewJob, Role, UserRecord } from "../../src/domain/types";
import { NotificationDispatcher, type Notification, type Notifier } from "../../src/services/notifier";
import { createServices, type ServiceContext, type Services } from "../../src/services";
import { MemoryStore } from "./memory-store";

export const TEST_PASSWORD = "password123";

export const silentLogger = pino({ level: "silent" });

export function testConfig(overrides: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({
    NODE_ENV: "test",
    SESSION_SECRET: "test-secret",
    LOG_LEVEL: "silent",
    RATE_LIMIT_MAX: "10000",
    ...overrides,
  });
}

/** Keeps every notification it is handed; can be told to fail. */
export class RecordingNotifier implements Notifier {
  readonly sent: Notification[] = [];
  failWith: Error | null = null;

  async notify(notification: Notification): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.sent.push(notification);
  }

  ofKind<K extends Notification["kind"]>(kind: K): Extract<Notification, { kind: K }>[] {
    return this.sent.filter((n): n is Extract<Notification, { kind: K }> => n.kind === kind);
  }
}

export interface Harness {
  store: MemoryStore;
  notifier: RecordingNotifier;
  tokens: SessionTokens;
  ctx: ServiceContext;
  services: Services;
}

export function createHarness(options: { now?: () => Date } = {}): Harness {
  const store = new MemoryStore({ now: options.now });
  const notifier = new RecordingNotifier();
  const tokens = new SessionTokens({ secret: "test-secret", ttlDays: 7 });
  const ctx: ServiceContext = {
    store,
    notifications: new NotificationDispatcher(notifier, silentLogger),
    tokens,
    logger: silentLogger,
    now: options.now,
  };
  return { store, notifier, tokens, ctx, services: createServices(ctx) };
}

let emailSeq = 0;

export async function seedUser(
  store: MemoryStore,
  role: Role,
  overrides: Partial<Pick<UserRecord, "email" | "firstName" | "lastName" | "company">> = {}
): Promise<UserRecord> {
  emailSeq += 1;
  return store.users.create({
    email: overrides.email ?? `${role}${emailSeq}@example.test`,
    passwordHash: await hashPassword(TEST_PASSWORD),
    firstName: overrides.firstName ?? "Test",
    lastName: overrides.lastName ?? role.charAt(0).toUpperCase() + role.slice(1),
    role,
    company: overrides.company !== undefined ? overrides.company : role === "employer" ? "Acme" : null,
  });
}

export function jobInput(employer: UserRecord, overrides: Partial<NewJob> = {}): NewJob {
  return {
    title: "Backend Engineer",
    description: "Build APIs",
    requirements: "3 years of Node",
    benefits: null,
    location: "Berlin",
    salaryMin: null,
    salaryMax: null,
    skills: ["Node"],
    type: "full-time",
    experienceLevel: "mid",
    remote: false,
    status: "approved",
    company: employer.company ?? "Acme",
    employerId: employer.id,
    ...overrides,
  };
}

export function seedJob(store: MemoryStore, employer: UserRecord, overrides: Partial<NewJob> = {}): Promise<JobRecord> {
  return store.jobs.create(jobInput(employer, overrides));
}

export const validJobBody = {
  title: "Backend Engineer",
  description: "Build APIs",
  requirements: "3 years of Node",
  location: "Berlin",
  skills: ["Node", "Docker"],
};

export const validApplication = {
  coverLetter: "I would like to join.",
  resumeUrl: "https://cv.example.test/me.pdf",
};
