// src/services/index.ts
import { AdminService } from "./admin.service";
import { ApplicationsService } from "./applications.service";
import { AuthService } from "./auth.service";
import type { ServiceContext } from "./context";
import { JobsService } from "./jobs.service";
import { ModerationService } from "./moderation.service";

export interface Services {
  auth: AuthService;
  jobs: JobsService;
  applications: ApplicationsService;
  moderation: ModerationService;
  admin: AdminService;
}

export function createServices(ctx: ServiceContext): Services {
  return {
    auth: new AuthService(ctx),
    jobs: new JobsService(ctx),
    applications: new ApplicationsService(ctx),
    moderation: new ModerationService(ctx),
    admin: new AdminService(ctx),
  };
}

export type { ServiceContext } from "./context";
