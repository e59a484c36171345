// src/services/admin.service.ts
import type { ApplicationStatus, CountsBy, JobStatus, Role, UserRecord } from "../domain/types";
import { NotFoundError, ValidationError } from "../domain/errors";
import { authorize } from "../auth/policy";
import { hashPassword } from "../auth/credentials";
import { resolvePage, toPageMeta, USER_PAGE_LIMITS, type PageMeta, type PageQuery } from "./pagination";
import { toUserDTO, type UserDTO } from "./projections";
import type { ServiceContext } from "./context";

const RECENT_ACTIVITY_DAYS = 30;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface PlatformStats {
  totalUsers: number;
  totalJobs: number;
  totalApplications: number;
  pendingJobs: number;
  usersByRole: CountsBy<Role>;
  jobsByStatus: CountsBy<JobStatus>;
  applicationsByStatus: CountsBy<ApplicationStatus>;
  recentActivity: { users: number; jobs: number; applications: number };
}

export type UserListPage = PageMeta & { users: UserDTO[] };

export interface DeletedUserSummary {
  deletedJobs: number;
  deletedApplications: number;
}

export class AdminService {
  constructor(private readonly ctx: ServiceContext) {}

  async stats(actor: UserRecord): Promise<PlatformStats> {
    authorize(actor, "admin:view-stats");
    const { store } = this.ctx;

    const now = this.ctx.now?.() ?? new Date();
    const createdSince = new Date(now.getTime() - RECENT_ACTIVITY_DAYS * DAY_MS);

    const [
      totalUsers,
      totalJobs,
      totalApplications,
      pendingJobs,
      usersByRole,
      jobsByStatus,
      applicationsByStatus,
      recentUsers,
      recentJobs,
      recentApplications,
    ] = await Promise.all([
      store.users.count(),
      store.jobs.count(),
      store.applications.count(),
      store.jobs.count({ status: "pending" }),
      store.users.countByRole(),
      store.jobs.countByStatus(),
      store.applications.countByStatus(),
      store.users.count({ createdSince }),
      store.jobs.count({ createdSince }),
      store.applications.count({ createdSince }),
    ]);

    return {
      totalUsers,
      totalJobs,
      totalApplications,
      pendingJobs,
      usersByRole,
      jobsByStatus,
      applicationsByStatus,
      recentActivity: { users: recentUsers, jobs: recentJobs, applications: recentApplications },
    };
  }

  async listUsers(actor: UserRecord, query: PageQuery): Promise<UserListPage> {
    authorize(actor, "admin:list-users");
    const { store } = this.ctx;
    const page = resolvePage(query, USER_PAGE_LIMITS);

    const [users, total] = await Promise.all([store.users.list(page), store.users.count()]);
    return { users: users.map(toUserDTO), ...toPageMeta(total, page) };
  }

  /**
   * Removes the account with everything hanging off it: an employer's jobs
   * and the applications to them, a seeker's own applications.
   */
  async deleteUser(actor: UserRecord, userId: number): Promise<DeletedUserSummary> {
    authorize(actor, "admin:delete-user");
    if (userId === actor.id) throw new ValidationError("You cannot delete your own account");

    return this.ctx.store.transaction(async (tx) => {
      const user = await tx.users.findById(userId);
      if (!user) throw new NotFoundError("User not found");

      const jobIds = (await tx.jobs.listByEmployer(user.id)).map((j) => j.id);
      const deletedApplications =
        (await tx.applications.deleteByJobIds(jobIds)) + (await tx.applications.deleteBySeeker(user.id));
      const deletedJobs = (await tx.jobs.deleteByEmployer(user.id)).length;
      await tx.users.delete(user.id);

      return { deletedJobs, deletedApplications };
    });
  }
}

/**
 * Creates the configured admin account unless a user with that email exists.
 * Returns true when an account was created.
 */
export async function ensureAdminAccount(
  ctx: Pick<ServiceContext, "store" | "logger">,
  admin: { email: string; password: string }
): Promise<boolean> {
  const email = admin.email.trim().toLowerCase();
  if (await ctx.store.users.findByEmail(email)) return false;

  const passwordHash = await hashPassword(admin.password);
  await ctx.store.transaction((tx) =>
    tx.users.create({
      email,
      passwordHash,
      firstName: "Admin",
      lastName: "User",
      role: "admin",
      company: null,
    })
  );

  ctx.logger.info({ event: "admin_seeded", email }, "Admin account created");
  return true;
}
