// src/services/applications.service.ts
import type { UserRecord } from "../domain/types";
import { DuplicateApplicationError, NotFoundError, ValidationError } from "../domain/errors";
import { acceptsApplications } from "../domain/jobLifecycle";
import { authorize } from "../auth/policy";
import { UniqueConstraintError } from "../repositories/types";
import { applicationStatusSchema, applySchema, parseInput } from "../validation/schemas";
import { toApplicationDTO, type ApplicationDTO } from "./projections";
import type { ServiceContext } from "./context";

export class ApplicationsService {
  constructor(private readonly ctx: ServiceContext) {}

  /**
   * Preconditions run in a fixed order: seeker role, job exists and is
   * approved, no earlier application, then the cover letter and resume.
   */
  async apply(actor: UserRecord, jobId: number, body: unknown): Promise<ApplicationDTO> {
    authorize(actor, "application:create");

    const { application, job, employer } = await this.ctx.store.transaction(async (tx) => {
      const job = await tx.jobs.findById(jobId);
      if (!job) throw new NotFoundError("Job not found");
      if (!acceptsApplications(job)) {
        throw new ValidationError("This job is not available for applications");
      }

      if (await tx.applications.findBySeekerAndJob(actor.id, job.id)) {
        throw new DuplicateApplicationError();
      }

      const input = parseInput(applySchema, body);

      // the unique index settles two submissions racing past the check above
      const application = await tx.applications
        .create({ ...input, seekerId: actor.id, jobId: job.id })
        .catch((err: unknown) => {
          if (err instanceof UniqueConstraintError) throw new DuplicateApplicationError();
          throw err;
        });

      return { application, job, employer: await tx.users.findById(job.employerId) };
    });

    const { notifications } = this.ctx;
    notifications.dispatch({
      kind: "application-submitted",
      to: actor.email,
      data: { firstName: actor.firstName, jobTitle: job.title, company: job.company },
    });
    if (employer) {
      notifications.dispatch({
        kind: "application-received",
        to: employer.email,
        data: {
          firstName: employer.firstName,
          jobTitle: job.title,
          applicantName: `${actor.firstName} ${actor.lastName}`,
        },
      });
    }

    return toApplicationDTO(application);
  }

  /** The seeker's applications, each with its job. */
  async listMine(actor: UserRecord): Promise<ApplicationDTO[]> {
    authorize(actor, "application:list-own");
    const { store } = this.ctx;

    const applications = await store.applications.listBySeeker(actor.id);
    const jobs = await store.jobs.findByIds(Array.from(new Set(applications.map((a) => a.jobId))));
    const jobById = new Map(jobs.map((j) => [j.id, j]));

    return applications.map((a) => toApplicationDTO(a, { job: jobById.get(a.jobId) ?? null }));
  }

  /** Applications to one job, each with the applicant's profile. */
  async listForJob(actor: UserRecord, jobId: number): Promise<ApplicationDTO[]> {
    authorize(actor, "job:view-applications");
    const { store } = this.ctx;

    const job = await store.jobs.findById(jobId);
    if (!job) throw new NotFoundError("Job not found");
    authorize(actor, "job:view-applications", { employerId: job.employerId });

    const applications = await store.applications.listByJob(job.id);
    const seekers = await store.users.findByIds(Array.from(new Set(applications.map((a) => a.seekerId))));
    const seekerById = new Map(seekers.map((u) => [u.id, u]));

    return applications.map((a) => toApplicationDTO(a, { seeker: seekerById.get(a.seekerId) ?? null }));
  }

  /**
   * Seekers see the job they applied to; the owning employer and admins see
   * the applicant instead.
   */
  async get(actor: UserRecord, applicationId: number): Promise<ApplicationDTO> {
    authorize(actor, "application:view");
    const { store } = this.ctx;

    const application = await store.applications.findById(applicationId);
    if (!application) throw new NotFoundError("Application not found");

    const job = await store.jobs.findById(application.jobId);
    if (!job) throw new NotFoundError("Application not found");

    authorize(actor, "application:view", { employerId: job.employerId, seekerId: application.seekerId });

    const includeJob = actor.role === "seeker";
    const includeSeeker = actor.role === "employer" || actor.role === "admin";

    return toApplicationDTO(application, {
      ...(includeJob ? { job } : {}),
      ...(includeSeeker ? { seeker: await store.users.findById(application.seekerId) } : {}),
    });
  }

  /** Any status may follow any other; only who may change it is restricted. */
  async updateStatus(actor: UserRecord, applicationId: number, body: unknown): Promise<ApplicationDTO> {
    authorize(actor, "application:update-status");

    return this.ctx.store.transaction(async (tx) => {
      const application = await tx.applications.findById(applicationId);
      if (!application) throw new NotFoundError("Application not found");

      const job = await tx.jobs.findById(application.jobId);
      if (!job) throw new NotFoundError("Application not found");
      authorize(actor, "application:update-status", { employerId: job.employerId });

      const { status } = parseInput(applicationStatusSchema, body);

      const updated = await tx.applications.updateStatus(application.id, status);
      if (!updated) throw new NotFoundError("Application not found");

      return toApplicationDTO(updated, { job, seeker: await tx.users.findById(updated.seekerId) });
    });
  }
}
