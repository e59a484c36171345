// src/services/moderation.service.ts
import type { JobRecord, UserRecord } from "../domain/types";
import { NotFoundError } from "../domain/errors";
import { moderate, type ModerationDecision } from "../domain/jobLifecycle";
import { authorize } from "../auth/policy";
import type { Repositories } from "../repositories/types";
import { parseInput, rejectJobSchema } from "../validation/schemas";
import { toJobDTO, toUserDTO, type JobDTO, type JobSummaryDTO, type UserDTO } from "./projections";
import { summarizeJobs } from "./jobs.service";
import type { ServiceContext } from "./context";

export type PendingJobDTO = JobSummaryDTO & { employer: UserDTO | null };

interface Decided {
  job: JobRecord;
  employer: UserRecord | null;
}

export class ModerationService {
  constructor(private readonly ctx: ServiceContext) {}

  async listPending(actor: UserRecord): Promise<PendingJobDTO[]> {
    authorize(actor, "job:list-pending");
    const { store } = this.ctx;

    const jobs = await store.jobs.listByStatus("pending");
    const [summaries, employers] = await Promise.all([
      summarizeJobs(store, jobs),
      store.users.findByIds(Array.from(new Set(jobs.map((j) => j.employerId)))),
    ]);

    const employerById = new Map(employers.map((u) => [u.id, u]));
    return summaries.map((job) => {
      const employer = employerById.get(job.employerId);
      return { ...job, employer: employer ? toUserDTO(employer) : null };
    });
  }

  async approve(actor: UserRecord, jobId: number): Promise<JobDTO> {
    authorize(actor, "job:moderate");

    const { job, employer } = await this.ctx.store.transaction((tx) => this.decide(tx, jobId, "approve"));

    if (employer) {
      this.ctx.notifications.dispatch({
        kind: "job-approved",
        to: employer.email,
        data: { firstName: employer.firstName, jobTitle: job.title },
      });
    }

    return toJobDTO(job);
  }

  /** The reason, when given, is passed on to the employer. */
  async reject(actor: UserRecord, jobId: number, body: unknown): Promise<JobDTO> {
    authorize(actor, "job:moderate");
    const { reason } = parseInput(rejectJobSchema, body);

    const { job, employer } = await this.ctx.store.transaction((tx) => this.decide(tx, jobId, "reject"));

    if (employer) {
      this.ctx.notifications.dispatch({
        kind: "job-rejected",
        to: employer.email,
        data: {
          firstName: employer.firstName,
          jobTitle: job.title,
          ...(reason ? { reason } : {}),
        },
      });
    }

    return toJobDTO(job);
  }

  private async decide(tx: Repositories, jobId: number, decision: ModerationDecision): Promise<Decided> {
    const current = await tx.jobs.findById(jobId);
    if (!current) throw new NotFoundError("Job not found");

    const job = await tx.jobs.update(current.id, { status: moderate(current, decision) });
    if (!job) throw new NotFoundError("Job not found");

    return { job, employer: await tx.users.findById(job.employerId) };
  }
}
