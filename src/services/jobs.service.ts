// src/services/jobs.service.ts
import type { JobPatch, JobRecord, UserRecord } from "../domain/types";
import { InvalidSalaryRangeError, NotFoundError, ValidationError } from "../domain/errors";
import { isPubliclyVisible, statusAfterEdit } from "../domain/jobLifecycle";
import { authorize, canPerform } from "../auth/policy";
import type { Repositories } from "../repositories/types";
import { jobCreateSchema, jobUpdateSchema, parseInput } from "../validation/schemas";
import { JOB_PAGE_LIMITS, resolvePage, toPageMeta, type PageMeta } from "./pagination";
import {
  toApplicationDTO,
  toJobDTO,
  toJobSummaryDTO,
  type JobDTO,
  type JobDetailDTO,
  type JobSummaryDTO,
} from "./projections";
import type { ServiceContext } from "./context";

export interface JobListQuery {
  search?: unknown;
  location?: unknown;
  page?: unknown;
  limit?: unknown;
}

export type JobListPage = PageMeta & { jobs: JobSummaryDTO[] };

function textFilter(raw: unknown): string | undefined {
  if (typeof raw !== "string") return undefined;
  const trimmed = raw.trim();
  return trimmed ? trimmed : undefined;
}

function assertSalaryRange(min: number | null, max: number | null): void {
  if (min !== null && max !== null && max < min) throw new InvalidSalaryRangeError();
}

export async function summarizeJobs(
  repos: Pick<Repositories, "applications">,
  jobs: JobRecord[]
): Promise<JobSummaryDTO[]> {
  const counts = await repos.applications.countByJobIds(jobs.map((j) => j.id));
  return jobs.map((job) => toJobSummaryDTO(job, counts.get(job.id) ?? 0));
}

export class JobsService {
  constructor(private readonly ctx: ServiceContext) {}

  /**
   * Approved jobs only. `search` matches title, description and company as a
   * case-insensitive substring, or a skill exactly; `location` is a substring.
   */
  async listPublic(query: JobListQuery): Promise<JobListPage> {
    const { store } = this.ctx;
    const page = resolvePage(query, JOB_PAGE_LIMITS);

    const { items, total } = await store.jobs.search(
      { status: "approved", search: textFilter(query.search), location: textFilter(query.location) },
      page
    );

    return { jobs: await summarizeJobs(store, items), ...toPageMeta(total, page) };
  }

  async listMine(actor: UserRecord): Promise<JobSummaryDTO[]> {
    authorize(actor, "job:list-own");
    const { store } = this.ctx;
    return summarizeJobs(store, await store.jobs.listByEmployer(actor.id));
  }

  /**
   * Owner and admins see the applications; everyone else gets the public
   * projection, and only for approved jobs.
   */
  async getDetail(actor: UserRecord | null, jobId: number): Promise<JobDetailDTO> {
    const { store } = this.ctx;

    const job = await store.jobs.findById(jobId);
    if (!job) throw new NotFoundError("Job not found");

    const privileged =
      actor !== null && canPerform(actor, "job:view-applications", { employerId: job.employerId }).allowed;

    if (!privileged && !isPubliclyVisible(job)) throw new NotFoundError("Job not found");

    if (privileged) {
      const applications = await store.applications.listByJob(job.id);
      return { ...toJobDTO(job), applications: applications.map((a) => toApplicationDTO(a)) };
    }

    const [summary] = await summarizeJobs(store, [job]);
    return summary;
  }

  async create(actor: UserRecord, body: unknown): Promise<JobDTO> {
    authorize(actor, "job:create");
    const input = parseInput(jobCreateSchema, body);
    assertSalaryRange(input.salaryMin, input.salaryMax);

    if (!actor.company) {
      throw new ValidationError("Add a company name to your profile before posting jobs");
    }
    const company = actor.company;

    const job = await this.ctx.store.transaction((tx) =>
      tx.jobs.create({
        ...input,
        status: "pending", // every new posting waits for moderation
        company,
        employerId: actor.id,
      })
    );

    return toJobDTO(job);
  }

  /**
   * Any edit of an approved or rejected job sends it back to moderation.
   */
  async update(actor: UserRecord, jobId: number, body: unknown): Promise<JobDTO> {
    authorize(actor, "job:update");
    const input = parseInput(jobUpdateSchema, body);

    // zod leaves absent keys out, so the patch holds only what was sent
    const patch: JobPatch = { ...input };
    if (Object.keys(patch).length === 0) throw new ValidationError("No updatable fields provided");

    const updated = await this.ctx.store.transaction(async (tx) => {
      const job = await tx.jobs.findById(jobId);
      if (!job) throw new NotFoundError("Job not found");
      authorize(actor, "job:update", { employerId: job.employerId });

      assertSalaryRange(
        patch.salaryMin !== undefined ? patch.salaryMin : job.salaryMin,
        patch.salaryMax !== undefined ? patch.salaryMax : job.salaryMax
      );

      return tx.jobs.update(job.id, { ...patch, status: statusAfterEdit(job.status) });
    });

    if (!updated) throw new NotFoundError("Job not found");
    return toJobDTO(updated);
  }

  /** Removes the job and every application to it. */
  async delete(actor: UserRecord, jobId: number): Promise<{ deletedApplications: number }> {
    authorize(actor, "job:delete");

    return this.ctx.store.transaction(async (tx) => {
      const job = await tx.jobs.findById(jobId);
      if (!job) throw new NotFoundError("Job not found");
      authorize(actor, "job:delete", { employerId: job.employerId });

      const deletedApplications = await tx.applications.deleteByJobIds([job.id]);
      await tx.jobs.delete(job.id);
      return { deletedApplications };
    });
  }
}
