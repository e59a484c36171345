// src/repositories/types.ts
import type {
  ApplicationRecord,
  ApplicationStatus,
  CountsBy,
  JobPatch,
  JobRecord,
  JobStatus,
  NewApplication,
  NewJob,
  NewUser,
  Role,
  UserPatch,
  UserRecord,
} from "../domain/types";

/** Raised by a repository when a write hits a unique index. */
export class UniqueConstraintError extends Error {
  constructor(readonly constraint: "users.email" | "applications.seeker_job") {
    super(`Unique constraint violated: ${constraint}`);
    this.name = "UniqueConstraintError";
  }
}

export interface PageWindow {
  skip: number;
  limit: number;
}

export interface JobSearch {
  status: JobStatus;
  search?: string;
  location?: string;
}

export interface CreatedSince {
  createdSince?: Date;
}

export interface UserRepository {
  findById(id: number): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  findByIds(ids: number[]): Promise<UserRecord[]>;
  create(input: NewUser): Promise<UserRecord>;
  update(id: number, patch: UserPatch): Promise<UserRecord | null>;
  delete(id: number): Promise<boolean>;
  /** Newest first. */
  list(window: PageWindow): Promise<UserRecord[]>;
  count(filter?: CreatedSince): Promise<number>;
  countByRole(): Promise<CountsBy<Role>>;
}

export interface JobRepository {
  findById(id: number): Promise<JobRecord | null>;
  findByIds(ids: number[]): Promise<JobRecord[]>;
  create(input: NewJob): Promise<JobRecord>;
  update(id: number, patch: JobPatch): Promise<JobRecord | null>;
  delete(id: number): Promise<boolean>;
  /** Newest first, ties broken by id descending. */
  search(query: JobSearch, window: PageWindow): Promise<{ items: JobRecord[]; total: number }>;
  listByStatus(status: JobStatus): Promise<JobRecord[]>;
  listByEmployer(employerId: number): Promise<JobRecord[]>;
  deleteByEmployer(employerId: number): Promise<number[]>;
  count(filter?: CreatedSince & { status?: JobStatus }): Promise<number>;
  countByStatus(): Promise<CountsBy<JobStatus>>;
}

export interface ApplicationRepository {
  findById(id: number): Promise<ApplicationRecord | null>;
  findBySeekerAndJob(seekerId: number, jobId: number): Promise<ApplicationRecord | null>;
  /** Fails with UniqueConstraintError when the seeker already applied to the job. */
  create(input: NewApplication): Promise<ApplicationRecord>;
  updateStatus(id: number, status: ApplicationStatus): Promise<ApplicationRecord | null>;
  listBySeeker(seekerId: number): Promise<ApplicationRecord[]>;
  listByJob(jobId: number): Promise<ApplicationRecord[]>;
  countByJobIds(jobIds: number[]): Promise<Map<number, number>>;
  deleteByJobIds(jobIds: number[]): Promise<number>;
  deleteBySeeker(seekerId: number): Promise<number>;
  count(filter?: CreatedSince): Promise<number>;
  countByStatus(): Promise<CountsBy<ApplicationStatus>>;
}

export interface Repositories {
  users: UserRepository;
  jobs: JobRepository;
  applications: ApplicationRepository;
}

/**
 * Backing store. Reads may go through the top-level repositories; every
 * mutation runs inside `transaction`, which commits when `work` resolves and
 * rolls back when it throws.
 */
export interface Store extends Repositories {
  transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T>;
  ping(): Promise<boolean>;
}
