// tests/support/memory-store.ts
import {
  APPLICATION_STATUSES,
  JOB_STATUSES,
  ROLES,
  type ApplicationRecord,
  type JobRecord,
  type UserRecord,
} from "../../src/domain/types";
import { zeroFilledCounts } from "../../src/repositories/counts";
import {
  UniqueConstraintError,
  type ApplicationRepository,
  type JobRepository,
  type Repositories,
  type Store,
  type UserRepository,
} from "../../src/repositories/types";

type Undo = () => void;

interface Row {
  id: number;
  createdAt: Date;
}

class Table<T extends Row> {
  readonly rows = new Map<number, T>();
  private seq = 0;

  nextId(): number {
    this.seq += 1;
    return this.seq;
  }

  insert(row: T, log: Undo[] | null): void {
    this.rows.set(row.id, row);
    log?.push(() => this.rows.delete(row.id));
  }

  replace(row: T, log: Undo[] | null): void {
    const previous = this.rows.get(row.id);
    this.rows.set(row.id, row);
    if (previous) log?.push(() => this.rows.set(previous.id, previous));
  }

  remove(id: number, log: Undo[] | null): boolean {
    const previous = this.rows.get(id);
    if (!previous) return false;
    this.rows.delete(id);
    log?.push(() => this.rows.set(previous.id, previous));
    return true;
  }

  /** Newest first, ties broken by id descending. */
  sorted(predicate: (row: T) => boolean = () => true): T[] {
    return [...this.rows.values()]
      .filter(predicate)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);
  }
}

function copyUser(u: UserRecord): UserRecord {
  return { ...u };
}

function copyJob(j: JobRecord): JobRecord {
  return { ...j, skills: [...j.skills] };
}

function copyApplication(a: ApplicationRecord): ApplicationRecord {
  return { ...a };
}

function countBy<T>(rows: Iterable<T>, key: (row: T) => string) {
  const totals = new Map<string, number>();
  for (const row of rows) totals.set(key(row), (totals.get(key(row)) ?? 0) + 1);
  return [...totals].map(([k, count]) => ({ key: k, count }));
}

function since(createdSince: Date | undefined) {
  return (row: Row) => !createdSince || row.createdAt >= createdSince;
}

export interface MemoryStoreOptions {
  /** Clock used for createdAt/updatedAt. */
  now?: () => Date;
}

/**
 * In-process Store with the same unique constraints as the Mongo indexes.
 * A transaction keeps an undo log and replays it backwards when `work` throws.
 */
export class MemoryStore implements Store {
  readonly userRows = new Table<UserRecord>();
  readonly jobRows = new Table<JobRecord>();
  readonly applicationRows = new Table<ApplicationRecord>();

  readonly users: UserRepository;
  readonly jobs: JobRepository;
  readonly applications: ApplicationRepository;

  healthy = true;
  transactions = { committed: 0, rolledBack: 0 };

  private readonly now: () => Date;

  constructor(options: MemoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    const repos = this.repositories(null);
    this.users = repos.users;
    this.jobs = repos.jobs;
    this.applications = repos.applications;
  }

  async transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T> {
    const log: Undo[] = [];
    try {
      const result = await work(this.repositories(log));
      this.transactions.committed += 1;
      return result;
    } catch (err) {
      for (const undo of log.reverse()) undo();
      this.transactions.rolledBack += 1;
      throw err;
    }
  }

  async ping(): Promise<boolean> {
    return this.healthy;
  }

  private repositories(log: Undo[] | null): Repositories {
    return {
      users: this.userRepository(log),
      jobs: this.jobRepository(log),
      applications: this.applicationRepository(log),
    };
  }

  private userRepository(log: Undo[] | null): UserRepository {
    const table = this.userRows;
    return {
      findById: async (id) => {
        const row = table.rows.get(id);
        return row ? copyUser(row) : null;
      },
      findByEmail: async (email) => {
        const needle = email.trim().toLowerCase();
        const row = [...table.rows.values()].find((u) => u.email === needle);
        return row ? copyUser(row) : null;
      },
      findByIds: async (ids) => ids.flatMap((id) => table.rows.get(id) ?? []).map(copyUser),
      create: async (input) => {
        if ([...table.rows.values()].some((u) => u.email === input.email)) {
          throw new UniqueConstraintError("users.email");
        }
        const at = this.now();
        const row: UserRecord = { ...input, id: table.nextId(), createdAt: at, updatedAt: at };
        table.insert(row, log);
        return copyUser(row);
      },
      update: async (id, patch) => {
        const current = table.rows.get(id);
        if (!current) return null;
        const row: UserRecord = { ...current, ...patch, updatedAt: this.now() };
        table.replace(row, log);
        return copyUser(row);
      },
      delete: async (id) => table.remove(id, log),
      list: async ({ skip, limit }) => table.sorted().slice(skip, skip + limit).map(copyUser),
      count: async (filter = {}) => table.sorted(since(filter.createdSince)).length,
      countByRole: async () => zeroFilledCounts(ROLES, countBy(table.rows.values(), (u) => u.role)),
    };
  }

  private jobRepository(log: Undo[] | null): JobRepository {
    const table = this.jobRows;
    return {
      findById: async (id) => {
        const row = table.rows.get(id);
        return row ? copyJob(row) : null;
      },
      findByIds: async (ids) => ids.flatMap((id) => table.rows.get(id) ?? []).map(copyJob),
      create: async (input) => {
        const at = this.now();
        const row: JobRecord = { ...input, skills: [...input.skills], id: table.nextId(), createdAt: at, updatedAt: at };
        table.insert(row, log);
        return copyJob(row);
      },
      update: async (id, patch) => {
        const current = table.rows.get(id);
        if (!current) return null;
        const row: JobRecord = { ...current, ...patch, updatedAt: this.now() };
        table.replace(row, log);
        return copyJob(row);
      },
      delete: async (id) => table.remove(id, log),
      search: async (query, { skip, limit }) => {
        const search = query.search?.toLowerCase();
        const location = query.location?.toLowerCase();
        const matches = table.sorted((j) => {
          if (j.status !== query.status) return false;
          if (location && !j.location.toLowerCase().includes(location)) return false;
          if (!search) return true;
          return (
            j.title.toLowerCase().includes(search) ||
            j.description.toLowerCase().includes(search) ||
            j.company.toLowerCase().includes(search) ||
            j.skills.some((s) => s.toLowerCase() === search)
          );
        });
        return { items: matches.slice(skip, skip + limit).map(copyJob), total: matches.length };
      },
      listByStatus: async (status) => table.sorted((j) => j.status === status).map(copyJob),
      listByEmployer: async (employerId) => table.sorted((j) => j.employerId === employerId).map(copyJob),
      deleteByEmployer: async (employerId) => {
        const ids = table.sorted((j) => j.employerId === employerId).map((j) => j.id);
        ids.forEach((id) => table.remove(id, log));
        return ids;
      },
      count: async (filter = {}) =>
        table.sorted((j) => since(filter.createdSince)(j) && (!filter.status || j.status === filter.status))
          .length,
      countByStatus: async () =>
        zeroFilledCounts(JOB_STATUSES, countBy(table.rows.values(), (j) => j.status)),
    };
  }

  private applicationRepository(log: Undo[] | null): ApplicationRepository {
    const table = this.applicationRows;
    const removeWhere = (predicate: (a: ApplicationRecord) => boolean) => {
      const ids = table.sorted(predicate).map((a) => a.id);
      ids.forEach((id) => table.remove(id, log));
      return ids.length;
    };
    return {
      findById: async (id) => {
        const row = table.rows.get(id);
        return row ? copyApplication(row) : null;
      },
      findBySeekerAndJob: async (seekerId, jobId) => {
        const row = [...table.rows.values()].find((a) => a.seekerId === seekerId && a.jobId === jobId);
        return row ? copyApplication(row) : null;
      },
      create: async (input) => {
        if ([...table.rows.values()].some((a) => a.seekerId === input.seekerId && a.jobId === input.jobId)) {
          throw new UniqueConstraintError("applications.seeker_job");
        }
        const at = this.now();
        const row: ApplicationRecord = { ...input, status: "pending", id: table.nextId(), createdAt: at, updatedAt: at };
        table.insert(row, log);
        return copyApplication(row);
      },
      updateStatus: async (id, status) => {
        const current = table.rows.get(id);
        if (!current) return null;
        const row: ApplicationRecord = { ...current, status, updatedAt: this.now() };
        table.replace(row, log);
        return copyApplication(row);
      },
      listBySeeker: async (seekerId) => table.sorted((a) => a.seekerId === seekerId).map(copyApplication),
      listByJob: async (jobId) => table.sorted((a) => a.jobId === jobId).map(copyApplication),
      countByJobIds: async (jobIds) => {
        const counts = new Map<number, number>(jobIds.map((id) => [id, 0]));
        for (const a of table.rows.values()) {
          const current = counts.get(a.jobId);
          if (current !== undefined) counts.set(a.jobId, current + 1);
        }
        return counts;
      },
      deleteByJobIds: async (jobIds) => removeWhere((a) => jobIds.includes(a.jobId)),
      deleteBySeeker: async (seekerId) => removeWhere((a) => a.seekerId === seekerId),
      count: async (filter = {}) => table.sorted(since(filter.createdSince)).length,
      countByStatus: async () =>
        zeroFilledCounts(APPLICATION_STATUSES, countBy(table.rows.values(), (a) => a.status)),
    };
  }
}
