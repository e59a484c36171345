// src/repositories/mongo.ts
import type { ClientSession, Connection, FilterQuery } from "mongoose";
import mongoose from "../config/mongo";
import User, { type IUser } from "../models/User";
import Job, { type IJob } from "../models/Jobs";
import Application, { type IApplication } from "../models/Application";
import { nextSequence } from "../models/Counter";
import {
  APPLICATION_STATUSES,
  JOB_STATUSES,
  ROLES,
  type ApplicationRecord,
  type JobRecord,
  type UserRecord,
} from "../domain/types";
import { zeroFilledCounts } from "./counts";
import {
  UniqueConstraintError,
  type ApplicationRepository,
  type JobRepository,
  type Repositories,
  type Store,
  type UserRepository,
} from "./types";

const DUPLICATE_KEY = 11000;
const TRANSIENT_TRANSACTION_ERROR = "TransientTransactionError";

export function isDuplicateKeyError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === DUPLICATE_KEY;
}

export function hasErrorLabel(err: unknown, label: string): boolean {
  if (typeof err !== "object" || err === null || !("errorLabels" in err)) return false;
  const labels = err.errorLabels;
  return Array.isArray(labels) && labels.includes(label);
}

const MAX_TRANSACTION_ATTEMPTS = 5;

/**
 * Runs `attempt` again while it fails with a transient transaction error,
 * such as a write conflict on the shared id counter.
 */
export async function retryTransient<T>(
  attempt: () => Promise<T>,
  maxAttempts: number = MAX_TRANSACTION_ATTEMPTS
): Promise<T> {
  for (let n = 1; ; n++) {
    try {
      return await attempt();
    } catch (err) {
      if (n >= maxAttempts || !hasErrorLabel(err, TRANSIENT_TRANSACTION_ERROR)) throw err;
    }
  }
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

type GroupRow = { _id: string; count: number };

function toRows(groups: GroupRow[]) {
  return groups.map((g) => ({ key: String(g._id), count: g.count }));
}

/**
 * Transform Mongo documents -> plain records
 */
function toUserRecord(doc: IUser): UserRecord {
  return {
    id: doc._id,
    email: doc.email,
    passwordHash: doc.passwordHash,
    firstName: doc.firstName,
    lastName: doc.lastName,
    role: doc.role,
    company: doc.company ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function toJobRecord(doc: IJob): JobRecord {
  return {
    id: doc._id,
    title: doc.title,
    description: doc.description,
    requirements: doc.requirements,
    benefits: doc.benefits ?? null,
    location: doc.location,
    salaryMin: doc.salaryMin ?? null,
    salaryMax: doc.salaryMax ?? null,
    skills: [...doc.skills],
    type: doc.type,
    experienceLevel: doc.experienceLevel,
    remote: doc.remote,
    status: doc.status,
    company: doc.company,
    employerId: doc.employerId,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function toApplicationRecord(doc: IApplication): ApplicationRecord {
  return {
    id: doc._id,
    coverLetter: doc.coverLetter,
    resumeUrl: doc.resumeUrl,
    status: doc.status,
    seekerId: doc.seekerId,
    jobId: doc.jobId,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function createdSinceFilter(createdSince?: Date) {
  return createdSince ? { createdAt: { $gte: createdSince } } : {};
}

const NEWEST_FIRST = { createdAt: -1, _id: -1 } as const;

function userRepository(session?: ClientSession): UserRepository {
  return {
    async findById(id) {
      const doc = await User.findById(id, null, { session });
      return doc ? toUserRecord(doc) : null;
    },
    async findByEmail(email) {
      const doc = await User.findOne({ email: email.trim().toLowerCase() }, null, { session });
      return doc ? toUserRecord(doc) : null;
    },
    async findByIds(ids) {
      if (!ids.length) return [];
      const docs = await User.find({ _id: { $in: ids } }, null, { session });
      return docs.map(toUserRecord);
    },
    async create(input) {
      const _id = await nextSequence("users", session);
      try {
        const doc = await new User({ _id, ...input }).save({ session });
        return toUserRecord(doc);
      } catch (err) {
        if (isDuplicateKeyError(err)) throw new UniqueConstraintError("users.email");
        throw err;
      }
    },
    async update(id, patch) {
      const doc = await User.findByIdAndUpdate(
        id,
        { $set: patch },
        { new: true, runValidators: true, session }
      );
      return doc ? toUserRecord(doc) : null;
    },
    async delete(id) {
      const res = await User.deleteOne({ _id: id }, { session });
      return res.deletedCount > 0;
    },
    async list({ skip, limit }) {
      const docs = await User.find({}, null, { session }).sort(NEWEST_FIRST).skip(skip).limit(limit);
      return docs.map(toUserRecord);
    },
    async count(filter = {}) {
      return await User.countDocuments(createdSinceFilter(filter.createdSince)).session(session ?? null);
    },
    async countByRole() {
      const groups = await User.aggregate<GroupRow>([
        { $group: { _id: "$role", count: { $sum: 1 } } },
      ]).session(session ?? null);
      return zeroFilledCounts(ROLES, toRows(groups));
    },
  };
}

function jobRepository(session?: ClientSession): JobRepository {
  return {
    async findById(id) {
      const doc = await Job.findById(id, null, { session });
      return doc ? toJobRecord(doc) : null;
    },
    async findByIds(ids) {
      if (!ids.length) return [];
      const docs = await Job.find({ _id: { $in: ids } }, null, { session });
      return docs.map(toJobRecord);
    },
    async create(input) {
      const _id = await nextSequence("jobs", session);
      const doc = await new Job({ _id, ...input }).save({ session });
      return toJobRecord(doc);
    },
    async update(id, patch) {
      const doc = await Job.findByIdAndUpdate(
        id,
        { $set: patch },
        { new: true, runValidators: true, session }
      );
      return doc ? toJobRecord(doc) : null;
    },
    async delete(id) {
      const res = await Job.deleteOne({ _id: id }, { session });
      return res.deletedCount > 0;
    },
    async search(query, { skip, limit }) {
      const filter: FilterQuery<IJob> = { status: query.status };

      if (query.search) {
        const needle = escapeRegExp(query.search);
        const contains = new RegExp(needle, "i");
        filter.$or = [
          { title: contains },
          { description: contains },
          { company: contains },
          { skills: new RegExp(`^${needle}$`, "i") },
        ];
      }

      if (query.location) {
        filter.location = new RegExp(escapeRegExp(query.location), "i");
      }

      const [docs, total] = await Promise.all([
        Job.find(filter, null, { session }).sort(NEWEST_FIRST).skip(skip).limit(limit),
        Job.countDocuments(filter).session(session ?? null),
      ]);

      return { items: docs.map(toJobRecord), total };
    },
    async listByStatus(status) {
      const docs = await Job.find({ status }, null, { session }).sort(NEWEST_FIRST);
      return docs.map(toJobRecord);
    },
    async listByEmployer(employerId) {
      const docs = await Job.find({ employerId }, null, { session }).sort(NEWEST_FIRST);
      return docs.map(toJobRecord);
    },
    async deleteByEmployer(employerId) {
      const docs = await Job.find({ employerId }, { _id: 1 }, { session });
      const ids = docs.map((d) => d._id);
      if (ids.length) await Job.deleteMany({ _id: { $in: ids } }, { session });
      return ids;
    },
    async count(filter = {}) {
      return await Job.countDocuments({
        ...createdSinceFilter(filter.createdSince),
        ...(filter.status ? { status: filter.status } : {}),
      }).session(session ?? null);
    },
    async countByStatus() {
      const groups = await Job.aggregate<GroupRow>([
        { $group: { _id: "$status", count: { $sum: 1 } } },
      ]).session(session ?? null);
      return zeroFilledCounts(JOB_STATUSES, toRows(groups));
    },
  };
}

function applicationRepository(session?: ClientSession): ApplicationRepository {
  return {
    async findById(id) {
      const doc = await Application.findById(id, null, { session });
      return doc ? toApplicationRecord(doc) : null;
    },
    async findBySeekerAndJob(seekerId, jobId) {
      const doc = await Application.findOne({ seekerId, jobId }, null, { session });
      return doc ? toApplicationRecord(doc) : null;
    },
    async create(input) {
      const _id = await nextSequence("applications", session);
      try {
        const doc = await new Application({ _id, ...input, status: "pending" }).save({ session });
        return toApplicationRecord(doc);
      } catch (err) {
        if (isDuplicateKeyError(err)) throw new UniqueConstraintError("applications.seeker_job");
        throw err;
      }
    },
    async updateStatus(id, status) {
      const doc = await Application.findByIdAndUpdate(
        id,
        { $set: { status } },
        { new: true, runValidators: true, session }
      );
      return doc ? toApplicationRecord(doc) : null;
    },
    async listBySeeker(seekerId) {
      const docs = await Application.find({ seekerId }, null, { session }).sort(NEWEST_FIRST);
      return docs.map(toApplicationRecord);
    },
    async listByJob(jobId) {
      const docs = await Application.find({ jobId }, null, { session }).sort(NEWEST_FIRST);
      return docs.map(toApplicationRecord);
    },
    async countByJobIds(jobIds) {
      const counts = new Map<number, number>(jobIds.map((id) => [id, 0]));
      if (!jobIds.length) return counts;

      const groups = await Application.aggregate<{ _id: number; count: number }>([
        { $match: { jobId: { $in: jobIds } } },
        { $group: { _id: "$jobId", count: { $sum: 1 } } },
      ]).session(session ?? null);

      groups.forEach((g) => counts.set(g._id, g.count));
      return counts;
    },
    async deleteByJobIds(jobIds) {
      if (!jobIds.length) return 0;
      const res = await Application.deleteMany({ jobId: { $in: jobIds } }, { session });
      return res.deletedCount;
    },
    async deleteBySeeker(seekerId) {
      const res = await Application.deleteMany({ seekerId }, { session });
      return res.deletedCount;
    },
    async count(filter = {}) {
      return await Application.countDocuments(createdSinceFilter(filter.createdSince)).session(
        session ?? null
      );
    },
    async countByStatus() {
      const groups = await Application.aggregate<GroupRow>([
        { $group: { _id: "$status", count: { $sum: 1 } } },
      ]).session(session ?? null);
      return zeroFilledCounts(APPLICATION_STATUSES, toRows(groups));
    },
  };
}

function createRepositories(session?: ClientSession): Repositories {
  return {
    users: userRepository(session),
    jobs: jobRepository(session),
    applications: applicationRepository(session),
  };
}

/**
 * Store over the mongoose models. Transactions need MongoDB running as a
 * replica set (a single-node one is enough).
 */
export class MongoStore implements Store {
  readonly users: UserRepository;
  readonly jobs: JobRepository;
  readonly applications: ApplicationRepository;

  constructor(private readonly connection: Connection = mongoose.connection) {
    const repos = createRepositories();
    this.users = repos.users;
    this.jobs = repos.jobs;
    this.applications = repos.applications;
  }

  transaction<T>(work: (tx: Repositories) => Promise<T>): Promise<T> {
    return retryTransient(() => this.runOnce(work));
  }

  private async runOnce<T>(work: (tx: Repositories) => Promise<T>): Promise<T> {
    const session = await this.connection.startSession();
    try {
      session.startTransaction();
      const result = await work(createRepositories(session));
      await session.commitTransaction();
      return result;
    } catch (err) {
      if (session.inTransaction()) await session.abortTransaction();
      throw err;
    } finally {
      await session.endSession();
    }
  }

  async ping(): Promise<boolean> {
    const db = this.connection.db;
    if (this.connection.readyState !== 1 || !db) return false;
    await db.admin().ping();
    return true;
  }
}
