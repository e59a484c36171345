// src/domain/types.ts

export const ROLES = ["seeker", "employer", "admin"] as const;
export type Role = (typeof ROLES)[number];

/** Roles a visitor may pick at registration; admins are bootstrapped. */
export const REGISTRABLE_ROLES = ["seeker", "employer"] as const;

export const JOB_STATUSES = ["pending", "approved", "rejected"] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const EMPLOYMENT_TYPES = ["full-time", "part-time", "contract", "freelance"] as const;
export type EmploymentType = (typeof EMPLOYMENT_TYPES)[number];

export const EXPERIENCE_LEVELS = ["entry", "mid", "senior", "lead"] as const;
export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number];

export const APPLICATION_STATUSES = ["pending", "approved", "rejected", "interview"] as const;
export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

export interface UserRecord {
  id: number;
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  role: Role;
  company: string | null; // employers only
  createdAt: Date;
  updatedAt: Date;
}

export interface JobRecord {
  id: number;
  title: string;
  description: string;
  requirements: string;
  benefits: string | null;
  location: string;
  salaryMin: number | null;
  salaryMax: number | null;
  skills: string[];
  type: EmploymentType;
  experienceLevel: ExperienceLevel;
  remote: boolean;
  status: JobStatus;
  company: string; // copied from the employer when the job is created
  employerId: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface ApplicationRecord {
  id: number;
  coverLetter: string;
  resumeUrl: string;
  status: ApplicationStatus;
  seekerId: number;
  jobId: number;
  createdAt: Date;
  updatedAt: Date;
}

export type NewUser = Omit<UserRecord, "id" | "createdAt" | "updatedAt">;
export type UserPatch = Partial<Pick<UserRecord, "firstName" | "lastName" | "company">>;

export type NewJob = Omit<JobRecord, "id" | "createdAt" | "updatedAt">;
export type JobPatch = Partial<
  Pick<
    JobRecord,
    | "title"
    | "description"
    | "requirements"
    | "benefits"
    | "location"
    | "salaryMin"
    | "salaryMax"
    | "skills"
    | "type"
    | "experienceLevel"
    | "remote"
    | "status"
  >
>;

export type NewApplication = Omit<ApplicationRecord, "id" | "status" | "createdAt" | "updatedAt">;

export type CountsBy<K extends string> = Record<K, number>;
