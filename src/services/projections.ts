// src/services/projections.ts
import type { ApplicationRecord, JobRecord, UserRecord } from "../domain/types";

function iso(date: Date | null | undefined): string | null {
  return date ? date.toISOString() : null;
}

/**
 * Transform records -> transport shape (camelCase, integer ids, ISO timestamps)
 */
export function toUserDTO(user: UserRecord) {
  return {
    id: user.id,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    role: user.role,
    company: user.company,
    createdAt: iso(user.createdAt),
    updatedAt: iso(user.updatedAt),
  };
}

export type UserDTO = ReturnType<typeof toUserDTO>;

export function toJobDTO(job: JobRecord) {
  return {
    id: job.id,
    title: job.title,
    description: job.description,
    requirements: job.requirements,
    benefits: job.benefits,
    location: job.location,
    salaryMin: job.salaryMin,
    salaryMax: job.salaryMax,
    skills: [...job.skills],
    type: job.type,
    experienceLevel: job.experienceLevel,
    remote: job.remote,
    status: job.status,
    company: job.company,
    employerId: job.employerId,
    createdAt: iso(job.createdAt),
    updatedAt: iso(job.updatedAt),
  };
}

export type JobDTO = ReturnType<typeof toJobDTO>;

export type JobSummaryDTO = JobDTO & { applicationCount: number };
export type JobDetailDTO = JobSummaryDTO | (JobDTO & { applications: ApplicationDTO[] });

export function toJobSummaryDTO(job: JobRecord, applicationCount: number): JobSummaryDTO {
  return { ...toJobDTO(job), applicationCount };
}

export interface ApplicationDTO {
  id: number;
  coverLetter: string;
  resumeUrl: string;
  status: ApplicationRecord["status"];
  seekerId: number;
  jobId: number;
  createdAt: string | null;
  updatedAt: string | null;
  job?: JobDTO | null;
  seeker?: UserDTO | null;
}

export interface ApplicationEmbeds {
  job?: JobRecord | null; // present only when the job is to be embedded
  seeker?: UserRecord | null; // present only when the applicant is to be embedded
}

export function toApplicationDTO(app: ApplicationRecord, embeds: ApplicationEmbeds = {}): ApplicationDTO {
  const dto: ApplicationDTO = {
    id: app.id,
    coverLetter: app.coverLetter,
    resumeUrl: app.resumeUrl,
    status: app.status,
    seekerId: app.seekerId,
    jobId: app.jobId,
    createdAt: iso(app.createdAt),
    updatedAt: iso(app.updatedAt),
  };

  if (embeds.job !== undefined) dto.job = embeds.job ? toJobDTO(embeds.job) : null;
  if (embeds.seeker !== undefined) dto.seeker = embeds.seeker ? toUserDTO(embeds.seeker) : null;

  return dto;
}
