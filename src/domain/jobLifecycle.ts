// src/domain/jobLifecycle.ts
import type { JobRecord, JobStatus } from "./types";
import { InvalidTransitionError } from "./errors";

export type ModerationDecision = "approve" | "reject";

const DECISION_TARGET: Record<ModerationDecision, JobStatus> = {
  approve: "approved",
  reject: "rejected",
};

/**
 * Only a pending job can be moderated; approved and rejected jobs go back to
 * pending through an edit, never directly.
 */
export function moderate(job: Pick<JobRecord, "status">, decision: ModerationDecision): JobStatus {
  if (job.status !== "pending") {
    throw new InvalidTransitionError(`Job is not pending approval (current status: ${job.status})`);
  }
  return DECISION_TARGET[decision];
}

/** Status a job takes after its owner edits it. */
export function statusAfterEdit(status: JobStatus): JobStatus {
  return status === "approved" || status === "rejected" ? "pending" : status;
}

export function isPubliclyVisible(job: Pick<JobRecord, "status">): boolean {
  return job.status === "approved";
}

export function acceptsApplications(job: Pick<JobRecord, "status">): boolean {
  return job.status === "approved";
}
