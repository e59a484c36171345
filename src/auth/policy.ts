// src/auth/policy.ts
import type { Role } from "../domain/types";
import { ForbiddenError } from "../domain/errors";

export type Action =
  | "job:create"
  | "job:update"
  | "job:delete"
  | "job:list-own"
  | "job:moderate"
  | "job:list-pending"
  | "job:view-applications"
  | "application:create"
  | "application:list-own"
  | "application:view"
  | "application:update-status"
  | "admin:view-stats"
  | "admin:list-users"
  | "admin:delete-user";

export interface Actor {
  id: number;
  role: Role;
}

/**
 * Ownership facts about the resource an action targets.
 * `employerId` is the owner of the job (or of the job an application belongs to),
 * `seekerId` the applicant.
 */
export interface ResourceScope {
  employerId?: number;
  seekerId?: number;
}

export type Decision = { allowed: true } | { allowed: false; reason: string };

const ALLOW: Decision = { allowed: true };

function deny(reason: string): Decision {
  return { allowed: false, reason };
}

// Without a resource only the role half of a rule is evaluated.
function ownsJob(actor: Actor, resource?: ResourceScope): boolean {
  return resource === undefined || resource.employerId === actor.id;
}

function ownsApplication(actor: Actor, resource?: ResourceScope): boolean {
  return resource === undefined || resource.seekerId === actor.id;
}

type Rule = (actor: Actor, resource?: ResourceScope) => Decision;

function onlyRole(role: Role, reason: string): Rule {
  return (actor) => (actor.role === role ? ALLOW : deny(reason));
}

function jobOwner(verb: string): Rule {
  return (actor, resource) => {
    if (actor.role !== "employer") return deny(`Only employers can ${verb} jobs`);
    if (!ownsJob(actor, resource)) return deny(`You can only ${verb} your own jobs`);
    return ALLOW;
  };
}

function jobOwnerOrAdmin(reason: string): Rule {
  return (actor, resource) => {
    if (actor.role === "admin") return ALLOW;
    if (actor.role === "employer") {
      return ownsJob(actor, resource) ? ALLOW : deny(reason);
    }
    return deny("Insufficient permissions");
  };
}

const RULES: Record<Action, Rule> = {
  "job:create": onlyRole("employer", "Only employers can create jobs"),
  "job:update": jobOwner("update"),
  "job:delete": jobOwner("delete"),
  "job:list-own": onlyRole("employer", "Only employers have job postings"),
  "job:moderate": onlyRole("admin", "Admin access required"),
  "job:list-pending": onlyRole("admin", "Admin access required"),
  "job:view-applications": jobOwnerOrAdmin("You can only view applications for your own jobs"),
  "application:create": onlyRole("seeker", "Only job seekers can apply to jobs"),
  "application:list-own": onlyRole("seeker", "Only job seekers can view their applications"),
  "application:update-status": jobOwnerOrAdmin("You can only update applications for your own jobs"),
  "application:view": (actor, resource) => {
    if (actor.role === "admin") return ALLOW;
    if (actor.role === "employer") {
      return ownsJob(actor, resource) ? ALLOW : deny("You can only view applications for your own jobs");
    }
    return ownsApplication(actor, resource) ? ALLOW : deny("You can only view your own applications");
  },
  "admin:view-stats": onlyRole("admin", "Admin access required"),
  "admin:list-users": onlyRole("admin", "Admin access required"),
  "admin:delete-user": onlyRole("admin", "Admin access required"),
};

export function canPerform(actor: Actor, action: Action, resource?: ResourceScope): Decision {
  return RULES[action](actor, resource);
}

export function enforce(decision: Decision): void {
  if (!decision.allowed) throw new ForbiddenError(decision.reason);
}

export function authorize(actor: Actor, action: Action, resource?: ResourceScope): void {
  enforce(canPerform(actor, action, resource));
}
