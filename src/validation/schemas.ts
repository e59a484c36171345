// src/validation/schemas.ts
import { z } from "zod";
import {
  APPLICATION_STATUSES,
  EMPLOYMENT_TYPES,
  EXPERIENCE_LEVELS,
  REGISTRABLE_ROLES,
} from "../domain/types";
import { ValidationError } from "../domain/errors";

function requiredText(field: string) {
  return z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} is required`);
}

function optionalText(field: string) {
  return z.string({ invalid_type_error: `${field} must be a string` }).trim();
}

function salary(field: string) {
  return z
    .number({ invalid_type_error: `${field} must be a number` })
    .int(`${field} must be a whole number`)
    .nonnegative(`${field} cannot be negative`)
    .nullable();
}

const skills = z
  .array(requiredText("skill"), {
    required_error: "skills is required",
    invalid_type_error: "skills must be a list",
  })
  .min(1, "At least one skill is required");

function enumOf<T extends readonly [string, ...string[]]>(field: string, values: T) {
  return z.enum(values, {
    errorMap: () => ({ message: `${field} must be one of: ${values.join(", ")}` }),
  });
}

export const registerSchema = z
  .object({
    email: requiredText("email").toLowerCase().email("email must be a valid email address"),
    password: z
      .string({ required_error: "password is required", invalid_type_error: "password must be a string" })
      .min(8, "password must be at least 8 characters"),
    firstName: requiredText("firstName"),
    lastName: requiredText("lastName"),
    role: z.enum(REGISTRABLE_ROLES, {
      errorMap: (issue) => ({
        message: issue.code === "invalid_type" ? "role is required" : "Invalid role",
      }),
    }),
    company: optionalText("company").optional(),
  })
  .superRefine((data, ctx) => {
    if (data.role === "employer" && !data.company) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["company"],
        message: "Company name is required for employers",
      });
    }
  });

export const loginSchema = z.object({
  email: z
    .string({ required_error: "Email and password are required", invalid_type_error: "email must be a string" })
    .trim()
    .toLowerCase()
    .min(1, "Email and password are required"),
  password: z
    .string({ required_error: "Email and password are required", invalid_type_error: "password must be a string" })
    .min(1, "Email and password are required"),
});

export const profileSchema = z.object({
  firstName: requiredText("firstName").optional(),
  lastName: requiredText("lastName").optional(),
  company: requiredText("company").optional(),
});

const jobFields = {
  title: requiredText("title"),
  description: requiredText("description"),
  requirements: requiredText("requirements"),
  benefits: optionalText("benefits")
    .nullable()
    .transform((v) => (v ? v : null)),
  location: requiredText("location"),
  salaryMin: salary("salaryMin"),
  salaryMax: salary("salaryMax"),
  skills,
  type: enumOf("type", EMPLOYMENT_TYPES),
  experienceLevel: enumOf("experienceLevel", EXPERIENCE_LEVELS),
  remote: z.boolean({ invalid_type_error: "remote must be true or false" }),
};

export const jobCreateSchema = z.object({
  ...jobFields,
  benefits: jobFields.benefits.optional().transform((v) => v ?? null),
  salaryMin: jobFields.salaryMin.optional().transform((v) => v ?? null),
  salaryMax: jobFields.salaryMax.optional().transform((v) => v ?? null),
  type: jobFields.type.default("full-time"),
  experienceLevel: jobFields.experienceLevel.default("mid"),
  remote: jobFields.remote.default(false),
});

// unknown keys (status, employerId, company) are stripped
export const jobUpdateSchema = z.object(jobFields).partial();

export const applySchema = z
  .object({
    coverLetter: optionalText("coverLetter").optional(),
    resumeUrl: optionalText("resumeUrl").optional(),
    resume: optionalText("resume").optional(), // field name used by older clients
  })
  .transform((data) => ({
    coverLetter: data.coverLetter ?? "",
    resumeUrl: data.resumeUrl || data.resume || "",
  }))
  .refine((data) => data.coverLetter.length > 0 && data.resumeUrl.length > 0, {
    message: "Cover letter and resume URL are required",
  });

export const applicationStatusSchema = z.object({
  status: z.enum(APPLICATION_STATUSES, {
    errorMap: () => ({ message: "Invalid status" }),
  }),
});

export const rejectJobSchema = z.object({
  reason: z
    .string({ invalid_type_error: "reason must be a string" })
    .trim()
    .nullish()
    .transform((v) => (v ? v : undefined)),
});

/**
 * Parse a request body; the first issue becomes the ValidationError message.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    // every schema here sets its own messages, so the first one reads as-is
    throw new ValidationError(result.error.issues[0].message);
  }
  return result.data;
}
