import mongoose from "../config/mongo";
import type { Document } from "mongoose";
import {
  EMPLOYMENT_TYPES,
  EXPERIENCE_LEVELS,
  JOB_STATUSES,
  type EmploymentType,
  type ExperienceLevel,
  type JobStatus,
} from "../domain/types";

const { Schema, model } = mongoose;

export interface IJob extends Document<number> {
  title: string;
  description: string;
  requirements: string;
  benefits?: string | null;
  location: string;
  salaryMin?: number | null;
  salaryMax?: number | null;
  skills: string[];
  type: EmploymentType;
  experienceLevel: ExperienceLevel;
  remote: boolean;

  status: JobStatus;
  company: string;
  employerId: number;

  createdAt: Date;
  updatedAt: Date;
}

const JobSchema = new Schema<IJob>(
  {
    _id: { type: Number, required: true },
    title: { type: String, required: true },
    description: { type: String, required: true },
    requirements: { type: String, required: true },
    benefits: { type: String, default: null },
    location: { type: String, required: true },
    salaryMin: { type: Number, default: null },
    salaryMax: { type: Number, default: null },
    skills: { type: [String], required: true },
    type: { type: String, enum: [...EMPLOYMENT_TYPES], default: "full-time" },
    experienceLevel: { type: String, enum: [...EXPERIENCE_LEVELS], default: "mid" },
    remote: { type: Boolean, default: false },

    status: {
      type: String,
      enum: [...JOB_STATUSES],
      default: "pending",
      index: true,
    },
    company: { type: String, required: true }, // denormalized from the employer at creation
    employerId: { type: Number, required: true, index: true },
  },
  { timestamps: true }
);

// public listing: approved jobs, newest first
JobSchema.index({ status: 1, createdAt: -1 });

export default model<IJob>("Job", JobSchema);
