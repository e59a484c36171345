import mongoose from "../config/mongo";
import type { Document } from "mongoose";
import { APPLICATION_STATUSES, type ApplicationStatus } from "../domain/types";

const { Schema, model } = mongoose;

export interface IApplication extends Document<number> {
  coverLetter: string;
  resumeUrl: string;
  status: ApplicationStatus;
  seekerId: number;
  jobId: number;

  createdAt: Date;
  updatedAt: Date;
}

const ApplicationSchema = new Schema<IApplication>(
  {
    _id: { type: Number, required: true },
    coverLetter: { type: String, required: true },
    resumeUrl: { type: String, required: true },
    status: {
      type: String,
      enum: [...APPLICATION_STATUSES],
      default: "pending",
      index: true,
    },
    seekerId: { type: Number, required: true, index: true },
    jobId: { type: Number, required: true, index: true },
  },
  { timestamps: true }
);

// one application per seeker and job; concurrent duplicates fail here with E11000
ApplicationSchema.index({ seekerId: 1, jobId: 1 }, { unique: true });

export default model<IApplication>("Application", ApplicationSchema);
