// src/models/User.ts
import mongoose from "../config/mongo";
import type { Document } from "mongoose";
import { ROLES, type Role } from "../domain/types";

const { Schema, model } = mongoose;

export interface IUser extends Document<number> {
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  role: Role;
  company?: string | null; // employers only

  createdAt: Date;
  updatedAt: Date;
}

const UserSchema = new Schema<IUser>(
  {
    _id: { type: Number, required: true },
    email: { type: String, required: true, unique: true, lowercase: true, trim: true },
    passwordHash: { type: String, required: true },
    firstName: { type: String, required: true, trim: true },
    lastName: { type: String, required: true, trim: true },
    role: { type: String, enum: [...ROLES], required: true, index: true },
    company: { type: String, default: null },
  },
  { timestamps: true }
);

UserSchema.index({ createdAt: -1 });

export default model<IUser>("User", UserSchema);
