// src/models/Counter.ts
import mongoose from "../config/mongo";
import type { ClientSession } from "mongoose";
import { InternalError } from "../domain/errors";

const { Schema, model } = mongoose;

export interface ICounter {
  _id: string; // sequence name, e.g. "jobs"
  seq: number;
}

const CounterSchema = new Schema<ICounter>(
  {
    _id: { type: String, required: true },
    seq: { type: Number, default: 0 },
  },
  { versionKey: false }
);

const Counter = model<ICounter>("Counter", CounterSchema);

/**
 * Integer ids for users, jobs and applications.
 * Inside a transaction the increment rolls back with everything else.
 */
export async function nextSequence(name: string, session?: ClientSession): Promise<number> {
  const counter = await Counter.findOneAndUpdate(
    { _id: name },
    { $inc: { seq: 1 } },
    { new: true, upsert: true, session }
  );
  if (!counter) throw new InternalError(`Sequence ${name} could not be incremented`);
  return counter.seq;
}

export default Counter;
