// src/config/mongo.ts
import mongoose from "mongoose";
import type { Logger } from "pino";

export async function connectMongo(uri: string, logger: Logger) {
  await mongoose.connect(uri);
  // credentials stay out of the log line
  logger.info({ db: mongoose.connection.name, host: mongoose.connection.host }, "MongoDB connected");
  return mongoose;
}

export async function disconnectMongo() {
  await mongoose.connection.close();
}

export default mongoose;
