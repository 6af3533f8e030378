/** Mongo connector, ping, transaction runner and duplicate-key helpers (Mongoose) */
import mongoose from "mongoose";

import { env } from "./env.js";

let connecting: Promise<void> | null = null;

// sessions opened by connection.transaction() follow the async call chain,
// so store calls inside withTransaction() join it without passing a session
mongoose.set("transactionAsyncLocalStorage", true);

export async function connectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 1) return;
  if (connecting) return connecting;

  connecting = mongoose
    .connect(env.MONGO_URI, { serverSelectionTimeoutMS: 3000 })
    .then(() => {}) // ensure Promise<void>
    .finally(() => {
      connecting = null;
    });

  await connecting;
}

export async function pingMongo(): Promise<{ status: "ok" | "error"; message?: string }> {
  try {
    await connectMongo();
    const db = mongoose.connection.db;
    if (!db) throw new Error("Mongo connection not ready");
    await db.admin().command({ ping: 1 });
    return { status: "ok" };
  } catch (err) {
    return { status: "error", message: err instanceof Error ? err.message : String(err) };
  }
}

export async function closeMongo() {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
  }
}

/** Run `fn` inside a Mongo transaction when MONGO_TRANSACTIONS is on; unique indexes back it up either way. */
export async function withMongoTransaction<T>(fn: () => Promise<T>): Promise<T> {
  await connectMongo();
  if (!env.MONGO_TRANSACTIONS) return fn();
  return mongoose.connection.transaction(() => fn());
}

/** Field names of the unique index a write collided with, or null when `err` is not E11000. */
export function duplicateKeyFields(err: unknown): string[] | null {
  if (!(err instanceof mongoose.mongo.MongoServerError) || err.code !== 11000) return null;
  const pattern: unknown = err.keyPattern;
  return pattern && typeof pattern === "object" ? Object.keys(pattern) : [];
}

/** ObjectId for a valid id string, null otherwise. */
export function toObjectId(id: string): mongoose.Types.ObjectId | null {
  return mongoose.isValidObjectId(id) ? new mongoose.Types.ObjectId(id) : null;
}
