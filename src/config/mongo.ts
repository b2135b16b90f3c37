// src/config/mongo.ts
import mongoose from "mongoose";
import { loadMongoConfig, type ConfigSources, type MongoConfig } from "./config";
import { logger } from "../utils/logger";

export type PingStatus = {
  ok: boolean;
  dbName: string | null;
  error?: string;
  checkedAt: string;
};

const PING_TTL_MS = 60_000;

let activeConfig: MongoConfig | null = null;
let cachedPing: { status: PingStatus; expiresAt: number } | null = null;

/**
 * Validate configuration, then open the shared mongoose connection.
 * Nothing is dialled when the configuration is incomplete.
 */
export async function connectMongo(sources: ConfigSources = {}): Promise<MongoConfig> {
  const config = loadMongoConfig(sources);

  await mongoose.connect(config.uri, {
    dbName: config.dbName,
    serverSelectionTimeoutMS: 5000,
  });
  activeConfig = config;
  cachedPing = null;

  logger.info("MongoDB connected", { dbName: config.dbName });
  return config;
}

/**
 * Admin ping, cached for a minute. `refresh` forces a new round trip.
 */
export async function pingStatus(options: { refresh?: boolean } = {}): Promise<PingStatus> {
  const now = Date.now();
  if (!options.refresh && cachedPing && cachedPing.expiresAt > now) {
    return cachedPing.status;
  }

  const dbName = activeConfig?.dbName ?? null;
  const checkedAt = new Date(now).toISOString();
  let status: PingStatus;
  try {
    const db = mongoose.connection.db;
    if (!db) throw new Error("MongoDB connection is not open");
    await db.admin().command({ ping: 1 });
    status = { ok: true, dbName, checkedAt };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn("MongoDB ping failed", { error: message });
    status = { ok: false, dbName, error: message, checkedAt };
  }

  cachedPing = { status, expiresAt: now + PING_TTL_MS };
  return status;
}

export async function disconnectMongo(): Promise<void> {
  await mongoose.connection.close();
  activeConfig = null;
  cachedPing = null;
  logger.info("MongoDB disconnected");
}

export default mongoose;
