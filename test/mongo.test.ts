import mongoose from "mongoose";
import { afterEach, describe, expect, it, vi } from "vitest";
import { connectMongo, pingStatus } from "../src/config/mongo";
import { ConfigurationError } from "../src/utils/errors";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("connectMongo", () => {
  it("does not attempt a connection when configuration is missing", async () => {
    const connect = vi.spyOn(mongoose, "connect");

    await expect(connectMongo({ env: { MONGO_DB_NAME: "quizdb" }, secretsPath: null })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    expect(connect).not.toHaveBeenCalled();
  });

  it("connects with the configured database name", async () => {
    const connect = vi.spyOn(mongoose, "connect").mockResolvedValue(mongoose);

    const config = await connectMongo({
      env: { MONGO_URI: "mongodb://localhost:27017", MONGO_DB_NAME: "quizdb" },
      secretsPath: null,
    });

    expect(config).toEqual({ uri: "mongodb://localhost:27017", dbName: "quizdb" });
    expect(connect).toHaveBeenCalledTimes(1);
    expect(connect).toHaveBeenCalledWith("mongodb://localhost:27017", {
      dbName: "quizdb",
      serverSelectionTimeoutMS: 5000,
    });
  });
});

describe("pingStatus", () => {
  it("reports a closed connection and caches the result until refreshed", async () => {
    const first = await pingStatus({ refresh: true });
    expect(first.ok).toBe(false);
    expect(first.error).toBe("MongoDB connection is not open");

    const cached = await pingStatus();
    expect(cached).toBe(first);

    const refreshed = await pingStatus({ refresh: true });
    expect(refreshed).not.toBe(first);
    expect(refreshed.ok).toBe(false);
  });
});
