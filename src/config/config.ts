// src/config/config.ts
import { z } from "zod";
import { ConfigurationError } from "../utils/errors";
import { DEFAULT_SECRETS_PATH, readSecretsFile, type SecretKey, type Secrets } from "./secrets";

export type MongoConfig = {
  uri: string;
  dbName: string;
};

export type ConfigSources = {
  env?: NodeJS.ProcessEnv;
  /** `null` skips the secrets file entirely. */
  secretsPath?: string | null;
};

const MONGO_URI_SCHEME = /^mongodb(\+srv)?:\/\//;

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}

function requiredSetting(key: SecretKey) {
  return z
    .string({ required_error: `${key} is not set (environment or secrets file)` })
    .refine((value) => !isBlank(value), { message: `${key} is empty` });
}

const MongoSettingsSchema = z.object({
  MONGO_URI: requiredSetting("MONGO_URI").superRefine((value, ctx) => {
    if (!isBlank(value) && !MONGO_URI_SCHEME.test(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "MONGO_URI must start with mongodb:// or mongodb+srv://",
      });
    }
  }),
  MONGO_DB_NAME: requiredSetting("MONGO_DB_NAME"),
});

function toConfigurationError(error: z.ZodError): ConfigurationError {
  return new ConfigurationError(error.issues.map((issue) => issue.message).join("; "));
}

/**
 * Resolve the MongoDB connection settings. A non-empty value in the secrets
 * file wins over the environment. Values come back exactly as stored.
 *
 * @throws ConfigurationError when a value is missing, blank or malformed.
 */
export function loadMongoConfig(sources: ConfigSources = {}): MongoConfig {
  const env = sources.env ?? process.env;
  const secretsPath =
    sources.secretsPath === undefined ? env.SECRETS_FILE || DEFAULT_SECRETS_PATH : sources.secretsPath;
  const secrets: Secrets = secretsPath ? readSecretsFile(secretsPath) : {};

  const pick = (key: SecretKey): string | undefined => {
    const secret = secrets[key];
    return isBlank(secret) ? env[key] : secret;
  };

  const parsed = MongoSettingsSchema.safeParse({
    MONGO_URI: pick("MONGO_URI"),
    MONGO_DB_NAME: pick("MONGO_DB_NAME"),
  });
  if (!parsed.success) throw toConfigurationError(parsed.error);

  return { uri: parsed.data.MONGO_URI, dbName: parsed.data.MONGO_DB_NAME };
}

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

export const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const AppSettingsSchema = z.object({
  NODE_ENV: z.preprocess(blankToUndefined, z.enum(["development", "production", "test"]).default("development")),
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(65535).default(4000)),
  CORS_ORIGIN: z.preprocess(blankToUndefined, z.string().optional()),
  TRUST_PROXY: z.preprocess(blankToUndefined, z.enum(["true", "false"]).default("false")),
  INTERNAL_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  PUBLIC_BASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default("info")),
  LOG_DIR: z.preprocess(blankToUndefined, z.string().optional()),
  SECRETS_FILE: z.preprocess(blankToUndefined, z.string().optional()),
});

export type AppConfig = {
  nodeEnv: "development" | "production" | "test";
  port: number;
  corsOrigin?: string;
  trustProxy: boolean;
  internalApiKey?: string;
  /** Public origin advertised in the OpenAPI servers list. */
  publicBaseUrl?: string;
  logLevel: LogLevel;
  logDir?: string;
  secretsFile?: string;
};

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = AppSettingsSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
    );
  }

  const s = parsed.data;
  return {
    nodeEnv: s.NODE_ENV,
    port: s.PORT,
    corsOrigin: s.CORS_ORIGIN,
    trustProxy: s.TRUST_PROXY === "true",
    internalApiKey: s.INTERNAL_API_KEY,
    publicBaseUrl: s.PUBLIC_BASE_URL,
    logLevel: s.LOG_LEVEL,
    logDir: s.LOG_DIR,
    secretsFile: s.SECRETS_FILE,
  };
}
