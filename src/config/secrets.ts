// src/config/secrets.ts
import fs from "fs";
import path from "path";
import { parse } from "smol-toml";
import { ConfigurationError } from "../utils/errors";

/**
 * Local secrets file (TOML). Kept out of version control; see
 * secrets.example.toml for the expected keys.
 */
export const DEFAULT_SECRETS_PATH = path.join(".secrets", "secrets.toml");

export type SecretKey = "MONGO_URI" | "MONGO_DB_NAME";

export type Secrets = Partial<Record<SecretKey, string>>;

const SECRET_KEYS: SecretKey[] = ["MONGO_URI", "MONGO_DB_NAME"];

export function readSecretsFile(filePath: string): Secrets {
  if (!fs.existsSync(filePath)) return {};

  let table: Record<string, unknown>;
  try {
    table = parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Malformed secrets file ${filePath}: ${reason}`);
  }

  const secrets: Secrets = {};
  for (const key of SECRET_KEYS) {
    const value = table[key];
    if (value === undefined) continue;
    if (typeof value !== "string") {
      throw new ConfigurationError(`${key} in ${filePath} must be a string`);
    }
    secrets[key] = value;
  }
  return secrets;
}
