import { config as loadDotEnv } from "dotenv";
import { ConfigurationError } from "@/lib/pipeline/errors";

const ENV_FILES = [".env.local", ".env"];

let loaded = false;

// `.env.local` wins over `.env`; neither overrides variables already set.
export function ensureEnvLoaded(): void {
  if (loaded) {
    return;
  }

  for (const path of ENV_FILES) {
    loadDotEnv({ path });
  }

  loaded = true;
}

export function requireEnv(name: string): string {
  const value = readEnv(name);

  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${name}`);
  }

  return value;
}

export function readEnv(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}
