/**
 * Runtime configuration from the process environment.
 */

import dotenv from "dotenv";
import { z } from "zod";
import { DEFAULT_API_URL } from "./resolver.js";

const envSchema = z.object({
  // Optional: Semantic Scholar API key (raises the rate limit)
  API_KEY: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
  // Optional: Graph API base URL; blank means the default
  S2_API_URL: z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    z.string().trim().url().default(DEFAULT_API_URL)
  ),
});

export interface ResolverConfig {
  apiKey?: string;
  apiUrl: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid environment configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Load a .env file from the working directory into process.env.
 * Variables already set in the environment are left untouched.
 */
export function loadDotenv(path?: string): void {
  dotenv.config(path ? { path } : {});
}

/** Validate environment variables into a ResolverConfig. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ResolverConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const config: ResolverConfig = { apiUrl: result.data.S2_API_URL };
  if (result.data.API_KEY) config.apiKey = result.data.API_KEY;
  return config;
}
