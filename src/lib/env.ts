/**
 * slash-registry — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * FLOWS: loadEnv() → dotenv → parseEnv(process.env) → typed AppConfig (or ConfigError listing every issue)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

// "yes", "YES", "1", "true", "on" all count as true
const truthyPattern = /^(1|true|yes|on)$/i;
const SNOWFLAKE_PATTERN = /^\d{17,20}$/;

function flag(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === "" ? defaultValue : truthyPattern.test(value)));
}

const schema = z.object({
  DISCORD_TOKEN: z.string({ required_error: "Missing DISCORD_TOKEN" }).min(1, "Missing DISCORD_TOKEN"),
  APPLICATION_ID: z
    .string({ required_error: "Missing APPLICATION_ID (or CLIENT_ID)" })
    .regex(SNOWFLAKE_PATTERN, "APPLICATION_ID must be a snowflake"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.string().optional(),

  // Synchronization policy
  SYNC_COMMANDS: flag(true),
  SYNC_ON_RELOAD: flag(false),
  DELETE_UNKNOWN_COMMANDS: flag(true),
  DELETE_ON_RELOAD: flag(false),
  SYNC_GUILD_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SYNC_GUILD_CONCURRENCY: z.coerce.number().int().min(1).max(10).default(1),
  KNOWN_GUILD_IDS: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? "")
        .split(",")
        .map((id) => id.trim())
        .filter((id) => id.length > 0)
    )
    .refine((ids) => ids.every((id) => SNOWFLAKE_PATTERN.test(id)), {
      message: "KNOWN_GUILD_IDS must be a comma-separated list of snowflakes",
    }),

  // Sentry error tracking - disabled if DSN not provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
});

export type AppConfig = z.infer<typeof schema>;

/**
 * Validates a raw environment. Every value is trimmed first; empty strings count as unset.
 * safeParse collects ALL issues so they can be fixed in one go.
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const read = (key: string): string | undefined => {
    const value = source[key]?.trim();
    return value ? value : undefined;
  };

  const raw = {
    DISCORD_TOKEN: read("DISCORD_TOKEN"),
    // CLIENT_ID is the older name for the same value
    APPLICATION_ID: read("APPLICATION_ID") ?? read("CLIENT_ID"),
    NODE_ENV: read("NODE_ENV"),
    LOG_LEVEL: read("LOG_LEVEL"),
    SYNC_COMMANDS: read("SYNC_COMMANDS"),
    SYNC_ON_RELOAD: read("SYNC_ON_RELOAD"),
    DELETE_UNKNOWN_COMMANDS: read("DELETE_UNKNOWN_COMMANDS"),
    DELETE_ON_RELOAD: read("DELETE_ON_RELOAD"),
    SYNC_GUILD_TIMEOUT_MS: read("SYNC_GUILD_TIMEOUT_MS"),
    SYNC_GUILD_CONCURRENCY: read("SYNC_GUILD_CONCURRENCY"),
    KNOWN_GUILD_IDS: read("KNOWN_GUILD_IDS"),
    SENTRY_DSN: read("SENTRY_DSN"),
    SENTRY_ENVIRONMENT: read("SENTRY_ENVIRONMENT"),
    SENTRY_TRACES_SAMPLE_RATE: read("SENTRY_TRACES_SAMPLE_RATE"),
  };

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`));
  }
  return parsed.data;
}

/**
 * Loads .env from the working directory, then validates process.env.
 * override: false in tests so values set by the test win.
 */
export function loadEnv(): AppConfig {
  const isTest = process.env.NODE_ENV === "test" || !!process.env.VITEST_WORKER_ID;
  dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });
  return parseEnv(process.env);
}
