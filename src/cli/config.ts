/**
 * CLI configuration: resolve paths and pipeline settings from the
 * environment.
 *
 * Defaults:
 *   Base dir:  ~/.sealgate
 *   Archive:   ~/.sealgate/archive/
 *
 * Environment overrides (all optional):
 *   SEALGATE_BASE_DIR                 base directory
 *   SEALGATE_SESSION_DB               read-only session store (SQLite file)
 *   SEALGATE_ARCHIVE_ROOT             content-addressed package archive
 *   SEALGATE_RISK_THRESHOLD           LOW | MEDIUM | HIGH | CRITICAL
 *   SEALGATE_MAX_DEVIATION_SESSIONS   sessions replayed per package
 *   SEALGATE_STRICT_MODE              "true" blocks sealing on non-critical gaps
 *   SEALGATE_JOB_TIMEOUT_MS           wall-clock budget per job
 *   SEALGATE_MAX_CONCURRENT_JOBS      jobs executing at once
 *   SEALGATE_RETRY_MAX                retries for external calls
 *   SEALGATE_RETRY_BACKOFF_MS         initial backoff, doubled per retry
 *   SEALGATE_LOG_LEVEL                pino level
 *   SEALGATE_USER_ID                  default submitting user
 *   SEALGATE_SIGNING_KEY              key for the local HMAC signer
 */

import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { mkdirSync } from "node:fs";
import { z } from "zod";
import { RiskLevelSchema } from "../contracts/schemas.js";
import { parseWith } from "../contracts/validation.js";
import { LOG_LEVELS } from "../logging/logger.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const positiveInt = (max: number) => z.coerce.number().int().min(1).max(max);

const EnvSchema = z.object({
  SEALGATE_BASE_DIR: z.string().min(1).optional(),
  SEALGATE_SESSION_DB: z.string().min(1).optional(),
  SEALGATE_ARCHIVE_ROOT: z.string().min(1).optional(),
  SEALGATE_RISK_THRESHOLD: RiskLevelSchema.default("HIGH"),
  SEALGATE_MAX_DEVIATION_SESSIONS: positiveInt(10_000).default(10),
  SEALGATE_STRICT_MODE: booleanFlag.default("false"),
  SEALGATE_JOB_TIMEOUT_MS: positiveInt(86_400_000).default(300_000),
  SEALGATE_MAX_CONCURRENT_JOBS: positiveInt(64).default(4),
  SEALGATE_RETRY_MAX: z.coerce.number().int().min(0).max(10).default(3),
  SEALGATE_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).max(60_000).default(200),
  SEALGATE_LOG_LEVEL: z
    .string()
    .refine((v) => LOG_LEVELS.some((level) => level === v), "Unknown log level")
    .default("info"),
  SEALGATE_USER_ID: z.string().min(1).default("system-auditor"),
  SEALGATE_SIGNING_KEY: z.string().min(1).optional(),
});

export const AuditorConfigSchema = EnvSchema.transform((env) => {
  const baseDir = resolve(env.SEALGATE_BASE_DIR ?? join(homedir(), ".sealgate"));
  return {
    baseDir,
    sessionDbPath: env.SEALGATE_SESSION_DB ? resolve(env.SEALGATE_SESSION_DB) : null,
    archiveRoot: resolve(env.SEALGATE_ARCHIVE_ROOT ?? join(baseDir, "archive")),
    riskThreshold: env.SEALGATE_RISK_THRESHOLD,
    maxDeviationSessions: env.SEALGATE_MAX_DEVIATION_SESSIONS,
    strictMode: env.SEALGATE_STRICT_MODE,
    jobTimeoutMs: env.SEALGATE_JOB_TIMEOUT_MS,
    maxConcurrentJobs: env.SEALGATE_MAX_CONCURRENT_JOBS,
    retry: {
      maxRetries: env.SEALGATE_RETRY_MAX,
      backoffMs: env.SEALGATE_RETRY_BACKOFF_MS,
    },
    logLevel: LOG_LEVELS.find((level) => level === env.SEALGATE_LOG_LEVEL) ?? "info",
    defaultUserId: env.SEALGATE_USER_ID,
    signingKey: env.SEALGATE_SIGNING_KEY ?? null,
  };
});

export type AuditorConfig = z.infer<typeof AuditorConfigSchema>;

export function resolveConfig(
  env: Record<string, string | undefined> = process.env,
): AuditorConfig {
  const relevant: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith("SEALGATE_") && value !== undefined && value !== "") {
      relevant[key] = value;
    }
  }
  return parseWith(AuditorConfigSchema, relevant, "environment configuration");
}

/**
 * Ensure the base directory and archive root exist.
 */
export function ensureDataDirs(config: AuditorConfig): void {
  mkdirSync(config.baseDir, { recursive: true });
  mkdirSync(config.archiveRoot, { recursive: true });
}
