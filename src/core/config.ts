/**
 * Run configuration for find-serverless-stacks.
 *
 * Validates the raw command-line options and applies defaults.
 */

import { z } from "zod";
import type { RunConfig } from "@/types";
import { DEFAULT_MAX_ATTEMPTS } from "@aws/clientFactory";
import { DEFAULT_MAX_WORKERS } from "@detector/detector";

export const DEFAULT_PROFILE = "default";
export const DEFAULT_SESSION_NAME = "find-serverless-stacks-session";
export const DEFAULT_SESSION_DURATION_SECONDS = 3600;
export const MIN_SESSION_DURATION_SECONDS = 900;
export const MAX_SESSION_DURATION_SECONDS = 43200;

const AssumeRoleSchema = z.object({
  roleArn: z.string().min(1, "role ARN cannot be empty when using AssumeRole"),
  sessionName: z.string().min(1, "session name cannot be empty").default(DEFAULT_SESSION_NAME),
  durationSeconds: z.coerce
    .number()
    .int()
    .min(MIN_SESSION_DURATION_SECONDS, "session duration must be between 900 and 43200 seconds")
    .max(MAX_SESSION_DURATION_SECONDS, "session duration must be between 900 and 43200 seconds")
    .default(DEFAULT_SESSION_DURATION_SECONDS),
  externalId: z.string().min(1).optional(),
});

/**
 * Configuration schema validation using Zod.
 *
 * Numeric options are coerced, since command-line values arrive as strings.
 */
const RunConfigSchema = z.object({
  region: z.string({ required_error: "region is required" }).min(1, "region is required"),
  profile: z.string().min(1).default(DEFAULT_PROFILE),
  output: z.enum(["json", "tsv"], {
    errorMap: () => ({ message: "invalid output format. Supported formats: json, tsv" }),
  }).default("json"),
  workers: z.coerce.number().int().positive().default(DEFAULT_MAX_WORKERS),
  maxAttempts: z.coerce.number().int().positive().default(DEFAULT_MAX_ATTEMPTS),
  assumeRole: AssumeRoleSchema.optional(),
});

export type RunConfigInput = z.input<typeof RunConfigSchema>;

/**
 * Base exception for configuration errors.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * Raised when the configuration is missing required fields or is invalid.
 */
export class ConfigValidationError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigValidationError";
  }
}

/**
 * Validate raw options and apply defaults.
 *
 * @param input - Raw options, typically from the command line
 * @returns Validated run configuration
 *
 * @throws {ConfigValidationError} If a field is missing or invalid
 */
export function parseRunConfig(input: unknown): RunConfig {
  const result = RunConfigSchema.safeParse(input);
  if (!result.success) {
    const problems = result.error.errors.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new ConfigValidationError(problems.join("; "), { cause: result.error });
  }
  return result.data;
}
