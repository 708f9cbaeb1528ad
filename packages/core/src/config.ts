/**
 * Application configuration, validated with zod.
 *
 * @example
 * ```typescript
 * const config = resolveAppConfig({
 *   ...loadConfigFromEnv(process.env),
 *   title: 'Admin',
 * });
 * ```
 */

import { z } from "zod";
import { ValidationError } from "yoguido-shared";
import { LOG_LEVELS, isLogLevel, type LogLevel } from "yoguido-kernel";

const logLevelSchema = z.custom<LogLevel>((value) => typeof value === "string" && isLogLevel(value), {
  message: `logLevel must be one of ${LOG_LEVELS.join(", ")}`,
});

export const appConfigSchema = z.object({
  title: z.string().min(1).default("YoGuido"),
  /** Abort event handlers running longer than this */
  handlerTimeoutMs: z.number().int().positive().optional(),
  sessionTtlMs: z.number().int().positive().default(30 * 60 * 1000),
  sweepIntervalMs: z.number().int().positive().default(60 * 1000),
  basePath: z
    .string()
    .regex(/^\/[^?#]*[^/?#]$/, 'basePath must start with "/" and not end with one')
    .default("/_yg"),
  logLevel: logLevelSchema.default("info"),
  /** Stylesheet URLs linked from every page */
  stylesheets: z.array(z.string()).default([]),
});

export type AppConfig = z.output<typeof appConfigSchema>;
export type AppConfigInput = z.input<typeof appConfigSchema>;

/**
 * Apply defaults and validate.
 *
 * @throws ValidationError naming the first offending field
 */
export function resolveAppConfig(input: AppConfigInput = {}): AppConfig {
  const result = appConfigSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const [issue] = result.error.issues;
  const field = issue.path.join(".") || "config";
  throw new ValidationError(field, `Invalid configuration: ${field}: ${issue.message}`, {
    code: issue.code === "invalid_type" ? "VALIDATION_TYPE" : "VALIDATION_CONSTRAINT",
  });
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw ValidationError.type(name, "a number", raw);
  }
  return value;
}

/**
 * Read `YOGUIDO_*` variables. Unset variables are left out so defaults apply.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfigInput {
  const config: AppConfigInput = {};
  if (env.YOGUIDO_TITLE) config.title = env.YOGUIDO_TITLE;
  if (env.YOGUIDO_BASE_PATH) config.basePath = env.YOGUIDO_BASE_PATH;
  if (env.YOGUIDO_LOG_LEVEL) {
    const level = env.YOGUIDO_LOG_LEVEL;
    if (!isLogLevel(level)) {
      throw ValidationError.type("YOGUIDO_LOG_LEVEL", `one of ${LOG_LEVELS.join(", ")}`, level);
    }
    config.logLevel = level;
  }
  const handlerTimeoutMs = envNumber(env, "YOGUIDO_HANDLER_TIMEOUT_MS");
  if (handlerTimeoutMs !== undefined) config.handlerTimeoutMs = handlerTimeoutMs;
  const sessionTtlMs = envNumber(env, "YOGUIDO_SESSION_TTL_MS");
  if (sessionTtlMs !== undefined) config.sessionTtlMs = sessionTtlMs;
  const sweepIntervalMs = envNumber(env, "YOGUIDO_SWEEP_INTERVAL_MS");
  if (sweepIntervalMs !== undefined) config.sweepIntervalMs = sweepIntervalMs;
  return config;
}
