/**
 * converge configuration schema (TypeBox), defaults and loading.
 *
 * Sources, later ones winning: built-in defaults, the JSON config file,
 * `CONVERGE_*` environment variables.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";
import { isLogLevel } from "./logging/index.js";
import type { LockWaitStrategy } from "./types.js";

export const CONFIG_FILE_NAME = "converge.config.json";

// =============================================================================
// Schema
// =============================================================================

const stateSchema = Type.Object({
  backend: Type.Union([Type.Literal("memory"), Type.Literal("sqlite")], {
    description: "Snapshot persistence backend",
  }),
  path: Type.String({ minLength: 1, description: "SQLite database file (sqlite backend only)" }),
  lockTimeoutMs: Type.Integer({
    minimum: 0,
    description: "How long apply waits for a held lock; 0 fails immediately",
  }),
  leaseMs: Type.Integer({ minimum: 1, description: "Lock lease length; renewed every third of it" }),
  pollIntervalMs: Type.Integer({ minimum: 1, description: "Interval between lock attempts while waiting" }),
  holder: Type.Optional(Type.String({ description: "Lock holder shown to other processes" })),
});

const retrySchema = Type.Object({
  maxAttempts: Type.Integer({ minimum: 1 }),
  minDelayMs: Type.Integer({ minimum: 0 }),
  maxDelayMs: Type.Integer({ minimum: 0 }),
  jitterFactor: Type.Number({ minimum: 0, maximum: 1 }),
});

const executorSchema = Type.Object({
  concurrency: Type.Integer({ minimum: 1, description: "Parallel operations per wave" }),
  retry: retrySchema,
});

const loggingSchema = Type.Object({
  level: Type.Union([
    Type.Literal("trace"),
    Type.Literal("debug"),
    Type.Literal("info"),
    Type.Literal("warn"),
    Type.Literal("error"),
    Type.Literal("fatal"),
  ]),
  file: Type.Optional(Type.String({ description: "Also write JSON lines to this file" })),
  colors: Type.Optional(Type.Boolean({ description: "Defaults to whether stderr is a terminal" })),
  redactPatterns: Type.Optional(Type.Array(Type.String(), { description: "Extra secret-matching regexes" })),
});

export const configSchema = Type.Object({
  defaultScope: Type.String({ minLength: 1 }),
  state: stateSchema,
  executor: executorSchema,
  logging: loggingSchema,
});

export type ConvergeConfig = Static<typeof configSchema>;

/** Shape of the config file: every section and field optional. */
const configFileSchema = Type.Object(
  {
    defaultScope: Type.Optional(Type.String({ minLength: 1 })),
    state: Type.Optional(Type.Partial(stateSchema)),
    executor: Type.Optional(
      Type.Object({
        concurrency: Type.Optional(Type.Integer({ minimum: 1 })),
        retry: Type.Optional(Type.Partial(retrySchema)),
      }),
    ),
    logging: Type.Optional(Type.Partial(loggingSchema)),
  },
  { additionalProperties: false },
);

export type ConvergeConfigFile = Static<typeof configFileSchema>;

export function getDefaultConfig(): ConvergeConfig {
  return {
    defaultScope: "default",
    state: {
      backend: "sqlite",
      path: ".converge/state.db",
      lockTimeoutMs: 0,
      leaseMs: 30_000,
      pollIntervalMs: 500,
    },
    executor: {
      concurrency: 4,
      retry: { maxAttempts: 3, minDelayMs: 100, maxDelayMs: 30_000, jitterFactor: 0.2 },
    },
    logging: { level: "info" },
  };
}

// =============================================================================
// Loading
// =============================================================================

export type LoadConfigOptions = {
  /** Explicit config file; it must exist. */
  path?: string;
  env?: NodeJS.ProcessEnv;
  /** Directory searched for `converge.config.json` when no path is given. */
  cwd?: string;
};

/**
 * Load the effective configuration.
 *
 * @throws ConfigError when the file is unreadable, is not JSON, or any value
 *   (file or environment) fails validation.
 */
export function loadConfig(options: LoadConfigOptions = {}): ConvergeConfig {
  const env = options.env ?? process.env;
  const file = readConfigFile(options);
  const config = applyEnvOverrides(mergeConfig(getDefaultConfig(), file), env);

  if (!Value.Check(configSchema, config)) {
    throw new ConfigError("Invalid configuration", collectIssues(configSchema, config));
  }
  if (config.executor.retry.minDelayMs > config.executor.retry.maxDelayMs) {
    throw new ConfigError("Invalid configuration", ["/executor/retry: minDelayMs exceeds maxDelayMs"]);
  }
  return config;
}

function readConfigFile(options: LoadConfigOptions): ConvergeConfigFile {
  const explicit = options.path !== undefined;
  const filePath = path.resolve(options.cwd ?? process.cwd(), options.path ?? CONFIG_FILE_NAME);

  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    if (!explicit && err instanceof Error && "code" in err && err.code === "ENOENT") return {};
    throw new ConfigError(`Cannot read config file ${filePath}`, [err instanceof Error ? err.message : String(err)]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }

  if (!Value.Check(configFileSchema, parsed)) {
    throw new ConfigError(`Invalid config file ${filePath}`, collectIssues(configFileSchema, parsed));
  }
  return parsed;
}

export function mergeConfig(base: ConvergeConfig, file: ConvergeConfigFile): ConvergeConfig {
  return {
    defaultScope: file.defaultScope ?? base.defaultScope,
    state: { ...base.state, ...file.state },
    executor: {
      concurrency: file.executor?.concurrency ?? base.executor.concurrency,
      retry: { ...base.executor.retry, ...file.executor?.retry },
    },
    logging: { ...base.logging, ...file.logging },
  };
}

function applyEnvOverrides(config: ConvergeConfig, env: NodeJS.ProcessEnv): ConvergeConfig {
  const next: ConvergeConfig = {
    ...config,
    state: { ...config.state },
    executor: { ...config.executor },
    logging: { ...config.logging },
  };

  const level = env.CONVERGE_LOG_LEVEL;
  if (level) {
    if (!isLogLevel(level)) {
      throw new ConfigError("Invalid configuration", [`CONVERGE_LOG_LEVEL: unknown level "${level}"`]);
    }
    next.logging.level = level;
  }

  const backend = env.CONVERGE_STATE_BACKEND;
  if (backend) {
    if (backend !== "memory" && backend !== "sqlite") {
      throw new ConfigError("Invalid configuration", [`CONVERGE_STATE_BACKEND: expected memory or sqlite, got "${backend}"`]);
    }
    next.state.backend = backend;
  }

  if (env.CONVERGE_STATE_PATH) next.state.path = env.CONVERGE_STATE_PATH;

  const concurrency = env.CONVERGE_CONCURRENCY;
  if (concurrency) {
    const value = Number(concurrency);
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError("Invalid configuration", [`CONVERGE_CONCURRENCY: expected a positive integer, got "${concurrency}"`]);
    }
    next.executor.concurrency = value;
  }

  return next;
}

function collectIssues(schema: TSchema, value: unknown): string[] {
  return [...Value.Errors(schema, value)].map((error) => `${error.path || "/"}: ${error.message}`);
}

// =============================================================================
// Derived Settings
// =============================================================================

/** Lock wait strategy for mutating commands. */
export function lockWaitStrategy(config: ConvergeConfig): LockWaitStrategy {
  if (config.state.lockTimeoutMs <= 0) return { mode: "fail-fast" };
  return { mode: "wait", timeoutMs: config.state.lockTimeoutMs, pollIntervalMs: config.state.pollIntervalMs };
}
