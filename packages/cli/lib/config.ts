/**
 * Configuration loader for the cardcheck CLI.
 *
 * Priority chain (later wins):
 *
 *   defaults -> config file -> CARDCHECK_* environment -> CLI flags
 *
 * The config file is the --config path when given, otherwise
 * cardcheck.json in the working directory if it exists. An explicit
 * file that cannot be read is an error; a missing automatic one is not.
 */

import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import { DEFAULT_EXPIRING_SOON_MONTHS } from "@cardcheck/card";
import { DEFAULT_CARD_LOG_FILE, DEFAULT_CONFIG_FILE } from "./constants.ts";
import type { LogLevel } from "../logger.ts";

// ── Types ────────────────────────────────────────────────────────────────────

/** Fully resolved configuration. */
export interface CardcheckConfig {
  /** Card log path, relative to the working directory unless absolute. */
  logFile: string;
  /** Append each validated card to the card log. */
  cardLog: boolean;
  /** Diagnostic log level. */
  logLevel: LogLevel;
  /** Months ahead that count as "expiring soon". */
  expiringSoonMonths: number;
}

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const ConfigInputSchema = z
  .object({
    logFile: z.string().min(1),
    cardLog: z.boolean(),
    logLevel: LogLevelSchema,
    expiringSoonMonths: z.number().int().min(0).max(120),
  })
  .partial()
  .strict();

/** Partial config as read from a file or the environment. */
export type CardcheckConfigInput = z.infer<typeof ConfigInputSchema>;

/** Flags taken from the command line. Undefined means "not given". */
export interface CliConfigFlags {
  logFile?: string;
  cardLog?: boolean;
  logLevel?: string;
}

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigError extends Error {
  /** Set when the config file does not exist. */
  readonly notFound: boolean;

  constructor(message: string, notFound = false) {
    super(message);
    this.name = "ConfigError";
    this.notFound = notFound;
  }
}

// ── Defaults ─────────────────────────────────────────────────────────────────

export const CONFIG_DEFAULTS: CardcheckConfig = {
  logFile: DEFAULT_CARD_LOG_FILE,
  cardLog: true,
  logLevel: "warn",
  expiringSoonMonths: DEFAULT_EXPIRING_SOON_MONTHS,
};

/**
 * Environment variable names.
 */
export const ENV_VARS = {
  LOG_FILE: "CARDCHECK_LOG_FILE",
  CARD_LOG: "CARDCHECK_CARD_LOG",
  LOG_LEVEL: "CARDCHECK_LOG_LEVEL",
  EXPIRING_SOON_MONTHS: "CARDCHECK_EXPIRING_SOON_MONTHS",
} as const;

// ── Internal helpers ─────────────────────────────────────────────────────────

function describeIssues(source: string, error: z.ZodError): string {
  const issues = error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  return `Invalid config in ${source}: ${issues.join("; ")}`;
}

function parseInput(source: string, raw: unknown): CardcheckConfigInput {
  const result = ConfigInputSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(describeIssues(source, result.error));
  }
  return result.data;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// ── Public API ───────────────────────────────────────────────────────────────

/**
 * Read and validate a single JSON config file.
 *
 * @throws ConfigError on unreadable files, invalid JSON or unknown keys
 */
export async function readConfigFile(
  filePath: string,
): Promise<CardcheckConfigInput> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      throw new ConfigError(`Config file not found: ${filePath}`, true);
    }
    throw new ConfigError(`Failed to read config file ${filePath}: ${err}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(
      `Config file ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  return parseInput(filePath, parsed);
}

/**
 * Read CARDCHECK_* variables. Unset or empty variables are skipped.
 *
 * @throws ConfigError on values that do not parse
 */
export function readEnvConfig(
  env: Record<string, string | undefined>,
): CardcheckConfigInput {
  const get = (key: string): string | undefined => env[key] || undefined;

  const raw: Record<string, unknown> = {};

  const logFile = get(ENV_VARS.LOG_FILE);
  if (logFile !== undefined) raw.logFile = logFile;

  const cardLog = get(ENV_VARS.CARD_LOG);
  if (cardLog !== undefined) {
    const normalized = cardLog.toLowerCase();
    if (normalized === "true" || normalized === "1") {
      raw.cardLog = true;
    } else if (normalized === "false" || normalized === "0") {
      raw.cardLog = false;
    } else {
      throw new ConfigError(
        `Invalid boolean for ${ENV_VARS.CARD_LOG}: ${cardLog} (expected true, false, 1 or 0)`,
      );
    }
  }

  const logLevel = get(ENV_VARS.LOG_LEVEL);
  if (logLevel !== undefined) raw.logLevel = logLevel.toLowerCase();

  const months = get(ENV_VARS.EXPIRING_SOON_MONTHS);
  if (months !== undefined) {
    const parsed = Number(months);
    if (!Number.isInteger(parsed)) {
      throw new ConfigError(
        `Invalid integer for ${ENV_VARS.EXPIRING_SOON_MONTHS}: ${months}`,
      );
    }
    raw.expiringSoonMonths = parsed;
  }

  return parseInput("environment", raw);
}

export interface LoadConfigOptions {
  /** Working directory; relative paths resolve against it. */
  cwd: string;
  /** Explicit --config path. */
  configPath?: string;
  env?: Record<string, string | undefined>;
}

/**
 * Load the resolved config: defaults, then the config file, then env.
 * CLI flags are applied separately with {@link mergeCliFlags}.
 */
export async function loadConfig(
  options: LoadConfigOptions,
): Promise<CardcheckConfig> {
  let fileInput: CardcheckConfigInput = {};

  if (options.configPath) {
    fileInput = await readConfigFile(resolve(options.cwd, options.configPath));
  } else {
    const autoPath = resolve(options.cwd, DEFAULT_CONFIG_FILE);
    try {
      fileInput = await readConfigFile(autoPath);
    } catch (err) {
      if (!(err instanceof ConfigError && err.notFound)) throw err;
    }
  }

  const envInput = readEnvConfig(options.env ?? {});

  return {
    ...CONFIG_DEFAULTS,
    ...fileInput,
    ...envInput,
  };
}

/**
 * Apply command-line flags on top of a resolved config.
 *
 * Only flags that were explicitly passed (not undefined) override config
 * values.
 */
export function mergeCliFlags(
  config: CardcheckConfig,
  flags: CliConfigFlags,
): CardcheckConfig {
  const result = { ...config };

  if (flags.logFile !== undefined) result.logFile = flags.logFile;
  if (flags.cardLog !== undefined) result.cardLog = flags.cardLog;
  if (flags.logLevel !== undefined) {
    const level = LogLevelSchema.safeParse(flags.logLevel);
    if (!level.success) {
      throw new ConfigError(
        `Invalid log level: ${flags.logLevel}. Must be one of: debug, info, warn, error`,
      );
    }
    result.logLevel = level.data;
  }

  return result;
}
