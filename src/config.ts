/**
 * Configuration loading. The HTTP server reads its settings from the environment (optionally via a
 * `.env` file), while each optimization run reads a JSON configuration file describing the solver
 * executable and routing parameters. Environment variables may override selected solver options.
 */
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import dotenv from 'dotenv';
import { ConfigError, isMissingFileError } from './errors';
import { isLogLevel, type LogLevel } from './logger';

dotenv.config();

/**
 * Solver and routing options, read once per run and shared read-only by every layer worker.
 */
export interface OptimizerConfig {
  /** Absolute path of the route-solving executable. */
  program: string;
  /** Integer scale applied to coordinates before they are handed to the solver. */
  precision: number;
  /** Number of solver runs per layer problem. */
  numRuns: number;
  /** Islands whose entries lie closer than this distance (mm) are merged before routing. */
  maxMergeLength: number;
  /** Layers with fewer islands than this are emitted unchanged. */
  minimumIslands: number;
  /** Upper bound on simultaneously running solver processes. */
  maxConcurrency: number;
  /** Per-invocation time limit in milliseconds. */
  solverTimeoutMs: number;
  /** Argument template; `{parameters}`, `{problem}`, `{tour}` and `{runs}` are substituted. */
  solverArgs: string[];
  /** Feed rate written on synthesized travel moves, or `null` to reuse the layer's travel feed. */
  travelFeedrate: number | null;
  /** Additional instruction codes recognized as plain state changes. */
  extraStateCodes: string[];
}

/**
 * Runtime configuration for the HTTP server process.
 */
export interface ServerConfig {
  /** Port the HTTP server listens on. */
  port: number;
  /** Allowed CORS origins or `true` to allow all origins. */
  corsOrigins: string[] | true;
  /** JSON configuration used for optimization requests. */
  optimizerConfigPath: string;
  /** Minimum level written by the server logger. */
  logLevel: LogLevel;
}

export const DEFAULT_SOLVER_ARGS: readonly string[] = ['{parameters}'];

const DEFAULT_PRECISION = 1000;
const DEFAULT_NUM_RUNS = 1;
const DEFAULT_MINIMUM_ISLANDS = 2;
const DEFAULT_SOLVER_TIMEOUT_MS = 60_000;
const MAX_DEFAULT_CONCURRENCY = 8;

/** Parses a positive integer environment variable, returning `undefined` when unset or invalid. */
const parsePositiveInteger = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
};

export const defaultConcurrency = (): number => Math.max(1, Math.min(MAX_DEFAULT_CONCURRENCY, os.availableParallelism()));

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readInteger = (source: Record<string, unknown>, key: string, fallback: number, minimum: number): number => {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < minimum) {
    throw new ConfigError(`"${key}" must be an integer greater than or equal to ${minimum}.`);
  }
  return value;
};

const readNonNegativeNumber = (source: Record<string, unknown>, key: string, fallback: number): number => {
  const value = source[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`"${key}" must be a non-negative number.`);
  }
  return value;
};

const readStringList = (source: Record<string, unknown>, key: string, fallback: readonly string[]): string[] => {
  const value = source[key];
  if (value === undefined) {
    return [...fallback];
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`"${key}" must be an array of strings.`);
  }
  return [...value];
};

/**
 * Validates a parsed JSON document and applies environment overrides. Relative program paths are
 * resolved against `baseDir` (the directory of the configuration file).
 */
export function parseOptimizerConfig(
  raw: unknown,
  baseDir: string,
  env: NodeJS.ProcessEnv = process.env,
): OptimizerConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration must be a JSON object.');
  }

  const programOverride = env.OPTIMIZER_PROGRAM?.trim();
  const program = programOverride || raw.program;
  if (typeof program !== 'string' || program.trim() === '') {
    throw new ConfigError('"program" must name the solver executable.');
  }

  let travelFeedrate: number | null = null;
  if (raw.travel_feedrate !== undefined) {
    const value = raw.travel_feedrate;
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
      throw new ConfigError('"travel_feedrate" must be a positive number.');
    }
    travelFeedrate = value;
  }

  const solverArgs = readStringList(raw, 'solver_args', DEFAULT_SOLVER_ARGS);
  if (solverArgs.length === 0) {
    throw new ConfigError('"solver_args" must contain at least one argument.');
  }

  const config: OptimizerConfig = {
    program: path.resolve(baseDir, program.trim()),
    precision: readInteger(raw, 'precision', DEFAULT_PRECISION, 1),
    numRuns: readInteger(raw, 'num_runs', DEFAULT_NUM_RUNS, 1),
    maxMergeLength: readNonNegativeNumber(raw, 'max_merge_length', 0),
    minimumIslands: readInteger(raw, 'minimum_islands', DEFAULT_MINIMUM_ISLANDS, 2),
    maxConcurrency:
      parsePositiveInteger(env.OPTIMIZER_MAX_CONCURRENCY) ??
      readInteger(raw, 'max_concurrency', defaultConcurrency(), 1),
    solverTimeoutMs:
      parsePositiveInteger(env.OPTIMIZER_SOLVER_TIMEOUT_MS) ??
      readInteger(raw, 'solver_timeout_ms', DEFAULT_SOLVER_TIMEOUT_MS, 1),
    solverArgs,
    travelFeedrate,
    extraStateCodes: readStringList(raw, 'extra_state_codes', []).map((code) => code.trim().toUpperCase()),
  };

  return Object.freeze(config);
}

/**
 * Reads, validates and freezes the JSON configuration at `filePath`. The solver executable must
 * exist; every problem is reported as a {@link ConfigError}.
 */
export async function loadOptimizerConfig(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<OptimizerConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const reason = isMissingFileError(error) ? 'file does not exist' : 'file is not readable';
    throw new ConfigError(`Unable to read configuration ${filePath}: ${reason}.`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Unable to parse JSON in configuration ${filePath}.`, { cause: error });
  }

  const config = parseOptimizerConfig(raw, path.dirname(path.resolve(filePath)), env);

  try {
    const stats = await fs.stat(config.program);
    if (!stats.isFile()) {
      throw new ConfigError(`Program ${config.program} is not a file.`);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(`Program ${config.program} does not exist.`, { cause: error });
  }

  return config;
}

const DEFAULT_PORT = 4000;

/** `CORS_ORIGIN` lists the dashboards allowed to upload files; unset means any origin. */
export const allowedOrigins = (value: string | undefined): string[] | true => {
  const origins = (value ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin !== '');
  return origins.length > 0 ? origins : true;
};

const logLevel = process.env.LOG_LEVEL?.trim().toLowerCase();

/** Settings of the optimizer API process, read from the environment when this module loads. */
export const serverConfig: ServerConfig = Object.freeze({
  port: parsePositiveInteger(process.env.PORT) ?? DEFAULT_PORT,
  corsOrigins: allowedOrigins(process.env.CORS_ORIGIN),
  optimizerConfigPath: path.resolve(process.env.OPTIMIZER_CONFIG ?? 'config.json'),
  logLevel: isLogLevel(logLevel) ? logLevel : 'info',
});
