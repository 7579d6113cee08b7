/**
 * Engine configuration
 *
 * Resolution order, later wins: defaults, then the JSON config file
 * (explicit path, else $PACKRAT_CONFIG, else ~/.packrat/config.json),
 * then explicit overrides.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';

export const MIN_LEVEL = 1;
export const MAX_LEVEL = 22;
export const DEFAULT_CHUNK_SIZE = 1024 * 1024;
export const DEFAULT_COMPRESSION_LEVEL = 3;

export const EngineConfigSchema = z.object({
  chunkSize: z.number().int().min(512).max(256 * 1024 * 1024),
  compressionLevel: z.number().int().min(MIN_LEVEL).max(MAX_LEVEL),
  verifyIntegrity: z.boolean(),
  /** Codec worker threads for a single stream; 1 (the default) encodes on the calling thread */
  threads: z.number().int().min(1).max(256),
  /** Independent file jobs run at once by compressFiles */
  parallelJobs: z.number().int().min(1).max(64),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/** The file may set any subset; snake_case keys are accepted too. */
const ConfigFileSchema = z
  .object({
    chunkSize: z.number(),
    chunk_size: z.number(),
    compressionLevel: z.number(),
    compression_level: z.number(),
    verifyIntegrity: z.boolean(),
    verify_integrity: z.boolean(),
    threads: z.number(),
    parallel_threads: z.number(),
    parallelJobs: z.number(),
    parallel_jobs: z.number(),
  })
  .partial()
  .strict();

export const DEFAULT_CONFIG: EngineConfig = {
  chunkSize: DEFAULT_CHUNK_SIZE,
  compressionLevel: DEFAULT_COMPRESSION_LEVEL,
  verifyIntegrity: true,
  threads: 1,
  parallelJobs: 4,
};

export function defaultConfigPath(): string {
  return process.env['PACKRAT_CONFIG'] || join(homedir(), '.packrat', 'config.json');
}

/**
 * Parse and validate config file contents.
 */
export function parseConfig(text: string, source = 'config'): Partial<EngineConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`${source} is not valid JSON: ${describeError(error)}`, { path: source, cause: error });
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`${source}: ${formatIssues(parsed.error)}`, { path: source });
  }

  const file = parsed.data;
  const merged: Partial<EngineConfig> = {};
  const chunkSize = file.chunkSize ?? file.chunk_size;
  const compressionLevel = file.compressionLevel ?? file.compression_level;
  const verifyIntegrity = file.verifyIntegrity ?? file.verify_integrity;
  const threads = file.threads ?? file.parallel_threads;
  const parallelJobs = file.parallelJobs ?? file.parallel_jobs;
  if (chunkSize !== undefined) merged.chunkSize = chunkSize;
  if (compressionLevel !== undefined) merged.compressionLevel = compressionLevel;
  if (verifyIntegrity !== undefined) merged.verifyIntegrity = verifyIntegrity;
  if (threads !== undefined) merged.threads = threads;
  if (parallelJobs !== undefined) merged.parallelJobs = parallelJobs;

  const checked = EngineConfigSchema.partial().safeParse(merged);
  if (!checked.success) {
    throw new ConfigError(`${source}: ${formatIssues(checked.error)}`, { path: source });
  }
  return checked.data;
}

/**
 * Load the effective configuration.
 *
 * A missing file at the default location is not an error; a missing file
 * that was asked for explicitly is.
 */
export function loadConfig(
  options: { path?: string; overrides?: Partial<EngineConfig> } = {}
): EngineConfig {
  const configPath = options.path ?? defaultConfigPath();
  let fromFile: Partial<EngineConfig> = {};

  if (existsSync(configPath)) {
    let text: string;
    try {
      text = readFileSync(configPath, 'utf-8');
    } catch (error) {
      throw new ConfigError(`Cannot read ${configPath}: ${describeError(error)}`, { path: configPath, cause: error });
    }
    fromFile = parseConfig(text, configPath);
  } else if (options.path) {
    throw new ConfigError(`Config file not found: ${configPath}`, { path: configPath });
  }

  return resolveConfig(mergeConfig(fromFile, options.overrides ?? {}));
}

/**
 * Fill the gaps of a partial config with defaults and validate the result.
 */
export function resolveConfig(partial: Partial<EngineConfig> = {}): EngineConfig {
  const result = EngineConfigSchema.safeParse(mergeConfig(DEFAULT_CONFIG, partial));
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Write the default config file, returning its path.
 */
export function writeUserConfig(path = defaultConfigPath(), overwrite = false): string {
  if (existsSync(path) && !overwrite) {
    throw new ConfigError(`Config file already exists: ${path}`, { path });
  }
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n');
  return path;
}

/** Fields left undefined in `top` keep the value from `base`. */
function mergeConfig(base: Partial<EngineConfig>, top: Partial<EngineConfig>): Partial<EngineConfig> {
  return {
    ...base,
    ...(top.chunkSize !== undefined && { chunkSize: top.chunkSize }),
    ...(top.compressionLevel !== undefined && { compressionLevel: top.compressionLevel }),
    ...(top.verifyIntegrity !== undefined && { verifyIntegrity: top.verifyIntegrity }),
    ...(top.threads !== undefined && { threads: top.threads }),
    ...(top.parallelJobs !== undefined && { parallelJobs: top.parallelJobs }),
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
