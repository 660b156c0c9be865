import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import type { LogLevel } from '@taskfit/core';
import { createLogger, isLogLevel } from '@taskfit/core';
import type { ForestParams } from './model/random-forest.js';
import { DEFAULT_FOREST_PARAMS, ForestParamsSchema } from './model/random-forest.js';

const log = createLogger('Config');

export const CONFIG_FILE_NAME = 'taskfit.config.json';

export interface TaskfitConfig {
  /** Where users/tasks/results/progress/model JSON files live */
  dataDir: string;
  logLevel: LogLevel;
  forest: ForestParams;
}

const FileConfigSchema = z
  .object({
    dataDir: z.string().min(1),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
    forest: ForestParamsSchema.partial(),
  })
  .partial();

type FileConfig = z.infer<typeof FileConfigSchema>;

export interface LoadConfigOptions {
  cwd?: string;
  env?: Record<string, string | undefined>;
}

function readConfigFile(path: string): FileConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    log.warn(`Failed to parse ${path}, using defaults`, err);
    return {};
  }
  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn(`Ignoring invalid config in ${path}`, parsed.error.issues.map((i) => i.message));
    return {};
  }
  log.info(`Loaded config from ${path}`);
  return parsed.data;
}

function envOverrides(env: Record<string, string | undefined>): FileConfig {
  const overrides: FileConfig = {};
  if (env.TASKFIT_DATA_DIR) {
    overrides.dataDir = env.TASKFIT_DATA_DIR;
  }
  if (env.TASKFIT_LOG_LEVEL) {
    if (isLogLevel(env.TASKFIT_LOG_LEVEL)) {
      overrides.logLevel = env.TASKFIT_LOG_LEVEL;
    } else {
      log.warn(`Unknown TASKFIT_LOG_LEVEL "${env.TASKFIT_LOG_LEVEL}", ignoring`);
    }
  }
  if (env.TASKFIT_SEED) {
    const seed = Number(env.TASKFIT_SEED);
    if (Number.isInteger(seed)) {
      overrides.forest = { seed };
    } else {
      log.warn(`TASKFIT_SEED must be an integer, got "${env.TASKFIT_SEED}"`);
    }
  }
  return overrides;
}

/**
 * Priority: environment > config file (TASKFIT_CONFIG or ./taskfit.config.json)
 * > defaults. `forest` is merged key by key so partial overrides keep defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): TaskfitConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const configPath = env.TASKFIT_CONFIG ?? join(cwd, CONFIG_FILE_NAME);
  let fileConfig: FileConfig = {};
  if (existsSync(configPath)) {
    fileConfig = readConfigFile(configPath);
  } else {
    log.debug('No config file found, using defaults');
  }

  const overrides = envOverrides(env);
  const config: TaskfitConfig = {
    dataDir: resolve(cwd, overrides.dataDir ?? fileConfig.dataDir ?? 'data'),
    logLevel: overrides.logLevel ?? fileConfig.logLevel ?? 'info',
    forest: { ...DEFAULT_FOREST_PARAMS, ...fileConfig.forest, ...overrides.forest },
  };

  log.debug(`Config resolved: dataDir=${config.dataDir}, trees=${config.forest.trees}, seed=${config.forest.seed}`);
  return config;
}
