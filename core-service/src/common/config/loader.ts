/**
 * Unified Configuration Management
 *
 * Priority order (lowest to highest):
 * 1. Defaults supplied by the service
 * 2. JSON config file (optional; missing file is not an error)
 * 3. Environment variables (highest priority - overrides everything)
 *
 * Objects are merged deeply; arrays and scalars replace.
 * The merged object is handed to the service's validator, which returns the
 * typed config or a list of errors.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { logger } from '../logger.js';
import { getErrorMessage } from '../errors.js';
import { isValidationFailure, type ValidationFailure } from '../validation/arktype.js';

export interface ConfigLoaderOptions<T> {
  /** Service name (e.g. 'loyalty-service'); also the env var prefix */
  serviceName: string;
  /** Defaults, lowest priority */
  defaults: Record<string, unknown>;
  /** JSON config file path (relative to cwd or absolute) */
  configFile?: string;
  /** Whether to use environment variables (default: true) */
  useEnvVars?: boolean;
  /** Environment to read from (default: process.env) */
  env?: Record<string, string | undefined>;
  /** Turns the merged object into the typed config */
  validate: (config: Record<string, unknown>) => T | ValidationFailure;
}

export class ConfigValidationError extends Error {
  constructor(readonly serviceName: string, readonly errors: string[]) {
    super(`Config validation failed for ${serviceName}: ${errors.join(', ')}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Load configuration from defaults, an optional file and the environment.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   serviceName: 'loyalty-service',
 *   defaults: DEFAULT_CONFIG,
 *   configFile: process.env.LOYALTY_CONFIG_FILE,
 *   validate: validateConfig,
 * });
 * ```
 */
export async function loadConfig<T>(options: ConfigLoaderOptions<T>): Promise<T> {
  const { serviceName, defaults, configFile, useEnvVars = true, env = process.env, validate } = options;

  let merged: Record<string, unknown> = deepMerge({}, defaults);

  if (configFile) {
    const fileConfig = await loadConfigFile(configFile);
    if (fileConfig) {
      merged = deepMerge(merged, fileConfig);
      logger.debug('Loaded config file', { serviceName, configFile });
    }
  }

  if (useEnvVars) {
    const envConfig = loadConfigFromEnv(serviceName, env);
    if (Object.keys(envConfig).length > 0) {
      merged = deepMerge(merged, envConfig);
      logger.debug('Applied environment variable overrides', { serviceName, keys: Object.keys(envConfig) });
    }
  }

  const result = validate(merged);
  if (isValidationFailure(result)) {
    throw new ConfigValidationError(serviceName, result.errors);
  }
  return result;
}

async function loadConfigFile(filePath: string): Promise<Record<string, unknown> | null> {
  const resolvedPath = path.isAbsolute(filePath) ? filePath : path.resolve(process.cwd(), filePath);

  let content: string;
  try {
    content = await readFile(resolvedPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.debug('Config file not found, skipping', { configFile: resolvedPath });
      return null;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(`Invalid JSON in config file ${resolvedPath}: ${getErrorMessage(error)}`);
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file ${resolvedPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Convert env vars to a config object:
 * - LOYALTY_SERVICE_MONGO_URI -> { mongoUri }
 * - LOYALTY_SERVICE_SAFETY__DAILY_CAP -> { safety: { dailyCap } }
 */
export function loadConfigFromEnv(
  serviceName: string,
  env: Record<string, string | undefined>,
): Record<string, unknown> {
  const prefix = serviceName.toUpperCase().replace(/-/g, '_') + '_';
  const config: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(prefix) || value === undefined) continue;

    const configPath = key.slice(prefix.length).split('__').map(snakeToCamel);
    const leaf = configPath.pop();
    if (!leaf) continue;

    let current = config;
    for (const part of configPath) {
      const next = current[part];
      if (isPlainObject(next)) {
        current = next;
      } else {
        const created: Record<string, unknown> = {};
        current[part] = created;
        current = created;
      }
    }
    current[leaf] = parseEnvValue(value);
  }

  return config;
}

function snakeToCamel(part: string): string {
  return part
    .toLowerCase()
    .replace(/_([a-z0-9])/g, (_, char: string) => char.toUpperCase());
}

/**
 * Parse environment variable value (handle booleans, null, numbers, JSON)
 */
export function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value === 'null') return null;

  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d*\.\d+$/.test(value)) return parseFloat(value);

  if ((value.startsWith('{') && value.endsWith('}')) ||
      (value.startsWith('[') && value.endsWith(']'))) {
    try {
      return JSON.parse(value);
    } catch {
      return value;
    }
  }

  return value;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    result[key] = isPlainObject(existing) && isPlainObject(value)
      ? deepMerge(existing, value)
      : isPlainObject(value) ? deepMerge({}, value) : value;
  }
  return result;
}
