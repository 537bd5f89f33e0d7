/**
 * Configuration loader for bioscout.
 *
 * Loads config from an optional YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 * - Deep freezing of the result
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { BioscoutConfig, ResolvedConfig, ResultType } from './types.js';
import { DEFAULT_CONFIG, RESULT_TYPES } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.BIOSCOUT_CONFIG or './bioscout.config.yaml') */
  configPath?: string;
}

/**
 * A config file where every section, and every key within it, may be omitted.
 */
export type PartialConfig = {
  [K in keyof BioscoutConfig]?: BioscoutConfig[K] extends object ? Partial<BioscoutConfig[K]> : BioscoutConfig[K];
};

export const DEFAULT_CONFIG_PATH = './bioscout.config.yaml';

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
function substituteEnvVars(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVarsRecursive);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects (source overrides target). Arrays are replaced, not merged.
 */
function deepMerge<T extends object>(target: T, source: Partial<T>): T {
  const result = { ...target };

  for (const key of Object.keys(source) as (keyof T)[]) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (
      sourceValue !== undefined &&
      sourceValue !== null &&
      typeof sourceValue === 'object' &&
      !Array.isArray(sourceValue) &&
      targetValue !== undefined &&
      targetValue !== null &&
      typeof targetValue === 'object' &&
      !Array.isArray(targetValue)
    ) {
      result[key] = deepMerge(targetValue, sourceValue as Partial<typeof targetValue>);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue as T[keyof T];
    }
  }

  return result;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function requireSection(config: unknown, path: string): Record<string, unknown> {
  if (!isRecord(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }
  return config;
}

function validateUrl(value: unknown, path: string): void {
  if (typeof value !== 'string' || !/^https?:\/\//.test(value)) {
    throw new ConfigValidationError('must be an http(s) URL', path, value);
  }
  try {
    new URL(value);
  } catch {
    throw new ConfigValidationError('must be an http(s) URL', path, value);
  }
}

function validateHttpConfig(config: unknown, path = 'http'): void {
  const c = requireSection(config, path);

  if (c.timeoutMs !== undefined && (typeof c.timeoutMs !== 'number' || !(c.timeoutMs > 0))) {
    throw new ConfigValidationError('timeoutMs must be a positive number', `${path}.timeoutMs`, c.timeoutMs);
  }

  if (c.userAgent !== undefined && (typeof c.userAgent !== 'string' || c.userAgent.length === 0)) {
    throw new ConfigValidationError('userAgent must be a non-empty string', `${path}.userAgent`, c.userAgent);
  }
}

function validateEndpointConfig(config: unknown, path: string, key: string): void {
  const c = requireSection(config, path);
  if (c[key] !== undefined) {
    validateUrl(c[key], `${path}.${key}`);
  }
}

function isResultType(value: string): value is ResultType {
  return (RESULT_TYPES as readonly string[]).includes(value);
}

/**
 * Validate archive configuration, including per-type default field overrides.
 */
function validateArchiveConfig(config: unknown, path = 'archive'): void {
  validateEndpointConfig(config, path, 'baseUrl');
  const c = requireSection(config, path);

  if (c.defaultFields === undefined) {
    return;
  }
  const defaults = requireSection(c.defaultFields, `${path}.defaultFields`);
  for (const [resultType, fields] of Object.entries(defaults)) {
    const fieldPath = `${path}.defaultFields.${resultType}`;
    if (!isResultType(resultType)) {
      throw new ConfigValidationError(`unknown result type (expected one of: ${RESULT_TYPES.join(', ')})`, fieldPath, resultType);
    }
    if (!Array.isArray(fields) || fields.length === 0 || !fields.every((f) => typeof f === 'string' && f.length > 0)) {
      throw new ConfigValidationError('must be a non-empty list of field names', fieldPath, fields);
    }
  }
}

function validateRetryConfig(config: unknown, path = 'retry'): void {
  const c = requireSection(config, path);

  if (c.maxAttempts !== undefined && (typeof c.maxAttempts !== 'number' || !Number.isInteger(c.maxAttempts) || c.maxAttempts < 1)) {
    throw new ConfigValidationError('maxAttempts must be an integer >= 1', `${path}.maxAttempts`, c.maxAttempts);
  }
  for (const key of ['baseDelayMs', 'maxDelayMs']) {
    const value = c[key];
    if (value !== undefined && (typeof value !== 'number' || value < 0)) {
      throw new ConfigValidationError(`${key} must be a number >= 0`, `${path}.${key}`, value);
    }
  }
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): asserts config is PartialConfig {
  const c = requireSection(config, '');

  if (c.logLevel !== undefined && !['debug', 'info', 'warn', 'error'].includes(String(c.logLevel))) {
    throw new ConfigValidationError('logLevel must be one of: debug, info, warn, error', 'logLevel', c.logLevel);
  }

  if (c.http !== undefined) {
    validateHttpConfig(c.http);
  }
  if (c.taxonomy !== undefined) {
    validateEndpointConfig(c.taxonomy, 'taxonomy', 'baseUrl');
  }
  if (c.archive !== undefined) {
    validateArchiveConfig(c.archive);
  }
  if (c.workflows !== undefined) {
    validateEndpointConfig(c.workflows, 'workflows', 'manifestUrl');
  }
  if (c.retry !== undefined) {
    validateRetryConfig(c.retry);
  }
}

/**
 * Merge a partial config over the defaults and freeze the result.
 */
export function resolveConfig(partial: PartialConfig = {}): ResolvedConfig {
  const config: BioscoutConfig = {
    logLevel: partial.logLevel ?? DEFAULT_CONFIG.logLevel,
    http: deepMerge(DEFAULT_CONFIG.http, partial.http ?? {}),
    taxonomy: deepMerge(DEFAULT_CONFIG.taxonomy, partial.taxonomy ?? {}),
    archive: deepMerge(
      { ...DEFAULT_CONFIG.archive, defaultFields: { ...DEFAULT_CONFIG.archive.defaultFields } },
      partial.archive ?? {}
    ),
    workflows: deepMerge(DEFAULT_CONFIG.workflows, partial.workflows ?? {}),
    retry: deepMerge(DEFAULT_CONFIG.retry, partial.retry ?? {}),
  };
  return deepFreeze(config);
}

/**
 * Load configuration from a YAML file.
 *
 * A missing file at the default location yields the defaults; a missing file
 * that was asked for explicitly is an error.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ResolvedConfig> {
  const requestedPath = options.configPath ?? process.env.BIOSCOUT_CONFIG;
  const absolutePath = resolve(requestedPath ?? DEFAULT_CONFIG_PATH);

  if (!existsSync(absolutePath)) {
    if (requestedPath !== undefined) {
      throw new Error(`Config file not found at ${absolutePath}`);
    }
    return resolveConfig();
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty file parses to null
  const substituted = substituteEnvVarsRecursive(parsed ?? {});

  validateConfig(substituted);
  return resolveConfig(substituted);
}
