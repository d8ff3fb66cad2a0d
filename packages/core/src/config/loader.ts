/**
 * @netlens/core - Configuration loader
 *
 * Reads the optional JSON file named by NETLENS_CONFIG, merges it over the
 * defaults, applies environment overrides and validates the result. The
 * configuration is read once at startup; an unusable one throws.
 */

import { readFileSync, existsSync } from 'node:fs';
import { Value } from '@sinclair/typebox/value';
import { NetlensConfigSchema, DEFAULT_CONFIG, type NetlensConfig, type ProviderKind, type LogLevel } from './schema.js';
import { validateConfig, ConfigError, type ValidationResult } from './validator.js';
import { isPlainObject } from '../utils/index.js';

export interface LoadConfigOptions {
  /** Environment to read overrides from. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /** Explicit config file path. Defaults to env.NETLENS_CONFIG. */
  configPath?: string;
}

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Deep-merge two objects.  Arrays are replaced (not concatenated).
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, overVal] of Object.entries(override)) {
    const baseVal = result[key];

    if (isPlainObject(overVal) && isPlainObject(baseVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else if (overVal !== undefined) {
      result[key] = overVal;
    }
  }

  return result;
}

function readConfigFile(path: string): Record<string, unknown> {
  const text = readFileSync(path, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`${path} must contain a JSON object`);
  }
  return parsed;
}

function parseNumber(name: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigError(`Environment variable ${name} must be a number (got "${raw}")`);
  }
  return value;
}

/**
 * Apply environment overrides on top of a validated config. Returns a new
 * object; the input is left untouched.
 */
export function applyEnvOverrides(config: NetlensConfig, env: NodeJS.ProcessEnv): NetlensConfig {
  const next = Value.Clone(config);

  const keyed: Array<[ProviderKind, string, string]> = [
    ['gemini', 'GEMINI_API_KEY', 'GEMINI_MODEL'],
    ['openai', 'OPENAI_API_KEY', 'OPENAI_MODEL'],
  ];
  for (const [kind, keyVar, modelVar] of keyed) {
    const provider = next.providers.find((p) => p.kind === kind);
    if (!provider) continue;
    const apiKey = env[keyVar];
    const model = env[modelVar];
    if (apiKey) provider.apiKey = apiKey;
    if (model) provider.model = model;
  }

  const disabled = (env['NETLENS_DISABLE_PROVIDERS'] ?? '')
    .split(',')
    .map((id) => id.trim())
    .filter(Boolean);
  for (const provider of next.providers) {
    if (disabled.includes(provider.id)) provider.enabled = false;
  }

  const ttl = env['ASSISTANT_CACHE_TTL_SECONDS'];
  if (ttl !== undefined) next.cache.ttlSeconds = parseNumber('ASSISTANT_CACHE_TTL_SECONDS', ttl);

  const maxEntries = env['ASSISTANT_CACHE_MAX_ENTRIES'];
  if (maxEntries !== undefined) {
    next.cache.maxEntries = parseNumber('ASSISTANT_CACHE_MAX_ENTRIES', maxEntries);
  }

  const host = env['HOST'];
  if (host) next.gateway.host = host;

  const port = env['PORT'];
  if (port !== undefined) next.gateway.port = parseNumber('PORT', port);

  const level = env['LOG_LEVEL'];
  if (level !== undefined) {
    const normalized = level.trim().toLowerCase();
    if (!isLogLevel(normalized)) {
      throw new ConfigError(`LOG_LEVEL "${level}" is not a pino level`);
    }
    next.logging.level = normalized;
  }

  return next;
}

function assertValid(validation: ValidationResult, stage: string): NetlensConfig {
  if (!validation.valid || !validation.config) {
    const details = validation.errors.map((e) => `${e.path || '/'}: ${e.message}`).join('; ');
    throw new ConfigError(`Invalid configuration (${stage}): ${details}`, validation.errors);
  }
  return validation.config;
}

/**
 * Load the gateway configuration.
 *
 * 1. Read the file named by NETLENS_CONFIG (optional)
 * 2. Deep-merge with DEFAULT_CONFIG
 * 3. Fill missing fields through TypeBox defaults
 * 4. Apply environment overrides
 * 5. Validate; throw ConfigError when unusable
 */
export function loadConfig(
  options: LoadConfigOptions = {},
): { config: NetlensConfig; validation: ValidationResult } {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env['NETLENS_CONFIG'];

  let fileJson: Record<string, unknown> = {};
  if (configPath) {
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file ${configPath} does not exist`);
    }
    fileJson = readConfigFile(configPath);
  }

  const merged = deepMerge(Value.Clone(DEFAULT_CONFIG), fileJson);
  const withDefaults = Value.Default(NetlensConfigSchema, merged);

  const base = assertValid(validateConfig(withDefaults), configPath ?? 'defaults');
  const validation = validateConfig(applyEnvOverrides(base, env));
  const config = assertValid(validation, 'environment');

  return { config, validation };
}
