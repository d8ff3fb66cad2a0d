/**
 * @netlens/core - Configuration validator
 *
 * Validates a NetlensConfig object using TypeBox, then applies the business
 * rules the schema cannot express (unique provider ids, usable cache size).
 */

import { Value } from '@sinclair/typebox/value';
import { NetlensConfigSchema, type NetlensConfig, type ProviderConfig } from './schema.js';

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
  /** Present only when the value matched the schema. */
  config: NetlensConfig | null;
}

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationWarning {
  path: string;
  message: string;
}

/** Thrown at startup when the configuration cannot be used. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly errors: ValidationError[] = [],
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validate a NetlensConfig candidate.
 *
 * 1. TypeBox schema check
 * 2. Cache capacity must be positive
 * 3. Provider ids must be unique
 * 4. Soft warnings for providers that can never be called
 */
export function validateConfig(raw: unknown): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  for (const err of Value.Errors(NetlensConfigSchema, raw)) {
    errors.push({ path: err.path, message: err.message });
  }

  if (!Value.Check(NetlensConfigSchema, raw)) {
    return { valid: false, errors, warnings, config: null };
  }

  const config = raw;

  if (config.cache.maxEntries <= 0) {
    errors.push({
      path: '/cache/maxEntries',
      message: `Cache capacity must be at least 1 (got ${config.cache.maxEntries})`,
    });
  }

  const seen = new Set<string>();
  config.providers.forEach((provider, i) => {
    const prefix = `/providers/${i}`;

    if (seen.has(provider.id)) {
      errors.push({ path: `${prefix}/id`, message: `Duplicate provider id "${provider.id}"` });
    }
    seen.add(provider.id);

    if (provider.enabled && !provider.apiKey) {
      warnings.push({
        path: `${prefix}/apiKey`,
        message: `Provider "${provider.id}" has no API key and will be skipped`,
      });
    }
  });

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config,
  };
}

/**
 * Providers the assistant may actually call: enabled and holding a key,
 * in configured priority order.
 */
export function activeProviders(config: NetlensConfig): ProviderConfig[] {
  return config.providers.filter((p) => p.enabled && typeof p.apiKey === 'string' && p.apiKey.length > 0);
}
