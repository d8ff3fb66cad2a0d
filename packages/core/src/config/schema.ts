/**
 * @netlens/core - TypeBox schema for the assistant gateway configuration
 *
 * Sections: providers, cache, gateway, logging
 */

import { Type, type Static } from '@sinclair/typebox';

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

export const ProviderKindSchema = Type.Union([Type.Literal('gemini'), Type.Literal('openai')]);

export const ProviderConfigSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  kind: ProviderKindSchema,
  enabled: Type.Boolean({
    default: true,
    description: 'Set to false to take the provider out of rotation even when a key is present',
  }),
  apiKey: Type.Optional(Type.String()),
  baseUrl: Type.Optional(Type.String()),
  model: Type.String({ minLength: 1 }),
  maxRetries: Type.Integer({ minimum: 1, default: 3 }),
  retryBackoffSeconds: Type.Number({ minimum: 0, default: 1.5 }),
  circuitFailureThreshold: Type.Integer({ minimum: 1, default: 3 }),
  circuitCooldownSeconds: Type.Number({ minimum: 0, default: 60 }),
  timeoutSeconds: Type.Number({ minimum: 0.1, default: 15 }),
  maxOutputTokens: Type.Integer({ minimum: 1, default: 220 }),
  temperature: Type.Number({ minimum: 0, maximum: 2, default: 0.35 }),
});

const CacheSchema = Type.Object({
  ttlSeconds: Type.Number({ minimum: 0, default: 600 }),
  maxEntries: Type.Integer({ default: 200 }),
});

const GatewaySchema = Type.Object({
  host: Type.String({ default: '127.0.0.1' }),
  port: Type.Integer({ minimum: 1, maximum: 65535, default: 8080 }),
  historyLimit: Type.Integer({ minimum: 1, default: 20 }),
});

const LoggingSchema = Type.Object({
  level: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' },
  ),
});

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

export const NetlensConfigSchema = Type.Object({
  $schema: Type.Optional(Type.String()),
  version: Type.Number({ default: 1 }),
  providers: Type.Array(ProviderConfigSchema, { default: [] }),
  cache: CacheSchema,
  gateway: GatewaySchema,
  logging: LoggingSchema,
});

export type ProviderKind = Static<typeof ProviderKindSchema>;
export type ProviderConfig = Static<typeof ProviderConfigSchema>;
export type LogLevel = Static<typeof LoggingSchema>['level'];
export type NetlensConfig = Static<typeof NetlensConfigSchema>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Provider settings shared by both default entries. */
const PROVIDER_DEFAULTS = {
  enabled: true,
  maxRetries: 3,
  retryBackoffSeconds: 1.5,
  circuitFailureThreshold: 3,
  circuitCooldownSeconds: 60,
  timeoutSeconds: 15,
  maxOutputTokens: 220,
  temperature: 0.35,
} as const;

export const DEFAULT_CONFIG: NetlensConfig = {
  version: 1,
  providers: [
    { id: 'primary', kind: 'gemini', model: 'gemini-2.5-flash', ...PROVIDER_DEFAULTS },
    { id: 'secondary', kind: 'openai', model: 'gpt-4o-mini', ...PROVIDER_DEFAULTS },
  ],
  cache: {
    ttlSeconds: 600,
    maxEntries: 200,
  },
  gateway: {
    host: '127.0.0.1',
    port: 8080,
    historyLimit: 20,
  },
  logging: {
    level: 'info',
  },
};
