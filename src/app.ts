/**
 * NetLens - Application wiring
 *
 * Builds every long-lived component from a validated config without
 * opening any socket, so the same graph serves the entry point and tests.
 */

import { activeProviders, type Logger, type NetlensConfig } from '@netlens/core';
import { HealthReporter } from '@netlens/fallback';
import { DashboardAssistant, ResponseCache } from '@netlens/assistant';
import { ProviderClient, type ProviderClientOptions } from './models/index.js';
import { ConversationHistory } from './gateway/history.js';
import { AssistantRoutes } from './gateway/routes.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AppDependencies {
  /** Per-client overrides keyed by provider id (fake transports in tests). */
  clientOverrides?: Record<string, Partial<Pick<ProviderClientOptions, 'provider' | 'now' | 'sleep'>>>;
  now?: () => number;
}

export interface App {
  clients: ProviderClient[];
  cache: ResponseCache;
  assistant: DashboardAssistant;
  health: HealthReporter;
  history: ConversationHistory;
  routes: AssistantRoutes;
}

// ---------------------------------------------------------------------------
// createApp
// ---------------------------------------------------------------------------

export function createApp(config: NetlensConfig, logger: Logger, deps: AppDependencies = {}): App {
  const clients = activeProviders(config).map((provider) =>
    ProviderClient.fromConfig(provider, {
      now: deps.now,
      logger: logger.child({ component: 'provider', provider: provider.id }),
      ...deps.clientOverrides?.[provider.id],
    }),
  );

  const cache = new ResponseCache({
    ttlMs: config.cache.ttlSeconds * 1000,
    maxEntries: config.cache.maxEntries,
    now: deps.now,
  });

  const assistant = new DashboardAssistant({
    cache,
    clients,
    logger: logger.child({ component: 'assistant' }),
  });

  const health = new HealthReporter(clients.map((client) => client.breaker));
  const history = new ConversationHistory({ limit: config.gateway.historyLimit });
  const routes = new AssistantRoutes({
    assistant,
    history,
    health,
    cache,
    logger: logger.child({ component: 'routes' }),
  });

  return { clients, cache, assistant, health, history, routes };
}
