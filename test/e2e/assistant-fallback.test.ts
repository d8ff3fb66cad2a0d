/**
 * E2E Tests for the Dashboard Assistant
 *
 * Drives DashboardAssistant through real ProviderClients over in-process
 * fake transports: healthy primary, failover, local guidance, the
 * unavailable notice, circuit skipping, caching, the documented scenarios
 * and cancellation.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { HttpError, MalformedResponseError } from '@netlens/fallback';
import {
  DEFAULT_ACTIONS,
  DashboardAssistant,
  INTRO_QUESTION,
  ResponseCache,
  UNAVAILABLE_MESSAGE,
} from '@netlens/assistant';
import type { CompletionClient, CompletionOutcome } from '@netlens/assistant';
import { ProviderClient } from '../../src/models/index.js';
import type { GenerateOptions, ModelProvider, ProviderClientOptions } from '../../src/models/index.js';

vi.mock('pino', () => {
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn(), fatal: vi.fn() };
  return { pino: () => logger, default: () => logger };
});

type Generate = (prompt: string, options: GenerateOptions) => Promise<string>;

const SUPPORTED = ['dns_records', 'domain', 'ip_geolocation', 'port_scan', 'speed', 'whois'];
const PORT_QUESTION = 'Which port is open on example.com?';
const OFF_TOPIC = 'How should I structure a good team meeting?';

const answers = (text: string): Generate => async () => text;
const fails = (status: number): Generate => async () => {
  throw new HttpError(`HTTP ${status}`, status);
};
const never: Generate = () => new Promise<string>(() => undefined);

function fakeProvider(generate: Generate) {
  return {
    name: 'fake',
    model: 'fake-model',
    isConfigured: () => true,
    generate: vi.fn(generate),
  } satisfies ModelProvider;
}

describe('DashboardAssistant', () => {
  let clock: number;
  let cache: ResponseCache;

  beforeEach(() => {
    clock = 0;
    cache = new ResponseCache({ ttlMs: 600_000, maxEntries: 50, now: () => clock });
  });

  function client(
    name: string,
    provider: ModelProvider,
    overrides: Partial<ProviderClientOptions> = {},
  ): ProviderClient {
    return new ProviderClient({
      name,
      provider,
      maxRetries: 1,
      backoffMs: 0,
      timeoutMs: 5_000,
      maxOutputTokens: 220,
      temperature: 0.35,
      failureThreshold: 3,
      cooldownMs: 60_000,
      now: () => clock,
      sleep: async () => undefined,
      ...overrides,
    });
  }

  function assistantWith(...clients: CompletionClient[]): DashboardAssistant {
    return new DashboardAssistant({ cache, clients });
  }

  // ---------------------------------------------------------------------------
  // Healthy primary
  // ---------------------------------------------------------------------------
  describe('Healthy primary', () => {
    it('answers from the primary with the resolved tool', async () => {
      const primary = fakeProvider(answers('Port 443 is open.'));
      const secondary = fakeProvider(answers('unused'));
      const assistant = assistantWith(client('primary', primary), client('secondary', secondary));

      const answer = await assistant.answer(PORT_QUESTION);

      expect(answer.answer).toBe('Port 443 is open.');
      expect(answer.tool).toBe('port_scan');
      expect(answer.confidence).toBe('92%');
      expect(answer.provider).toBe('primary');
      expect(answer.example).toBe('/api/port_scan (POST with JSON payload: {"host":"example.com", "port":443})');
      expect(secondary.generate).not.toHaveBeenCalled();
    });

    it('serves a repeated question from the cache without calling a provider', async () => {
      const primary = fakeProvider(answers('Port 443 is open.'));
      const assistant = assistantWith(client('primary', primary));

      await assistant.answer(PORT_QUESTION);
      const repeat = await assistant.answer('  which PORT is open   on example.com? ');

      expect(repeat.answer).toBe('Port 443 is open.');
      expect(repeat.provider).toBe('cache');
      expect(repeat.tool).toBe('port_scan');
      expect(primary.generate).toHaveBeenCalledTimes(1);
    });

    it('an expired cache entry is fetched again', async () => {
      const primary = fakeProvider(answers('fresh'));
      const assistant = assistantWith(client('primary', primary));

      await assistant.answer(PORT_QUESTION);
      clock = 600_001;
      const later = await assistant.answer(PORT_QUESTION);

      expect(later.provider).toBe('primary');
      expect(primary.generate).toHaveBeenCalledTimes(2);
    });

    it('tries the next prompt strategy when the first yields nothing usable', async () => {
      let calls = 0;
      const primary = fakeProvider(async () => {
        calls += 1;
        if (calls === 1) throw new MalformedResponseError('no candidates');
        return 'Second try.';
      });
      const assistant = assistantWith(client('primary', primary));

      const answer = await assistant.answer(PORT_QUESTION);

      expect(answer.answer).toBe('Second try.');
      expect(primary.generate).toHaveBeenCalledTimes(2);
      const [firstPrompt] = primary.generate.mock.calls[0] ?? [];
      const [secondPrompt] = primary.generate.mock.calls[1] ?? [];
      expect(firstPrompt).toContain('Selected tool: port_scan');
      expect(secondPrompt).not.toContain('Selected tool:');
    });
  });

  // ---------------------------------------------------------------------------
  // Failover
  // ---------------------------------------------------------------------------
  describe('Failover', () => {
    it('falls back to the secondary when the primary keeps failing', async () => {
      const primary = fakeProvider(fails(500));
      const secondary = fakeProvider(answers('From the backup.'));
      const primaryClient = client('primary', primary);
      const assistant = assistantWith(primaryClient, client('secondary', secondary));

      const answer = await assistant.answer(PORT_QUESTION);

      expect(answer.answer).toBe('From the backup.');
      expect(answer.provider).toBe('secondary');
      // Three strategies, one attempt each, opened the primary circuit
      expect(primary.generate).toHaveBeenCalledTimes(3);
      expect(primaryClient.breaker.state).toBe('open');
    });

    it('skips a provider whose circuit is open', async () => {
      const primary = fakeProvider(fails(503));
      const secondary = fakeProvider(answers('Backup answer.'));
      const assistant = assistantWith(client('primary', primary), client('secondary', secondary));

      await assistant.answer(PORT_QUESTION);
      const second = await assistant.answer('What does an MX record do?');

      expect(second.provider).toBe('secondary');
      expect(second.tool).toBe('dns_records');
      expect(primary.generate).toHaveBeenCalledTimes(3);
    });

    it('uses local guidance when every provider fails and a tool is known', async () => {
      const assistant = assistantWith(client('primary', fakeProvider(fails(500))), client('secondary', fakeProvider(fails(502))));

      const answer = await assistant.answer(PORT_QUESTION);

      expect(answer.provider).toBe('deterministic');
      expect(answer.tool).toBe('port_scan');
      expect(answer.confidence).toBe('70%');
      expect(answer.answer).toBe(
        'Port Scan helps with checks whether a tcp port is open on the host. ' +
          'Ask for more details or use /api/port_scan (POST with JSON payload: {"host":"example.com", "port":443}).',
      );
      expect(cache.size).toBe(0);
    });

    it('returns the unavailable notice when every provider fails and no tool applies', async () => {
      const assistant = assistantWith(client('primary', fakeProvider(fails(500))), client('secondary', fakeProvider(fails(500))));

      const answer = await assistant.answer(OFF_TOPIC);

      expect(answer).toEqual({
        answer: UNAVAILABLE_MESSAGE,
        tool: null,
        tips: [],
        example: null,
        suggestedActions: [...DEFAULT_ACTIONS],
        confidence: '0%',
        context: null,
        provider: 'deterministic',
        availableTools: SUPPORTED,
      });
    });

    it('works with no providers configured', async () => {
      const assistant = assistantWith();

      expect((await assistant.answer(PORT_QUESTION)).provider).toBe('deterministic');
      expect((await assistant.answer(OFF_TOPIC)).answer).toBe(UNAVAILABLE_MESSAGE);
      expect(assistant.providerCount).toBe(0);
    });
  });

  // ---------------------------------------------------------------------------
  // Documented scenarios
  // ---------------------------------------------------------------------------
  describe('Scenarios', () => {
    it('a port_scan hint with no providers returns the port scan guidance', async () => {
      const answer = await assistantWith().answer('how do I use this', 'port_scan');

      expect(answer).toEqual({
        answer:
          'Port Scan helps with checks whether a tcp port is open on the host. ' +
          'Ask for more details or use /api/port_scan (POST with JSON payload: {"host":"example.com", "port":443}).',
        tool: 'port_scan',
        tips: [
          'Default port is 80; specify another port via the `port` field.',
          'Use this tool before running intrusive scans; it keeps the timeout short.',
        ],
        example: '/api/port_scan (POST with JSON payload: {"host":"example.com", "port":443})',
        suggestedActions: [
          'Call `/api/tool-guidance?tool=port_scan` for step-by-step usage.',
          '/api/port_scan (POST with JSON payload: {"host":"example.com", "port":443})',
        ],
        confidence: '70%',
        context: null,
        provider: 'deterministic',
      });
    });

    it('whois with every provider returning 503 exhausts retries on each and falls back to WHOIS guidance', async () => {
      const primary = fakeProvider(fails(503));
      const secondary = fakeProvider(fails(503));
      const primaryClient = client('primary', primary, { maxRetries: 3, failureThreshold: 5 });
      const secondaryClient = client('secondary', secondary, { maxRetries: 3, failureThreshold: 5 });
      const assistant = assistantWith(primaryClient, secondaryClient);

      const answer = await assistant.answer('what is whois');

      expect(answer.provider).toBe('deterministic');
      expect(answer.tool).toBe('whois');
      expect(answer.confidence).toBe('80%');
      expect(answer.answer).toBe(
        'WHOIS Lookup helps with retrieves registration metadata, registrar, and key dates for a domain. ' +
          'Ask for more details or use /api/whois (POST with JSON payload: {"host":"example.com"}).',
      );
      // Three retries on the tool prompt, then two on the general prompt open the circuit
      expect(primary.generate).toHaveBeenCalledTimes(5);
      expect(secondary.generate).toHaveBeenCalledTimes(5);
      expect(primaryClient.breaker.snapshot()).toMatchObject({ state: 'open', consecutiveFailures: 5 });
      expect(secondaryClient.breaker.snapshot()).toMatchObject({ state: 'open', consecutiveFailures: 5 });
    });

    it('a question that matches no tool sends the general prompt and gets no tool tips', async () => {
      const primary = fakeProvider(answers('Keep an agenda and a timebox.'));
      const assistant = assistantWith(client('primary', primary));

      const answer = await assistant.answer(OFF_TOPIC);

      const [prompt] = primary.generate.mock.calls[0] ?? [];
      expect(prompt).not.toContain('Selected tool:');
      expect(prompt).toContain(`User question: ${OFF_TOPIC}`);
      expect(answer).toEqual({
        answer: 'Keep an agenda and a timebox.',
        tool: null,
        tips: [],
        example: null,
        suggestedActions: [...DEFAULT_ACTIONS],
        confidence: '90%',
        context: null,
        provider: 'primary',
      });
    });

    it('concurrent questions after the cooldown send exactly one probe to the provider', async () => {
      let calls = 0;
      let release: (text: string) => void = () => undefined;
      const primary = fakeProvider(() => {
        calls += 1;
        if (calls === 1) return Promise.reject(new HttpError('HTTP 503', 503));
        return new Promise<string>((resolve) => {
          release = resolve;
        });
      });
      const primaryClient = client('primary', primary, { failureThreshold: 1 });
      const assistant = assistantWith(primaryClient);

      expect((await assistant.answer(PORT_QUESTION)).provider).toBe('deterministic');
      expect(primaryClient.breaker.state).toBe('open');

      clock = 60_000;
      const both = Promise.all([assistant.answer(PORT_QUESTION), assistant.answer(PORT_QUESTION)]);
      await vi.waitFor(() => expect(primary.generate).toHaveBeenCalledTimes(2));
      release('Recovered.');
      const results = await both;

      expect(results.map((a) => a.provider).sort()).toEqual(['deterministic', 'primary']);
      expect(primary.generate).toHaveBeenCalledTimes(2);
      expect(primaryClient.breaker.state).toBe('closed');
    });
  });

  // ---------------------------------------------------------------------------
  // Tool resolution and context
  // ---------------------------------------------------------------------------
  describe('Context', () => {
    it('falls back to the prior turn tool when the question names none', async () => {
      const primary = fakeProvider(answers('It means the port accepts connections.'));
      const assistant = assistantWith(client('primary', primary));
      const context = { tool: 'port_scan', target: 'example.com', summary: '443 open' };

      const answer = await assistant.answer('what does this mean?', null, context);

      expect(answer.tool).toBe('port_scan');
      expect(answer.context).toEqual(context);
      const [prompt] = primary.generate.mock.calls[0] ?? [];
      expect(prompt).toContain('Recent context: Latest port scan on example.com (443 open)');
    });

    it('an unknown context tool is ignored', async () => {
      const assistant = assistantWith(client('primary', fakeProvider(answers('General answer.'))));

      const answer = await assistant.answer('what does this mean?', undefined, { tool: 'traceroute' });

      expect(answer.tool).toBeNull();
      expect(answer.confidence).toBe('90%');
    });

    it('the same question under a different context is not served from cache', async () => {
      const primary = fakeProvider(answers('Contextual.'));
      const assistant = assistantWith(client('primary', primary));

      await assistant.answer(PORT_QUESTION, null, { target: 'example.com' });
      const other = await assistant.answer(PORT_QUESTION, null, { target: 'example.org' });

      expect(other.provider).toBe('primary');
      expect(primary.generate).toHaveBeenCalledTimes(2);
    });
  });

  // ---------------------------------------------------------------------------
  // Empty question
  // ---------------------------------------------------------------------------
  describe('Empty question', () => {
    it('asks the provider for an introduction', async () => {
      const primary = fakeProvider(answers('I can help with networking.'));
      const assistant = assistantWith(client('primary', primary));

      const answer = await assistant.answer('   ');

      expect(answer.answer).toBe('I can help with networking.');
      expect(answer.tool).toBeNull();
      expect(answer.suggestedActions).toEqual([...DEFAULT_ACTIONS]);
      const [prompt] = primary.generate.mock.calls[0] ?? [];
      expect(prompt).toContain(`User question: ${INTRO_QUESTION}`);
      expect(cache.size).toBe(0);
    });

    it('returns the unavailable notice without providers', async () => {
      expect((await assistantWith().answer('')).answer).toBe(UNAVAILABLE_MESSAGE);
    });
  });

  // ---------------------------------------------------------------------------
  // Cancellation
  // ---------------------------------------------------------------------------
  describe('Cancellation', () => {
    it('a request cancelled mid-call gets a local answer, caches nothing and skips the secondary', async () => {
      const controller = new AbortController();
      const primary = fakeProvider((prompt, options) => {
        controller.abort();
        return never(prompt, options);
      });
      const secondary = fakeProvider(answers('unused'));
      const primaryClient = client('primary', primary);
      const assistant = assistantWith(primaryClient, client('secondary', secondary));

      const answer = await assistant.answer(PORT_QUESTION, null, null, controller.signal);

      expect(answer.provider).toBe('deterministic');
      expect(primary.generate).toHaveBeenCalledTimes(1);
      expect(secondary.generate).not.toHaveBeenCalled();
      expect(primaryClient.breaker.snapshot().consecutiveFailures).toBe(0);
      expect(cache.size).toBe(0);
    });

    it('a request cancelled before it starts calls nothing', async () => {
      const controller = new AbortController();
      controller.abort();
      const primary = fakeProvider(answers('unused'));
      const assistant = assistantWith(client('primary', primary));

      const answer = await assistant.answer(OFF_TOPIC, null, null, controller.signal);

      expect(answer.answer).toBe(UNAVAILABLE_MESSAGE);
      expect(primary.generate).not.toHaveBeenCalled();
    });

    it('an answer that completed before cancellation is still cached', async () => {
      const controller = new AbortController();
      const lateCancel: CompletionClient = {
        name: 'primary',
        isAvailable: () => true,
        complete: async (): Promise<CompletionOutcome> => {
          controller.abort();
          return { ok: true, text: 'Finished just in time.' };
        },
      };
      const assistant = assistantWith(lateCancel);

      const answer = await assistant.answer(PORT_QUESTION, null, null, controller.signal);

      expect(answer.answer).toBe('Finished just in time.');
      expect(cache.size).toBe(1);
    });
  });
});
