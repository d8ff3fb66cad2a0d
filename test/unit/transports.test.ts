/**
 * Unit Tests for the vendor transports
 *
 * fetch is stubbed in process; no request leaves the test.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { HttpError, MalformedResponseError, classifyFailure } from '@netlens/fallback';
import { DEFAULT_CONFIG } from '@netlens/core';
import { GeminiProvider, OpenAIProvider, createProvider } from '../../src/models/index.js';

const OPTIONS = { maxOutputTokens: 220, temperature: 0.35 };

function stubFetch(status: number, body: unknown) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
    new Response(typeof body === 'string' ? body : JSON.stringify(body), { status }),
  );
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function sentJson(fetchMock: ReturnType<typeof stubFetch>): unknown {
  const init = fetchMock.mock.calls[0]?.[1];
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('GeminiProvider', () => {
  it('posts a generateContent request and joins the first candidate parts', async () => {
    const fetchMock = stubFetch(200, {
      candidates: [
        { content: { parts: [{ text: 'Hello ' }, { text: 'there.' }] } },
        { content: { parts: [{ text: 'ignored' }] } },
      ],
    });
    const provider = new GeminiProvider('gemini-test', 'test-secret', 'http://gemini.local/');

    expect(await provider.generate('the prompt', OPTIONS)).toBe('Hello there.');

    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://gemini.local/v1beta/models/gemini-test:generateContent');
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
      'Content-Type': 'application/json',
      'x-goog-api-key': 'test-secret',
    });
    expect(sentJson(fetchMock)).toEqual({
      contents: [{ parts: [{ text: 'the prompt' }] }],
      generationConfig: { temperature: 0.35, maxOutputTokens: 220 },
    });
  });

  it('an empty candidate list is malformed', async () => {
    stubFetch(200, { candidates: [] });
    const provider = new GeminiProvider('gemini-test', 'test-secret');

    await expect(provider.generate('p', OPTIONS)).rejects.toThrow(MalformedResponseError);
  });

  it('a body of the wrong shape is malformed', async () => {
    stubFetch(200, { candidates: 'nope' });
    const provider = new GeminiProvider('gemini-test', 'test-secret');

    await expect(provider.generate('p', OPTIONS)).rejects.toThrow(
      'Gemini response does not match generateContent shape',
    );
  });

  it('a non-JSON body is malformed', async () => {
    stubFetch(200, '<html>');
    const provider = new GeminiProvider('gemini-test', 'test-secret');

    await expect(provider.generate('p', OPTIONS)).rejects.toThrow('Gemini returned a body that is not JSON');
  });

  it('a non-2xx status becomes an HttpError carrying the status', async () => {
    stubFetch(503, 'overloaded');
    const provider = new GeminiProvider('gemini-test', 'test-secret');

    const err = await provider.generate('p', OPTIONS).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpError);
    expect(classifyFailure(err)).toBe('server');
    if (err instanceof HttpError) {
      expect(err.statusCode).toBe(503);
      expect(err.message).toBe('Gemini HTTP 503: overloaded');
    }
  });

  it('reports configuration from the key', () => {
    expect(new GeminiProvider('m', 'test-secret').isConfigured()).toBe(true);
    expect(new GeminiProvider('m', '').isConfigured()).toBe(false);
    expect(new GeminiProvider('m').isConfigured()).toBe(false);
  });
});

describe('OpenAIProvider', () => {
  it('posts a chat completion and returns the first choice', async () => {
    const fetchMock = stubFetch(200, { choices: [{ message: { content: '  Use dig.  ' } }] });
    const provider = new OpenAIProvider('gpt-test', 'test-secret');

    expect(await provider.generate('the prompt', OPTIONS)).toBe('Use dig.');

    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.openai.com/v1/chat/completions');
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(sentJson(fetchMock)).toEqual({
      model: 'gpt-test',
      messages: [{ role: 'user', content: 'the prompt' }],
      max_tokens: 220,
      temperature: 0.35,
    });
  });

  it('a null completion is malformed', async () => {
    stubFetch(200, { choices: [{ message: { content: null } }] });
    const provider = new OpenAIProvider('gpt-test', 'test-secret');

    await expect(provider.generate('p', OPTIONS)).rejects.toThrow('OpenAI returned an empty completion');
  });

  it('a 4xx status is a client failure', async () => {
    stubFetch(429, '{"error":"rate limited"}');
    const provider = new OpenAIProvider('gpt-test', 'test-secret');

    const err = await provider.generate('p', OPTIONS).catch((e: unknown) => e);
    expect(classifyFailure(err)).toBe('client');
  });
});

describe('createProvider', () => {
  it('picks the transport by kind', () => {
    const [gemini, openai] = DEFAULT_CONFIG.providers;
    if (!gemini || !openai) throw new Error('default config has two providers');

    const first = createProvider({ ...gemini, apiKey: 'test-secret' });
    const second = createProvider(openai);

    expect(first).toBeInstanceOf(GeminiProvider);
    expect(first.model).toBe('gemini-2.5-flash');
    expect(first.isConfigured()).toBe(true);
    expect(second).toBeInstanceOf(OpenAIProvider);
    expect(second.isConfigured()).toBe(false);
  });
});
