/**
 * Unit tests for the Service Adapter Module
 * The HTTP adapter talks to an in-process axios adapter
 */

import { describe, test, expect, jest } from '@jest/globals';
import { AxiosError } from 'axios';
import {
  HttpChatServiceAdapter,
  extractCitationsFromText,
  mapHttpError,
  pollUntilStable,
  runDetectionStrategies,
  type DetectionStrategy,
} from '../../src/service-adapters/index.js';
import { parseSetCookie } from '../../src/service-adapters/http-chat-adapter.js';
import {
  AuthenticationExpiredError,
  CancelledError,
  InputUnavailableError,
  RateLimitedError,
  TimeoutError,
} from '../../src/errors/index.js';
import { silentLogger } from '../../src/observability/index.js';
import { fakeHttp, type FakeHandler } from '../fixtures/fake-http.js';

function strategy<T>(name: string, attempt: () => Promise<T | null>): DetectionStrategy<T> {
  return { name, attempt };
}

describe('Service Adapter Module', () => {
  describe('runDetectionStrategies()', () => {
    test('should return the first strategy that finds an input', async () => {
      const third = jest.fn(async () => 'never');

      const outcome = await runDetectionStrategies([
        strategy('textarea', async () => null),
        strategy('editor', async () => 'editor-node'),
        strategy('fallback', third),
      ]);

      expect(outcome).toEqual({ strategy: 'editor', value: 'editor-node' });
      expect(third).not.toHaveBeenCalled();
    });

    test('should move past strategies that fail to find the input', async () => {
      const outcome = await runDetectionStrategies([
        strategy<string>('textarea', async () => {
          throw new InputUnavailableError('textarea hidden');
        }),
        strategy('editor', async () => 'editor-node'),
      ]);

      expect(outcome.strategy).toBe('editor');
    });

    test('should name every strategy tried when none succeed', async () => {
      const search = runDetectionStrategies([
        strategy<string>('textarea', async () => null),
        strategy<string>('editor', async () => {
          throw new Error('Element not found: [contenteditable]');
        }),
      ]);

      await expect(search).rejects.toThrow(
        'No input entry point found (textarea: not found; editor: Element not found: [contenteditable])'
      );
      await expect(search).rejects.toMatchObject({ strategiesTried: ['textarea', 'editor'] });
    });

    test('should stop on errors that are not about the input surface', async () => {
      const next = jest.fn(async () => 'x');

      await expect(
        runDetectionStrategies([
          strategy<string>('textarea', async () => {
            throw new AuthenticationExpiredError('logged out');
          }),
          strategy('editor', next),
        ])
      ).rejects.toBeInstanceOf(AuthenticationExpiredError);
      expect(next).not.toHaveBeenCalled();
    });

    test('should reject an empty strategy list', async () => {
      await expect(runDetectionStrategies([])).rejects.toThrow('No input detection strategies configured');
    });

    test('should stop when cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        runDetectionStrategies([strategy('textarea', async () => 'x')], { signal: controller.signal })
      ).rejects.toBeInstanceOf(CancelledError);
    });
  });

  describe('pollUntilStable()', () => {
    function scripted(values: Array<string | null>): () => Promise<string | null> {
      let index = 0;
      return async () => {
        const value = values[Math.min(index, values.length - 1)] ?? null;
        index += 1;
        return value;
      };
    }

    test('should wait for growth to stop', async () => {
      const result = await pollUntilStable(scripted([null, 'Hel', 'Hello', 'Hello', 'Hello']), {
        intervalMs: 10,
        stablePolls: 2,
        timeoutMs: 1000,
        sleep: async () => {},
      });

      expect(result).toEqual({ text: 'Hello', polls: 5 });
    });

    test('should not treat repeated empty reads as stable', async () => {
      let clock = 0;
      const polling = pollUntilStable(scripted(['']), {
        intervalMs: 100,
        stablePolls: 2,
        timeoutMs: 300,
        now: () => clock,
        sleep: async (ms) => {
          clock += ms;
        },
      });

      await expect(polling).rejects.toBeInstanceOf(TimeoutError);
      await expect(polling).rejects.toThrow('Response not stable after 300ms (4 polls)');
    });

    test('should check cancellation at each poll boundary', async () => {
      const controller = new AbortController();
      const read = jest.fn(async () => {
        controller.abort();
        return 'partial';
      });

      await expect(
        pollUntilStable(read, {
          intervalMs: 10,
          stablePolls: 3,
          timeoutMs: 1000,
          signal: controller.signal,
          sleep: async () => {},
        })
      ).rejects.toBeInstanceOf(CancelledError);
      expect(read).toHaveBeenCalledTimes(1);
    });
  });

  describe('extractCitationsFromText()', () => {
    test('should collect links, bare URLs and numbered references in order', () => {
      const text =
        'See [Docs](https://docs.example.test/a) and https://example.test/b. Also [1].\n\n' +
        '[1]: https://ref.example.test/one';

      expect(extractCitationsFromText(text)).toEqual([
        { label: 'Docs', url: 'https://docs.example.test/a' },
        { label: 'https://example.test/b', url: 'https://example.test/b' },
        { label: '[1]', url: 'https://ref.example.test/one' },
      ]);
    });

    test('should keep unresolved numbered references without a URL', () => {
      expect(extractCitationsFromText('As shown in [2] and again in [2].')).toEqual([{ label: '[2]', url: null }]);
    });

    test('should return nothing for plain prose', () => {
      expect(extractCitationsFromText('No sources here.')).toEqual([]);
    });
  });

  describe('parseSetCookie()', () => {
    test('should read name, value and attributes', () => {
      expect(
        parseSetCookie([
          'session=test-session-token; Path=/; Domain=chat.example.test; Expires=Thu, 01 Jan 2037 00:00:00 GMT',
          'malformed',
        ])
      ).toEqual([
        {
          name: 'session',
          value: 'test-session-token',
          path: '/',
          domain: 'chat.example.test',
          expires: 2114380800,
        },
      ]);
    });
  });

  describe('HttpChatServiceAdapter', () => {
    function adapterFor(handler: FakeHandler, extra: { healthPath?: string } = {}) {
      const { http, requests } = fakeHttp(handler);
      const adapter = new HttpChatServiceAdapter({
        serviceId: 'chat-api',
        baseURL: 'https://chat.example.test',
        probePath: '/api/me',
        submitPaths: ['/api/v2/conversations', '/api/v1/conversations'],
        conversationPath: '/api/conversations/:id',
        pollIntervalMs: 1,
        stablePolls: 2,
        http,
        logger: silentLogger,
        ...extra,
      });
      return { adapter, requests };
    }

    const authState = { cookies: [{ name: 'session', value: 'test-session-token' }], localStorage: {} };

    test('should require an :id placeholder in the conversation path', () => {
      expect(
        () =>
          new HttpChatServiceAdapter({
            serviceId: 'chat-api',
            baseURL: 'https://chat.example.test',
            probePath: '/api/me',
            submitPaths: ['/api/conversations'],
            conversationPath: '/api/conversations/latest',
          })
      ).toThrow('conversationPath must contain ":id"');
    });

    test('should open without network traffic unless a health path is set', async () => {
      const quiet = adapterFor(() => ({ status: 200 }));
      await quiet.adapter.open(authState);
      expect(quiet.requests).toHaveLength(0);

      const checked = adapterFor(() => ({ status: 503 }), { healthPath: '/health' });
      await expect(checked.adapter.open(authState)).rejects.toMatchObject({
        kind: 'SessionUnavailable',
        message: 'chat-api is unavailable (HTTP 503)',
      });
    });

    test('should probe authentication with the session cookie', async () => {
      const { adapter, requests } = adapterFor((request) => ({
        status: request.cookie === 'session=test-session-token' ? 200 : 401,
      }));

      expect(await adapter.isAuthenticated(await adapter.open(authState))).toBe(true);
      expect(await adapter.isAuthenticated(await adapter.open(null))).toBe(false);
      expect(requests.map((request) => `${request.method} ${request.url}`)).toEqual([
        'GET /api/me',
        'GET /api/me',
      ]);
    });

    test('should fall back to the next submit path and poll the answer until stable', async () => {
      const texts = ['', 'Paris', 'Paris is the capital [1].', 'Paris is the capital [1].'];
      let polls = 0;
      const { adapter, requests } = adapterFor((request) => {
        if (request.url === '/api/v2/conversations') return { status: 404 };
        if (request.url === '/api/v1/conversations') return { status: 200, data: { id: 'conv 1' } };
        if (request.url === '/api/conversations/conv%201') {
          const text = texts[Math.min(polls, texts.length - 1)];
          polls += 1;
          return { status: 200, data: { text } };
        }
        return { status: 500 };
      });

      const session = await adapter.open(authState);
      const attempt = await adapter.submitQuery(session, 'Capital of France?');
      const raw = await adapter.awaitResponse(attempt, 5000);

      expect(attempt.endpoint).toBe('/api/v1/conversations');
      expect(attempt.conversationId).toBe('conv 1');
      expect(requests[1]?.body).toEqual({ prompt: 'Capital of France?' });
      expect(raw.text).toBe('Paris is the capital [1].');
      expect(raw.polls).toBe(5);
      expect(adapter.extractCitations(raw)).toEqual([{ label: '[1]', url: null }]);
    });

    test('should report InputUnavailable when no submit path accepts the prompt', async () => {
      const { adapter } = adapterFor(() => ({ status: 404 }));

      const submit = adapter.submitQuery(await adapter.open(authState), 'hello');

      await expect(submit).rejects.toBeInstanceOf(InputUnavailableError);
      await expect(submit).rejects.toThrow(
        'No input entry point found (POST /api/v2/conversations: not found; POST /api/v1/conversations: not found)'
      );
    });

    test('should surface rate limits with the Retry-After delay', async () => {
      const { adapter } = adapterFor(() => ({ status: 429, headers: { 'retry-after': '7' } }));

      const submit = adapter.submitQuery(await adapter.open(authState), 'hello');

      await expect(submit).rejects.toBeInstanceOf(RateLimitedError);
      await expect(submit).rejects.toMatchObject({ retryAfterMs: 7000 });
    });

    test('should fold refreshed cookies into the captured auth state', async () => {
      const { adapter } = adapterFor(() => ({
        status: 200,
        headers: { 'set-cookie': ['session=rotated-token; Path=/', 'csrf=test-csrf'] },
      }));

      const session = await adapter.open(authState);
      await adapter.isAuthenticated(session);

      expect(await adapter.captureAuthState(session)).toEqual({
        cookies: [
          { name: 'session', value: 'rotated-token', path: '/' },
          { name: 'csrf', value: 'test-csrf' },
        ],
        localStorage: {},
      });
      expect(await adapter.captureAuthState(await adapter.open(null))).toBeNull();
    });
  });

  describe('mapHttpError()', () => {
    test('should map cancellation, timeouts and unreachable hosts', () => {
      expect(mapHttpError(new AxiosError('canceled', 'ERR_CANCELED'), 'chat-api').kind).toBe('Cancelled');

      const timeout = mapHttpError(new AxiosError('timeout of 50ms exceeded', 'ECONNABORTED'), 'chat-api', 50);
      expect(timeout).toBeInstanceOf(TimeoutError);
      expect(timeout.message).toBe('Request to chat-api timed out');

      const refused = mapHttpError(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED'), 'chat-api');
      expect(refused.kind).toBe('SessionUnavailable');
      expect(refused.message).toBe('chat-api is unreachable: connect ECONNREFUSED');
    });

    test('should classify non-axios errors by message', () => {
      expect(mapHttpError(new Error('socket hang up, timed out'), 'chat-api').kind).toBe('Timeout');
    });

    test('should map unexpected statuses to Unknown', async () => {
      const { http } = fakeHttp(() => ({ status: 500 }));
      const error = await http.get('/boom').catch((caught: unknown) => caught);

      const mapped = mapHttpError(error, 'chat-api');
      expect(mapped.kind).toBe('Unknown');
      expect(mapped.message).toBe('chat-api returned HTTP 500');
    });
  });
});
