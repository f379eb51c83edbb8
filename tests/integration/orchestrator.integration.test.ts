/**
 * Integration Tests for the query pipeline
 *
 * Config -> file session store -> HTTP adapters (in-process fake server)
 * -> orchestrator -> synthesis -> audit record.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, type OrchestratorConfig } from '../../src/config/index.js';
import { createOrchestrator } from '../../src/orchestrator/index.js';
import { FileSessionStore } from '../../src/session-store/index.js';
import { MemoryStorageAdapter } from '../../src/storage/index.js';
import { createQueryRequest, loadAuditRecord, persistAuditRecord } from '../../src/audit/index.js';
import { silentLogger } from '../../src/observability/index.js';
import type { HttpChatAdapterConfig } from '../../src/service-adapters/index.js';
import type { ServiceAttempt } from '../../src/types/index.js';
import { fakeHttp, type FakeRequest } from '../fixtures/fake-http.js';

const ANSWERS: Record<string, string> = {
  c1: 'Quicksort partitions the array around a pivot.',
  c2: 'For example, sorting [3, 1, 2] picks 2 as the pivot. See https://docs.test/quicksort',
};

function promptOf(request: FakeRequest): string {
  const body = request.body;
  return typeof body === 'object' && body !== null && 'prompt' in body && typeof body.prompt === 'string'
    ? body.prompt
    : '';
}

function httpService(serviceId: string, http: HttpChatAdapterConfig['http']): HttpChatAdapterConfig {
  return {
    serviceId,
    baseURL: `https://${serviceId}.test`,
    probePath: '/api/me',
    submitPaths: ['/api/conversations'],
    conversationPath: '/api/conversations/:id',
    http,
    logger: silentLogger,
  };
}

describe('Query pipeline', () => {
  let sessionDir: string;
  let config: OrchestratorConfig;

  beforeEach(async () => {
    sessionDir = await mkdtemp(join(tmpdir(), 'query-fanout-'));
    config = loadConfig(
      {},
      {
        sessionDir,
        timeoutMs: 5000,
        pollIntervalMs: 1,
        stablePolls: 1,
        backoff: { strategy: 'fixed', baseDelayMs: 1, maxDelayMs: 1 },
      }
    );
  });

  afterEach(async () => {
    await rm(sessionDir, { recursive: true, force: true });
  });

  it('should run a query end to end and keep an audit record', async () => {
    const seed = new FileSessionStore(sessionDir, { logger: silentLogger });
    await seed.save('chat-a', { cookies: [{ name: 'session', value: 'test-session' }], localStorage: {} });
    await seed.save('chat-b', { cookies: [{ name: 'session', value: 'test-stale' }], localStorage: {} });

    const chatA = fakeHttp((request) => {
      if (request.method === 'GET' && request.url === '/api/me') {
        return request.cookie.includes('session=test-session') ? { status: 200, data: {} } : { status: 401 };
      }
      if (request.method === 'POST') {
        const id = promptOf(request).includes('worked example') ? 'c2' : 'c1';
        return { status: 200, data: { id }, headers: { 'set-cookie': ['session=test-rotated; Path=/'] } };
      }
      const id = request.url.split('/').pop() ?? '';
      return { status: 200, data: { text: ANSWERS[id] ?? '' } };
    });
    const chatB = fakeHttp(() => ({ status: 401 }));

    const orchestrator = createOrchestrator(config, {
      http: [httpService('chat-a', chatA.http), httpService('chat-b', chatB.http)],
      logger: silentLogger,
    });
    const request = createQueryRequest({
      prompt: 'How does quicksort work?',
      targetServices: ['chat-a', 'chat-b'],
      rubric: { requirements: [{ type: 'example' }, { type: 'minCitations', count: 1 }] },
    });
    const updates: ServiceAttempt[] = [];

    const result = await orchestrator.submit(request, { onUpdate: (attempt) => updates.push(attempt) });

    const outcomeA = result.perService['chat-a'];
    expect(outcomeA?.status).toBe('succeeded');
    expect(outcomeA?.attempt?.attemptNumber).toBe(2);
    expect(outcomeA?.attempt?.extractedCitations).toEqual([
      { label: 'https://docs.test/quicksort', url: 'https://docs.test/quicksort' },
    ]);
    expect(chatA.requests.filter((r) => r.method === 'POST').map(promptOf)).toEqual([
      'How does quicksort work?',
      'How does quicksort work?\n\nAdd a worked example and cite at least one source.',
    ]);

    expect(result.perService['chat-b']).toMatchObject({
      status: 'failed',
      kind: 'AuthenticationExpired',
      reason: 'Not logged in or session expired; interactive login required: chat-b reports the session is not logged in',
    });
    expect(updates.filter((attempt) => attempt.serviceId === 'chat-b').map((attempt) => attempt.status)).toEqual([
      'pending',
      'failed_terminal',
    ]);

    const reread = new FileSessionStore(sessionDir, { logger: silentLogger });
    const loadedA = await reread.load('chat-a');
    expect(loadedA.found && loadedA.authState.cookies).toEqual([
      { name: 'session', value: 'test-rotated', path: '/' },
    ]);
    expect((await reread.getProfile('chat-b'))?.authStatus).toBe('expired');

    const storage = new MemoryStorageAdapter();
    const saved = await persistAuditRecord(storage, request, result);
    expect(saved.success).toBe(true);

    const record = await loadAuditRecord(storage, request.id);
    expect(record.data?.attempts.map((attempt) => `${attempt.serviceId}#${attempt.attemptNumber}:${attempt.status}`)).toEqual([
      'chat-a#1:failed_retryable',
      'chat-a#2:succeeded',
      'chat-b#1:failed_terminal',
    ]);
    expect(record.data?.report.split('\n')).toContain('### chat-a: succeeded after 2 attempts');
  });
});
