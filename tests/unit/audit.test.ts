/**
 * Unit tests for the Audit Module
 */

import { describe, test, beforeEach } from '@jest/globals';
import {
  InvalidQueryError,
  createQueryRequest,
  generateQueryId,
  loadAuditRecord,
  persistAuditRecord,
  refineQuery,
} from '../../src/audit/index.js';
import { MemoryStorageAdapter } from '../../src/storage/index.js';
import { buildSynthesis } from '../../src/synthesizer/index.js';
import { renderMarkdown } from '../../src/report-builder/index.js';
import type { ArtifactMetadata, ArtifactType, QueryId } from '../../src/types/index.js';
import { succeeded } from '../fixtures/attempts.js';

const NOW = Date.parse('2026-03-01T00:00:00.000Z');
const now = () => NOW;

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidQueryError) return error.issues;
    throw error;
  }
  return [];
}

class FailingStorage extends MemoryStorageAdapter {
  override async save(_queryId: QueryId, _artifactType: ArtifactType): Promise<ArtifactMetadata> {
    throw new Error('disk full');
  }
}

describe('Audit Module', () => {
  describe('generateQueryId()', () => {
    test('should produce valid, distinct ids', () => {
      const first = generateQueryId();
      const second = generateQueryId();

      expect(first).toBeValidQueryId();
      expect(second).toBeValidQueryId();
      expect(first).not.toBe(second);
    });

    test('should encode the time in base 36', () => {
      expect(generateQueryId(NOW).startsWith(`q_${NOW.toString(36)}_`)).toBe(true);
    });
  });

  describe('createQueryRequest()', () => {
    test('should build a frozen request with defaults', () => {
      const request = createQueryRequest(
        { prompt: '  How does quicksort work?  ', targetServices: ['chat-a', 'chat-b', 'chat-a'] },
        { now }
      );

      expect(request.id).toBeValidQueryId();
      expect(request.originalPrompt).toBe('How does quicksort work?');
      expect(request.refinedPrompt).toBe('How does quicksort work?');
      expect(request.targetServices).toEqual(['chat-a', 'chat-b']);
      expect(request.rubric).toEqual({ requirements: [] });
      expect(request.maxRetriesPerService).toBe(3);
      expect(request.createdAt).toBe('2026-03-01T00:00:00.000Z');
      expect(request.parentId).toBeNull();
      expect(Object.isFrozen(request)).toBe(true);
      expect(Object.isFrozen(request.targetServices)).toBe(true);
      expect(Object.isFrozen(request.rubric.requirements)).toBe(true);
    });

    test('should keep the rubric and retry budget', () => {
      const request = createQueryRequest({
        prompt: 'Explain quicksort',
        refinedPrompt: 'Explain quicksort with one example',
        targetServices: ['chat-a'],
        rubric: { requirements: [{ type: 'minCitations', count: 2 }] },
        maxRetriesPerService: 5,
      });

      expect(request.refinedPrompt).toBe('Explain quicksort with one example');
      expect(request.rubric.requirements).toEqual([{ type: 'minCitations', count: 2 }]);
      expect(request.maxRetriesPerService).toBe(5);
    });

    test('should list every problem', () => {
      const issues = issuesOf(() => createQueryRequest({ prompt: '   ', targetServices: [] }));

      expect(issues).toEqual([
        'prompt: prompt must not be empty',
        'targetServices: at least one target service is required',
      ]);
    });

    test('should reject service ids that are not path safe', () => {
      expect(() => createQueryRequest({ prompt: 'Explain quicksort', targetServices: ['../chat'] })).toThrow(
        'Invalid query: targetServices.0: invalid service id'
      );
    });
  });

  describe('createQueryRequest() service ids', () => {
    test('should reject ids that start with a digit', () => {
      expect(issuesOf(() => createQueryRequest({ prompt: 'Explain quicksort', targetServices: ['chat-a', '42'] }))).toEqual([
        'targetServices.1: invalid service id',
      ]);
    });

    test('should fall back to the given default retry budget', () => {
      const request = createQueryRequest(
        { prompt: 'Explain quicksort', targetServices: ['chat-a'] },
        { defaultMaxRetries: 5 }
      );

      expect(request.maxRetriesPerService).toBe(5);
    });
  });

  describe('refineQuery()', () => {
    test('should point back at the parent without changing it', () => {
      const parent = createQueryRequest(
        { prompt: 'Explain quicksort', targetServices: ['chat-a', 'chat-b'], maxRetriesPerService: 2 },
        { now }
      );

      const child = refineQuery(parent, 'Explain quicksort to a beginner', { targetServices: ['chat-b'] });

      expect(child.parentId).toBe(parent.id);
      expect(child.id).not.toBe(parent.id);
      expect(child.originalPrompt).toBe('Explain quicksort');
      expect(child.refinedPrompt).toBe('Explain quicksort to a beginner');
      expect(child.targetServices).toEqual(['chat-b']);
      expect(child.maxRetriesPerService).toBe(2);
      expect(parent.refinedPrompt).toBe('Explain quicksort');
    });
  });

  describe('audit records', () => {
    let storage: MemoryStorageAdapter;

    beforeEach(() => {
      storage = new MemoryStorageAdapter();
    });

    const request = createQueryRequest(
      { prompt: 'How does quicksort work?', targetServices: ['chat-a', 'chat-b'] },
      { now }
    );
    const result = buildSynthesis(
      request,
      [succeeded('chat-a', 'Quicksort picks a pivot element.'), succeeded('chat-b', 'Quicksort picks a pivot element.')],
      { generatedAt: '2026-03-01T00:05:00.000Z' }
    );

    test('should save and load all four artifacts', async () => {
      const saved = await persistAuditRecord(storage, request, result);

      expect(saved.success).toBe(true);
      expect(saved.data?.map((artifact) => artifact.fileName)).toEqual([
        'request.json',
        'attempts.json',
        'synthesis.json',
        'report.md',
      ]);

      const loaded = await loadAuditRecord(storage, request.id);

      expect(loaded.success).toBe(true);
      expect(loaded.data?.request).toEqual(request);
      expect(loaded.data?.attempts).toEqual(result.auditTrail);
      expect(loaded.data?.synthesis).toEqual(result);
      expect(loaded.data?.report).toBe(renderMarkdown(result));
      expect(loaded.metadata).toMatchObject({ queryId: request.id, module: 'audit' });
    });

    test('should refuse a synthesis from another query', async () => {
      const other = createQueryRequest({ prompt: 'Explain mergesort', targetServices: ['chat-a'] });

      const saved = await persistAuditRecord(storage, other, result);

      expect(saved.success).toBe(false);
      expect(saved.error).toMatchObject({
        code: 'AUDIT_MISMATCH',
        message: `Synthesis belongs to ${request.id}, not ${other.id}`,
      });
      expect(storage.size()).toBe(0);
    });

    test('should report storage failures', async () => {
      const saved = await persistAuditRecord(new FailingStorage(), request, result);

      expect(saved.success).toBe(false);
      expect(saved.error?.code).toBe('AUDIT_PERSIST_ERROR');
      expect(saved.error?.message).toBe('Failed to save audit record: disk full');
    });

    test('should reject a stored artifact that does not match its schema', async () => {
      await persistAuditRecord(storage, request, result);
      await storage.save(request.id, 'synthesis', JSON.stringify({ queryId: request.id }));

      const loaded = await loadAuditRecord(storage, request.id);

      expect(loaded.success).toBe(false);
      expect(loaded.error?.code).toBe('AUDIT_LOAD_ERROR');
      expect(loaded.error?.message).toMatch(
        /^Failed to load audit record: synthesis\.json is malformed \(prompt: Required; perService: Required;/
      );
    });

    test('should report a missing record', async () => {
      const loaded = await loadAuditRecord(storage, 'q_missing');

      expect(loaded.success).toBe(false);
      expect(loaded.error?.code).toBe('AUDIT_LOAD_ERROR');
      expect(loaded.error?.message).toMatch(/^Failed to load audit record: Artifact not found: q_missing\//);
    });
  });
});
