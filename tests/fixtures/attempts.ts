/**
 * Builders for requests and attempts used across tests
 */

import type { QueryRequest, ServiceAttempt, Rubric } from '../../src/types/index.js';

export function makeRequest(overrides: Partial<QueryRequest> = {}): QueryRequest {
  const rubric: Rubric = { requirements: [] };
  return {
    id: 'q_test_0000abcd',
    originalPrompt: 'How does quicksort work?',
    refinedPrompt: 'How does quicksort work?',
    targetServices: ['chat-a', 'chat-b'],
    rubric,
    maxRetriesPerService: 3,
    createdAt: '2026-03-01T00:00:00.000Z',
    parentId: null,
    ...overrides,
  };
}

export function succeeded(serviceId: string, rawResponse: string, attemptNumber = 1): ServiceAttempt {
  return {
    queryId: 'q_test_0000abcd',
    serviceId,
    attemptNumber,
    status: 'succeeded',
    prompt: 'How does quicksort work?',
    rawResponse,
    extractedCitations: [],
    validation: { passed: true, missingElements: [], score: 1 },
    failure: null,
    startedAt: '2026-03-01T00:00:01.000Z',
    endedAt: '2026-03-01T00:00:02.000Z',
  };
}

export function failed(
  serviceId: string,
  failure: ServiceAttempt['failure'],
  attemptNumber = 1,
  status: 'failed_retryable' | 'failed_terminal' = 'failed_terminal'
): ServiceAttempt {
  return {
    queryId: 'q_test_0000abcd',
    serviceId,
    attemptNumber,
    status,
    prompt: 'How does quicksort work?',
    rawResponse: null,
    extractedCitations: [],
    validation: null,
    failure,
    startedAt: '2026-03-01T00:00:01.000Z',
    endedAt: '2026-03-01T00:00:02.000Z',
  };
}
