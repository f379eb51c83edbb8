/**
 * Audit Module
 *
 * Responsibilities:
 * - Create immutable QueryRequests with unique ids
 * - Refine and resubmit (a new request that points at its parent by id)
 * - Persist one audit record per query through a StorageAdapter
 *
 * Audit layout:
 * - queries/{query_id}/request.json
 * - queries/{query_id}/attempts.json
 * - queries/{query_id}/synthesis.json
 * - queries/{query_id}/report.md
 */

import { randomBytes } from 'crypto';
import { z } from 'zod';
import type {
  ArtifactMetadata,
  Logger,
  ModuleResult,
  QueryId,
  QueryRequest,
  Rubric,
  ServiceAttempt,
  ServiceId,
  StorageAdapter,
  SynthesisResult,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../config/index.js';
import { RubricSchema } from '../validator/index.js';
import { SERVICE_ID_PATTERN } from '../session-store/index.js';
import { renderMarkdown } from '../report-builder/index.js';
import { silentLogger } from '../observability/index.js';

const MODULE = 'audit';

// ============================================================================
// Query Requests
// ============================================================================

/**
 * Unique, time-ordered query id: `q_<base36 millis>_<8 hex chars>`
 */
export function generateQueryId(now: number = Date.now()): QueryId {
  return `q_${now.toString(36)}_${randomBytes(4).toString('hex')}`;
}

const QueryInputSchema = z.object({
  prompt: z.string().trim().min(1, 'prompt must not be empty'),
  refinedPrompt: z.string().trim().min(1, 'refinedPrompt must not be empty').optional(),
  targetServices: z
    .array(z.string().regex(SERVICE_ID_PATTERN, 'invalid service id'))
    .min(1, 'at least one target service is required'),
  rubric: RubricSchema.optional(),
  maxRetriesPerService: z.number().int().positive().optional(),
});

export interface CreateQueryInput {
  prompt: string;
  targetServices: ServiceId[];
  rubric?: Rubric;
  /** Prompt actually sent; defaults to the prompt */
  refinedPrompt?: string;
  maxRetriesPerService?: number;
}

export interface CreateQueryOptions {
  parentId?: QueryId | null;
  /** Retry budget when the input names none; usually config.maxRetriesPerService */
  defaultMaxRetries?: number;
  now?: () => number;
}

export class InvalidQueryError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid query: ${issues.join('; ')}`);
    this.name = 'InvalidQueryError';
    this.issues = issues;
  }
}

/**
 * Build a frozen QueryRequest
 *
 * Target services are de-duplicated, first occurrence wins.
 *
 * @throws InvalidQueryError listing every problem found
 */
export function createQueryRequest(input: CreateQueryInput, options: CreateQueryOptions = {}): QueryRequest {
  const parsed = QueryInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidQueryError(
      parsed.error.errors.map((issue) => `${issue.path.join('.') || 'query'}: ${issue.message}`)
    );
  }

  const now = (options.now ?? Date.now)();
  const data = parsed.data;
  const rubric: Rubric = data.rubric ?? { requirements: [] };

  return Object.freeze({
    id: generateQueryId(now),
    originalPrompt: data.prompt,
    refinedPrompt: data.refinedPrompt ?? data.prompt,
    targetServices: Object.freeze([...new Set(data.targetServices)]),
    rubric: Object.freeze({ requirements: Object.freeze(rubric.requirements.map((r) => Object.freeze({ ...r }))) }),
    maxRetriesPerService: data.maxRetriesPerService ?? options.defaultMaxRetries ?? DEFAULT_CONFIG.maxRetriesPerService,
    createdAt: new Date(now).toISOString(),
    parentId: options.parentId ?? null,
  });
}

export type RefineOverrides = Partial<Omit<CreateQueryInput, 'prompt' | 'refinedPrompt'>>;

/**
 * New request for a reworded prompt; the parent is referenced by id only
 */
export function refineQuery(
  parent: QueryRequest,
  refinedPrompt: string,
  overrides: RefineOverrides = {},
  options: Omit<CreateQueryOptions, 'parentId'> = {}
): QueryRequest {
  return createQueryRequest(
    {
      prompt: parent.originalPrompt,
      refinedPrompt,
      targetServices: overrides.targetServices ?? [...parent.targetServices],
      rubric: overrides.rubric ?? parent.rubric,
      maxRetriesPerService: overrides.maxRetriesPerService ?? parent.maxRetriesPerService,
    },
    { ...options, parentId: parent.id }
  );
}

// ============================================================================
// Audit Records
// ============================================================================

const ErrorKindSchema = z.enum([
  'SessionUnavailable',
  'AuthenticationExpired',
  'InputUnavailable',
  'Timeout',
  'ValidationFailed',
  'RateLimited',
  'Cancelled',
  'Unknown',
]);

const StoredRequestSchema = z.object({
  id: z.string().min(1),
  originalPrompt: z.string(),
  refinedPrompt: z.string(),
  targetServices: z.array(z.string().regex(SERVICE_ID_PATTERN)),
  rubric: RubricSchema,
  maxRetriesPerService: z.number().int().positive(),
  createdAt: z.string(),
  parentId: z.string().nullable(),
});

const StoredAttemptSchema = z.object({
  queryId: z.string(),
  serviceId: z.string(),
  attemptNumber: z.number().int().positive(),
  status: z.enum(['pending', 'dispatched', 'succeeded', 'failed_retryable', 'failed_terminal']),
  prompt: z.string(),
  rawResponse: z.string().nullable(),
  extractedCitations: z.array(z.object({ label: z.string(), url: z.string().nullable() })),
  validation: z
    .object({ passed: z.boolean(), missingElements: z.array(z.string()), score: z.number().optional() })
    .nullable(),
  failure: z
    .object({ kind: ErrorKindSchema, message: z.string(), missingElements: z.array(z.string()).optional() })
    .nullable(),
  startedAt: z.string().nullable(),
  endedAt: z.string().nullable(),
});

const StoredOutcomeSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('succeeded'), attempt: StoredAttemptSchema }),
  z.object({
    status: z.literal('failed'),
    kind: ErrorKindSchema,
    reason: z.string(),
    attempt: StoredAttemptSchema.nullable(),
  }),
]);

const StoredSynthesisSchema = z.object({
  queryId: z.string(),
  prompt: z.string(),
  perService: z.record(StoredOutcomeSchema),
  mergedSummary: z.string(),
  commonInsights: z.array(z.object({ text: z.string(), services: z.array(z.string()) })),
  uniqueContent: z.record(z.array(z.string())),
  divergenceNotes: z.array(z.string()),
  serviceContributions: z.record(z.number()),
  confidence: z.enum(['high', 'medium', 'low']),
  cancelled: z.boolean(),
  auditTrail: z.array(StoredAttemptSchema),
  generatedAt: z.string(),
});

export interface AuditRecord {
  request: QueryRequest;
  attempts: ServiceAttempt[];
  synthesis: SynthesisResult;
  report: string;
}

export interface AuditOptions {
  logger?: Logger;
}

function failure<T>(queryId: QueryId, startTime: number, code: string, message: string, details?: unknown): ModuleResult<T> {
  return {
    success: false,
    error: { code, message, details },
    metadata: {
      queryId,
      module: MODULE,
      timestamp: new Date().toISOString(),
      duration: Date.now() - startTime,
    },
  };
}

/**
 * Save request, attempts, synthesis and the Markdown report
 */
export async function persistAuditRecord(
  storage: StorageAdapter,
  request: QueryRequest,
  result: SynthesisResult,
  options: AuditOptions = {}
): Promise<ModuleResult<ArtifactMetadata[]>> {
  const startTime = Date.now();
  const logger = options.logger ?? silentLogger;

  if (result.queryId !== request.id) {
    return failure(
      request.id,
      startTime,
      'AUDIT_MISMATCH',
      `Synthesis belongs to ${result.queryId}, not ${request.id}`
    );
  }

  try {
    const saved = [
      await storage.save(request.id, 'request', JSON.stringify(request, null, 2)),
      await storage.save(request.id, 'attempts', JSON.stringify(result.auditTrail, null, 2)),
      await storage.save(request.id, 'synthesis', JSON.stringify(result, null, 2)),
      await storage.save(request.id, 'report', renderMarkdown(result)),
    ];

    logger.info('Audit record saved', { queryId: request.id, artifacts: saved.length });

    return {
      success: true,
      data: saved,
      metadata: {
        queryId: request.id,
        module: MODULE,
        timestamp: new Date().toISOString(),
        duration: Date.now() - startTime,
      },
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    logger.error('Audit record not saved', { queryId: request.id, error: errorMessage });
    return failure(request.id, startTime, 'AUDIT_PERSIST_ERROR', `Failed to save audit record: ${errorMessage}`, {
      error,
    });
  }
}

function contentToString(content: string | Buffer): string {
  return typeof content === 'string' ? content : content.toString('utf-8');
}

/**
 * @throws Error naming the artifact and every schema issue
 */
function parseArtifact<S extends z.ZodTypeAny>(name: string, content: string | Buffer, schema: S): z.output<S> {
  const parsed = schema.safeParse(JSON.parse(contentToString(content)));
  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => `${issue.path.join('.') || name}: ${issue.message}`);
    throw new Error(`${name} is malformed (${issues.join('; ')})`);
  }
  return parsed.data;
}

/**
 * Read a saved audit record back
 */
export async function loadAuditRecord(
  storage: StorageAdapter,
  queryId: QueryId
): Promise<ModuleResult<AuditRecord>> {
  const startTime = Date.now();

  try {
    const [request, attempts, synthesis, report] = await Promise.all([
      storage.load(queryId, 'request'),
      storage.load(queryId, 'attempts'),
      storage.load(queryId, 'synthesis'),
      storage.load(queryId, 'report'),
    ]);

    return {
      success: true,
      data: {
        request: parseArtifact('request.json', request.content, StoredRequestSchema),
        attempts: parseArtifact('attempts.json', attempts.content, z.array(StoredAttemptSchema)),
        synthesis: parseArtifact('synthesis.json', synthesis.content, StoredSynthesisSchema),
        report: contentToString(report.content),
      },
      metadata: {
        queryId,
        module: MODULE,
        timestamp: new Date().toISOString(),
        duration: Date.now() - startTime,
      },
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    return failure(queryId, startTime, 'AUDIT_LOAD_ERROR', `Failed to load audit record: ${errorMessage}`, {
      error,
    });
  }
}
