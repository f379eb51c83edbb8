/**
 * Query Fanout - Main Entry Point
 *
 * Sends one query to several authenticated AI services at once, validates
 * each answer against a rubric, retries with clarifications, and merges
 * what comes back into one report.
 *
 * Architecture:
 * - Service adapters hide how each service is driven
 * - The orchestrator owns concurrency, retries and cancellation
 * - Sessions persist per service across restarts
 * - Audit records are stored by query id
 */

// Core Types
export type * from './types/index.js';

// Observability
export { createConsoleLogger, silentLogger, defaultMetrics } from './observability/index.js';

// Errors
export {
  OrchestratorError,
  SessionUnavailableError,
  AuthenticationExpiredError,
  InputUnavailableError,
  TimeoutError,
  ValidationFailedError,
  RateLimitedError,
  CancelledError,
  isRetryableKind,
  classifyError,
  toOrchestratorError,
  describeErrorKind,
} from './errors/index.js';

// Config
export {
  loadConfig,
  ConfigError,
  DEFAULT_CONFIG,
  DEFAULT_MODEL,
  OrchestratorConfigSchema,
  type OrchestratorConfig,
  type BackoffConfig,
  type ConfigOverrides,
} from './config/index.js';

// Session Store - Persisted auth state per service
export {
  FileSessionStore,
  MemorySessionStore,
  ServiceProfileSchema,
  assertValidServiceId,
  type SessionStore,
  type SessionStoreOptions,
  type LoadResult,
  type SaveOptions,
} from './session-store/index.js';

// Locks - Per-service FIFO exclusion
export { ServiceLockManager, sleep, type LockHolder, type ReleaseFn } from './locks/index.js';

// Service Adapters
export {
  HttpChatServiceAdapter,
  mapHttpError,
  runDetectionStrategies,
  pollUntilStable,
  extractCitationsFromText,
  type ServiceAdapter,
  type AdapterRegistry,
  type AdapterKind,
  type SessionHandle,
  type AttemptHandle,
  type RawResponse,
  type DetectionStrategy,
  type DetectionOutcome,
  type PollOptions,
  type PollResult,
  type HttpChatAdapterConfig,
  type HttpChatSession,
  type HttpChatAttempt,
} from './service-adapters/index.js';

// Validator - Rubric checks
export {
  validate,
  checkRequirement,
  requirementLabel,
  clarificationPhrase,
  parseRubric,
  RubricSchema,
  RubricRequirementSchema,
  RubricParseError,
  type ValidationSubject,
} from './validator/index.js';

// Retry Controller
export {
  RetryController,
  buildClarificationSentence,
  defaultClarificationStrategy,
  computeBackoffDelay,
  computeRetryDelay,
  type ClarificationStrategy,
  type ClarificationInput,
  type RetryDecision,
  type RetryControllerOptions,
} from './retry-controller/index.js';

// Orchestrator
export {
  Orchestrator,
  createOrchestrator,
  type OrchestratorDeps,
  type OrchestratorSettings,
  type DispatchOptions,
  type CreateOrchestratorOptions,
} from './orchestrator/index.js';

// Synthesizer
export {
  Synthesizer,
  ClaudeSummarizer,
  buildSynthesis,
  extractiveSummary,
  splitSentences,
  jaccard,
  DEFAULT_OVERLAP_THRESHOLD,
  type SummarizationStep,
  type SummarizationInput,
  type SummaryClient,
  type SynthesizerConfig,
  type ClaudeSummarizerConfig,
} from './synthesizer/index.js';

// Report Builder
export { renderMarkdown, renderPlainText, renderJson, toReportObject } from './report-builder/index.js';

// Storage Module - Artifact persistence
export {
  S3StorageAdapter,
  MemoryStorageAdapter,
  createStorageAdapter,
  ARTIFACT_FILE_NAMES,
  type S3Config,
} from './storage/index.js';

// Audit - Query requests and audit records
export {
  generateQueryId,
  createQueryRequest,
  refineQuery,
  persistAuditRecord,
  loadAuditRecord,
  InvalidQueryError,
  type CreateQueryInput,
  type CreateQueryOptions,
  type RefineOverrides,
  type AuditRecord,
} from './audit/index.js';
