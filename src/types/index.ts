/**
 * Core type definitions for the query fanout orchestrator
 *
 * This module exports all shared types used across the system.
 */

/**
 * Identifier of one external AI service (e.g. "claude", "perplexity")
 * Format: lowercase alphanumerics, "-" and "_"
 */
export type ServiceId = string;

/**
 * Unique identifier for a query request
 * Format: q_<timestamp36>_<random hex>
 */
export type QueryId = string;

// ============================================================================
// Session State
// ============================================================================

export type AuthStatus = 'unknown' | 'valid' | 'expired';

/**
 * Cookie captured from a service session
 */
export interface StoredCookie {
  name: string;
  value: string;
  domain?: string;
  path?: string;
  /** Unix epoch seconds */
  expires?: number;
}

/**
 * Opaque snapshot of a service's authenticated session.
 * The session store never interprets it; adapters do.
 */
export interface AuthState {
  cookies: StoredCookie[];
  localStorage: Record<string, string>;
  data?: Record<string, unknown>;
}

/**
 * Persisted authentication state for one service
 */
export interface ServiceProfile {
  serviceId: ServiceId;
  persistedAuthState: AuthState | null;
  authStatus: AuthStatus;
  lastValidatedAt: string | null;
  createdAt: string;
  updatedAt: string;
  expiresAt: string | null;
}

// ============================================================================
// Rubric
// ============================================================================

/**
 * One structural requirement a response must satisfy.
 * `label` overrides the name reported in missingElements.
 */
export type RubricRequirement =
  | { type: 'minCitations'; count: number; label?: string }
  | { type: 'section'; heading: string; label?: string }
  | { type: 'pattern'; pattern: string; flags?: string; label?: string }
  | { type: 'example'; label?: string }
  | { type: 'minWords'; count: number; label?: string };

export interface Rubric {
  readonly requirements: readonly RubricRequirement[];
}

// ============================================================================
// Queries and Attempts
// ============================================================================

/**
 * A user query as dispatched. Frozen once created;
 * refinement produces a new request pointing back through parentId.
 */
export interface QueryRequest {
  readonly id: QueryId;
  readonly originalPrompt: string;
  readonly refinedPrompt: string;
  readonly targetServices: readonly ServiceId[];
  readonly rubric: Rubric;
  readonly maxRetriesPerService: number;
  readonly createdAt: string;
  readonly parentId: QueryId | null;
}

export type AttemptStatus =
  | 'pending'
  | 'dispatched'
  | 'succeeded'
  | 'failed_retryable'
  | 'failed_terminal';

export type ErrorKind =
  | 'SessionUnavailable'
  | 'AuthenticationExpired'
  | 'InputUnavailable'
  | 'Timeout'
  | 'ValidationFailed'
  | 'RateLimited'
  | 'Cancelled'
  | 'Unknown';

export interface Citation {
  label: string;
  url: string | null;
}

export interface ValidationResult {
  passed: boolean;
  missingElements: string[];
  score?: number;
}

export interface AttemptFailure {
  kind: ErrorKind;
  message: string;
  missingElements?: string[];
}

/**
 * One dispatch-and-response cycle for a query against a service
 */
export interface ServiceAttempt {
  queryId: QueryId;
  serviceId: ServiceId;
  attemptNumber: number;
  status: AttemptStatus;
  prompt: string;
  rawResponse: string | null;
  extractedCitations: Citation[];
  validation: ValidationResult | null;
  failure: AttemptFailure | null;
  startedAt: string | null;
  endedAt: string | null;
}

// ============================================================================
// Synthesis
// ============================================================================

export type ServiceOutcome =
  | { status: 'succeeded'; attempt: ServiceAttempt }
  | { status: 'failed'; kind: ErrorKind; reason: string; attempt: ServiceAttempt | null };

export interface CommonInsight {
  text: string;
  services: ServiceId[];
}

export type SynthesisConfidence = 'high' | 'medium' | 'low';

export interface SynthesisResult {
  queryId: QueryId;
  prompt: string;
  perService: Record<ServiceId, ServiceOutcome>;
  mergedSummary: string;
  commonInsights: CommonInsight[];
  uniqueContent: Record<ServiceId, string[]>;
  divergenceNotes: string[];
  serviceContributions: Record<ServiceId, number>;
  confidence: SynthesisConfidence;
  cancelled: boolean;
  auditTrail: ServiceAttempt[];
  generatedAt: string;
}

// ============================================================================
// Observability
// ============================================================================

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

// ============================================================================
// Storage
// ============================================================================

export type ArtifactType = 'request' | 'attempts' | 'synthesis' | 'report';

/**
 * Artifact metadata for storage tracking
 */
export interface ArtifactMetadata {
  queryId: QueryId;
  artifactType: ArtifactType;
  fileName: string;
  createdAt: string;
  contentType: string;
  size?: number;
  checksum?: string;
}

/**
 * Storage adapter interface for audit artifact persistence
 */
export interface StorageAdapter {
  save(queryId: QueryId, artifactType: ArtifactType, content: string | Buffer, metadata?: Record<string, string>): Promise<ArtifactMetadata>;
  load(queryId: QueryId, artifactType: ArtifactType): Promise<{ content: string | Buffer; metadata: ArtifactMetadata }>;
  exists(queryId: QueryId, artifactType: ArtifactType): Promise<boolean>;
  list(queryId: QueryId): Promise<ArtifactMetadata[]>;
  delete(queryId: QueryId, artifactType?: ArtifactType): Promise<void>;
}

/**
 * Module result wrapper for operations that cross a storage boundary
 */
export interface ModuleResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  metadata: {
    queryId: QueryId;
    module: string;
    timestamp: string;
    duration?: number;
  };
}
