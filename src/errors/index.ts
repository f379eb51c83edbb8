/**
 * Error Taxonomy Module
 *
 * Every failure an adapter can surface maps to one ErrorKind. The
 * orchestrator catches all adapter errors at its boundary and turns
 * them into attempt states using the rules below:
 *
 * - SessionUnavailable    terminal for the query
 * - AuthenticationExpired terminal, flags the profile expired
 * - InputUnavailable      retried under a small separate budget
 * - Timeout               retryable under the retry budget
 * - ValidationFailed      retryable with a clarification prompt
 * - RateLimited           retryable after an extended delay
 * - Cancelled             terminal marker, never retried
 * - Unknown               retryable
 */

import type { ErrorKind } from '../types/index.js';

export type { ErrorKind };

/**
 * Base class for all orchestration errors
 */
export class OrchestratorError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = `${kind}Error`;
    this.kind = kind;
  }

  get retryable(): boolean {
    return isRetryableKind(this.kind);
  }
}

export class SessionUnavailableError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SessionUnavailable', message, options);
  }
}

export class AuthenticationExpiredError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AuthenticationExpired', message, options);
  }
}

export class InputUnavailableError extends OrchestratorError {
  /** Names of the detection strategies that were tried, in order */
  readonly strategiesTried: string[];

  constructor(message: string, strategiesTried: string[] = [], options?: { cause?: unknown }) {
    super('InputUnavailable', message, options);
    this.strategiesTried = strategiesTried;
  }
}

export class TimeoutError extends OrchestratorError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super('Timeout', message);
    this.timeoutMs = timeoutMs;
  }
}

export class ValidationFailedError extends OrchestratorError {
  readonly missingElements: string[];

  constructor(missingElements: string[]) {
    super('ValidationFailed', `Response is missing: ${missingElements.join(', ')}`);
    this.missingElements = missingElements;
  }
}

export class RateLimitedError extends OrchestratorError {
  /** Delay requested by the service, when it told us */
  readonly retryAfterMs: number | null;

  constructor(message: string, retryAfterMs: number | null = null, options?: { cause?: unknown }) {
    super('RateLimited', message, options);
    this.retryAfterMs = retryAfterMs;
  }
}

export class CancelledError extends OrchestratorError {
  constructor(message = 'Query was cancelled') {
    super('Cancelled', message);
  }
}

// ============================================================================
// Classification
// ============================================================================

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'InputUnavailable',
  'Timeout',
  'ValidationFailed',
  'RateLimited',
  'Unknown',
]);

/**
 * Whether an error kind may be retried within the same query
 */
export function isRetryableKind(kind: ErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

/**
 * Message patterns used to classify errors thrown by code that does
 * not use the taxonomy (automation libraries, HTTP clients, etc.).
 * Checked in order; first match wins.
 */
const MESSAGE_PATTERNS: Array<{ kind: ErrorKind; patterns: RegExp[] }> = [
  { kind: 'Cancelled', patterns: [/\babort(ed)?\b/i, /\bcancel(l)?ed\b/i] },
  { kind: 'RateLimited', patterns: [/rate.?limit/i, /\b429\b/, /too many requests/i, /overloaded/i] },
  {
    kind: 'AuthenticationExpired',
    patterns: [/\b401\b/, /\b403\b/, /unauthori[sz]ed/i, /not logged in/i, /login required/i, /session expired/i],
  },
  { kind: 'Timeout', patterns: [/time(d)?.?out/i, /ETIMEDOUT/] },
  {
    kind: 'SessionUnavailable',
    patterns: [/ECONNREFUSED/, /ENOTFOUND/, /EAI_AGAIN/, /unreachable/i, /service (is )?down/i, /binary (is )?missing/i],
  },
  {
    kind: 'InputUnavailable',
    patterns: [/not interactable/i, /could not (locate|focus)/i, /input.*not found/i, /element.*not found/i],
  },
];

/**
 * Map any thrown value onto the error taxonomy
 *
 * OrchestratorError instances keep their kind; AbortError maps to
 * Cancelled; everything else is classified by message.
 */
export function classifyError(error: unknown): ErrorKind {
  if (error instanceof OrchestratorError) {
    return error.kind;
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return 'Cancelled';
  }

  const message = error instanceof Error ? error.message : String(error);
  for (const { kind, patterns } of MESSAGE_PATTERNS) {
    if (patterns.some((pattern) => pattern.test(message))) {
      return kind;
    }
  }

  return 'Unknown';
}

/**
 * Convert any thrown value into an OrchestratorError
 */
export function toOrchestratorError(error: unknown): OrchestratorError {
  if (error instanceof OrchestratorError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new OrchestratorError(classifyError(error), message, { cause: error });
}

/**
 * Human-readable reason for a failure kind, used in reports
 */
export function describeErrorKind(kind: ErrorKind): string {
  switch (kind) {
    case 'SessionUnavailable':
      return 'Service could not be reached';
    case 'AuthenticationExpired':
      return 'Not logged in or session expired; interactive login required';
    case 'InputUnavailable':
      return 'Could not find where to enter the query';
    case 'Timeout':
      return 'No complete response within the time limit';
    case 'ValidationFailed':
      return 'Response did not satisfy the rubric';
    case 'RateLimited':
      return 'Service is rate limiting requests';
    case 'Cancelled':
      return 'Cancelled before completion';
    case 'Unknown':
      return 'Unexpected error';
  }
}
