/**
 * Retry Controller Module
 *
 * Owns the attempt history for one (query, service) pair and decides
 * what happens after each failure.
 *
 * Attempt states:
 *   pending -> dispatched -> succeeded | failed_retryable | failed_terminal
 *   pending -> failed_terminal (cancelled before dispatch)
 *
 * Rules:
 * - at most one attempt is dispatched at a time
 * - attempts never exceed maxRetriesPerService
 * - SessionUnavailable, AuthenticationExpired and Cancelled stop immediately
 * - InputUnavailable has its own smaller budget
 * - ValidationFailed retries with a clarification prompt naming what was missing
 * - RateLimited waits the service's Retry-After, or the extended rate limit delay
 */

import type {
  AttemptStatus,
  Citation,
  ErrorKind,
  Logger,
  QueryRequest,
  Rubric,
  ServiceAttempt,
  ServiceId,
  ValidationResult,
} from '../types/index.js';
import type { BackoffConfig } from '../config/index.js';
import { OrchestratorError, RateLimitedError, ValidationFailedError, isRetryableKind } from '../errors/index.js';
import { clarificationPhrase, requirementLabel } from '../validator/index.js';
import { silentLogger } from '../observability/index.js';

// ============================================================================
// Clarification
// ============================================================================

export interface ClarificationInput {
  basePrompt: string;
  missingElements: string[];
  rubric: Rubric;
  attemptNumber: number;
}

/**
 * Builds the prompt for the next attempt after a validation failure
 */
export type ClarificationStrategy = (input: ClarificationInput) => string;

function joinPhrases(phrases: string[]): string {
  if (phrases.length <= 1) return phrases.join('');
  return `${phrases.slice(0, -1).join(', ')} and ${phrases[phrases.length - 1]}`;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * One sentence, built from the phrase of each missing requirement
 *
 * e.g. "Add a worked example and cite at least two sources."
 */
export function buildClarificationSentence(missingElements: string[], rubric: Rubric): string {
  const phrases = missingElements.map((missing) => {
    const requirement = rubric.requirements.find((candidate) => requirementLabel(candidate) === missing);
    return requirement ? clarificationPhrase(requirement) : `address ${missing}`;
  });
  return `${capitalize(joinPhrases(phrases))}.`;
}

/**
 * Default strategy: the original prompt followed by the clarification sentence
 */
export const defaultClarificationStrategy: ClarificationStrategy = ({ basePrompt, missingElements, rubric }) =>
  `${basePrompt}\n\n${buildClarificationSentence(missingElements, rubric)}`;

// ============================================================================
// Backoff
// ============================================================================

/**
 * Delay before retrying after the given attempt failed
 *
 * @param attemptNumber - The attempt that just failed (1-based)
 */
export function computeBackoffDelay(attemptNumber: number, backoff: BackoffConfig): number {
  if (backoff.strategy === 'fixed') {
    return backoff.baseDelayMs;
  }
  const delay = backoff.baseDelayMs * 2 ** Math.max(0, attemptNumber - 1);
  return Math.min(backoff.maxDelayMs, delay);
}

/**
 * Delay for a specific failure; rate limits use their own, longer delay
 */
export function computeRetryDelay(
  kind: ErrorKind,
  attemptNumber: number,
  backoff: BackoffConfig,
  retryAfterMs: number | null = null
): number {
  if (kind === 'RateLimited') {
    return retryAfterMs ?? backoff.rateLimitDelayMs;
  }
  return computeBackoffDelay(attemptNumber, backoff);
}

// ============================================================================
// Controller
// ============================================================================

const TRANSITIONS: Record<AttemptStatus, AttemptStatus[]> = {
  pending: ['dispatched', 'failed_terminal'],
  dispatched: ['succeeded', 'failed_retryable', 'failed_terminal'],
  succeeded: [],
  failed_retryable: [],
  failed_terminal: [],
};

export interface RetryControllerOptions {
  backoff: BackoffConfig;
  /** Attempts allowed when the input surface cannot be found */
  inputRetries: number;
  clarify?: ClarificationStrategy;
  logger?: Logger;
  now?: () => number;
}

export interface AttemptEvidence {
  rawResponse?: string | null;
  extractedCitations?: Citation[];
  validation?: ValidationResult | null;
}

export type RetryDecision =
  | { action: 'retry'; delayMs: number; prompt: string }
  | { action: 'stop' };

/**
 * Attempt state machine for one service within one query
 */
export class RetryController {
  readonly serviceId: ServiceId;
  private readonly request: QueryRequest;
  private readonly options: RetryControllerOptions;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly clarify: ClarificationStrategy;

  private attempts: ServiceAttempt[] = [];
  private nextPrompt: string;
  private inputFailures = 0;
  private done = false;

  constructor(request: QueryRequest, serviceId: ServiceId, options: RetryControllerOptions) {
    this.request = request;
    this.serviceId = serviceId;
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
    this.clarify = options.clarify ?? defaultClarificationStrategy;
    this.nextPrompt = request.refinedPrompt;
  }

  get finished(): boolean {
    return this.done;
  }

  get attemptCount(): number {
    return this.attempts.length;
  }

  /**
   * Latest attempt, or null before the first
   */
  get current(): ServiceAttempt | null {
    const last = this.attempts[this.attempts.length - 1];
    return last ? snapshot(last) : null;
  }

  /**
   * Ordered snapshots of every attempt so far
   */
  history(): ServiceAttempt[] {
    return this.attempts.map(snapshot);
  }

  /**
   * Create the next attempt in `pending`
   *
   * @throws Error when finished, over budget, or the previous attempt is unresolved
   */
  begin(): ServiceAttempt {
    const last = this.attempts[this.attempts.length - 1];
    if (this.done) {
      throw new Error(`No further attempts for ${this.serviceId}: already finished`);
    }
    if (last && (last.status === 'pending' || last.status === 'dispatched')) {
      throw new Error(`Attempt ${last.attemptNumber} for ${this.serviceId} is still ${last.status}`);
    }
    if (this.attempts.length >= this.request.maxRetriesPerService) {
      throw new Error(`Retry budget exhausted for ${this.serviceId}`);
    }

    const attempt: ServiceAttempt = {
      queryId: this.request.id,
      serviceId: this.serviceId,
      attemptNumber: this.attempts.length + 1,
      status: 'pending',
      prompt: this.nextPrompt,
      rawResponse: null,
      extractedCitations: [],
      validation: null,
      failure: null,
      startedAt: null,
      endedAt: null,
    };
    this.attempts.push(attempt);
    return snapshot(attempt);
  }

  dispatch(): ServiceAttempt {
    const attempt = this.transition('dispatched');
    attempt.startedAt = this.timestamp();
    return snapshot(attempt);
  }

  succeed(evidence: AttemptEvidence): ServiceAttempt {
    const attempt = this.transition('succeeded');
    applyEvidence(attempt, evidence);
    attempt.endedAt = this.timestamp();
    this.done = true;
    return snapshot(attempt);
  }

  /**
   * Record a failure and decide whether another attempt follows
   */
  fail(error: OrchestratorError, evidence: AttemptEvidence = {}): { attempt: ServiceAttempt; decision: RetryDecision } {
    const last = this.attempts[this.attempts.length - 1];
    if (!last) {
      throw new Error(`No attempt to fail for ${this.serviceId}`);
    }

    const decision = this.decide(last, error, evidence.validation ?? null);
    const attempt = this.transition(decision.action === 'retry' ? 'failed_retryable' : 'failed_terminal');
    applyEvidence(attempt, evidence);
    attempt.failure = {
      kind: error.kind,
      message: error.message,
      ...(error instanceof ValidationFailedError ? { missingElements: [...error.missingElements] } : {}),
    };
    attempt.endedAt = this.timestamp();

    if (decision.action === 'retry') {
      this.nextPrompt = decision.prompt;
      this.logger.info('Attempt failed; retrying', {
        serviceId: this.serviceId,
        attemptNumber: attempt.attemptNumber,
        kind: error.kind,
        delayMs: decision.delayMs,
      });
    } else {
      this.done = true;
      this.logger.warn('Attempt failed; giving up', {
        serviceId: this.serviceId,
        attemptNumber: attempt.attemptNumber,
        kind: error.kind,
      });
    }

    return { attempt: snapshot(attempt), decision };
  }

  /**
   * End the current attempt as failed_terminal whatever the error kind.
   * Used for setup failures (no session, unreachable) and cancellation.
   */
  terminate(error: OrchestratorError, evidence: AttemptEvidence = {}): ServiceAttempt {
    const attempt = this.transition('failed_terminal');
    applyEvidence(attempt, evidence);
    attempt.failure = { kind: error.kind, message: error.message };
    attempt.endedAt = this.timestamp();
    this.done = true;
    this.logger.warn('Attempt ended', {
      serviceId: this.serviceId,
      attemptNumber: attempt.attemptNumber,
      kind: error.kind,
    });
    return snapshot(attempt);
  }

  private decide(attempt: ServiceAttempt, error: OrchestratorError, validation: ValidationResult | null): RetryDecision {
    if (!isRetryableKind(error.kind) || attempt.status === 'pending') {
      return { action: 'stop' };
    }
    if (attempt.attemptNumber >= this.request.maxRetriesPerService) {
      return { action: 'stop' };
    }
    if (error.kind === 'InputUnavailable') {
      this.inputFailures += 1;
      if (this.inputFailures >= this.options.inputRetries) {
        return { action: 'stop' };
      }
    }

    const retryAfterMs = error instanceof RateLimitedError ? error.retryAfterMs : null;
    const delayMs = computeRetryDelay(error.kind, attempt.attemptNumber, this.options.backoff, retryAfterMs);

    let prompt = this.nextPrompt;
    if (error instanceof ValidationFailedError) {
      prompt = this.clarify({
        basePrompt: this.request.refinedPrompt,
        missingElements: validation?.missingElements ?? error.missingElements,
        rubric: this.request.rubric,
        attemptNumber: attempt.attemptNumber + 1,
      });
    }

    return { action: 'retry', delayMs, prompt };
  }

  private transition(to: AttemptStatus): ServiceAttempt {
    const attempt = this.attempts[this.attempts.length - 1];
    if (!attempt) {
      throw new Error(`No attempt to move to ${to} for ${this.serviceId}`);
    }
    if (!TRANSITIONS[attempt.status].includes(to)) {
      throw new Error(`Invalid attempt transition ${attempt.status} -> ${to} for ${this.serviceId}`);
    }
    attempt.status = to;
    return attempt;
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}

function applyEvidence(attempt: ServiceAttempt, evidence: AttemptEvidence): void {
  if (evidence.rawResponse !== undefined) attempt.rawResponse = evidence.rawResponse;
  if (evidence.extractedCitations !== undefined) attempt.extractedCitations = [...evidence.extractedCitations];
  if (evidence.validation !== undefined) attempt.validation = evidence.validation;
}

function snapshot(attempt: ServiceAttempt): ServiceAttempt {
  return {
    ...attempt,
    extractedCitations: attempt.extractedCitations.map((citation) => ({ ...citation })),
    validation: attempt.validation
      ? { ...attempt.validation, missingElements: [...attempt.validation.missingElements] }
      : null,
    failure: attempt.failure
      ? {
          ...attempt.failure,
          ...(attempt.failure.missingElements ? { missingElements: [...attempt.failure.missingElements] } : {}),
        }
      : null,
  };
}
