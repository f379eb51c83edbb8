/**
 * Orchestrator Module
 *
 * Fans one QueryRequest out to every target service concurrently and
 * streams attempt updates as they happen.
 *
 * Per service:
 * 1. Take the service lock (FIFO; a second query waits its turn)
 * 2. Load persisted auth state; none, or expired, ends the service with
 *    AuthenticationExpired and flags the profile
 * 3. open() and isAuthenticated()
 * 4. submit -> await -> validate, retrying through the RetryController
 * 5. Persist refreshed auth state after a success
 *
 * Adapter errors never escape: each one becomes an attempt state.
 * Cancellation (cancel(queryId) or an external AbortSignal) stops new
 * dispatches and aborts in-flight calls at their next poll boundary;
 * attempts that already finished are kept. An adapter error is only
 * Cancelled when the query itself was cancelled.
 *
 * Usage:
 * ```typescript
 * const orchestrator = createOrchestrator(loadConfig(), { adapters });
 * const request = orchestrator.createRequest({ prompt, targetServices: ['chat-a', 'chat-b'] });
 * for await (const attempt of orchestrator.dispatch(request)) {
 *   console.log(attempt.serviceId, attempt.status);
 * }
 * const result = await orchestrator.submit(request);
 * ```
 */

import type {
  Citation,
  Logger,
  Metrics,
  QueryId,
  QueryRequest,
  ServiceAttempt,
  ServiceId,
  SynthesisResult,
  ValidationResult,
} from '../types/index.js';
import type { OrchestratorConfig } from '../config/index.js';
import { DEFAULT_CONFIG } from '../config/index.js';
import {
  AuthenticationExpiredError,
  CancelledError,
  OrchestratorError,
  SessionUnavailableError,
  ValidationFailedError,
  toOrchestratorError,
} from '../errors/index.js';
import {
  HttpChatServiceAdapter,
  type AdapterRegistry,
  type HttpChatAdapterConfig,
  type ServiceAdapter,
  type SessionHandle,
} from '../service-adapters/index.js';
import { FileSessionStore, type SessionStore } from '../session-store/index.js';
import { ServiceLockManager, sleep, type ReleaseFn } from '../locks/index.js';
import { RetryController, type ClarificationStrategy } from '../retry-controller/index.js';
import { validate } from '../validator/index.js';
import { createQueryRequest, type CreateQueryInput, type CreateQueryOptions } from '../audit/index.js';
import { ClaudeSummarizer, Synthesizer } from '../synthesizer/index.js';
import { createConsoleLogger, defaultMetrics } from '../observability/index.js';

export type OrchestratorSettings = Pick<
  OrchestratorConfig,
  'timeoutMs' | 'backoff' | 'inputRetries' | 'maxRetriesPerService'
>;

export interface OrchestratorDeps {
  adapters: AdapterRegistry;
  sessionStore: SessionStore;
  settings?: Partial<OrchestratorSettings>;
  locks?: ServiceLockManager;
  synthesizer?: Synthesizer;
  clarify?: ClarificationStrategy;
  logger?: Logger;
  metrics?: Metrics;
  /** Delay between attempts; override in tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface DispatchOptions {
  signal?: AbortSignal;
  /** Called with every attempt snapshot, in emission order */
  onUpdate?: (attempt: ServiceAttempt) => void;
}

type Emit = (attempt: ServiceAttempt) => void;

/**
 * Unbounded single-consumer queue feeding the attempt stream
 */
class UpdateChannel<T> {
  private items: T[] = [];
  private wake: (() => void) | null = null;
  private closed = false;

  push(item: T): void {
    this.items.push(item);
    this.notify();
  }

  close(): void {
    this.closed = true;
    this.notify();
  }

  async *drain(): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const item = this.items.shift();
      if (item !== undefined) {
        yield item;
        continue;
      }
      if (this.closed) {
        return;
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

/**
 * Concurrent multi-service query dispatcher
 */
export class Orchestrator {
  private readonly adapters: AdapterRegistry;
  private readonly sessionStore: SessionStore;
  private readonly settings: OrchestratorSettings;
  private readonly locks: ServiceLockManager;
  private readonly synthesizer: Synthesizer;
  private readonly clarify: ClarificationStrategy | undefined;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly active: Map<QueryId, AbortController> = new Map();

  constructor(deps: OrchestratorDeps) {
    this.adapters = deps.adapters;
    this.sessionStore = deps.sessionStore;
    this.settings = {
      timeoutMs: deps.settings?.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
      backoff: deps.settings?.backoff ?? DEFAULT_CONFIG.backoff,
      inputRetries: deps.settings?.inputRetries ?? DEFAULT_CONFIG.inputRetries,
      maxRetriesPerService: deps.settings?.maxRetriesPerService ?? DEFAULT_CONFIG.maxRetriesPerService,
    };
    this.locks = deps.locks ?? new ServiceLockManager();
    this.logger = deps.logger ?? createConsoleLogger('orchestrator');
    this.metrics = deps.metrics ?? defaultMetrics;
    this.synthesizer = deps.synthesizer ?? new Synthesizer({ logger: this.logger, metrics: this.metrics });
    this.clarify = deps.clarify;
    this.sleep = deps.sleep ?? sleep;
  }

  /**
   * Build a QueryRequest whose retry budget defaults to the configured one
   *
   * @throws InvalidQueryError listing every problem found
   */
  createRequest(input: CreateQueryInput, options: CreateQueryOptions = {}): QueryRequest {
    return createQueryRequest(input, {
      ...options,
      defaultMaxRetries: options.defaultMaxRetries ?? this.settings.maxRetriesPerService,
    });
  }

  /**
   * Dispatch a query to every target service and stream attempt snapshots
   *
   * The stream ends once every service has a final attempt
   * (succeeded or failed_terminal). Leaving the loop early cancels the query.
   *
   * @throws Error if a query with the same id is already running
   */
  dispatch(request: QueryRequest, options: DispatchOptions = {}): AsyncGenerator<ServiceAttempt, void, undefined> {
    return this.stream(request, options, { cancelled: false });
  }

  private async *stream(
    request: QueryRequest,
    options: DispatchOptions,
    outcome: { cancelled: boolean }
  ): AsyncGenerator<ServiceAttempt, void, undefined> {
    const abort = this.register(request.id, options.signal);
    const channel = new UpdateChannel<ServiceAttempt>();
    const startedAt = Date.now();
    let completed = false;

    const emit: Emit = (attempt) => {
      this.metrics.increment('orchestrator.attempt_update', {
        service: attempt.serviceId,
        status: attempt.status,
      });
      channel.push(attempt);
      if (options.onUpdate) {
        try {
          options.onUpdate(attempt);
        } catch (error) {
          this.logger.warn('onUpdate listener threw', {
            queryId: request.id,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    };

    this.logger.info('Dispatching query', {
      queryId: request.id,
      services: [...request.targetServices],
    });
    this.metrics.increment('orchestrator.dispatch', {});

    const tasks = request.targetServices.map((serviceId) =>
      this.runService(request, serviceId, abort.signal, emit)
    );
    const settled = Promise.allSettled(tasks).then((results) => {
      for (const result of results) {
        if (result.status === 'rejected') {
          this.logger.error('Service task failed unexpectedly', {
            queryId: request.id,
            error: result.reason instanceof Error ? result.reason.message : String(result.reason),
          });
        }
      }
      completed = true;
      channel.close();
    });

    try {
      yield* channel.drain();
    } finally {
      outcome.cancelled = abort.signal.aborted;
      if (!completed) {
        abort.abort();
      }
      await settled;
      this.unregister(request.id, abort);
      this.metrics.timing('orchestrator.duration', Date.now() - startedAt, {});
      this.logger.info('Query finished', { queryId: request.id, cancelled: abort.signal.aborted });
    }
  }

  /**
   * Dispatch, wait for every service, and synthesize the result
   */
  async submit(request: QueryRequest, options: DispatchOptions = {}): Promise<SynthesisResult> {
    const trail = new Map<string, ServiceAttempt>();
    const outcome = { cancelled: false };

    for await (const attempt of this.stream(request, options, outcome)) {
      trail.set(`${attempt.serviceId}#${attempt.attemptNumber}`, attempt);
    }

    return this.synthesizer.synthesize(request, [...trail.values()], { cancelled: outcome.cancelled });
  }

  /**
   * Cancel a running query
   *
   * @returns false when no query with that id is running
   */
  cancel(queryId: QueryId): boolean {
    const controller = this.active.get(queryId);
    if (!controller) {
      return false;
    }
    this.logger.info('Cancelling query', { queryId });
    controller.abort();
    return true;
  }

  isRunning(queryId: QueryId): boolean {
    return this.active.has(queryId);
  }

  private register(queryId: QueryId, external?: AbortSignal): AbortController {
    if (this.active.has(queryId)) {
      throw new Error(`Query ${queryId} is already running`);
    }
    const controller = new AbortController();
    if (external?.aborted) {
      controller.abort();
    } else {
      external?.addEventListener('abort', () => controller.abort(), { once: true });
    }
    this.active.set(queryId, controller);
    return controller;
  }

  private unregister(queryId: QueryId, controller: AbortController): void {
    if (this.active.get(queryId) === controller) {
      this.active.delete(queryId);
    }
  }

  private async runService(
    request: QueryRequest,
    serviceId: ServiceId,
    signal: AbortSignal,
    emit: Emit
  ): Promise<void> {
    const controller = new RetryController(request, serviceId, {
      backoff: this.settings.backoff,
      inputRetries: this.settings.inputRetries,
      clarify: this.clarify,
      logger: this.logger,
    });

    const adapter = this.adapters.get(serviceId);
    if (!adapter) {
      this.endService(controller, new SessionUnavailableError(`No adapter registered for ${serviceId}`), emit);
      return;
    }

    let release: ReleaseFn;
    try {
      release = await this.locks.acquire(serviceId, request.id, signal);
    } catch (error) {
      this.endService(controller, this.failureFor(error, signal), emit);
      return;
    }

    try {
      await this.runLocked(request, adapter, controller, signal, emit);
    } catch (error) {
      const failure = this.failureFor(error, signal);
      if (failure.kind === 'AuthenticationExpired') {
        await this.flagExpired(serviceId);
      }
      this.endService(controller, failure, emit);
    } finally {
      release();
    }
  }

  /**
   * Session setup and the attempt loop, under the service lock.
   * Throws only for setup failures; attempt failures go through the controller.
   */
  private async runLocked(
    request: QueryRequest,
    adapter: ServiceAdapter,
    controller: RetryController,
    signal: AbortSignal,
    emit: Emit
  ): Promise<void> {
    const serviceId = adapter.serviceId;

    if (signal.aborted) {
      throw new CancelledError();
    }

    const loaded = await this.sessionStore.load(serviceId);
    if (!loaded.found) {
      throw new AuthenticationExpiredError(`No persisted session for ${serviceId}; interactive login required`);
    }
    if (loaded.profile.authStatus === 'expired') {
      throw new AuthenticationExpiredError(`Persisted session for ${serviceId} has expired; interactive login required`);
    }

    const session = await adapter.open(loaded.authState, signal);
    try {
      const authenticated = await adapter.isAuthenticated(session, signal);
      if (!authenticated) {
        throw new AuthenticationExpiredError(`${serviceId} reports the session is not logged in`);
      }
      await this.sessionStore.markStatus(serviceId, 'valid');

      const succeeded = await this.attemptLoop(request, adapter, session, controller, signal, emit);
      if (succeeded) {
        await this.persistAuthState(adapter, session, loaded.profile.expiresAt);
      }
    } finally {
      await this.closeSession(adapter, session);
    }
  }

  private async attemptLoop(
    request: QueryRequest,
    adapter: ServiceAdapter,
    session: SessionHandle,
    controller: RetryController,
    signal: AbortSignal,
    emit: Emit
  ): Promise<boolean> {
    const serviceId = adapter.serviceId;

    while (!controller.finished) {
      const pending = controller.begin();
      emit(pending);

      if (signal.aborted) {
        emit(controller.terminate(new CancelledError()));
        return false;
      }

      emit(controller.dispatch());
      this.metrics.increment('orchestrator.dispatched', { service: serviceId });

      let evidence: { rawResponse: string; extractedCitations: Citation[] } | null = null;
      let validation: ValidationResult | null = null;
      try {
        const handle = await adapter.submitQuery(session, pending.prompt, signal);
        const raw = await adapter.awaitResponse(handle, this.settings.timeoutMs, signal);
        evidence = { rawResponse: raw.text, extractedCitations: adapter.extractCitations(raw) };

        validation = validate(evidence, request.rubric);
        if (validation.passed) {
          emit(controller.succeed({ ...evidence, validation }));
          this.metrics.increment('orchestrator.succeeded', { service: serviceId });
          return true;
        }
        throw new ValidationFailedError(validation.missingElements);
      } catch (error) {
        const failure = this.failureFor(error, signal);

        if (failure.kind === 'Cancelled') {
          emit(controller.terminate(failure, evidence ? { ...evidence } : {}));
          return false;
        }
        if (failure.kind === 'AuthenticationExpired') {
          await this.flagExpired(serviceId);
        }

        const { attempt, decision } = controller.fail(failure, evidence ? { ...evidence, validation } : {});
        emit(attempt);
        this.metrics.increment('orchestrator.failed', { service: serviceId, kind: failure.kind });

        if (decision.action === 'retry') {
          await this.sleep(decision.delayMs, signal).catch((sleepError: unknown) => {
            if (!(sleepError instanceof CancelledError)) {
              throw sleepError;
            }
          });
        }
      }
    }
    return false;
  }

  /**
   * Final failed_terminal attempt for a service that cannot continue
   */
  private endService(controller: RetryController, error: OrchestratorError, emit: Emit): void {
    if (controller.finished) {
      return;
    }
    const current = controller.current;
    if (!current || (current.status !== 'pending' && current.status !== 'dispatched')) {
      emit(controller.begin());
    }
    emit(controller.terminate(error));
  }

  private failureFor(error: unknown, signal: AbortSignal): OrchestratorError {
    if (signal.aborted) {
      return error instanceof CancelledError ? error : new CancelledError();
    }
    const failure = toOrchestratorError(error);
    // Only a cancel request for this query counts as Cancelled
    if (failure.kind === 'Cancelled') {
      return new OrchestratorError('Unknown', failure.message, { cause: error });
    }
    return failure;
  }

  private async flagExpired(serviceId: ServiceId): Promise<void> {
    try {
      await this.sessionStore.markStatus(serviceId, 'expired');
    } catch (error) {
      this.logger.error('Failed to flag session as expired', {
        serviceId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async persistAuthState(
    adapter: ServiceAdapter,
    session: SessionHandle,
    expiresAt: string | null
  ): Promise<void> {
    if (!adapter.captureAuthState) {
      return;
    }
    try {
      const state = await adapter.captureAuthState(session);
      if (state) {
        await this.sessionStore.save(adapter.serviceId, state, { expiresAt });
      }
    } catch (error) {
      this.logger.warn('Failed to persist refreshed session state', {
        serviceId: adapter.serviceId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async closeSession(adapter: ServiceAdapter, session: SessionHandle): Promise<void> {
    if (!adapter.close) {
      return;
    }
    try {
      await adapter.close(session);
    } catch (error) {
      this.logger.warn('Failed to close session', {
        serviceId: adapter.serviceId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export interface CreateOrchestratorOptions {
  adapters?: ServiceAdapter[];
  /** Reference HTTP adapters; poll settings default to the configuration */
  http?: HttpChatAdapterConfig[];
  sessionStore?: SessionStore;
  logger?: Logger;
  metrics?: Metrics;
}

/**
 * Wire an Orchestrator from loaded configuration
 *
 * @throws Error when two adapters share a service id
 */
export function createOrchestrator(config: OrchestratorConfig, options: CreateOrchestratorOptions = {}): Orchestrator {
  const logger = options.logger ?? createConsoleLogger('orchestrator');
  const metrics = options.metrics ?? defaultMetrics;

  const httpAdapters = (options.http ?? []).map(
    (httpConfig) =>
      new HttpChatServiceAdapter({
        ...httpConfig,
        pollIntervalMs: httpConfig.pollIntervalMs ?? config.pollIntervalMs,
        stablePolls: httpConfig.stablePolls ?? config.stablePolls,
      })
  );

  const adapters = new Map<ServiceId, ServiceAdapter>();
  for (const adapter of [...(options.adapters ?? []), ...httpAdapters]) {
    if (adapters.has(adapter.serviceId)) {
      throw new Error(`Duplicate adapter for ${adapter.serviceId}`);
    }
    adapters.set(adapter.serviceId, adapter);
  }

  const sessionStore =
    options.sessionStore ??
    new FileSessionStore(config.sessionDir, { maxAgeMs: config.sessionMaxAgeMs, logger });

  const summarizer = config.summarizer
    ? new ClaudeSummarizer({ apiKey: config.summarizer.apiKey, model: config.summarizer.model, logger, metrics })
    : null;

  return new Orchestrator({
    adapters,
    sessionStore,
    settings: {
      timeoutMs: config.timeoutMs,
      backoff: config.backoff,
      inputRetries: config.inputRetries,
      maxRetriesPerService: config.maxRetriesPerService,
    },
    synthesizer: new Synthesizer({ summarizer, logger, metrics }),
    logger,
    metrics,
  });
}
