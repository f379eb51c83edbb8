/**
 * Service Adapter Module
 *
 * Responsibilities:
 * - Define the ServiceAdapter capability interface every service implements
 * - Run ordered input-detection strategies (first success wins)
 * - Poll a growing response until it stops changing
 * - Extract citations from response text
 *
 * How an adapter drives its service (browser automation, desktop UI
 * automation, a native API) is its own business. The orchestrator only
 * sees the interface below and the error taxonomy in ../errors.
 */

import type { AuthState, Citation, ServiceId } from '../types/index.js';

export type AdapterKind = 'browser' | 'desktop' | 'api';

/**
 * Session-bound context returned by open()
 */
export interface SessionHandle {
  readonly serviceId: ServiceId;
  readonly openedAt: string;
}

/**
 * Reference to a submitted, not yet completed, query
 */
export interface AttemptHandle {
  readonly serviceId: ServiceId;
  readonly submittedAt: string;
}

export interface RawResponse {
  text: string;
  receivedAt: string;
  /** Number of polls it took to see a stable response */
  polls: number;
}

/**
 * Capability interface for one external AI service
 */
export interface ServiceAdapter<
  S extends SessionHandle = SessionHandle,
  A extends AttemptHandle = AttemptHandle,
> {
  readonly serviceId: ServiceId;
  readonly kind: AdapterKind;

  /**
   * Establish a session using persisted auth state when there is one
   * @throws SessionUnavailableError when the service cannot be reached
   */
  open(authState: AuthState | null, signal?: AbortSignal): Promise<S>;

  /** Cheap probe; must not change any state when it fails */
  isAuthenticated(session: S, signal?: AbortSignal): Promise<boolean>;

  /**
   * Submit without waiting for the answer
   * @throws InputUnavailableError when no entry point can be found
   */
  submitQuery(session: S, text: string, signal?: AbortSignal): Promise<A>;

  /**
   * Wait until the response has stopped growing
   * @throws TimeoutError when it is still growing after timeoutMs
   */
  awaitResponse(attempt: A, timeoutMs: number, signal?: AbortSignal): Promise<RawResponse>;

  /** Best effort; never throws */
  extractCitations(raw: RawResponse): Citation[];

  /** Current auth state, for persisting refreshed cookies after a successful run */
  captureAuthState?(session: S): Promise<AuthState | null>;

  close?(session: S): Promise<void>;
}

/**
 * Adapters by serviceId
 */
export type AdapterRegistry = ReadonlyMap<ServiceId, ServiceAdapter>;

export { runDetectionStrategies } from './detection.js';
export type { DetectionStrategy, DetectionOutcome } from './detection.js';
export { pollUntilStable } from './polling.js';
export type { PollOptions, PollResult } from './polling.js';
export { extractCitationsFromText } from './citations.js';
export { HttpChatServiceAdapter, mapHttpError } from './http-chat-adapter.js';
export type { HttpChatAdapterConfig, HttpChatSession, HttpChatAttempt } from './http-chat-adapter.js';
