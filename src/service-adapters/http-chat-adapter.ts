/**
 * HTTP chat service adapter
 *
 * Reference API adapter for services that expose a conversation
 * API behind a cookie-authenticated web session:
 *
 * - GET  {healthPath}                  reachability check on open (optional)
 * - GET  {probePath}                   200 when the session is logged in
 * - POST one of {submitPaths}          body `{ prompt }`, returns `{ id }`
 * - GET  {conversationPath with :id}   returns `{ text }`, growing while the answer streams
 *
 * Cookies set by the service during a run are folded back into the
 * session so the orchestrator can persist them.
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { AuthState, Citation, Logger, ServiceId, StoredCookie } from '../types/index.js';
import {
  AuthenticationExpiredError,
  CancelledError,
  OrchestratorError,
  RateLimitedError,
  SessionUnavailableError,
  TimeoutError,
  toOrchestratorError,
} from '../errors/index.js';
import { createConsoleLogger } from '../observability/index.js';
import type {
  AttemptHandle,
  RawResponse,
  ServiceAdapter,
  SessionHandle,
} from './index.js';
import { runDetectionStrategies, type DetectionStrategy } from './detection.js';
import { pollUntilStable } from './polling.js';
import { extractCitationsFromText } from './citations.js';

export interface HttpChatAdapterConfig {
  serviceId: ServiceId;
  baseURL: string;
  probePath: string;
  /** Tried in order; the first that accepts the prompt wins */
  submitPaths: string[];
  /** Must contain ":id" */
  conversationPath: string;
  healthPath?: string;
  pollIntervalMs?: number;
  stablePolls?: number;
  /** Per-request timeout */
  requestTimeoutMs?: number;
  /** Injected client (tests, proxies); one is created from baseURL otherwise */
  http?: AxiosInstance;
  logger?: Logger;
}

export interface HttpChatSession extends SessionHandle {
  client: AxiosInstance;
  cookies: StoredCookie[];
  localStorage: Record<string, string>;
}

export interface HttpChatAttempt extends AttemptHandle {
  session: HttpChatSession;
  conversationId: string;
  endpoint: string;
}

const HTTP_UNAVAILABLE_STATUSES = new Set([502, 503, 504]);
const HTTP_NOT_APPLICABLE_STATUSES = new Set([404, 405, 415, 422]);

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds
 */
function parseRetryAfter(value: unknown, now: number = Date.now()): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.max(0, value * 1000);
  }
  if (typeof value !== 'string' || value.trim() === '') {
    return null;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? null : Math.max(0, date - now);
}

/**
 * Map an axios failure onto the error taxonomy
 */
export function mapHttpError(error: unknown, serviceId: ServiceId, requestTimeoutMs = 0): OrchestratorError {
  if (error instanceof OrchestratorError) {
    return error;
  }
  if (!axios.isAxiosError(error)) {
    return toOrchestratorError(error);
  }

  if (error.code === 'ERR_CANCELED') {
    return new CancelledError(`Request to ${serviceId} was cancelled`);
  }

  const response = error.response;
  if (!response) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new TimeoutError(`Request to ${serviceId} timed out`, requestTimeoutMs);
    }
    return new SessionUnavailableError(`${serviceId} is unreachable: ${error.message}`, { cause: error });
  }

  const status = response.status;
  if (status === 401 || status === 403) {
    return new AuthenticationExpiredError(`${serviceId} rejected the session (HTTP ${status})`, { cause: error });
  }
  if (status === 429) {
    return new RateLimitedError(
      `${serviceId} is rate limiting requests`,
      parseRetryAfter(response.headers['retry-after']),
      { cause: error }
    );
  }
  if (HTTP_UNAVAILABLE_STATUSES.has(status)) {
    return new SessionUnavailableError(`${serviceId} is unavailable (HTTP ${status})`, { cause: error });
  }
  return new OrchestratorError('Unknown', `${serviceId} returned HTTP ${status}`, { cause: error });
}

function cookieHeader(cookies: StoredCookie[]): string {
  return cookies.map((cookie) => `${cookie.name}=${cookie.value}`).join('; ');
}

/**
 * Parse Set-Cookie header lines into stored cookies
 */
export function parseSetCookie(lines: string[]): StoredCookie[] {
  const cookies: StoredCookie[] = [];
  for (const line of lines) {
    const [pair, ...attributes] = line.split(';');
    const separator = pair?.indexOf('=') ?? -1;
    if (!pair || separator <= 0) continue;

    const cookie: StoredCookie = {
      name: pair.slice(0, separator).trim(),
      value: pair.slice(separator + 1).trim(),
    };
    for (const attribute of attributes) {
      const [rawKey, ...rest] = attribute.split('=');
      const key = rawKey?.trim().toLowerCase();
      const value = rest.join('=').trim();
      if (key === 'domain') cookie.domain = value;
      if (key === 'path') cookie.path = value;
      if (key === 'expires') {
        const expires = Date.parse(value);
        if (!Number.isNaN(expires)) cookie.expires = Math.floor(expires / 1000);
      }
    }
    cookies.push(cookie);
  }
  return cookies;
}

function readConversationId(data: unknown): string | null {
  if (typeof data !== 'object' || data === null) return null;
  const id = 'id' in data ? data.id : 'conversationId' in data ? data.conversationId : undefined;
  return typeof id === 'string' && id.length > 0 ? id : null;
}

function readText(data: unknown): string | null {
  if (typeof data !== 'object' || data === null || !('text' in data)) return null;
  return typeof data.text === 'string' ? data.text : null;
}

/**
 * API ServiceAdapter over axios
 */
export class HttpChatServiceAdapter implements ServiceAdapter<HttpChatSession, HttpChatAttempt> {
  readonly serviceId: ServiceId;
  readonly kind = 'api' as const;

  private readonly config: HttpChatAdapterConfig;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly stablePolls: number;
  private readonly requestTimeoutMs: number;

  constructor(config: HttpChatAdapterConfig) {
    if (!config.conversationPath.includes(':id')) {
      throw new Error('conversationPath must contain ":id"');
    }
    this.config = config;
    this.serviceId = config.serviceId;
    this.logger = config.logger ?? createConsoleLogger(`adapter:${config.serviceId}`);
    this.pollIntervalMs = config.pollIntervalMs ?? 1000;
    this.stablePolls = config.stablePolls ?? 3;
    this.requestTimeoutMs = config.requestTimeoutMs ?? 15000;
  }

  async open(authState: AuthState | null, signal?: AbortSignal): Promise<HttpChatSession> {
    const client =
      this.config.http ??
      axios.create({ baseURL: this.config.baseURL, timeout: this.requestTimeoutMs });

    const session: HttpChatSession = {
      serviceId: this.serviceId,
      openedAt: new Date().toISOString(),
      client,
      cookies: authState ? [...authState.cookies] : [],
      localStorage: authState ? { ...authState.localStorage } : {},
    };

    if (this.config.healthPath) {
      await this.request(session, 'get', this.config.healthPath, undefined, signal);
    }

    this.logger.debug('Session opened', { cookies: session.cookies.length });
    return session;
  }

  async isAuthenticated(session: HttpChatSession, signal?: AbortSignal): Promise<boolean> {
    try {
      await this.request(session, 'get', this.config.probePath, undefined, signal);
      return true;
    } catch (error) {
      if (error instanceof AuthenticationExpiredError) {
        this.logger.info('Authentication probe rejected', { error: error.message });
        return false;
      }
      throw error;
    }
  }

  async submitQuery(session: HttpChatSession, text: string, signal?: AbortSignal): Promise<HttpChatAttempt> {
    const strategies = this.config.submitPaths.map(
      (endpoint): DetectionStrategy<{ endpoint: string; conversationId: string }> => ({
        name: `POST ${endpoint}`,
        attempt: async (strategySignal?: AbortSignal) => {
          let response: AxiosResponse<unknown>;
          try {
            response = await this.request(session, 'post', endpoint, { prompt: text }, strategySignal);
          } catch (error) {
            if (this.isNotApplicable(error)) {
              return null;
            }
            throw error;
          }
          const conversationId = readConversationId(response.data);
          return conversationId ? { endpoint, conversationId } : null;
        },
      })
    );

    const outcome = await runDetectionStrategies(strategies, { signal, logger: this.logger });
    this.logger.info('Query submitted', {
      endpoint: outcome.value.endpoint,
      conversationId: outcome.value.conversationId,
    });

    return {
      serviceId: this.serviceId,
      submittedAt: new Date().toISOString(),
      session,
      conversationId: outcome.value.conversationId,
      endpoint: outcome.value.endpoint,
    };
  }

  async awaitResponse(attempt: HttpChatAttempt, timeoutMs: number, signal?: AbortSignal): Promise<RawResponse> {
    const path = this.config.conversationPath.replace(':id', encodeURIComponent(attempt.conversationId));

    const result = await pollUntilStable(
      async (pollSignal) => {
        const response = await this.request(attempt.session, 'get', path, undefined, pollSignal);
        return readText(response.data);
      },
      {
        intervalMs: this.pollIntervalMs,
        stablePolls: this.stablePolls,
        timeoutMs,
        signal,
      }
    );

    return { text: result.text, receivedAt: new Date().toISOString(), polls: result.polls };
  }

  extractCitations(raw: RawResponse): Citation[] {
    try {
      return extractCitationsFromText(raw.text);
    } catch (error) {
      this.logger.warn('Citation extraction failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  async captureAuthState(session: HttpChatSession): Promise<AuthState | null> {
    if (session.cookies.length === 0) {
      return null;
    }
    return { cookies: [...session.cookies], localStorage: { ...session.localStorage } };
  }

  private async request(
    session: HttpChatSession,
    method: 'get' | 'post',
    url: string,
    data: unknown,
    signal?: AbortSignal
  ): Promise<AxiosResponse<unknown>> {
    try {
      const response = await session.client.request<unknown>({
        method,
        url,
        data,
        signal,
        headers: session.cookies.length > 0 ? { Cookie: cookieHeader(session.cookies) } : {},
      });
      this.absorbCookies(session, response.headers['set-cookie']);
      return response;
    } catch (error) {
      throw mapHttpError(error, this.serviceId, this.requestTimeoutMs);
    }
  }

  private absorbCookies(session: HttpChatSession, setCookie: unknown): void {
    if (!Array.isArray(setCookie)) return;
    const lines = setCookie.filter((line): line is string => typeof line === 'string');
    for (const cookie of parseSetCookie(lines)) {
      const index = session.cookies.findIndex((existing) => existing.name === cookie.name);
      if (index >= 0) {
        session.cookies[index] = cookie;
      } else {
        session.cookies.push(cookie);
      }
    }
  }

  private isNotApplicable(error: unknown): boolean {
    if (!(error instanceof OrchestratorError)) return false;
    const cause = error.cause;
    if (!axios.isAxiosError(cause)) return false;
    const status = cause.response?.status;
    return status !== undefined && HTTP_NOT_APPLICABLE_STATUSES.has(status);
  }
}
