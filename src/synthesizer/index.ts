/**
 * Synthesizer Module
 *
 * Merges the final attempt of every target service into one
 * SynthesisResult:
 *
 * - Responses are split into sentences and normalised to token sets
 * - A sentence that at least two services share (token Jaccard >= threshold)
 *   becomes a common insight
 * - Everything else is kept verbatim as that service's unique content
 * - Failed services are listed with their reason
 * - Divergence notes record services with no overlap and shared claims
 *   whose figures or direction disagree
 *
 * An optional SummarizationStep (ClaudeSummarizer, via @anthropic-ai/sdk)
 * writes the merged summary; on any error the extractive summary is used.
 *
 * Usage:
 * ```typescript
 * const synthesizer = new Synthesizer({ summarizer: new ClaudeSummarizer({ apiKey }) });
 * const result = await synthesizer.synthesize(request, attempts);
 * ```
 */

import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/messages';
import type {
  CommonInsight,
  ErrorKind,
  Logger,
  Metrics,
  QueryRequest,
  ServiceAttempt,
  ServiceId,
  ServiceOutcome,
  SynthesisConfidence,
  SynthesisResult,
} from '../types/index.js';
import { DEFAULT_MODEL } from '../config/index.js';
import { describeErrorKind } from '../errors/index.js';
import { countWords } from '../validator/index.js';
import { createConsoleLogger, defaultMetrics } from '../observability/index.js';

// ============================================================================
// Text Analysis
// ============================================================================

export const DEFAULT_OVERLAP_THRESHOLD = 0.5;

const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'has', 'have',
  'in', 'is', 'it', 'its', 'of', 'on', 'or', 'that', 'the', 'this', 'to', 'was',
  'were', 'which', 'with',
]);

const UNCERTAINTY_PHRASES = ['might be', 'possibly', 'perhaps', 'unsure', 'not certain'];

const OPPOSITES: Array<[string, string]> = [
  ['increase', 'decrease'],
  ['increases', 'decreases'],
  ['rise', 'fall'],
  ['rises', 'falls'],
  ['higher', 'lower'],
  ['more', 'less'],
];

export interface Sentence {
  text: string;
  tokens: Set<string>;
  /** Three words or more; shorter fragments never match across services */
  comparable: boolean;
}

/**
 * Split a response into sentences
 *
 * Markdown list and heading markers are stripped and empty fragments
 * dropped. Fragments under three words (headings, reference lines) are
 * kept but not compared.
 */
export function splitSentences(text: string): Sentence[] {
  return text
    .split(/\n+/)
    .map((line) => line.trim().replace(/^(?:#{1,6}\s*|[-*+]\s+|\d+[.)]\s+|>\s*)/, ''))
    .flatMap((line) => line.split(/(?<=[.!?])\s+/))
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => ({ text: part, tokens: tokenize(part), comparable: countWords(part) >= 3 }));
}

/**
 * Lowercased content words
 */
export function tokenize(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^a-z0-9%]+/)
      .filter((token) => token.length > 0 && !STOPWORDS.has(token))
  );
}

export function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 && b.size === 0) return 0;
  let shared = 0;
  for (const token of a) {
    if (b.has(token)) shared += 1;
  }
  return shared / (a.size + b.size - shared);
}

function numbersIn(text: string): string[] {
  return (text.match(/\d+(?:[.,]\d+)?%?/g) ?? []).map((n) => n.replace(',', '.'));
}

function sameNumbers(a: string[], b: string[]): boolean {
  const left = [...new Set(a)].sort();
  const right = [...new Set(b)].sort();
  return left.length === right.length && left.every((value, i) => value === right[i]);
}

function hasOppositeTerms(a: Set<string>, b: Set<string>): boolean {
  return OPPOSITES.some(([x, y]) => (a.has(x) && b.has(y)) || (a.has(y) && b.has(x)));
}

/**
 * Confidence in one response, from 0 to 1
 *
 * Starts at 0.5; short answers (< 50 chars) x0.7, detailed ones
 * (> 500 chars) x1.1, hedged ones x0.8.
 */
export function responseConfidence(text: string): number {
  let confidence = 0.5;
  if (text.length < 50) {
    confidence *= 0.7;
  } else if (text.length > 500) {
    confidence *= 1.1;
  }
  const lower = text.toLowerCase();
  if (UNCERTAINTY_PHRASES.some((phrase) => lower.includes(phrase))) {
    confidence *= 0.8;
  }
  return Math.min(confidence, 1);
}

/**
 * Overall confidence: average response confidence, +0.05 per succeeded
 * service (max +0.2), -0.1 per disagreement
 */
export function overallConfidence(scores: number[], disagreements: number): SynthesisConfidence {
  if (scores.length === 0) {
    return 'low';
  }
  const average = scores.reduce((sum, score) => sum + score, 0) / scores.length;
  const bonus = Math.min(scores.length * 0.05, 0.2);
  const value = Math.max(0, Math.min(1, average + bonus - disagreements * 0.1));
  if (value >= 0.6) return 'high';
  if (value >= 0.4) return 'medium';
  return 'low';
}

// ============================================================================
// Summarization
// ============================================================================

export interface SummarizationInput {
  prompt: string;
  responses: Array<{ serviceId: ServiceId; text: string }>;
  commonInsights: CommonInsight[];
  uniqueContent: Record<ServiceId, string[]>;
  divergenceNotes: string[];
}

/**
 * Writes mergedSummary from the analysed responses
 */
export interface SummarizationStep {
  summarize(input: SummarizationInput): Promise<string>;
}

/**
 * The part of the Anthropic client the summarizer uses
 */
export interface SummaryClient {
  messages: {
    create(params: MessageCreateParamsNonStreaming): PromiseLike<{ content: ReadonlyArray<{ type: string }> }>;
  };
}

export interface ClaudeSummarizerConfig {
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  /** Request timeout in milliseconds (default: 60000) */
  timeout?: number;
  client?: SummaryClient;
  logger?: Logger;
  metrics?: Metrics;
}

const SUMMARY_SYSTEM_PROMPT =
  'You merge answers from several AI assistants into one concise summary. ' +
  'Keep points the assistants agree on, attribute points only one of them made, ' +
  'and state disagreements plainly. Do not add facts that are not in the answers.';

function buildSummaryPrompt(input: SummarizationInput): string {
  const sections = [
    `Question:\n${input.prompt}`,
    ...input.responses.map((response) => `Answer from ${response.serviceId}:\n${response.text}`),
  ];
  if (input.divergenceNotes.length > 0) {
    sections.push(`Known disagreements:\n${input.divergenceNotes.map((note) => `- ${note}`).join('\n')}`);
  }
  sections.push('Write the merged summary as plain prose, at most three paragraphs.');
  return sections.join('\n\n');
}

/**
 * SummarizationStep backed by the Claude Messages API
 */
export class ClaudeSummarizer implements SummarizationStep {
  private readonly client: SummaryClient;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(config: ClaudeSummarizerConfig = {}) {
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? 1024;
    this.logger = config.logger ?? createConsoleLogger('synthesizer');
    this.metrics = config.metrics ?? defaultMetrics;

    if (config.client) {
      this.client = config.client;
    } else {
      const apiKey = config.apiKey ?? process.env.ANTHROPIC_API_KEY;
      if (!apiKey) {
        throw new Error('ANTHROPIC_API_KEY is required. Set it in config or environment variable.');
      }
      this.client = new Anthropic({ apiKey, timeout: config.timeout ?? 60000 });
    }
  }

  async summarize(input: SummarizationInput): Promise<string> {
    const startTime = Date.now();
    this.logger.info('Calling Claude API for summary', {
      model: this.model,
      responses: input.responses.length,
    });
    this.metrics.increment('synthesizer.claude.calls', { model: this.model });

    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: 0.2,
      system: SUMMARY_SYSTEM_PROMPT,
      messages: [{ role: 'user', content: buildSummaryPrompt(input) }],
    });

    const text = response.content
      .map((block) => ('text' in block && typeof block.text === 'string' ? block.text : ''))
      .join('')
      .trim();

    if (text === '') {
      throw new Error('No text content in Claude response');
    }

    this.metrics.timing('synthesizer.claude.duration', Date.now() - startTime, { model: this.model });
    return text;
  }
}

// ============================================================================
// Synthesis
// ============================================================================

export interface SynthesisOptions {
  cancelled?: boolean;
}

export interface SynthesizerConfig {
  summarizer?: SummarizationStep | null;
  /** Minimum token Jaccard for two sentences to count as the same insight */
  overlapThreshold?: number;
  logger?: Logger;
  metrics?: Metrics;
  now?: () => Date;
}

interface ServiceSentences {
  serviceId: ServiceId;
  text: string;
  sentences: Sentence[];
  claimed: boolean[];
}

/**
 * Final attempt per service: the highest attemptNumber seen
 */
function finalAttempts(attempts: ServiceAttempt[]): Map<ServiceId, ServiceAttempt> {
  const finals = new Map<ServiceId, ServiceAttempt>();
  for (const attempt of attempts) {
    const existing = finals.get(attempt.serviceId);
    if (!existing || attempt.attemptNumber >= existing.attemptNumber) {
      finals.set(attempt.serviceId, attempt);
    }
  }
  return finals;
}

function outcomeFor(attempt: ServiceAttempt | undefined, cancelled: boolean): ServiceOutcome {
  if (!attempt) {
    const kind: ErrorKind = cancelled ? 'Cancelled' : 'Unknown';
    return {
      status: 'failed',
      kind,
      reason: cancelled ? describeErrorKind(kind) : 'No attempt was made',
      attempt: null,
    };
  }
  if (attempt.status === 'succeeded') {
    return { status: 'succeeded', attempt };
  }
  const kind: ErrorKind = attempt.failure?.kind ?? (cancelled ? 'Cancelled' : 'Unknown');
  const detail = attempt.failure?.missingElements?.length
    ? `missing ${attempt.failure.missingElements.join(', ')}`
    : attempt.failure?.message;
  return {
    status: 'failed',
    kind,
    reason: detail ? `${describeErrorKind(kind)}: ${detail}` : describeErrorKind(kind),
    attempt,
  };
}

/**
 * Deterministic synthesis without the summarization step
 */
export function buildSynthesis(
  request: QueryRequest,
  attempts: ServiceAttempt[],
  options: SynthesisOptions & { overlapThreshold?: number; generatedAt?: string } = {}
): SynthesisResult {
  const threshold = options.overlapThreshold ?? DEFAULT_OVERLAP_THRESHOLD;
  const cancelled = options.cancelled ?? false;
  const order = new Map(request.targetServices.map((serviceId, index) => [serviceId, index]));
  const finals = finalAttempts(attempts);

  const perService: Record<ServiceId, ServiceOutcome> = {};
  const analysed: ServiceSentences[] = [];
  for (const serviceId of request.targetServices) {
    const outcome = outcomeFor(finals.get(serviceId), cancelled);
    perService[serviceId] = outcome;
    if (outcome.status === 'succeeded') {
      const text = outcome.attempt.rawResponse ?? '';
      const sentences = splitSentences(text);
      analysed.push({ serviceId, text, sentences, claimed: sentences.map(() => false) });
    }
  }

  const commonInsights: CommonInsight[] = [];
  const divergenceNotes: string[] = [];
  let disagreements = 0;

  analysed.forEach((source, sourceIndex) => {
    source.sentences.forEach((sentence, sentenceIndex) => {
      if (source.claimed[sentenceIndex] || !sentence.comparable) return;

      const services: ServiceId[] = [source.serviceId];
      for (const other of analysed.slice(sourceIndex + 1)) {
        let best = -1;
        let bestScore = 0;
        other.sentences.forEach((candidate, candidateIndex) => {
          if (other.claimed[candidateIndex] || !candidate.comparable) return;
          const score = jaccard(sentence.tokens, candidate.tokens);
          if (score >= threshold && score > bestScore) {
            best = candidateIndex;
            bestScore = score;
          }
        });

        const match = other.sentences[best];
        if (!match) continue;
        other.claimed[best] = true;
        services.push(other.serviceId);

        const leftNumbers = numbersIn(sentence.text);
        const rightNumbers = numbersIn(match.text);
        if (leftNumbers.length > 0 && rightNumbers.length > 0 && !sameNumbers(leftNumbers, rightNumbers)) {
          divergenceNotes.push(
            `${source.serviceId} and ${other.serviceId} give different figures for "${sentence.text}" ` +
              `(${leftNumbers.join(', ')} vs ${rightNumbers.join(', ')})`
          );
          disagreements += 1;
        } else if (hasOppositeTerms(sentence.tokens, match.tokens)) {
          divergenceNotes.push(
            `${source.serviceId} and ${other.serviceId} disagree on direction: "${sentence.text}" vs "${match.text}"`
          );
          disagreements += 1;
        }
      }

      if (services.length >= 2) {
        source.claimed[sentenceIndex] = true;
        commonInsights.push({ text: sentence.text, services });
      }
    });
  });

  const uniqueContent: Record<ServiceId, string[]> = {};
  for (const entry of analysed) {
    uniqueContent[entry.serviceId] = entry.sentences
      .filter((_, index) => !entry.claimed[index])
      .map((sentence) => sentence.text);
    if (analysed.length >= 2 && !entry.claimed.some(Boolean)) {
      divergenceNotes.push(`${entry.serviceId} shares no content with the other services`);
    }
  }

  const scores = analysed.map((entry) => responseConfidence(entry.text));
  const total = scores.reduce((sum, score) => sum + score, 0);
  const serviceContributions: Record<ServiceId, number> = {};
  analysed.forEach((entry, index) => {
    serviceContributions[entry.serviceId] =
      total === 0 ? 1 / analysed.length : (scores[index] ?? 0) / total;
  });

  const auditTrail = [...attempts].sort(
    (a, b) =>
      (order.get(a.serviceId) ?? Number.MAX_SAFE_INTEGER) - (order.get(b.serviceId) ?? Number.MAX_SAFE_INTEGER) ||
      a.attemptNumber - b.attemptNumber
  );

  return {
    queryId: request.id,
    prompt: request.originalPrompt,
    perService,
    mergedSummary: extractiveSummary(commonInsights, uniqueContent, analysed.length),
    commonInsights,
    uniqueContent,
    divergenceNotes,
    serviceContributions,
    confidence: overallConfidence(scores, disagreements),
    cancelled,
    auditTrail,
    generatedAt: options.generatedAt ?? new Date().toISOString(),
  };
}

/**
 * Common insights first, then each service's additions
 */
export function extractiveSummary(
  commonInsights: CommonInsight[],
  uniqueContent: Record<ServiceId, string[]>,
  succeeded: number
): string {
  if (succeeded === 0) {
    return 'No service returned a usable response.';
  }
  const parts: string[] = [];
  if (commonInsights.length > 0) {
    parts.push(commonInsights.map((insight) => insight.text).join(' '));
  }
  for (const [serviceId, sentences] of Object.entries(uniqueContent)) {
    if (sentences.length > 0) {
      parts.push(`${serviceId} adds: ${sentences.join(' ')}`);
    }
  }
  return parts.join('\n\n');
}

/**
 * Synthesizer with an optional summarization step
 */
export class Synthesizer {
  private readonly summarizer: SummarizationStep | null;
  private readonly overlapThreshold: number;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly now: () => Date;

  constructor(config: SynthesizerConfig = {}) {
    this.summarizer = config.summarizer ?? null;
    this.overlapThreshold = config.overlapThreshold ?? DEFAULT_OVERLAP_THRESHOLD;
    this.logger = config.logger ?? createConsoleLogger('synthesizer');
    this.metrics = config.metrics ?? defaultMetrics;
    this.now = config.now ?? (() => new Date());
  }

  async synthesize(
    request: QueryRequest,
    attempts: ServiceAttempt[],
    options: SynthesisOptions = {}
  ): Promise<SynthesisResult> {
    const result = buildSynthesis(request, attempts, {
      ...options,
      overlapThreshold: this.overlapThreshold,
      generatedAt: this.now().toISOString(),
    });

    const responses = request.targetServices.flatMap((serviceId) => {
      const outcome = result.perService[serviceId];
      return outcome?.status === 'succeeded' ? [{ serviceId, text: outcome.attempt.rawResponse ?? '' }] : [];
    });

    this.logger.info('Synthesis complete', {
      queryId: request.id,
      succeeded: responses.length,
      commonInsights: result.commonInsights.length,
      confidence: result.confidence,
    });
    this.metrics.gauge('synthesizer.common_insights', result.commonInsights.length, {});

    if (!this.summarizer || responses.length === 0) {
      return result;
    }

    try {
      const summary = await this.summarizer.summarize({
        prompt: request.originalPrompt,
        responses,
        commonInsights: result.commonInsights,
        uniqueContent: result.uniqueContent,
        divergenceNotes: result.divergenceNotes,
      });
      return { ...result, mergedSummary: summary };
    } catch (error) {
      this.logger.warn('Summarization failed; using extractive summary', {
        queryId: request.id,
        error: error instanceof Error ? error.message : String(error),
      });
      this.metrics.increment('synthesizer.summary_fallback', {});
      return result;
    }
  }
}
