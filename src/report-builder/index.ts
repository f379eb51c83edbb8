/**
 * Report Builder Module
 *
 * The SynthesisResult is the only canonical artifact. Every format here
 * is a view derived from it: no clock reads, no randomness, so rendering
 * the same result twice gives byte-identical output.
 *
 * Formats:
 * - Markdown (saved as report.md in the audit record)
 * - Plain text (terminal output)
 * - JSON (key/value form carrying every SynthesisResult field)
 */

import type {
  Citation,
  ServiceAttempt,
  ServiceId,
  ServiceOutcome,
  SynthesisResult,
} from '../types/index.js';

// ============================================================================
// Helpers
// ============================================================================

function formatShare(share: number): string {
  return `${(share * 100).toFixed(1)}%`;
}

function formatCitation(citation: Citation): string {
  if (citation.url === null) return citation.label;
  return citation.label === citation.url ? `<${citation.url}>` : `[${citation.label}](${citation.url})`;
}

function outcomeHeadline(serviceId: ServiceId, outcome: ServiceOutcome): string {
  if (outcome.status === 'succeeded') {
    const n = outcome.attempt.attemptNumber;
    return `${serviceId}: succeeded after ${n} ${n === 1 ? 'attempt' : 'attempts'}`;
  }
  return `${serviceId}: failed (${outcome.kind})`;
}

function attemptFailure(attempt: ServiceAttempt): string {
  return attempt.failure ? `${attempt.failure.kind}: ${attempt.failure.message}` : '';
}

function escapeTableCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

// ============================================================================
// Markdown
// ============================================================================

/**
 * Render a synthesis result as a Markdown document
 */
export function renderMarkdown(result: SynthesisResult): string {
  const lines: string[] = [];

  lines.push('# Query Report');
  lines.push('');
  lines.push(`**Query ID:** \`${result.queryId}\``);
  lines.push(`**Generated:** ${result.generatedAt}`);
  lines.push(`**Confidence:** ${result.confidence}`);
  if (result.cancelled) {
    lines.push('**Status:** cancelled before every service finished');
  }
  lines.push('');

  lines.push('## Question');
  lines.push('');
  lines.push(result.prompt);
  lines.push('');

  lines.push('## Summary');
  lines.push('');
  lines.push(result.mergedSummary);
  lines.push('');

  lines.push('## Common Insights');
  lines.push('');
  if (result.commonInsights.length === 0) {
    lines.push('_None_');
  } else {
    for (const insight of result.commonInsights) {
      lines.push(`- ${insight.text} _(${insight.services.join(', ')})_`);
    }
  }
  lines.push('');

  lines.push('## Services');
  lines.push('');
  for (const [serviceId, outcome] of Object.entries(result.perService)) {
    lines.push(`### ${outcomeHeadline(serviceId, outcome)}`);
    lines.push('');
    if (outcome.status === 'failed') {
      lines.push(`**Reason:** ${outcome.reason}`);
      lines.push('');
      continue;
    }

    const unique = result.uniqueContent[serviceId] ?? [];
    if (unique.length > 0) {
      lines.push('**Unique content:**');
      lines.push('');
      for (const sentence of unique) {
        lines.push(`- ${sentence}`);
      }
      lines.push('');
    }

    if (outcome.attempt.extractedCitations.length > 0) {
      lines.push('**Citations:**');
      lines.push('');
      for (const citation of outcome.attempt.extractedCitations) {
        lines.push(`- ${formatCitation(citation)}`);
      }
      lines.push('');
    }
  }

  if (result.divergenceNotes.length > 0) {
    lines.push('## Divergence');
    lines.push('');
    for (const note of result.divergenceNotes) {
      lines.push(`- ${note}`);
    }
    lines.push('');
  }

  const contributions = Object.entries(result.serviceContributions);
  if (contributions.length > 0) {
    lines.push('## Contributions');
    lines.push('');
    lines.push('| Service | Share |');
    lines.push('| --- | --- |');
    for (const [serviceId, share] of contributions) {
      lines.push(`| ${serviceId} | ${formatShare(share)} |`);
    }
    lines.push('');
  }

  lines.push('## Attempts');
  lines.push('');
  lines.push('| Service | Attempt | Status | Failure |');
  lines.push('| --- | --- | --- | --- |');
  for (const attempt of result.auditTrail) {
    lines.push(
      `| ${attempt.serviceId} | ${attempt.attemptNumber} | ${attempt.status} | ${escapeTableCell(attemptFailure(attempt))} |`
    );
  }

  return lines.join('\n') + '\n';
}

// ============================================================================
// Plain Text
// ============================================================================

/**
 * Render a synthesis result as plain text
 */
export function renderPlainText(result: SynthesisResult): string {
  const lines: string[] = [];

  lines.push(`QUERY ${result.queryId}`);
  lines.push(`Generated: ${result.generatedAt}`);
  lines.push(`Confidence: ${result.confidence}${result.cancelled ? ' (cancelled)' : ''}`);
  lines.push('');
  lines.push('QUESTION');
  lines.push(result.prompt);
  lines.push('');
  lines.push('SUMMARY');
  lines.push(result.mergedSummary);
  lines.push('');

  if (result.commonInsights.length > 0) {
    lines.push('COMMON INSIGHTS');
    for (const insight of result.commonInsights) {
      lines.push(`* ${insight.text} [${insight.services.join(', ')}]`);
    }
    lines.push('');
  }

  lines.push('SERVICES');
  for (const [serviceId, outcome] of Object.entries(result.perService)) {
    lines.push(`* ${outcomeHeadline(serviceId, outcome)}`);
    if (outcome.status === 'failed') {
      lines.push(`    Reason: ${outcome.reason}`);
      continue;
    }
    for (const sentence of result.uniqueContent[serviceId] ?? []) {
      lines.push(`    - ${sentence}`);
    }
    for (const citation of outcome.attempt.extractedCitations) {
      lines.push(`    Source: ${citation.url ?? citation.label}`);
    }
  }

  if (result.divergenceNotes.length > 0) {
    lines.push('');
    lines.push('DIVERGENCE');
    for (const note of result.divergenceNotes) {
      lines.push(`* ${note}`);
    }
  }

  return lines.join('\n') + '\n';
}

// ============================================================================
// JSON
// ============================================================================

/**
 * Key/value form of a synthesis result with a fixed key order
 */
export function toReportObject(result: SynthesisResult): Record<string, unknown> {
  return {
    queryId: result.queryId,
    prompt: result.prompt,
    generatedAt: result.generatedAt,
    cancelled: result.cancelled,
    confidence: result.confidence,
    mergedSummary: result.mergedSummary,
    commonInsights: result.commonInsights,
    uniqueContent: result.uniqueContent,
    divergenceNotes: result.divergenceNotes,
    serviceContributions: result.serviceContributions,
    perService: result.perService,
    auditTrail: result.auditTrail,
  };
}

export function renderJson(result: SynthesisResult, pretty = true): string {
  return pretty ? JSON.stringify(toReportObject(result), null, 2) : JSON.stringify(toReportObject(result));
}
