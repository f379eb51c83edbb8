import type { Citation } from '../types/index.js';

const MARKDOWN_LINK = /\[([^\]]+)\]\((https?:\/\/[^\s)]+)\)/g;
const BARE_URL = /https?:\/\/[^\s<>()[\]"']+/g;
const NUMBERED_REF = /\[(\d{1,3})\](?!\()/g;
const REF_DEFINITION = /^\s*\[(\d{1,3})\]:?\s*(https?:\/\/\S+)/gm;
const TRAILING_PUNCTUATION = /[.,;:!?]+$/;

interface FoundCitation {
  index: number;
  citation: Citation;
}

/**
 * Pull citations out of response text
 *
 * Recognises markdown links, bare URLs and numbered [n] references
 * (resolved through "[n]: url" definitions when present). Results are
 * deduplicated by URL, or by label when there is no URL, and returned in
 * order of first appearance.
 */
export function extractCitationsFromText(text: string): Citation[] {
  const definitions = new Map<string, string>();
  for (const match of text.matchAll(REF_DEFINITION)) {
    const [, number, url] = match;
    if (number && url) {
      definitions.set(number, url.replace(TRAILING_PUNCTUATION, ''));
    }
  }

  const found: FoundCitation[] = [];

  for (const match of text.matchAll(MARKDOWN_LINK)) {
    const [, label, url] = match;
    if (label && url) {
      found.push({ index: match.index ?? 0, citation: { label: label.trim(), url } });
    }
  }

  for (const match of text.matchAll(BARE_URL)) {
    const url = match[0].replace(TRAILING_PUNCTUATION, '');
    found.push({ index: match.index ?? 0, citation: { label: url, url } });
  }

  for (const match of text.matchAll(NUMBERED_REF)) {
    const [, number] = match;
    if (number) {
      found.push({
        index: match.index ?? 0,
        citation: { label: `[${number}]`, url: definitions.get(number) ?? null },
      });
    }
  }

  found.sort((a, b) => a.index - b.index);

  const seen = new Set<string>();
  const citations: Citation[] = [];
  for (const { citation } of found) {
    const key = citation.url ?? citation.label;
    if (seen.has(key)) continue;
    seen.add(key);
    citations.push(citation);
  }
  return citations;
}
