/**
 * Rubric Validator Module
 *
 * Checks a service response against a task rubric. Purely structural and
 * deterministic: the same response and rubric always give the same
 * result, and nothing here calls out to a model.
 *
 * Requirement types:
 * - minCitations  at least N extracted citations
 * - section       a heading (markdown `#`, bold, or `Heading:` line)
 * - pattern       a regular expression match (case-insensitive by default)
 * - example       a worked example ("for example", "e.g.", a code block, ...)
 * - minWords      at least N words
 *
 * Missing requirements are reported by label, in rubric order.
 */

import { z } from 'zod';
import type { Citation, Rubric, RubricRequirement, ValidationResult } from '../types/index.js';

export type { Rubric, RubricRequirement, ValidationResult };

/**
 * The parts of an attempt the validator looks at
 */
export interface ValidationSubject {
  rawResponse: string | null;
  extractedCitations: Citation[];
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Count words in a string
 * Words are separated by whitespace
 */
export function countWords(text: string): number {
  const trimmed = text.trim();
  if (trimmed === '') {
    return 0;
  }
  return trimmed.split(/\s+/).length;
}

const NUMBER_WORDS = ['zero', 'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine', 'ten'];

function numberWord(n: number): string {
  return NUMBER_WORDS[n] ?? String(n);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const EXAMPLE_MARKERS = [
  /\bfor example\b/i,
  /\bfor instance\b/i,
  /\be\.g\./i,
  /\bworked example\b/i,
  /\bexample\s*\d*\s*:/i,
  /\bas an example\b/i,
  /```/,
];

// ============================================================================
// Requirement Checks
// ============================================================================

/**
 * Name reported in missingElements when a requirement is not met
 */
export function requirementLabel(requirement: RubricRequirement): string {
  if (requirement.label) {
    return requirement.label;
  }
  switch (requirement.type) {
    case 'minCitations':
      return requirement.count === 1 ? 'at least 1 citation' : `at least ${requirement.count} citations`;
    case 'section':
      return `section "${requirement.heading}"`;
    case 'pattern':
      return `pattern /${requirement.pattern}/`;
    case 'example':
      return 'worked example';
    case 'minWords':
      return `at least ${requirement.count} words`;
  }
}

/**
 * Imperative phrase asking a service to fix one missing requirement
 */
export function clarificationPhrase(requirement: RubricRequirement): string {
  switch (requirement.type) {
    case 'minCitations':
      return requirement.count === 1
        ? 'cite at least one source'
        : `cite at least ${numberWord(requirement.count)} sources`;
    case 'section':
      return `include a section headed "${requirement.heading}"`;
    case 'pattern':
      return `make sure the answer covers ${requirementLabel(requirement)}`;
    case 'example':
      return 'add a worked example';
    case 'minWords':
      return `expand the answer to at least ${requirement.count} words`;
  }
}

export function hasSection(text: string, heading: string): boolean {
  const name = escapeRegExp(heading.trim());
  const patterns = [
    new RegExp(`^\\s*#{1,6}\\s*${name}\\s*#*\\s*$`, 'im'),
    new RegExp(`^\\s*\\*\\*${name}\\*\\*:?\\s*$`, 'im'),
    new RegExp(`^\\s*${name}\\s*:`, 'im'),
  ];
  return patterns.some((pattern) => pattern.test(text));
}

export function hasExample(text: string): boolean {
  return EXAMPLE_MARKERS.some((marker) => marker.test(text));
}

/**
 * Check one requirement against a subject
 */
export function checkRequirement(subject: ValidationSubject, requirement: RubricRequirement): boolean {
  const text = subject.rawResponse ?? '';

  switch (requirement.type) {
    case 'minCitations':
      return subject.extractedCitations.length >= requirement.count;
    case 'section':
      return hasSection(text, requirement.heading);
    case 'pattern':
      return new RegExp(requirement.pattern, requirement.flags ?? 'i').test(text);
    case 'example':
      return hasExample(text);
    case 'minWords':
      return countWords(text) >= requirement.count;
  }
}

// ============================================================================
// Main Validation Function
// ============================================================================

/**
 * Validate a response against a rubric
 *
 * @returns passed, missing labels in rubric order, and the share of
 *          requirements satisfied (1 for an empty rubric)
 */
export function validate(subject: ValidationSubject, rubric: Rubric): ValidationResult {
  const missingElements: string[] = [];

  for (const requirement of rubric.requirements) {
    if (!checkRequirement(subject, requirement)) {
      missingElements.push(requirementLabel(requirement));
    }
  }

  const total = rubric.requirements.length;
  const score = total === 0 ? 1 : (total - missingElements.length) / total;

  return {
    passed: missingElements.length === 0,
    missingElements,
    score,
  };
}

// ============================================================================
// Rubric Parsing
// ============================================================================

const label = z.string().min(1).optional();

export const RubricRequirementSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('minCitations'), count: z.number().int().positive(), label }),
  z.object({ type: z.literal('section'), heading: z.string().min(1), label }),
  z.object({
    type: z.literal('pattern'),
    pattern: z.string().min(1),
    flags: z.string().regex(/^[dgimsuy]*$/).optional(),
    label,
  }),
  z.object({ type: z.literal('example'), label }),
  z.object({ type: z.literal('minWords'), count: z.number().int().positive(), label }),
]);

function isValidPattern(pattern: string, flags?: string): boolean {
  try {
    new RegExp(pattern, flags);
    return true;
  } catch {
    return false;
  }
}

export const RubricSchema = z
  .object({
    requirements: z.array(RubricRequirementSchema),
  })
  .superRefine((rubric, ctx) => {
    rubric.requirements.forEach((requirement, index) => {
      if (requirement.type === 'pattern' && !isValidPattern(requirement.pattern, requirement.flags)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'pattern is not a valid regular expression',
          path: ['requirements', index, 'pattern'],
        });
      }
    });
  });

export class RubricParseError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid rubric: ${issues.join('; ')}`);
    this.name = 'RubricParseError';
    this.issues = issues;
  }
}

/**
 * Validate authored rubric JSON
 *
 * @throws RubricParseError listing every problem found
 */
export function parseRubric(input: unknown): Rubric {
  const parsed = RubricSchema.safeParse(input);
  if (!parsed.success) {
    throw new RubricParseError(
      parsed.error.errors.map((issue) => `${issue.path.join('.') || 'rubric'}: ${issue.message}`)
    );
  }
  return parsed.data;
}
