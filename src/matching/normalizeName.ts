/**
 * Name Normalization for Timesheet Reconciliation
 *
 * Timesheets and invoices spell the same person differently: titles,
 * generational suffixes, hyphenated or apostrophised surnames, "Last, First"
 * ordering. Normalizing both sides to bare lower-case words lets the matcher
 * compare them token by token.
 *
 * Example transformations:
 * - "Dr. Mary-Jane O'Neil" → "mary jane o neil"
 * - "Smith Jr., John" → "smith john"
 */

import {
  MIN_TOKEN_LENGTH,
  NAME_PREFIX_PATTERN,
  NAME_SEPARATOR_PATTERN,
  NAME_SUFFIX_PATTERN,
} from './constants';

/**
 * Normalizes a person's name by:
 * 1. Lower-casing
 * 2. Removing honorific prefixes and generational/professional suffixes
 * 3. Turning hyphens and apostrophes into spaces
 * 4. Dropping everything that is not a letter or whitespace
 * 5. Collapsing and trimming whitespace
 *
 * @example
 * normalizeName("Mr. John O'Brien-Smith Jr.") // Returns: "john o brien smith"
 * normalizeName(null) // Returns: ""
 */
export function normalizeName(input: string | null | undefined): string {
  if (!input) {
    return '';
  }

  return input
    .toLowerCase()
    .replace(NAME_PREFIX_PATTERN, '')
    .replace(NAME_SUFFIX_PATTERN, '')
    .replace(NAME_SEPARATOR_PATTERN, ' ')
    .replace(/[^a-z\s]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Splits a name into matchable tokens, dropping single-letter initials.
 *
 * @example
 * tokenizeName("J. R. Tolkien") // Returns: ["tolkien"]
 */
export function tokenizeName(input: string | null | undefined): string[] {
  const normalized = normalizeName(input);
  if (!normalized) {
    return [];
  }
  return normalized.split(' ').filter((token) => token.length >= MIN_TOKEN_LENGTH);
}

/**
 * Whole-word containment check on an already normalized name.
 */
export function containsToken(normalizedName: string, token: string): boolean {
  const escaped = token.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`\\b${escaped}\\b`).test(normalizedName);
}

export default normalizeName;
