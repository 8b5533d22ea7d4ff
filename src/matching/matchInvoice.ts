/**
 * Invoice Matching
 *
 * Pairs a timesheet person with a pending invoice by name tokens.
 *
 * Flow:
 * 1. Tokenize the timesheet first and last names
 * 2. Pass 1: candidates containing every first AND every last token
 * 3. Pass 2 (only when pass 1 finds nothing): candidates containing any token
 *
 * A unique pass-1 hit is trusted; a unique pass-2 hit is written but flagged
 * for approval; several hits in either pass are never guessed between.
 */

import { containsToken, normalizeName, tokenizeName } from './normalizeName';
import type { MatchResult, PendingInvoice } from './types';

interface NameTokens {
  first: string[];
  last: string[];
}

interface Candidate {
  invoice: PendingInvoice;
  normalizedName: string;
}

function toCandidates(pool: readonly PendingInvoice[]): Candidate[] {
  return pool
    .map((invoice) => ({ invoice, normalizedName: normalizeName(invoice.resourceName) }))
    .filter((candidate) => candidate.normalizedName !== '');
}

function isFullMatch(candidate: Candidate, tokens: NameTokens): boolean {
  const has = (token: string) => containsToken(candidate.normalizedName, token);
  return tokens.first.every(has) && tokens.last.every(has);
}

function isPartialMatch(candidate: Candidate, tokens: NameTokens): boolean {
  const has = (token: string) => containsToken(candidate.normalizedName, token);
  return tokens.first.some(has) || tokens.last.some(has);
}

function tokensFor(firstName: string, lastName: string): NameTokens | null {
  const tokens = { first: tokenizeName(firstName), last: tokenizeName(lastName) };
  return tokens.first.length === 0 && tokens.last.length === 0 ? null : tokens;
}

/**
 * Matches a person against the pending pool.
 *
 * @example
 * matchInvoice('Jane', 'Doe', [{ resourceName: 'Doe, Jane Marie', ... }])
 * // Returns: { kind: 'matched', invoice }
 */
export function matchInvoice(
  firstName: string,
  lastName: string,
  pool: readonly PendingInvoice[]
): MatchResult {
  const tokens = tokensFor(firstName, lastName);
  if (!tokens) {
    return { kind: 'unmatched' };
  }

  const candidates = toCandidates(pool);

  const full = candidates.filter((candidate) => isFullMatch(candidate, tokens));
  if (full.length === 1) {
    return { kind: 'matched', invoice: full[0].invoice };
  }
  if (full.length > 1) {
    return { kind: 'ambiguous', candidates: full.map((candidate) => candidate.invoice) };
  }

  const partial = candidates.filter((candidate) => isPartialMatch(candidate, tokens));
  if (partial.length === 1) {
    return { kind: 'needs_approval', invoice: partial[0].invoice };
  }
  if (partial.length > 1) {
    return { kind: 'ambiguous', candidates: partial.map((candidate) => candidate.invoice) };
  }

  return { kind: 'unmatched' };
}

/**
 * Every invoice sharing at least one name token with the person.
 * Used to suggest possible matches in the discrepancy report.
 */
export function findPartialMatches(
  firstName: string,
  lastName: string,
  pool: readonly PendingInvoice[]
): PendingInvoice[] {
  const tokens = tokensFor(firstName, lastName);
  if (!tokens) {
    return [];
  }
  return toCandidates(pool)
    .filter((candidate) => isPartialMatch(candidate, tokens))
    .map((candidate) => candidate.invoice);
}
