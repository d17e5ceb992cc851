import { findMatches, resolveOverlaps } from '../utils/spans.js';
import type { Span } from '../utils/spans.js';
import { normalizeWhitespace } from '../utils/text.js';
import type { CompiledPattern } from '../taxonomy/types.js';

export interface PatternHit extends Span {
  pattern: CompiledPattern;
  snippet: string;
}

/**
 * Every match of every pattern inside `range`, overlaps included.
 */
export function scanPatterns(
  patterns: readonly CompiledPattern[],
  text: string,
  range?: Span
): PatternHit[] {
  const hits: PatternHit[] = [];
  for (const pattern of patterns) {
    if (pattern.weight <= 0) continue;
    for (const match of findMatches(pattern.regex, text, range)) {
      hits.push({
        start: match.index,
        end: match.index + match[0].length,
        pattern,
        snippet: normalizeWhitespace(match[0]),
      });
    }
  }
  return hits;
}

/**
 * Matches with overlaps resolved longest-first, in text order.
 */
export function scanResolved(
  patterns: readonly CompiledPattern[],
  text: string,
  range?: Span
): PatternHit[] {
  return resolveOverlaps(scanPatterns(patterns, text, range));
}

/**
 * Unions overlapping or touching ranges.
 */
export function mergeRanges(ranges: readonly Span[]): Span[] {
  const sorted = [...ranges].sort((a, b) => a.start - b.start);
  const merged: Span[] = [];
  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range.start <= last.end) {
      last.end = Math.max(last.end, range.end);
    } else {
      merged.push({ start: range.start, end: range.end });
    }
  }
  return merged;
}
