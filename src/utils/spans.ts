export interface Span {
  start: number;
  end: number;
}

export function spansOverlap(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}

/**
 * Keeps the longest non-overlapping hits. Equal lengths prefer the earlier
 * start, then input order. Output is in text order.
 */
export function resolveOverlaps<T extends Span>(hits: readonly T[]): T[] {
  const byLength = [...hits].sort(
    (a, b) => b.end - b.start - (a.end - a.start) || a.start - b.start
  );

  const kept: T[] = [];
  for (const hit of byLength) {
    if (!kept.some((k) => spansOverlap(k, hit))) {
      kept.push(hit);
    }
  }

  return kept.sort((a, b) => a.start - b.start || a.end - b.end);
}

/**
 * Runs a compiled pattern over `text`, reporting only matches that lie fully
 * inside `range`. Lookbehinds still see the text before the range.
 *
 * A fresh RegExp is built per call so shared (frozen) patterns carry no
 * lastIndex state between documents.
 */
export function findMatches(
  regex: RegExp,
  text: string,
  range: Span = { start: 0, end: text.length }
): RegExpExecArray[] {
  const flags = regex.flags.includes('g') ? regex.flags : `${regex.flags}g`;
  const re = new RegExp(regex.source, flags);
  re.lastIndex = range.start;

  const matches: RegExpExecArray[] = [];
  let match: RegExpExecArray | null;
  while ((match = re.exec(text)) !== null) {
    if (match.index >= range.end) break;
    if (match[0].length === 0) {
      re.lastIndex = match.index + 1;
      continue;
    }
    if (match.index + match[0].length <= range.end) {
      matches.push(match);
    }
  }
  return matches;
}
