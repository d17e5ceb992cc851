import { findMatches } from './spans.js';
import type { Span } from './spans.js';

export interface TextSpan extends Span {
  text: string;
}

// Tokens that end with a period without ending the sentence ("art. 7º", "Dr. Fulano")
const ABBREVIATIONS = new Set([
  'art', 'arts', 'fl', 'fls', 'inc', 'dr', 'dra', 'sr', 'sra', 'pág', 'min', 'des', 'exmo', 'exma', 'proc', 'nº',
]);

// An all-caps line such as "FUNDAMENTAÇÃO" or "III - DISPOSITIVO" starts a new section
const ANY_HEADING = /^[ \t]*(?:[IVX]+\s*[.)\-–]\s*)?\p{Lu}[\p{Lu} \t]{3,}:?[ \t]*$/mu;

const AFTER_PERIOD = /\s*(?:$|\n)|\s+["“(]?\p{Lu}/uy;
const LAST_TOKEN = /([\p{L}º]+)$/u;

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function isSentenceBoundary(text: string, index: number): boolean {
  const ch = text[index];
  if (ch === '\n' || ch === ';' || ch === '!' || ch === '?') return true;
  if (ch !== '.') return false;

  AFTER_PERIOD.lastIndex = index + 1;
  if (!AFTER_PERIOD.test(text)) return false;

  const token = LAST_TOKEN.exec(text.slice(Math.max(0, index - 12), index));
  if (token && (token[1].length === 1 || ABBREVIATIONS.has(token[1].toLowerCase()))) {
    return false;
  }
  return true;
}

/**
 * Splits text into trimmed sentence spans. Terminators: newline, `;`, `!`,
 * `?`, and a period followed by an uppercase word, a line break or the end.
 */
export function sentenceSpans(text: string): TextSpan[] {
  const spans: TextSpan[] = [];

  const push = (from: number, to: number) => {
    let start = from;
    let end = to;
    while (start < end && /\s/.test(text[start])) start++;
    while (end > start && /\s/.test(text[end - 1])) end--;
    if (end > start) {
      spans.push({ start, end, text: text.slice(start, end) });
    }
  };

  let start = 0;
  for (let i = 0; i < text.length; i++) {
    if (isSentenceBoundary(text, i)) {
      push(start, i + 1);
      start = i + 1;
    }
  }
  push(start, text.length);

  return spans;
}

export function truncate(value: string, maxLength: number): string {
  if (value.length <= maxLength) return value;
  return `${value.slice(0, Math.max(0, maxLength - 3)).trimEnd()}...`;
}

/**
 * Body of the first section whose heading matches `heading`, up to the next
 * all-caps heading line. Undefined when the heading is absent.
 */
export function sectionAfter(text: string, heading: RegExp): string | undefined {
  const [match] = findMatches(heading, text);
  if (!match) return undefined;

  const body = text.slice(match.index + match[0].length);
  const next = body.search(ANY_HEADING);
  return next < 0 ? body : body.slice(0, next);
}
