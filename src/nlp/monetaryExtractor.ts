import { createLogger } from '../utils/logger.js';
import { findMatches, resolveOverlaps } from '../utils/spans.js';
import type { Span } from '../utils/spans.js';
import { normalizeWhitespace, sectionAfter } from '../utils/text.js';
import type { Taxonomy } from '../taxonomy/types.js';
import type { MonetaryMention } from './types.js';

const logger = createLogger('MonetaryExtractor');

// Brazilian format: "15.000,00", "1500", "2,5"
const AMOUNT = String.raw`(\d{1,3}(?:\.\d{3})+(?:,\d{1,2})?|\d+(?:,\d{1,2})?)(?![\d])`;
const SCALE = String.raw`(mil|milh(?:ão|ões)|bilh(?:ão|ões))(?![\p{L}])`;
const REAIS = String.raw`(?:\s+(?:de\s+)?reais?(?![\p{L}]))?`;

const CURRENCY_AMOUNT = new RegExp(
  String.raw`(?<![\p{L}\p{N}_])R\$\s*${AMOUNT}(?:\s+${SCALE})?${REAIS}`,
  'giu'
);
const WORDED_AMOUNT = new RegExp(
  String.raw`(?<![\p{L}\p{N}_$.,])${AMOUNT}\s*(?:${SCALE}${REAIS}|reais?(?![\p{L}]))`,
  'giu'
);

const SCALE_FACTOR: Readonly<Record<string, number>> = {
  mil: 1e3,
  milhão: 1e6,
  milhões: 1e6,
  bilhão: 1e9,
  bilhões: 1e9,
};

const BLANK_LINE = /\n[ \t]*\n/;

interface AmountHit extends Span {
  surfaceText: string;
  value: number;
}

export function parseBrazilianAmount(amount: string, scale?: string): number {
  const value = Number(amount.replace(/\./g, '').replace(',', '.'));
  const factor = scale ? SCALE_FACTOR[scale.toLowerCase()] ?? 1 : 1;
  return Math.round(value * factor * 100) / 100;
}

function findAmounts(text: string): AmountHit[] {
  return [CURRENCY_AMOUNT, WORDED_AMOUNT].flatMap((regex) =>
    findMatches(regex, text).map((match) => ({
      start: match.index,
      end: match.index + match[0].length,
      surfaceText: normalizeWhitespace(match[0]),
      value: parseBrazilianAmount(match[1], match[2]),
    }))
  );
}

/**
 * Monetary amounts in the decision, in text order. Overlapping matches
 * ("R$ 5 mil" and "5 mil") collapse to the longest.
 */
export function extractMonetaryMentions(text: unknown, taxonomy: Taxonomy): MonetaryMention[] {
  if (typeof text !== 'string' || text.trim() === '') return [];
  const { contextChars, maxMentions } = taxonomy.monetary;

  const mentions = resolveOverlaps(findAmounts(text))
    .slice(0, maxMentions)
    .map((hit) => ({
      surfaceText: hit.surfaceText,
      value: hit.value,
      context: normalizeWhitespace(
        text.slice(Math.max(0, hit.start - contextChars), Math.min(text.length, hit.end + contextChars))
      ),
      offset: hit.start,
    }));

  logger.debug('Monetary mentions extracted', { count: mentions.length });
  return mentions;
}

/**
 * The part of the text that lists the claims: the requests section when a
 * heading is found, else the paragraph of the first "o reclamante requer"
 * phrase, else the whole text.
 */
export function requestScope(text: string, taxonomy: Taxonomy): string {
  const section = sectionAfter(text, taxonomy.requests.sectionHeading);
  if (section !== undefined) return section;

  const [phrase] = findMatches(taxonomy.requests.requestPhrase, text);
  if (phrase) {
    const paragraph = text.slice(phrase.index);
    const end = paragraph.search(BLANK_LINE);
    return end < 0 ? paragraph : paragraph.slice(0, end);
  }

  return text;
}

/**
 * Claim topics raised in the decision, as labels in lexicon order.
 */
export function extractMainRequests(text: unknown, taxonomy: Taxonomy): string[] {
  if (typeof text !== 'string' || text.trim() === '') return [];

  const scope = requestScope(text, taxonomy);
  return taxonomy.requests.topics
    .filter((topic) => findMatches(topic.regex, scope).length > 0)
    .map((topic) => topic.label)
    .slice(0, taxonomy.requests.maxRequests);
}
