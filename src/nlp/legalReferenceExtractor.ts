import { createLogger } from '../utils/logger.js';
import { findMatches, resolveOverlaps, spansOverlap, type Span } from '../utils/spans.js';
import { normalizeWhitespace } from '../utils/text.js';
import { tryParseJson, validator } from '../utils/validators.js';
import { REFERENCE_KINDS } from '../taxonomy/types.js';
import type { ReferenceKind, Taxonomy } from '../taxonomy/types.js';
import type { LegalReference, ReferenceProvenance } from './types.js';

/**
 * Legal Reference Extractor
 *
 * Finds citations of articles, statutes, súmulas/OJs, decrees and ordinances
 * in decision text and rewrites each to one canonical form, so the same norm
 * cited as "art. 7º da CLT" and "Artigo 7, CLT" collapses to "Art. 7º CLT".
 */

const logger = createLogger('LegalReferenceExtractor');

type ReferenceHintItem = string | Record<string, string | number>;

const validateReferenceHint = validator.compileSchema<ReferenceHintItem[]>({
  type: 'array',
  items: {
    anyOf: [
      { type: 'string' },
      { type: 'object', additionalProperties: { type: ['string', 'number'] } },
    ],
  },
});

const B = String.raw`(?<![\p{L}\p{N}_])`;
const E = String.raw`(?![\p{L}\p{N}_])`;
const NUMBER_MARK = String.raw`(?:n(?:\.?\s*[º°o])?\.?\s*)?`;
const NUMBER = String.raw`(\d{1,3}(?:\.\d{3})+|\d{1,6})`;
const YEAR = String.raw`(?:\s*\/\s*|\s*,?\s+de\s+(?:\d{1,2}\s*[º°]?\s+de\s+\p{L}+\s+de\s+)?)(\d{4}|\d{2})(?!\d)`;

const STATUTE_TYPE = String.raw`Lei\s+Complementar|Lei|Decreto[-\s]Lei|Medida\s+Provis[óo]ria|LC|MP`;
const STATUTE = new RegExp(
  String.raw`(?<![\p{L}\p{N}_-])(${STATUTE_TYPE})(?![\p{L}])\s*${NUMBER_MARK}${NUMBER}(?:${YEAR})?`,
  'giu'
);
// Same shape without capture groups, for embedding as an article's source
const STATUTE_INNER = String.raw`(?:${STATUTE_TYPE})(?![\p{L}])\s*${NUMBER_MARK}(?:\d{1,3}(?:\.\d{3})+|\d{1,6})(?:(?:\s*\/\s*|\s*,?\s+de\s+)(?:\d{4}|\d{2})(?!\d))?`;

const ARTICLE_NUMBER = String.raw`(?:\d{1,3}(?:\.\d{3})+|\d{1,4})\s*[º°ª]?(?:\s*-\s*[A-Z](?![\p{L}]))?`;
const ARTICLE_HEAD = String.raw`art(?:igo)?s?\.?\s*(${ARTICLE_NUMBER}(?:\s*(?:,|e)\s*${ARTICLE_NUMBER})*)`;
const PARAGRAPH = String.raw`(?:\s*,?\s*(?:§\s*(\d{1,3})\s*[º°]?|(?:par[áa]grafo|p(?:ar)?\.)\s*([úu]nico|\d{1,3})\s*[º°]?))?`;
const INCISOS = String.raw`(?:\s*,\s*(?:inc(?:iso)?\.?\s*)?[IVXLCDM]+(?![\p{L}]))*`;
const ALINEA = String.raw`(?:\s*,\s*(?:al[íi]nea\s+)?["“']?[a-z]["”']?(?![\p{L}]))?`;
const SOURCE_JOINER = String.raw`\s*,?\s*(?:(?:d[aoe]s?|n[ao]s?)\s+)?`;

const SINGLE_ARTICLE_NUMBER = /(\d{1,3}(?:\.\d{3})+|\d{1,4})\s*[º°ª]?(?:\s*-\s*([A-Z])(?![\p{L}]))?/giu;

const SUMULA = new RegExp(
  String.raw`${B}s[úu]mula(?:\s+(vinculante))?\s*${NUMBER_MARK}(\d{1,4})(?!\d)(?:\s*,?\s*(?:d[oa]\s+(?:c\.\s*|colendo\s+|e\.\s*|egr[ée]gio\s+)?)?(TST|STF|STJ|TRT(?:\s*(?:da\s*)?-?\s*\d{1,2}(?:ª\s*Regi[ãa]o)?)?)${E})?`,
  'giu'
);
const ORIENTATION = new RegExp(
  String.raw`${B}(?:OJ|orienta[çc][ãa]o\s+jurisprudencial)\s*${NUMBER_MARK}(\d{1,4})(?!\d)(?:\s*,?\s*d[ao]\s+(SBDI|SDI|SDC)(?:\s*-?\s*(1|2|II|I)${E})?)?(?:\s*,?\s*d[oa]\s+(TST)${E})?`,
  'giu'
);
const DECREE = new RegExp(
  String.raw`(?<![\p{L}\p{N}_-])decreto(?![-\s]*lei)(?:\s+(legislativo))?\s*${NUMBER_MARK}${NUMBER}(?:${YEAR})?`,
  'giu'
);
const ORDINANCE = new RegExp(
  String.raw`${B}(portaria|instru[çc][ãa]o\s+normativa)(?:\s+(?:d[oa]\s+)?(?!n[º°o.]?\s*\d)(?:conjunta\s+)?([A-Z]{2,6}(?:\s*\/\s*[A-Z]{2,6})?)(?![\p{L}]))?\s*${NUMBER_MARK}${NUMBER}(?:${YEAR})?`,
  'giu'
);
const REGULATORY_NORM = new RegExp(
  String.raw`${B}(?:NR|norma\s+regulamentadora)\s*-?\s*(?:n[º°.]*\s*)?(\d{1,2})(?!\d)`,
  'giu'
);

interface Found {
  kind: ReferenceKind;
  citation: string;
  start: number;
  end: number;
}

/* Formatting helpers */

function withThousands(raw: string): string {
  const value = parseInt(raw.replace(/\D/g, ''), 10);
  return String(value).replace(/\B(?=(\d{3})+(?!\d))/g, '.');
}

function ordinal(raw: string): string {
  const value = parseInt(raw.replace(/\D/g, ''), 10);
  return value <= 9 ? `${value}º` : withThousands(raw);
}

export function expandYear(raw: string, pivot: number): string {
  if (raw.length === 4) return raw;
  const value = parseInt(raw, 10);
  return String(value < pivot ? 2000 + value : 1900 + value);
}

function numberedAct(name: string, number: string, year: string | undefined, taxonomy: Taxonomy): string {
  const base = `${name} ${withThousands(number)}`;
  return year ? `${base}/${expandYear(year, taxonomy.twoDigitYearPivot)}` : base;
}

function statuteName(raw: string): string {
  const type = normalizeWhitespace(raw).toLowerCase();
  if (type === 'lei complementar' || type === 'lc') return 'Lei Complementar';
  if (type.startsWith('decreto')) return 'Decreto-Lei';
  if (type.startsWith('medida') || type === 'mp') return 'Medida Provisória';
  return 'Lei';
}

function statuteCitation(match: RegExpExecArray, taxonomy: Taxonomy): string {
  return numberedAct(statuteName(match[1]), match[2], match[3], taxonomy);
}

/**
 * Canonical source of an article: a code abbreviation or a numbered statute.
 */
function canonicalSource(raw: string, taxonomy: Taxonomy): string | undefined {
  const source = normalizeWhitespace(raw);
  const alias = taxonomy.references.sources.find((s) => s.exact.test(source));
  if (alias) return alias.canonical;

  const [statute] = findMatches(STATUTE, source);
  return statute ? statuteCitation(statute, taxonomy) : undefined;
}

function paragraphSuffix(sectionNumber?: string, paragraph?: string): string {
  if (sectionNumber) return `, § ${ordinal(sectionNumber)}`;
  if (!paragraph) return '';
  return /^\d/.test(paragraph) ? `, § ${ordinal(paragraph)}` : ', parágrafo único';
}

function articleCitations(
  numbers: string,
  sectionNumber: string | undefined,
  paragraph: string | undefined,
  source: string
): string[] {
  const parsed = findMatches(SINGLE_ARTICLE_NUMBER, numbers);
  // A paragraph only attaches unambiguously to a single article
  const suffix = parsed.length === 1 ? paragraphSuffix(sectionNumber, paragraph) : '';

  return parsed.map((m) => {
    const letter = m[2] ? `-${m[2].toUpperCase()}` : '';
    return `Art. ${ordinal(m[1])}${letter}${suffix} ${source}`;
  });
}

/* Per-kind finders */

function findArticles(text: string, taxonomy: Taxonomy): Found[] {
  const sourcePattern = `(${taxonomy.references.sourcePattern}|${STATUTE_INNER})${E}`;
  const forward = new RegExp(
    `${B}${ARTICLE_HEAD}${PARAGRAPH}${INCISOS}${ALINEA}${SOURCE_JOINER}${sourcePattern}`,
    'giu'
  );
  const reverse = new RegExp(
    `${B}(${taxonomy.references.sourcePattern})${E}\\s*,\\s*${ARTICLE_HEAD}${PARAGRAPH}`,
    'giu'
  );

  const found: Found[] = [];
  const add = (match: RegExpExecArray, citations: string[]) => {
    for (const citation of citations) {
      found.push({ kind: 'ARTICLE', citation, start: match.index, end: match.index + match[0].length });
    }
  };

  const forwardSpans: Span[] = [];
  for (const match of findMatches(forward, text)) {
    const source = canonicalSource(match[4], taxonomy);
    if (!source) continue;
    forwardSpans.push({ start: match.index, end: match.index + match[0].length });
    add(match, articleCitations(match[1], match[2], match[3], source));
  }
  // "CF, art. 11 da CLT": the source belongs to the previous citation
  for (const match of findMatches(reverse, text)) {
    const span = { start: match.index, end: match.index + match[0].length };
    if (forwardSpans.some((taken) => spansOverlap(taken, span))) continue;
    const source = canonicalSource(match[1], taxonomy);
    if (source) add(match, articleCitations(match[2], match[3], match[4], source));
  }

  return found;
}

function findStatutes(text: string, taxonomy: Taxonomy): Found[] {
  return findMatches(STATUTE, text).map((match): Found => ({
    kind: 'STATUTE',
    citation: statuteCitation(match, taxonomy),
    start: match.index,
    end: match.index + match[0].length,
  }));
}

function courtName(raw: string): string {
  const court = normalizeWhitespace(raw).toUpperCase();
  const region = /^TRT\D*(\d{1,2})/.exec(court);
  return region ? `TRT ${parseInt(region[1], 10)}` : court;
}

function findPrecedents(text: string): Found[] {
  const found: Found[] = [];

  for (const match of findMatches(SUMULA, text)) {
    const binding = Boolean(match[1]);
    const court = match[3] ? courtName(match[3]) : binding ? 'STF' : undefined;
    const name = binding ? 'Súmula Vinculante' : 'Súmula';
    found.push({
      kind: 'SUMULA',
      citation: [name, String(parseInt(match[2], 10)), court].filter(Boolean).join(' '),
      start: match.index,
      end: match.index + match[0].length,
    });
  }

  for (const match of findMatches(ORIENTATION, text)) {
    let chamber: string | undefined;
    if (match[2]) {
      const body = match[2].toUpperCase() === 'SDC' ? 'SDC' : 'SDI';
      const section = match[3] ? (match[3].toUpperCase().startsWith('II') || match[3] === '2' ? '2' : '1') : undefined;
      chamber = section ? `${body}-${section}` : body;
    }
    found.push({
      kind: 'SUMULA',
      citation: ['OJ', String(parseInt(match[1], 10)), chamber, match[4]?.toUpperCase()].filter(Boolean).join(' '),
      start: match.index,
      end: match.index + match[0].length,
    });
  }

  return found;
}

function findDecrees(text: string, taxonomy: Taxonomy): Found[] {
  return findMatches(DECREE, text).map((match): Found => ({
    kind: 'DECREE',
    citation: numberedAct(match[1] ? 'Decreto Legislativo' : 'Decreto', match[2], match[3], taxonomy),
    start: match.index,
    end: match.index + match[0].length,
  }));
}

function agencyName(raw: string, taxonomy: Taxonomy): string {
  const compact = raw.replace(/\s+/g, '');
  const alias = taxonomy.references.agencies.find((a) => a.exact.test(compact));
  return alias ? alias.canonical : compact.toUpperCase();
}

function findOrdinances(text: string, taxonomy: Taxonomy): Found[] {
  const found = findMatches(ORDINANCE, text).map((match): Found => {
    const type = /^portaria$/i.test(match[1]) ? 'Portaria' : 'Instrução Normativa';
    const agency = match[2] ? agencyName(match[2], taxonomy) : undefined;
    return {
      kind: 'ORDINANCE',
      citation: numberedAct(agency ? `${type} ${agency}` : type, match[3], match[4], taxonomy),
      start: match.index,
      end: match.index + match[0].length,
    };
  });

  for (const match of findMatches(REGULATORY_NORM, text)) {
    found.push({
      kind: 'ORDINANCE',
      citation: `NR ${parseInt(match[1], 10)}`,
      start: match.index,
      end: match.index + match[0].length,
    });
  }

  return found;
}

/**
 * Every citation in `text`, grouped by kind and in text order within a kind.
 */
function findReferences(text: string, taxonomy: Taxonomy, provenance: ReferenceProvenance): LegalReference[] {
  const byKind: Record<ReferenceKind, Found[]> = {
    ARTICLE: findArticles(text, taxonomy),
    STATUTE: resolveOverlaps(findStatutes(text, taxonomy)),
    SUMULA: findPrecedents(text),
    DECREE: findDecrees(text, taxonomy),
    ORDINANCE: findOrdinances(text, taxonomy),
  };

  return REFERENCE_KINDS.flatMap((kind) =>
    [...byKind[kind]]
      .sort((a, b) => a.start - b.start)
      .map((found) => ({
        kind,
        normalizedCitation: found.citation,
        provenance,
        confidence: taxonomy.references.kindConfidence[kind],
      }))
  );
}

/**
 * Splits a legislative-reference hint into citation strings. Accepts an
 * array, a JSON-encoded array (strings or flat objects), or free text
 * separated by `;`, `|` or newlines.
 */
export function splitReferenceHint(hint: string | readonly string[]): string[] {
  if (typeof hint !== 'string') {
    return hint.filter((item) => item.trim() !== '');
  }

  const trimmed = hint.trim();
  if (trimmed.startsWith('[')) {
    const parsed = validator.validate(validateReferenceHint, tryParseJson(trimmed));
    if (parsed.valid) {
      return parsed.data
        .map((item) => (typeof item === 'string' ? item : Object.values(item).join(' ')))
        .filter((item) => item.trim() !== '');
    }
    logger.debug('Reference hint is not a JSON citation array, reading it as text', {
      errors: validator.formatErrors(parsed.errors),
    });
  }

  return trimmed.split(/[;\n|]+/).map((item) => item.trim()).filter((item) => item !== '');
}

/**
 * Unions reference lists. Entries merge on (kind, normalizedCitation);
 * PRE_EXISTING provenance wins. Output is grouped by kind, first discovery
 * first within a kind.
 */
export function mergeReferences(...lists: ReadonlyArray<readonly LegalReference[]>): LegalReference[] {
  const merged = new Map<string, LegalReference>();

  for (const list of lists) {
    for (const reference of list) {
      const key = `${reference.kind}|${reference.normalizedCitation}`;
      const existing = merged.get(key);
      if (!existing) {
        merged.set(key, { ...reference });
      } else if (reference.provenance === 'PRE_EXISTING') {
        existing.provenance = 'PRE_EXISTING';
      }
    }
  }

  const all = [...merged.values()];
  return REFERENCE_KINDS.flatMap((kind) => all.filter((reference) => reference.kind === kind));
}

/**
 * Extract, normalize and deduplicate the legal references of a decision,
 * merged with the pre-existing citation field when one is supplied.
 */
export function extractReferences(
  text: unknown,
  taxonomy: Taxonomy,
  preExisting?: string | readonly string[]
): LegalReference[] {
  const extracted = typeof text === 'string' && text.trim() !== '' ? findReferences(text, taxonomy, 'EXTRACTED') : [];

  const supplied: LegalReference[] = [];
  if (preExisting !== undefined) {
    for (const item of splitReferenceHint(preExisting)) {
      const references = findReferences(item, taxonomy, 'PRE_EXISTING');
      if (references.length === 0) {
        logger.debug('Unrecognized pre-existing citation', { citation: item });
      }
      supplied.push(...references);
    }
  }

  return mergeReferences(extracted, supplied);
}

/**
 * Mean per-kind confidence of the references, 0 when there are none.
 */
export function referencesConfidence(references: readonly LegalReference[]): number {
  if (references.length === 0) return 0;
  return references.reduce((sum, r) => sum + r.confidence, 0) / references.length;
}
