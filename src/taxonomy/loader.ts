import fs from 'fs';
import crypto from 'crypto';
import { fileURLToPath } from 'url';
import { TaxonomyError, errorMessage } from '../utils/errors.js';
import { deepFreeze } from '../utils/freeze.js';
import { createLogger } from '../utils/logger.js';
import { validator } from '../utils/validators.js';
import { taxonomySchema } from './schema.js';
import type {
  CompiledMarker,
  CompiledPattern,
  CompiledRight,
  CompiledSource,
  CompiledTopic,
  MarkerDocument,
  PatternEntryDocument,
  RightEntryDocument,
  SourceAliasDocument,
  Taxonomy,
  TaxonomyDocument,
  TaxonomyOverrides,
  TopicDocument,
} from './types.js';

const logger = createLogger('TaxonomyLoader');

const validateTaxonomyDocument = validator.compileSchema<TaxonomyDocument>(taxonomySchema);

export const DEFAULT_TAXONOMY_PATH = fileURLToPath(
  new URL('../../taxonomy/default.json', import.meta.url)
);

export interface LoadTaxonomyOptions {
  /** Taxonomy file; defaults to the bundled taxonomy/default.json */
  path?: string;
  overrides?: TaxonomyOverrides;
}

/**
 * Wraps a pattern so it only matches whole words. `\b` is ASCII-only in
 * JavaScript and would split accented words.
 */
export function wholeWord(source: string): string {
  return `(?<![\\p{L}\\p{N}_])(?:${source})(?![\\p{L}\\p{N}_])`;
}

function compileRegex(source: string, entryId: string, flags = 'giu'): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new TaxonomyError(`Invalid regular expression: ${errorMessage(error)}`, entryId);
  }
}

function assertUniqueIds(entries: ReadonlyArray<{ id: string }>, section: string): void {
  const seen = new Set<string>();
  for (const entry of entries) {
    if (seen.has(entry.id)) {
      throw new TaxonomyError(`Duplicate id in ${section}`, entry.id);
    }
    seen.add(entry.id);
  }
}

function compilePatterns(entries: PatternEntryDocument[], section: string): CompiledPattern[] {
  assertUniqueIds(entries, section);
  return entries.map((entry) => ({
    id: entry.id,
    polarity: entry.polarity,
    weight: entry.weight,
    regex: compileRegex(wholeWord(entry.pattern), `${section}.${entry.id}`),
  }));
}

function compileRights(entries: RightEntryDocument[]): CompiledRight[] {
  assertUniqueIds(entries, 'laborRights.rights');
  return entries.map((entry) => ({
    id: entry.id,
    label: entry.label,
    weight: entry.weight,
    regex: compileRegex(wholeWord(entry.pattern), `laborRights.rights.${entry.id}`),
  }));
}

function compileMarkers(entries: MarkerDocument[], section: string): CompiledMarker[] {
  assertUniqueIds(entries, section);
  return entries.map((entry) => ({
    id: entry.id,
    regex: compileRegex(wholeWord(entry.pattern), `${section}.${entry.id}`),
  }));
}

function compileTopics(entries: TopicDocument[]): CompiledTopic[] {
  assertUniqueIds(entries, 'requests.topics');
  return entries.map((entry) => ({
    id: entry.id,
    label: entry.label,
    regex: compileRegex(wholeWord(entry.pattern), `requests.topics.${entry.id}`),
  }));
}

function alternation(patterns: string[]): string {
  return patterns.map((p) => `(?:${p})`).join('|');
}

/**
 * A line holding only a section heading, optionally numbered ("III - MÉRITO").
 */
function headingRegex(headings: string[], entryId: string): RegExp {
  return compileRegex(
    `(?:^|\\n)[ \\t]*(?:[\\dIVX]+\\s*[.)\\-–]\\s*)?(?:${alternation(headings)})[ \\t]*:?[ \\t]*(?=\\n|$)`,
    entryId
  );
}

/**
 * Serializes with sorted keys so the hash does not depend on key order.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([key, v]) => `${JSON.stringify(key)}:${canonicalJson(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export function computePipelineVersion(document: TaxonomyDocument): string {
  const hash = crypto.createHash('sha256').update(canonicalJson(document)).digest('hex');
  return `${document.version}+${hash.slice(0, 12)}`;
}

function applyOverrides(document: TaxonomyDocument, overrides: TaxonomyOverrides): TaxonomyDocument {
  return {
    ...document,
    ...(overrides.tieEpsilon !== undefined ? { tieEpsilon: overrides.tieEpsilon } : {}),
  };
}

/**
 * Validates, compiles and freezes a taxonomy document.
 *
 * @throws TaxonomyError on schema violations, invalid regular expressions or
 *   duplicate pattern ids
 */
export function buildTaxonomy(raw: unknown, overrides: TaxonomyOverrides = {}): Taxonomy {
  const parsed = validator.validate(validateTaxonomyDocument, raw);
  if (!parsed.valid) {
    throw new TaxonomyError(
      `Taxonomy failed schema validation:\n${validator.formatErrors(parsed.errors)}`
    );
  }

  const effective = applyOverrides(structuredClone(parsed.data), overrides);
  if (!(effective.tieEpsilon >= 0 && effective.tieEpsilon <= 1)) {
    throw new TaxonomyError(`tieEpsilon must be within [0, 1], got ${effective.tieEpsilon}`);
  }

  const weights = effective.summary.weights;
  if (weights.outcome + weights.parties + weights.references + weights.monetary <= 0) {
    throw new TaxonomyError('Summary weights must not all be zero');
  }

  const { outcome, parties, references, requests, reasoning, excerpt } = effective;

  // "Reclamado(a):", "Autores(as) -"
  const roleWord = (keywords: string[]) =>
    wholeWord(`(?:${alternation(keywords)})(?:\\s*\\((?:a|o|s|as|os|es)\\))?`);
  const labelRegex = (keywords: string[], id: string) =>
    compileRegex(`${roleWord(keywords)}\\s*[:\\-–]\\s*`, id);

  const compileAliases = (aliases: SourceAliasDocument[], section: string): CompiledSource[] =>
    aliases.map((alias) => ({
      canonical: alias.canonical,
      exact: compileRegex(`^(?:${alias.pattern})$`, `${section}.${alias.canonical}`, 'iu'),
    }));
  const sources = compileAliases(references.sources, 'references.sources');

  const taxonomy: Taxonomy = {
    version: effective.version,
    pipelineVersion: computePipelineVersion(effective),
    saturation: effective.saturation,
    confidenceScale: effective.confidenceScale,
    tieEpsilon: effective.tieEpsilon,
    twoDigitYearPivot: effective.twoDigitYearPivot,
    methods: effective.methods,
    outcome: {
      lexicon: compilePatterns(outcome.lexicon, 'lexicon'),
      inference: compilePatterns(outcome.inference, 'inference'),
      legalLanguage: compilePatterns(outcome.legalLanguage, 'legalLanguage'),
      laborRights: {
        rights: compileRights(outcome.laborRights.rights),
        verdicts: compilePatterns(outcome.laborRights.verdicts, 'laborRights.verdicts'),
      },
      contextMarkers: compileMarkers(outcome.contextMarkers, 'contextMarkers'),
      contextWindow: outcome.contextWindow,
      dispositiveMarkers: compileMarkers(outcome.dispositiveMarkers, 'dispositiveMarkers'),
    },
    parties: {
      claimantLabel: labelRegex(parties.claimantKeywords, 'parties.claimantKeywords'),
      defendantLabel: labelRegex(parties.defendantKeywords, 'parties.defendantKeywords'),
      anyRole: compileRegex(
        `${roleWord([...parties.claimantKeywords, ...parties.defendantKeywords])}\\s*[:\\-–]`,
        'parties.keywords'
      ),
      counselMarker: compileRegex(
        `${wholeWord(alternation(parties.counselMarkers))}\\s*[:\\-–]?\\s*`,
        'parties.counselMarkers'
      ),
      addressMarker: compileRegex(
        `${wholeWord(alternation(parties.addressMarkers))}\\s*[:\\-–]?\\s*`,
        'parties.addressMarkers'
      ),
      maxBlockLength: parties.maxBlockLength,
      confidence: parties.confidence,
      singlePartyFactor: parties.singlePartyFactor,
    },
    references: {
      sources,
      sourcePattern: alternation(references.sources.map((s) => s.pattern)),
      agencies: compileAliases(references.agencies, 'references.agencies'),
      kindConfidence: references.kindConfidence,
    },
    monetary: effective.monetary,
    requests: {
      maxRequests: requests.maxRequests,
      topics: compileTopics(requests.topics),
      sectionHeading: headingRegex(requests.sectionHeadings, 'requests.sectionHeadings'),
      requestPhrase: compileRegex(wholeWord(alternation(requests.requestPhrases)), 'requests.requestPhrases'),
    },
    reasoning: {
      maxLength: reasoning.maxLength,
      minSentenceLength: reasoning.minSentenceLength,
      sectionHeading: headingRegex(reasoning.sectionHeadings, 'reasoning.sectionHeadings'),
      keyword: compileRegex(wholeWord(alternation(reasoning.keywords)), 'reasoning.keywords'),
    },
    excerpt: {
      maxLength: excerpt.maxLength,
      minSentenceLength: excerpt.minSentenceLength,
      keyword: compileRegex(wholeWord(alternation(excerpt.keywords)), 'excerpt.keywords'),
    },
    summary: effective.summary,
  };

  // Embedding check: the alias alternation has to compile inside citation patterns
  compileRegex(wholeWord(taxonomy.references.sourcePattern), 'references.sources');

  return deepFreeze(taxonomy);
}

/**
 * Reads and builds a taxonomy file.
 */
export function loadTaxonomy(options: LoadTaxonomyOptions = {}): Taxonomy {
  const filePath = options.path ?? DEFAULT_TAXONOMY_PATH;

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new TaxonomyError(`Cannot read taxonomy file ${filePath}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new TaxonomyError(`Taxonomy file ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  const taxonomy = buildTaxonomy(raw, options.overrides);
  logger.debug('Taxonomy loaded', { path: filePath, pipelineVersion: taxonomy.pipelineVersion });
  return taxonomy;
}

let defaultTaxonomy: Taxonomy | null = null;

/**
 * The bundled taxonomy, loaded once per process.
 */
export function getDefaultTaxonomy(): Taxonomy {
  if (!defaultTaxonomy) {
    defaultTaxonomy = loadTaxonomy();
  }
  return defaultTaxonomy;
}
