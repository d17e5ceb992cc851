import { createLogger } from '../utils/logger.js';
import { findMatches } from '../utils/spans.js';
import { normalizeWhitespace } from '../utils/text.js';
import type { Taxonomy } from '../taxonomy/types.js';
import type { Parties, PartyRecord, PartyRole, TaxId } from './types.js';

const logger = createLogger('PartyExtractor');

const CNPJ = /(?<!\d)(\d{2})\.?(\d{3})\.?(\d{3})\/?(\d{4})-?(\d{2})(?!\d)/u;
const CPF = /(?<!\d)(\d{3})\.?(\d{3})\.?(\d{3})-?(\d{2})(?!\d)/u;

// A period ends a field unless it closes an honorific ("Dr. Fulano")
const PERIOD_END = String.raw`(?<!(?:^|[^\p{L}])(?:dr|dra|sr|sra))\.(?=\s|$)`;
const FIELD_MARKER = String.raw`(?<![\p{L}])(?:CPF|CNPJ|OAB|inscrit[oa])(?![\p{L}])`;

const NAME_END = new RegExp(String.raw`[\n;,(]|${PERIOD_END}|${FIELD_MARKER}`, 'iu');
const ADDRESS_END = new RegExp(String.raw`[\n;]|${PERIOD_END}|${FIELD_MARKER}`, 'iu');
const COUNSEL_END = new RegExp(String.raw`[\n;(]|${PERIOD_END}`, 'iu');

// Case-sensitive: the label regexes match with the `i` flag
const NAME_START = /^[\p{Lu}\p{N}"“]/u;

const OAB_NUMBER = /OAB\s*[/-]?\s*[A-Z]{2}\s*(?:n[º°.]*\s*)?[\d.]+(?:-?[A-Z])?/giu;
const HONORIFIC = /^(?:Dr|Dra|Drª|Sr|Sra)\.?\s+/iu;
const TRAILING_PUNCTUATION = /[\s,.;:\-–]+$/u;
const HINT_SEPARATOR = /\s+(?:x|vs\.?|versus|contra)\s+/iu;

interface PartyBlock {
  name: string;
  body: string;
}

function cleanValue(value: string): string {
  return normalizeWhitespace(value).replace(TRAILING_PUNCTUATION, '');
}

function hasLetters(value: string): boolean {
  return /\p{L}/u.test(value);
}

/**
 * Text up to the first match of `terminator`.
 */
function takeUntil(value: string, terminator: RegExp): string {
  const end = value.search(terminator);
  return end < 0 ? value : value.slice(0, end);
}

function extractTaxId(body: string): TaxId | undefined {
  const cnpj = CNPJ.exec(body);
  if (cnpj) {
    return { kind: 'CNPJ', value: `${cnpj[1]}.${cnpj[2]}.${cnpj[3]}/${cnpj[4]}-${cnpj[5]}` };
  }
  const cpf = CPF.exec(body);
  if (cpf) {
    return { kind: 'CPF', value: `${cpf[1]}.${cpf[2]}.${cpf[3]}-${cpf[4]}` };
  }
  return undefined;
}

function extractAddress(body: string, taxonomy: Taxonomy): string | undefined {
  const [marker] = findMatches(taxonomy.parties.addressMarker, body);
  if (!marker) return undefined;

  const rest = body.slice(marker.index + marker[0].length);
  const counselAt = findMatches(taxonomy.parties.counselMarker, rest)[0]?.index ?? rest.length;
  const address = cleanValue(takeUntil(rest.slice(0, counselAt), ADDRESS_END));
  return address.length >= 5 && hasLetters(address) ? address : undefined;
}

function extractCounsel(body: string, taxonomy: Taxonomy): string[] {
  const counsel: string[] = [];

  for (const marker of findMatches(taxonomy.parties.counselMarker, body)) {
    const rest = body.slice(marker.index + marker[0].length);
    const names = takeUntil(rest, COUNSEL_END)
      .replace(OAB_NUMBER, ' ')
      .split(/\s*,\s*|\s+e\s+/u)
      .map((name) => cleanValue(name).replace(HONORIFIC, ''))
      .filter((name) => name.length >= 3 && hasLetters(name));

    for (const name of names) {
      if (!counsel.includes(name)) counsel.push(name);
    }
  }

  return counsel;
}

function scoreParty(
  role: PartyRole,
  block: PartyBlock,
  taxonomy: Taxonomy
): PartyRecord {
  const weights = taxonomy.parties.confidence;
  const taxId = extractTaxId(block.body);
  const address = extractAddress(block.body, taxonomy);
  const counsel = extractCounsel(block.body, taxonomy);

  let confidence = weights.name;
  if (taxId) confidence += weights.taxId;
  if (counsel.length > 0) confidence += weights.counsel;
  if (address) confidence += weights.address;

  return {
    role,
    name: block.name,
    ...(taxId ? { taxId } : {}),
    ...(address ? { address } : {}),
    counsel,
    confidence: Math.min(1, confidence),
  };
}

/**
 * Whether only blanks separate `index` from the start of its line or from a
 * preceding ";".
 */
function opensLine(text: string, index: number): boolean {
  let i = index - 1;
  while (i >= 0 && (text[i] === ' ' || text[i] === '\t')) i--;
  return i < 0 || text[i] === '\n' || text[i] === ';';
}

/**
 * Every "<role keyword>: <name> ..." block for one role. A block runs until
 * the next role label or maxBlockLength characters. Mid-sentence, a label
 * needs a capitalized name after it, so "a autora - que trabalhou..." is
 * narrative.
 */
function findBlocks(text: string, label: RegExp, taxonomy: Taxonomy): PartyBlock[] {
  const blocks: PartyBlock[] = [];

  for (const match of findMatches(label, text)) {
    const start = match.index + match[0].length;
    if (!opensLine(text, match.index) && !NAME_START.test(text.slice(start, start + 1))) continue;
    const limit = Math.min(text.length, start + taxonomy.parties.maxBlockLength);
    const nextRole = findMatches(taxonomy.parties.anyRole, text, { start, end: limit })[0];
    const body = text.slice(start, nextRole ? nextRole.index : limit);

    const name = cleanValue(takeUntil(body, NAME_END));
    if (name.length < 2 || !hasLetters(name)) continue;

    blocks.push({ name, body });
  }

  return blocks;
}

function strongest(
  role: PartyRole,
  text: string,
  label: RegExp,
  taxonomy: Taxonomy
): PartyRecord | undefined {
  let best: PartyRecord | undefined;
  for (const block of findBlocks(text, label, taxonomy)) {
    const candidate = scoreParty(role, block, taxonomy);
    if (!best || candidate.confidence > best.confidence) {
      best = candidate;
    }
  }
  return best;
}

function extractFromText(text: string, taxonomy: Taxonomy): Parties {
  const claimant = strongest('CLAIMANT', text, taxonomy.parties.claimantLabel, taxonomy);
  const defendant = strongest('DEFENDANT', text, taxonomy.parties.defendantLabel, taxonomy);
  return {
    ...(claimant ? { claimant } : {}),
    ...(defendant ? { defendant } : {}),
  };
}

/**
 * Reads "A x B" / "A vs. B" style party captions.
 */
function extractFromCaption(hint: string, taxonomy: Taxonomy): Parties {
  const sides = hint.split(HINT_SEPARATOR);
  if (sides.length !== 2) return {};

  const record = (role: PartyRole, raw: string): PartyRecord | undefined => {
    const name = cleanValue(raw);
    if (name.length < 2 || !hasLetters(name)) return undefined;
    return { role, name, counsel: [], confidence: Math.min(1, taxonomy.parties.confidence.name) };
  };

  const claimant = record('CLAIMANT', sides[0]);
  const defendant = record('DEFENDANT', sides[1]);
  return {
    ...(claimant ? { claimant } : {}),
    ...(defendant ? { defendant } : {}),
  };
}

/**
 * Extract claimant and defendant from the decision text. Roles missing from
 * the text are filled from the parties hint when one is given.
 */
export function extractParties(text: unknown, taxonomy: Taxonomy, partiesHint?: string): Parties {
  const fromText = typeof text === 'string' ? extractFromText(text, taxonomy) : {};
  if (fromText.claimant && fromText.defendant) return fromText;
  if (!partiesHint || partiesHint.trim() === '') return fromText;

  let fromHint = extractFromText(partiesHint, taxonomy);
  if (!fromHint.claimant && !fromHint.defendant) {
    fromHint = extractFromCaption(partiesHint, taxonomy);
  }

  const claimant = fromText.claimant ?? fromHint.claimant;
  const defendant = fromText.defendant ?? fromHint.defendant;
  logger.debug('Parties completed from hint', {
    claimantFromHint: !fromText.claimant && Boolean(claimant),
    defendantFromHint: !fromText.defendant && Boolean(defendant),
  });

  return {
    ...(claimant ? { claimant } : {}),
    ...(defendant ? { defendant } : {}),
  };
}

/**
 * Mean of both records' confidence; a lone record is discounted by the
 * taxonomy's singlePartyFactor.
 */
export function partiesConfidence(parties: Parties, taxonomy: Taxonomy): number {
  const { claimant, defendant } = parties;
  if (claimant && defendant) return (claimant.confidence + defendant.confidence) / 2;
  const lone = claimant ?? defendant;
  return lone ? lone.confidence * taxonomy.parties.singlePartyFactor : 0;
}
