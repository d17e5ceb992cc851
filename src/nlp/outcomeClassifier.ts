import { createLogger } from '../utils/logger.js';
import { findMatches, resolveOverlaps, type Span } from '../utils/spans.js';
import { normalizeWhitespace, sentenceSpans } from '../utils/text.js';
import { OUTCOME_METHODS, POLARITIES } from '../taxonomy/types.js';
import type { CompiledRight, OutcomeMethod, Polarity, Taxonomy } from '../taxonomy/types.js';
import { mergeRanges, scanPatterns, scanResolved } from './patternScan.js';
import type { PatternHit } from './patternScan.js';
import { OUTCOME_BY_POLARITY, RIGHT_OUTCOME_BY_POLARITY } from './types.js';
import type { Evidence, Outcome, OutcomeClassification, WorkerRight } from './types.js';

const logger = createLogger('OutcomeClassifier');

/**
 * One vote cast by a method before scoring.
 */
interface MethodHit extends Span {
  polarity: Polarity;
  patternId: string;
  weight: number;
  snippet: string;
}

type MethodRunner = (text: string, taxonomy: Taxonomy) => MethodHit[];

function fromPatternHits(hits: PatternHit[], factor = 1): MethodHit[] {
  return hits.map((hit) => ({
    start: hit.start,
    end: hit.end,
    polarity: hit.pattern.polarity,
    patternId: hit.pattern.id,
    weight: hit.pattern.weight * factor,
    snippet: hit.snippet,
  }));
}

function direct(text: string, taxonomy: Taxonomy): MethodHit[] {
  return fromPatternHits(scanResolved(taxonomy.outcome.lexicon, text));
}

function inference(text: string, taxonomy: Taxonomy): MethodHit[] {
  return fromPatternHits(scanResolved(taxonomy.outcome.inference, text));
}

function legalLanguage(text: string, taxonomy: Taxonomy): MethodHit[] {
  return fromPatternHits(scanResolved(taxonomy.outcome.legalLanguage, text));
}

function distance(a: Span, b: Span): number {
  if (b.start >= a.end) return b.start - a.end;
  if (a.start >= b.end) return a.start - b.end;
  return 0;
}

interface RightVerdict extends Span {
  right: CompiledRight;
  verdict: PatternHit;
  snippet: string;
}

/**
 * A right mention paired with the nearest verdict phrase in its sentence.
 * Each right counts once per sentence; distinct rights sharing a verdict
 * ("horas extras e férias deferidas") each get a pairing.
 */
function pairRightsWithVerdicts(text: string, taxonomy: Taxonomy): RightVerdict[] {
  const { rights, verdicts } = taxonomy.outcome.laborRights;
  const sentences = sentenceSpans(text);
  const pairs: RightVerdict[] = [];

  for (const right of rights) {
    const counted = new Set<number>();

    for (const match of findMatches(right.regex, text)) {
      const mention = { start: match.index, end: match.index + match[0].length };
      const sentence = sentences.find((s) => mention.start >= s.start && mention.start < s.end);
      if (!sentence || counted.has(sentence.start)) continue;

      let nearest: PatternHit | undefined;
      for (const verdict of scanResolved(verdicts, text, sentence)) {
        if (verdict.start < mention.end && mention.start < verdict.end) continue;
        if (!nearest || distance(mention, verdict) < distance(mention, nearest)) {
          nearest = verdict;
        }
      }
      if (!nearest) continue;

      counted.add(sentence.start);
      const start = Math.min(mention.start, nearest.start);
      const end = Math.max(mention.end, nearest.end);
      pairs.push({ start, end, right, verdict: nearest, snippet: normalizeWhitespace(text.slice(start, end)) });
    }
  }

  return pairs.sort((a, b) => a.start - b.start);
}

function laborRights(text: string, taxonomy: Taxonomy): MethodHit[] {
  return pairRightsWithVerdicts(text, taxonomy).map(({ start, end, right, verdict, snippet }) => ({
    start,
    end,
    polarity: verdict.pattern.polarity,
    patternId: `${right.id}/${verdict.pattern.id}`,
    weight: right.weight * verdict.pattern.weight,
    snippet,
  }));
}

/**
 * The worker rights the decision rules on, one entry per right in text
 * order. A right mentioned in several sentences takes the verdict of its
 * last one, since the dispositive section closes the decision.
 */
export function analyzeRights(text: unknown, taxonomy: Taxonomy): WorkerRight[] {
  if (typeof text !== 'string' || text.trim() === '') return [];

  const latest = new Map<string, RightVerdict>();
  for (const pair of pairRightsWithVerdicts(text, taxonomy)) {
    const previous = latest.get(pair.right.id);
    if (!previous || pair.start >= previous.start) latest.set(pair.right.id, pair);
  }

  const rights = [...latest.values()]
    .sort((a, b) => a.start - b.start)
    .map(({ start, right, verdict, snippet }) => ({
      id: right.id,
      label: right.label,
      outcome: RIGHT_OUTCOME_BY_POLARITY[verdict.pattern.polarity],
      snippet,
      offset: start,
    }));

  logger.debug('Rights analyzed', { count: rights.length });
  return rights;
}

/**
 * The direct lexicon, restricted to windows around discourse markers.
 */
function semanticContext(text: string, taxonomy: Taxonomy): MethodHit[] {
  const { contextMarkers, contextWindow, lexicon } = taxonomy.outcome;

  const windows: Span[] = [];
  for (const marker of contextMarkers) {
    for (const match of findMatches(marker.regex, text)) {
      windows.push({
        start: Math.max(0, match.index - contextWindow.before),
        end: Math.min(text.length, match.index + match[0].length + contextWindow.after),
      });
    }
  }
  if (windows.length === 0) return [];

  const hits = mergeRanges(windows).flatMap((range) => scanPatterns(lexicon, text, range));
  return fromPatternHits(resolveOverlaps(hits));
}

/**
 * The direct lexicon inside the dispositive section, which runs from the
 * first dispositive marker to the end of the text. Appending text can only
 * widen that region. No marker, no vote.
 */
function documentStructure(text: string, taxonomy: Taxonomy): MethodHit[] {
  const { dispositiveMarkers, lexicon } = taxonomy.outcome;

  let regionStart = text.length;
  for (const marker of dispositiveMarkers) {
    const [first] = findMatches(marker.regex, text);
    if (first) regionStart = Math.min(regionStart, first.index);
  }
  if (regionStart === text.length) return [];

  return fromPatternHits(scanResolved(lexicon, text, { start: regionStart, end: text.length }));
}

const METHOD_RUNNERS: Readonly<Record<OutcomeMethod, MethodRunner>> = {
  direct,
  inference,
  labor_rights: laborRights,
  semantic_context: semanticContext,
  document_structure: documentStructure,
  legal_language: legalLanguage,
};

function emptyScores(): Record<Polarity, number> {
  return { favorable: 0, unfavorable: 0, partial: 0 };
}

function undetermined(): OutcomeClassification {
  return {
    outcome: 'UNDETERMINED',
    confidence: 0,
    evidence: [],
    methodsUsed: [],
    scores: emptyScores(),
  };
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Picks the winning label from the aggregate scores.
 *
 * Labels within tieEpsilon of the maximum are candidates. A conflict between
 * the two single-sided labels reads as a partial outcome; otherwise the label
 * backed by more distinct methods wins, and a remaining tie is undetermined.
 */
function selectOutcome(
  scores: Record<Polarity, number>,
  supporters: Record<Polarity, Set<OutcomeMethod>>,
  tieEpsilon: number
): Outcome {
  const max = Math.max(...POLARITIES.map((p) => scores[p]));
  const candidates = POLARITIES.filter((p) => scores[p] > 0 && scores[p] >= max - tieEpsilon);

  if (candidates.length === 1) {
    return OUTCOME_BY_POLARITY[candidates[0]];
  }
  if (candidates.includes('favorable') && candidates.includes('unfavorable')) {
    return OUTCOME_BY_POLARITY.partial;
  }

  const ranked = [...candidates].sort((a, b) => supporters[b].size - supporters[a].size);
  if (ranked.length > 1 && supporters[ranked[0]].size === supporters[ranked[1]].size) {
    return 'UNDETERMINED';
  }
  return OUTCOME_BY_POLARITY[ranked[0]];
}

/**
 * Classify the outcome of a decision.
 *
 * Six methods vote independently. Per method and polarity the pattern weights
 * are summed, normalized by the taxonomy's saturation and capped at the
 * method's ceiling; the label score is the method-weighted sum of those local
 * scores. Never throws on empty or non-string input.
 */
export function classifyOutcome(text: unknown, taxonomy: Taxonomy): OutcomeClassification {
  if (typeof text !== 'string' || text.trim() === '') {
    return undetermined();
  }

  const scores = emptyScores();
  const supporters: Record<Polarity, Set<OutcomeMethod>> = {
    favorable: new Set(),
    unfavorable: new Set(),
    partial: new Set(),
  };
  const evidence: Evidence[] = [];
  const methodsUsed: OutcomeMethod[] = [];

  for (const method of OUTCOME_METHODS) {
    const settings = taxonomy.methods[method];
    if (settings.weight <= 0 || settings.ceiling <= 0) continue;

    const hits = METHOD_RUNNERS[method](text, taxonomy).filter((hit) => hit.weight > 0);
    if (hits.length === 0) continue;
    methodsUsed.push(method);

    for (const polarity of POLARITIES) {
      const polarityHits = hits.filter((hit) => hit.polarity === polarity);
      if (polarityHits.length === 0) continue;

      const raw = polarityHits.reduce((sum, hit) => sum + hit.weight, 0);
      const local = Math.min(raw / taxonomy.saturation, settings.ceiling);
      scores[polarity] += settings.weight * local;
      supporters[polarity].add(method);
    }

    for (const hit of hits) {
      const raw = hits
        .filter((other) => other.polarity === hit.polarity)
        .reduce((sum, other) => sum + other.weight, 0);
      const local = Math.min(raw / taxonomy.saturation, settings.ceiling);
      evidence.push({
        method,
        polarity: hit.polarity,
        patternId: hit.patternId,
        snippet: hit.snippet,
        offset: hit.start,
        weight: hit.weight,
        contribution: (settings.weight * local * hit.weight) / raw,
      });
    }
  }

  const total = scores.favorable + scores.unfavorable + scores.partial;
  if (total <= 0) {
    logger.debug('No outcome evidence found');
    return undetermined();
  }

  const winnerScore = Math.max(scores.favorable, scores.unfavorable, scores.partial);
  const confidence = clamp01(winnerScore / taxonomy.confidenceScale) * (winnerScore / total);
  const outcome = selectOutcome(scores, supporters, taxonomy.tieEpsilon);

  logger.debug('Outcome classified', { outcome, confidence, methodsUsed, scores });

  return {
    outcome,
    confidence: clamp01(confidence),
    evidence,
    methodsUsed,
    scores,
  };
}
