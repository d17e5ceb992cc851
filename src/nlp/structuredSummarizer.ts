import { createLogger, DocumentLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { deepFreeze } from '../utils/freeze.js';
import { findMatches } from '../utils/spans.js';
import { normalizeWhitespace, sectionAfter, sentenceSpans, truncate } from '../utils/text.js';
import type { Taxonomy } from '../taxonomy/types.js';
import { analyzeRights, classifyOutcome } from './outcomeClassifier.js';
import { extractParties, partiesConfidence } from './partyExtractor.js';
import { extractReferences, referencesConfidence } from './legalReferenceExtractor.js';
import { extractMainRequests, extractMonetaryMentions } from './monetaryExtractor.js';
import type {
  DecisionText,
  ExtractionFailure,
  LegalReference,
  MonetaryMention,
  OutcomeClassification,
  Parties,
  StructuredSummary,
  SummaryBranch,
  WorkerRight,
} from './types.js';

/**
 * Structured Summarizer
 *
 * Runs the extractors over one decision and joins their results into a
 * frozen StructuredSummary. Each branch is isolated: a branch that throws
 * contributes its empty result and a failure record, and the others still run.
 */

const logger = createLogger('StructuredSummarizer');

export interface MonetaryResult {
  mentions: MonetaryMention[];
  requests: string[];
}

/**
 * The extractors a summarizer fans out to. Replaceable for tests.
 */
export interface Extractors {
  outcome(text: string, taxonomy: Taxonomy): OutcomeClassification;
  rights(text: string, taxonomy: Taxonomy): WorkerRight[];
  parties(text: string, taxonomy: Taxonomy, hint?: string): Parties;
  references(text: string, taxonomy: Taxonomy, hint?: string | readonly string[]): LegalReference[];
  monetary(text: string, taxonomy: Taxonomy): MonetaryResult;
}

export const defaultExtractors: Extractors = {
  outcome: classifyOutcome,
  rights: analyzeRights,
  parties: extractParties,
  references: extractReferences,
  monetary: (text, taxonomy) => ({
    mentions: extractMonetaryMentions(text, taxonomy),
    requests: extractMainRequests(text, taxonomy),
  }),
};

const EMPTY_OUTCOME: Readonly<OutcomeClassification> = {
  outcome: 'UNDETERMINED',
  confidence: 0,
  evidence: [],
  methodsUsed: [],
  scores: { favorable: 0, unfavorable: 0, partial: 0 },
};

function emptyOutcome(): OutcomeClassification {
  return { ...EMPTY_OUTCOME, evidence: [], methodsUsed: [], scores: { ...EMPTY_OUTCOME.scores } };
}

/**
 * Earliest sentence that reads like a ruling ("Julgo procedente...",
 * "Condeno a reclamada..."), else the start of the text.
 */
export function selectExcerpt(text: string, taxonomy: Taxonomy): string {
  const { maxLength, minSentenceLength, keyword } = taxonomy.excerpt;
  if (text.trim() === '') return '';

  for (const sentence of sentenceSpans(text)) {
    if (sentence.text.length < minSentenceLength) continue;
    if (findMatches(keyword, sentence.text).length > 0) {
      return truncate(normalizeWhitespace(sentence.text), maxLength);
    }
  }

  return truncate(normalizeWhitespace(text), maxLength);
}

/**
 * The leading grounds of the fundamentação section: its first sentence that
 * cites a legal basis, else the start of the section. Empty when the
 * decision has no such section.
 */
export function selectReasoning(text: string, taxonomy: Taxonomy): string {
  const { maxLength, minSentenceLength, sectionHeading, keyword } = taxonomy.reasoning;
  const section = sectionAfter(text, sectionHeading);
  if (section === undefined || section.trim() === '') return '';

  const grounded = sentenceSpans(section).find(
    (sentence) => sentence.text.length >= minSentenceLength && findMatches(keyword, sentence.text).length > 0
  );
  return truncate(normalizeWhitespace(grounded ? grounded.text : section), maxLength);
}

export class DecisionSummarizer {
  private taxonomy: Taxonomy;
  private extractors: Extractors;

  constructor(taxonomy: Taxonomy, extractors: Partial<Extractors> = {}) {
    this.taxonomy = taxonomy;
    this.extractors = { ...defaultExtractors, ...extractors };
  }

  get pipelineVersion(): string {
    return this.taxonomy.pipelineVersion;
  }

  summarize(document: DecisionText): StructuredSummary {
    const log = new DocumentLogger(document.id, logger);
    const text = typeof document.text === 'string' ? document.text : '';
    const failures: ExtractionFailure[] = [];
    log.started({ length: text.length });

    const branch = <T>(name: SummaryBranch, run: () => T, fallback: () => T): T => {
      try {
        return run();
      } catch (error) {
        log.warn('Extraction branch failed', { branch: name, error: errorMessage(error) });
        failures.push({ branch: name, message: errorMessage(error) });
        return fallback();
      }
    };

    const { taxonomy, extractors } = this;
    const outcome = branch('outcome', () => extractors.outcome(text, taxonomy), emptyOutcome);
    const rights = branch('rights', () => extractors.rights(text, taxonomy), (): WorkerRight[] => []);
    const parties = branch('parties', () => extractors.parties(text, taxonomy, document.parties), (): Parties => ({}));
    const legalReferences = branch(
      'references',
      () => extractors.references(text, taxonomy, document.legislativeReference),
      (): LegalReference[] => []
    );
    const monetary = branch(
      'monetary',
      () => extractors.monetary(text, taxonomy),
      (): MonetaryResult => ({ mentions: [], requests: [] })
    );

    const overallConfidence = this.overallConfidence(outcome, parties, legalReferences, monetary.mentions);

    log.completed({ outcome: outcome.outcome, overallConfidence, failures: failures.length });

    return deepFreeze({
      documentId: document.id,
      outcome,
      rights,
      parties,
      legalReferences,
      monetaryMentions: monetary.mentions,
      mainRequests: monetary.requests,
      decisionExcerpt: selectExcerpt(text, taxonomy),
      mainReasoning: selectReasoning(text, taxonomy),
      overallConfidence,
      pipelineVersion: taxonomy.pipelineVersion,
      failures,
    });
  }

  /**
   * Fixed-weight average of the branch confidences. Missing results count
   * as zero.
   */
  private overallConfidence(
    outcome: OutcomeClassification,
    parties: Parties,
    references: LegalReference[],
    mentions: MonetaryMention[]
  ): number {
    const weights = this.taxonomy.summary.weights;
    const total = weights.outcome + weights.parties + weights.references + weights.monetary;

    const weighted =
      weights.outcome * outcome.confidence +
      weights.parties * partiesConfidence(parties, this.taxonomy) +
      weights.references * referencesConfidence(references) +
      weights.monetary * Math.min(1, mentions.length / 3);

    return Math.min(1, Math.max(0, weighted / total));
  }
}

/**
 * Summarize one decision with the default extractors.
 */
export function summarize(document: DecisionText, taxonomy: Taxonomy): StructuredSummary {
  return new DecisionSummarizer(taxonomy).summarize(document);
}
