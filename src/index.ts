export { analyzeRights, classifyOutcome } from './nlp/outcomeClassifier.js';
export { extractParties, partiesConfidence } from './nlp/partyExtractor.js';
export {
  expandYear,
  extractReferences,
  mergeReferences,
  referencesConfidence,
  splitReferenceHint,
} from './nlp/legalReferenceExtractor.js';
export { extractMainRequests, extractMonetaryMentions, parseBrazilianAmount } from './nlp/monetaryExtractor.js';
export { DecisionSummarizer, defaultExtractors, selectExcerpt, selectReasoning, summarize } from './nlp/structuredSummarizer.js';
export type { Extractors, MonetaryResult } from './nlp/structuredSummarizer.js';
export { OUTCOME_BY_POLARITY, RIGHT_OUTCOME_BY_POLARITY } from './nlp/types.js';
export type {
  DecisionText,
  Evidence,
  ExtractionFailure,
  LegalReference,
  MonetaryMention,
  Outcome,
  OutcomeClassification,
  Parties,
  PartyRecord,
  PartyRole,
  ReferenceProvenance,
  RightOutcome,
  StructuredSummary,
  SummaryBranch,
  TaxId,
  WorkerRight,
} from './nlp/types.js';

export { DEFAULT_TAXONOMY_PATH, buildTaxonomy, computePipelineVersion, getDefaultTaxonomy, loadTaxonomy } from './taxonomy/loader.js';
export type { LoadTaxonomyOptions } from './taxonomy/loader.js';
export { OUTCOME_METHODS, POLARITIES, REFERENCE_KINDS } from './taxonomy/types.js';
export type { OutcomeMethod, Polarity, ReferenceKind, Taxonomy, TaxonomyDocument, TaxonomyOverrides } from './taxonomy/types.js';

export { BatchRunner, parseBatchInput, readBatchInput } from './pipeline/BatchRunner.js';
export type { BatchOptions, BatchResult, DocumentFailure, DocumentResult, DocumentSummarizer, ResultCallback } from './pipeline/BatchRunner.js';
export { buildReport, writeBatchResults } from './pipeline/ResultWriter.js';
export type { BatchReport } from './pipeline/ResultWriter.js';

export { loadConfiguredTaxonomy, loadPipelineConfig } from './config/pipeline.js';
export type { PipelineConfig } from './config/pipeline.js';
export { InputValidationError, TaxonomyError } from './utils/errors.js';
