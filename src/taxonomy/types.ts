export type Polarity = 'favorable' | 'unfavorable' | 'partial';

export const POLARITIES: readonly Polarity[] = ['favorable', 'unfavorable', 'partial'];

export const OUTCOME_METHODS = [
  'direct',
  'inference',
  'labor_rights',
  'semantic_context',
  'document_structure',
  'legal_language',
] as const;

export type OutcomeMethod = (typeof OUTCOME_METHODS)[number];

export const REFERENCE_KINDS = ['ARTICLE', 'STATUTE', 'SUMULA', 'DECREE', 'ORDINANCE'] as const;

export type ReferenceKind = (typeof REFERENCE_KINDS)[number];

export interface MethodSettings {
  weight: number;
  ceiling: number;
}

/* Taxonomy file shape (taxonomy/default.json) */

export interface PatternEntryDocument {
  id: string;
  polarity: Polarity;
  weight: number;
  pattern: string;
}

export interface RightEntryDocument {
  id: string;
  label: string;
  weight: number;
  pattern: string;
}

export interface MarkerDocument {
  id: string;
  pattern: string;
}

export interface TopicDocument {
  id: string;
  label: string;
  pattern: string;
}

export interface SourceAliasDocument {
  canonical: string;
  pattern: string;
}

export interface PartyConfidenceWeights {
  name: number;
  taxId: number;
  counsel: number;
  address: number;
}

export interface SummaryWeights {
  outcome: number;
  parties: number;
  references: number;
  monetary: number;
}

export interface TaxonomyDocument {
  version: string;
  saturation: number;
  confidenceScale: number;
  tieEpsilon: number;
  twoDigitYearPivot: number;
  methods: Record<OutcomeMethod, MethodSettings>;
  outcome: {
    lexicon: PatternEntryDocument[];
    inference: PatternEntryDocument[];
    legalLanguage: PatternEntryDocument[];
    laborRights: {
      rights: RightEntryDocument[];
      verdicts: PatternEntryDocument[];
    };
    contextMarkers: MarkerDocument[];
    contextWindow: { before: number; after: number };
    dispositiveMarkers: MarkerDocument[];
  };
  parties: {
    claimantKeywords: string[];
    defendantKeywords: string[];
    counselMarkers: string[];
    addressMarkers: string[];
    maxBlockLength: number;
    confidence: PartyConfidenceWeights;
    singlePartyFactor: number;
  };
  references: {
    sources: SourceAliasDocument[];
    /** Issuing bodies of ordinances ("MTb" and "MTE" are one ministry) */
    agencies: SourceAliasDocument[];
    kindConfidence: Record<ReferenceKind, number>;
  };
  monetary: { contextChars: number; maxMentions: number };
  requests: {
    maxRequests: number;
    topics: TopicDocument[];
    sectionHeadings: string[];
    requestPhrases: string[];
  };
  reasoning: { maxLength: number; minSentenceLength: number; sectionHeadings: string[]; keywords: string[] };
  excerpt: { maxLength: number; minSentenceLength: number; keywords: string[] };
  summary: { weights: SummaryWeights };
}

/**
 * Tunables that may be supplied outside the taxonomy file (environment, CLI).
 * They are folded in before hashing, so they change the pipeline version.
 */
export interface TaxonomyOverrides {
  tieEpsilon?: number;
}

/* Compiled, frozen taxonomy handed to every extractor */

export interface CompiledPattern {
  readonly id: string;
  readonly polarity: Polarity;
  readonly weight: number;
  readonly regex: RegExp;
}

export interface CompiledRight {
  readonly id: string;
  readonly label: string;
  readonly weight: number;
  readonly regex: RegExp;
}

export interface CompiledMarker {
  readonly id: string;
  readonly regex: RegExp;
}

export interface CompiledTopic {
  readonly id: string;
  readonly label: string;
  readonly regex: RegExp;
}

export interface CompiledSource {
  readonly canonical: string;
  /** Matches the whole string, used to canonicalize a captured source */
  readonly exact: RegExp;
}

export interface Taxonomy {
  readonly version: string;
  /** `<version>+<hash of the effective taxonomy>` */
  readonly pipelineVersion: string;
  readonly saturation: number;
  readonly confidenceScale: number;
  readonly tieEpsilon: number;
  readonly twoDigitYearPivot: number;
  readonly methods: Readonly<Record<OutcomeMethod, Readonly<MethodSettings>>>;
  readonly outcome: {
    readonly lexicon: readonly CompiledPattern[];
    readonly inference: readonly CompiledPattern[];
    readonly legalLanguage: readonly CompiledPattern[];
    readonly laborRights: {
      readonly rights: readonly CompiledRight[];
      readonly verdicts: readonly CompiledPattern[];
    };
    readonly contextMarkers: readonly CompiledMarker[];
    readonly contextWindow: { readonly before: number; readonly after: number };
    readonly dispositiveMarkers: readonly CompiledMarker[];
  };
  readonly parties: {
    /** Role keyword, optionally suffixed "(a)", followed by `:` or `-` */
    readonly claimantLabel: RegExp;
    readonly defendantLabel: RegExp;
    /** Any role keyword, used to stop a name at the next party */
    readonly anyRole: RegExp;
    readonly counselMarker: RegExp;
    readonly addressMarker: RegExp;
    readonly maxBlockLength: number;
    readonly confidence: Readonly<PartyConfidenceWeights>;
    readonly singlePartyFactor: number;
  };
  readonly references: {
    readonly sources: readonly CompiledSource[];
    /** Alternation of every source alias, for embedding in citation patterns */
    readonly sourcePattern: string;
    readonly agencies: readonly CompiledSource[];
    readonly kindConfidence: Readonly<Record<ReferenceKind, number>>;
  };
  readonly monetary: { readonly contextChars: number; readonly maxMentions: number };
  readonly requests: {
    readonly maxRequests: number;
    readonly topics: readonly CompiledTopic[];
    readonly sectionHeading: RegExp;
    readonly requestPhrase: RegExp;
  };
  readonly reasoning: {
    readonly maxLength: number;
    readonly minSentenceLength: number;
    readonly sectionHeading: RegExp;
    /** Marks a sentence that cites its legal grounds */
    readonly keyword: RegExp;
  };
  readonly excerpt: {
    readonly maxLength: number;
    readonly minSentenceLength: number;
    readonly keyword: RegExp;
  };
  readonly summary: { readonly weights: Readonly<SummaryWeights> };
}
