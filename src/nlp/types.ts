import type { OutcomeMethod, Polarity, ReferenceKind } from '../taxonomy/types.js';

export type Outcome =
  | 'FAVORABLE_TO_CLAIMANT'
  | 'FAVORABLE_TO_DEFENDANT'
  | 'PARTIALLY_FAVORABLE'
  | 'UNDETERMINED';

export const OUTCOME_BY_POLARITY: Readonly<Record<Polarity, Outcome>> = {
  favorable: 'FAVORABLE_TO_CLAIMANT',
  unfavorable: 'FAVORABLE_TO_DEFENDANT',
  partial: 'PARTIALLY_FAVORABLE',
};

/**
 * Input decision. Immutable for the duration of a run.
 */
export interface DecisionText {
  readonly id: string;
  readonly text: string;
  /** Raw parties field, e.g. "Fulano x Empresa Ltda" */
  readonly parties?: string;
  /** Free text, a JSON-encoded array, or an array of citation strings */
  readonly legislativeReference?: string | readonly string[];
}

export interface Evidence {
  method: OutcomeMethod;
  polarity: Polarity;
  patternId: string;
  snippet: string;
  offset: number;
  /** Weight of the pattern that fired */
  weight: number;
  /** Share of the final label score this hit accounts for */
  contribution: number;
}

export interface OutcomeClassification {
  outcome: Outcome;
  confidence: number;
  evidence: Evidence[];
  methodsUsed: OutcomeMethod[];
  scores: Record<Polarity, number>;
}

export type RightOutcome = 'GRANTED' | 'DENIED' | 'PARTIALLY_GRANTED';

export const RIGHT_OUTCOME_BY_POLARITY: Readonly<Record<Polarity, RightOutcome>> = {
  favorable: 'GRANTED',
  unfavorable: 'DENIED',
  partial: 'PARTIALLY_GRANTED',
};

/**
 * A worker right the decision rules on, with the verdict paired to it.
 */
export interface WorkerRight {
  /** Taxonomy right id, e.g. "horas_extras" */
  id: string;
  label: string;
  outcome: RightOutcome;
  snippet: string;
  offset: number;
}

export type PartyRole = 'CLAIMANT' | 'DEFENDANT';

export interface TaxId {
  kind: 'CPF' | 'CNPJ';
  value: string;
}

export interface PartyRecord {
  role: PartyRole;
  name: string;
  taxId?: TaxId;
  address?: string;
  counsel: string[];
  confidence: number;
}

export interface Parties {
  claimant?: PartyRecord;
  defendant?: PartyRecord;
}

export type ReferenceProvenance = 'EXTRACTED' | 'PRE_EXISTING';

export interface LegalReference {
  kind: ReferenceKind;
  normalizedCitation: string;
  provenance: ReferenceProvenance;
  confidence: number;
}

export interface MonetaryMention {
  surfaceText: string;
  value: number;
  context: string;
  offset: number;
}

export type SummaryBranch = 'outcome' | 'rights' | 'parties' | 'references' | 'monetary';

export interface ExtractionFailure {
  branch: SummaryBranch;
  message: string;
}

/**
 * Frozen once built.
 */
export interface StructuredSummary {
  readonly documentId: string;
  readonly outcome: OutcomeClassification;
  readonly rights: readonly WorkerRight[];
  readonly parties: Parties;
  readonly legalReferences: readonly LegalReference[];
  readonly monetaryMentions: readonly MonetaryMention[];
  readonly mainRequests: readonly string[];
  readonly decisionExcerpt: string;
  /** Leading grounds of the fundamentação section; empty when there is none */
  readonly mainReasoning: string;
  readonly overallConfidence: number;
  readonly pipelineVersion: string;
  readonly failures: readonly ExtractionFailure[];
}
