import type { SchemaObject } from 'ajv';
import { OUTCOME_METHODS, REFERENCE_KINDS } from './types.js';

const unit = { type: 'number', minimum: 0, maximum: 1 };
const positiveInteger = { type: 'integer', minimum: 1 };
const nonEmptyString = { type: 'string', minLength: 1 };

const patternEntry = {
  type: 'object',
  required: ['id', 'polarity', 'weight', 'pattern'],
  properties: {
    id: nonEmptyString,
    polarity: { enum: ['favorable', 'unfavorable', 'partial'] },
    weight: unit,
    pattern: nonEmptyString,
  },
};

const rightEntry = {
  type: 'object',
  required: ['id', 'label', 'weight', 'pattern'],
  properties: {
    id: nonEmptyString,
    label: nonEmptyString,
    weight: unit,
    pattern: nonEmptyString,
  },
};

const marker = {
  type: 'object',
  required: ['id', 'pattern'],
  properties: { id: nonEmptyString, pattern: nonEmptyString },
};

const topic = {
  type: 'object',
  required: ['id', 'label', 'pattern'],
  properties: { id: nonEmptyString, label: nonEmptyString, pattern: nonEmptyString },
};

const sourceAlias = {
  type: 'object',
  required: ['canonical', 'pattern'],
  properties: { canonical: nonEmptyString, pattern: nonEmptyString },
};

const patternList = { type: 'array', items: nonEmptyString, minItems: 1 };

function recordOf(keys: readonly string[], valueSchema: object) {
  return {
    type: 'object',
    required: [...keys],
    properties: Object.fromEntries(keys.map((key) => [key, valueSchema])),
  };
}

/**
 * JSON schema for a taxonomy file
 */
export const taxonomySchema: SchemaObject = {
  type: 'object',
  required: [
    'version',
    'saturation',
    'confidenceScale',
    'tieEpsilon',
    'twoDigitYearPivot',
    'methods',
    'outcome',
    'parties',
    'references',
    'monetary',
    'requests',
    'reasoning',
    'excerpt',
    'summary',
  ],
  properties: {
    version: nonEmptyString,
    saturation: { type: 'number', exclusiveMinimum: 0 },
    confidenceScale: { type: 'number', exclusiveMinimum: 0 },
    tieEpsilon: unit,
    twoDigitYearPivot: { type: 'integer', minimum: 0, maximum: 99 },
    methods: recordOf(OUTCOME_METHODS, {
      type: 'object',
      required: ['weight', 'ceiling'],
      properties: { weight: { type: 'number', minimum: 0 }, ceiling: unit },
    }),
    outcome: {
      type: 'object',
      required: [
        'lexicon',
        'inference',
        'legalLanguage',
        'laborRights',
        'contextMarkers',
        'contextWindow',
        'dispositiveMarkers',
      ],
      properties: {
        lexicon: { type: 'array', items: patternEntry, minItems: 1 },
        inference: { type: 'array', items: patternEntry },
        legalLanguage: { type: 'array', items: patternEntry },
        laborRights: {
          type: 'object',
          required: ['rights', 'verdicts'],
          properties: {
            rights: { type: 'array', items: rightEntry },
            verdicts: { type: 'array', items: patternEntry },
          },
        },
        contextMarkers: { type: 'array', items: marker },
        contextWindow: {
          type: 'object',
          required: ['before', 'after'],
          properties: {
            before: { type: 'integer', minimum: 0 },
            after: { type: 'integer', minimum: 0 },
          },
        },
        dispositiveMarkers: { type: 'array', items: marker },
      },
    },
    parties: {
      type: 'object',
      required: [
        'claimantKeywords',
        'defendantKeywords',
        'counselMarkers',
        'addressMarkers',
        'maxBlockLength',
        'confidence',
        'singlePartyFactor',
      ],
      properties: {
        claimantKeywords: patternList,
        defendantKeywords: patternList,
        counselMarkers: patternList,
        addressMarkers: patternList,
        maxBlockLength: positiveInteger,
        confidence: recordOf(['name', 'taxId', 'counsel', 'address'], unit),
        singlePartyFactor: unit,
      },
    },
    references: {
      type: 'object',
      required: ['sources', 'agencies', 'kindConfidence'],
      properties: {
        sources: { type: 'array', items: sourceAlias, minItems: 1 },
        agencies: { type: 'array', items: sourceAlias },
        kindConfidence: recordOf(REFERENCE_KINDS, unit),
      },
    },
    monetary: {
      type: 'object',
      required: ['contextChars', 'maxMentions'],
      properties: {
        contextChars: { type: 'integer', minimum: 0 },
        maxMentions: positiveInteger,
      },
    },
    requests: {
      type: 'object',
      required: ['maxRequests', 'topics', 'sectionHeadings', 'requestPhrases'],
      properties: {
        maxRequests: positiveInteger,
        topics: { type: 'array', items: topic },
        sectionHeadings: patternList,
        requestPhrases: patternList,
      },
    },
    reasoning: {
      type: 'object',
      required: ['maxLength', 'minSentenceLength', 'sectionHeadings', 'keywords'],
      properties: {
        maxLength: { type: 'integer', minimum: 4 },
        minSentenceLength: { type: 'integer', minimum: 0 },
        sectionHeadings: patternList,
        keywords: patternList,
      },
    },
    excerpt: {
      type: 'object',
      required: ['maxLength', 'minSentenceLength', 'keywords'],
      properties: {
        maxLength: { type: 'integer', minimum: 4 },
        minSentenceLength: { type: 'integer', minimum: 0 },
        keywords: patternList,
      },
    },
    summary: {
      type: 'object',
      required: ['weights'],
      properties: {
        weights: recordOf(['outcome', 'parties', 'references', 'monetary'], {
          type: 'number',
          minimum: 0,
        }),
      },
    },
  },
};
