import fs from 'fs/promises';
import pLimit from 'p-limit';
import { InputValidationError, errorMessage } from '../utils/errors.js';
import { createLogger, DocumentLogger } from '../utils/logger.js';
import { tryParseJson, validator } from '../utils/validators.js';
import { DecisionSummarizer } from '../nlp/structuredSummarizer.js';
import type { DecisionText, StructuredSummary } from '../nlp/types.js';
import type { Taxonomy } from '../taxonomy/types.js';

const DEFAULT_CONCURRENCY_LIMIT = 8;

const validateBatchInput = validator.compileSchema<DecisionText[]>({
  type: 'array',
  items: {
    type: 'object',
    required: ['id', 'text'],
    properties: {
      id: { type: 'string', minLength: 1 },
      text: { type: 'string' },
      parties: { type: 'string' },
      legislativeReference: {
        anyOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }],
      },
    },
  },
});

/**
 * Anything that turns one decision into a summary.
 */
export interface DocumentSummarizer {
  readonly pipelineVersion: string;
  summarize(document: DecisionText): StructuredSummary;
}

export interface BatchOptions {
  concurrencyLimit?: number;
}

export interface DocumentFailure {
  documentId: string;
  message: string;
  stack?: string;
}

export type DocumentResult =
  | { documentId: string; success: true; summary: StructuredSummary }
  | { documentId: string; success: false; failure: DocumentFailure };

/**
 * Called as each document completes
 */
export type ResultCallback = (result: DocumentResult) => Promise<void> | void;

export interface BatchResult {
  pipelineVersion: string;
  /** In input order */
  summaries: StructuredSummary[];
  failures: DocumentFailure[];
}

/**
 * Parse and validate a batch input file: a JSON array of decisions.
 */
export function parseBatchInput(content: string, source = 'input'): DecisionText[] {
  const data = tryParseJson(content);
  if (data === undefined) {
    throw new InputValidationError(`Invalid batch input in ${source}`, '  • root: not valid JSON');
  }

  const result = validator.validate(validateBatchInput, data);
  if (!result.valid) {
    throw new InputValidationError(`Invalid batch input in ${source}`, validator.formatErrors(result.errors));
  }
  return result.data;
}

export async function readBatchInput(filePath: string): Promise<DecisionText[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parseBatchInput(content, filePath);
}

/**
 * Batch Runner
 *
 * Summarizes many decisions with bounded concurrency. A document that
 * throws becomes a DocumentFailure; the rest of the batch carries on.
 */
export class BatchRunner {
  private summarizer: DocumentSummarizer;
  private concurrencyLimit: number;
  private logger = createLogger('BatchRunner');

  constructor(taxonomy: Taxonomy, options: BatchOptions = {}, summarizer?: DocumentSummarizer) {
    this.summarizer = summarizer ?? new DecisionSummarizer(taxonomy);
    this.concurrencyLimit = options.concurrencyLimit ?? DEFAULT_CONCURRENCY_LIMIT;
    if (!Number.isInteger(this.concurrencyLimit) || this.concurrencyLimit < 1) {
      throw new Error(`concurrencyLimit must be a positive integer, got ${this.concurrencyLimit}`);
    }
  }

  async run(documents: readonly DecisionText[], onResult?: ResultCallback): Promise<BatchResult> {
    const totalCount = documents.length;
    let completedCount = 0;

    this.logger.info(`Processing ${totalCount} documents`, {
      concurrencyLimit: this.concurrencyLimit,
      pipelineVersion: this.summarizer.pipelineVersion,
      streamingEnabled: Boolean(onResult),
    });

    const limit = pLimit(this.concurrencyLimit);
    const results = await Promise.all(
      documents.map((document) =>
        limit(async () => {
          const result = this.processDocument(document);

          // Stream result immediately if callback provided
          if (onResult) {
            try {
              await onResult(result);
            } catch (error) {
              this.logger.error(`Error in result callback for document ${document.id}`, {
                error: errorMessage(error),
              });
            }
          }

          completedCount++;
          if (completedCount % 10 === 0 || completedCount === totalCount) {
            this.logger.info(`Progress: ${completedCount}/${totalCount} processed`);
          }

          return result;
        })
      )
    );

    const summaries: StructuredSummary[] = [];
    const failures: DocumentFailure[] = [];
    for (const result of results) {
      if (result.success) {
        summaries.push(result.summary);
      } else {
        failures.push(result.failure);
      }
    }

    this.logger.info('Batch completed', {
      successful: summaries.length,
      failed: failures.length,
    });

    return { pipelineVersion: this.summarizer.pipelineVersion, summaries, failures };
  }

  private processDocument(document: DecisionText): DocumentResult {
    try {
      return { documentId: document.id, success: true, summary: this.summarizer.summarize(document) };
    } catch (error) {
      new DocumentLogger(document.id, this.logger).failed(error);
      return {
        documentId: document.id,
        success: false,
        failure: {
          documentId: document.id,
          message: errorMessage(error),
          ...(error instanceof Error && error.stack ? { stack: error.stack } : {}),
        },
      };
    }
  }
}
