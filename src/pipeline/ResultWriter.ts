import path from 'path';
import fs from 'fs/promises';
import { createLogger } from '../utils/logger.js';
import type { Outcome } from '../nlp/types.js';
import type { BatchResult } from './BatchRunner.js';

const logger = createLogger('ResultWriter');

/**
 * Batch statistics written to report.json
 */
export interface BatchReport {
  processedAt: string;
  pipelineVersion: string;
  totalDocuments: number;
  successfulDocuments: number;
  failedDocuments: number;
  successRate: string;
  outcomes: Record<Outcome, number>;
  /** Summaries with at least one failed extraction branch */
  partialSummaries: number;
  averageConfidence: number;
  outputDirectory: string;
}

export function buildReport(result: BatchResult, outputDirectory: string, processedAt: Date): BatchReport {
  const outcomes: Record<Outcome, number> = {
    FAVORABLE_TO_CLAIMANT: 0,
    FAVORABLE_TO_DEFENDANT: 0,
    PARTIALLY_FAVORABLE: 0,
    UNDETERMINED: 0,
  };
  let confidenceSum = 0;
  let partialSummaries = 0;

  for (const summary of result.summaries) {
    outcomes[summary.outcome.outcome]++;
    confidenceSum += summary.overallConfidence;
    if (summary.failures.length > 0) partialSummaries++;
  }

  const successfulDocuments = result.summaries.length;
  const totalDocuments = successfulDocuments + result.failures.length;

  return {
    processedAt: processedAt.toISOString(),
    pipelineVersion: result.pipelineVersion,
    totalDocuments,
    successfulDocuments,
    failedDocuments: result.failures.length,
    successRate: totalDocuments > 0 ? `${((successfulDocuments / totalDocuments) * 100).toFixed(1)}%` : '0.0%',
    outcomes,
    partialSummaries,
    averageConfidence: successfulDocuments > 0 ? confidenceSum / successfulDocuments : 0,
    outputDirectory,
  };
}

/**
 * Writes summaries.json, failures.json and report.json into a new
 * timestamped directory under `baseDir`.
 */
export async function writeBatchResults(
  result: BatchResult,
  baseDir: string,
  now: Date = new Date()
): Promise<BatchReport> {
  const timestamp = now.toISOString().replace(/[:.]/g, '-');
  const outputDir = path.join(baseDir, timestamp);
  await fs.mkdir(outputDir, { recursive: true });

  const report = buildReport(result, outputDir, now);

  await Promise.all([
    fs.writeFile(path.join(outputDir, 'summaries.json'), JSON.stringify(result.summaries, null, 2), 'utf-8'),
    fs.writeFile(path.join(outputDir, 'failures.json'), JSON.stringify(result.failures, null, 2), 'utf-8'),
    fs.writeFile(path.join(outputDir, 'report.json'), JSON.stringify(report, null, 2), 'utf-8'),
  ]);

  logger.info('Batch results written', {
    outputDirectory: outputDir,
    successfulDocuments: report.successfulDocuments,
    failedDocuments: report.failedDocuments,
  });

  return report;
}
