#!/usr/bin/env node

import fs from 'fs/promises';
import path from 'path';
import { loadConfiguredTaxonomy, loadPipelineConfig } from './config/pipeline.js';
import { classifyOutcome } from './nlp/outcomeClassifier.js';
import { BatchRunner, readBatchInput } from './pipeline/BatchRunner.js';
import { writeBatchResults } from './pipeline/ResultWriter.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

/**
 * CLI for decision fact extraction
 *
 * Usage:
 *   decision-facts summarize <input.json> [--concurrency N] [--out DIR]
 *   decision-facts classify <file.txt>
 *   decision-facts version
 */

const COMMANDS = ['summarize', 'classify', 'version', 'help'];

/**
 * Value following `name` in the flag list, if any
 */
function flagValue(flags: string[], name: string): string | undefined {
  const index = flags.indexOf(name);
  return index >= 0 ? flags[index + 1] : undefined;
}

function parseConcurrency(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`--concurrency must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Summarize a JSON array of decisions and write the results
 */
async function summarizeFile(inputPath: string, flags: string[]): Promise<void> {
  const config = loadPipelineConfig();
  const taxonomy = loadConfiguredTaxonomy(config);
  const documents = await readBatchInput(inputPath);
  logger.info(`Loaded ${documents.length} documents from ${inputPath}`);

  const runner = new BatchRunner(taxonomy, {
    concurrencyLimit: parseConcurrency(flagValue(flags, '--concurrency'), config.concurrency),
  });
  const result = await runner.run(documents);
  const report = await writeBatchResults(result, flagValue(flags, '--out') ?? config.outputDir);

  console.log('\n✅ Summarization completed!\n');
  console.log(`Pipeline version: ${report.pipelineVersion}`);
  console.log(`Total documents: ${report.totalDocuments}`);
  console.log(`Successful: ${report.successfulDocuments} (${report.successRate})`);
  console.log(`Failed: ${report.failedDocuments}`);
  console.log('\nOutcomes:');
  for (const [outcome, count] of Object.entries(report.outcomes)) {
    console.log(`  ${outcome}: ${count}`);
  }
  console.log('\nArtifacts:');
  console.log(`  - Summaries: ${path.join(report.outputDirectory, 'summaries.json')}`);
  console.log(`  - Failures: ${path.join(report.outputDirectory, 'failures.json')} (${report.failedDocuments} records)`);
  console.log(`  - Report: ${path.join(report.outputDirectory, 'report.json')}`);
  console.log('');
}

/**
 * Classify the outcome of one plain-text decision
 */
async function classifyFile(filePath: string): Promise<void> {
  const taxonomy = loadConfiguredTaxonomy(loadPipelineConfig());
  const text = await fs.readFile(filePath, 'utf-8');
  const classification = classifyOutcome(text, taxonomy);

  console.log(JSON.stringify({ pipelineVersion: taxonomy.pipelineVersion, ...classification }, null, 2));
}

function printVersion(): void {
  const taxonomy = loadConfiguredTaxonomy(loadPipelineConfig());
  console.log(taxonomy.pipelineVersion);
}

function printHelp(): void {
  console.log(`
Decision Facts - structured extraction from labor-court decisions

USAGE:
  decision-facts <command> [arguments]

COMMANDS:
  summarize <input.json>   Summarize a JSON array of decisions
    --concurrency N        Documents processed at once (default: BATCH_CONCURRENCY or 8)
    --out DIR              Output base directory (default: OUTPUT_DIR or ./output)
  classify <file.txt>      Print the outcome classification of one decision
  version                  Print the pipeline version
  help                     Show this help message

INPUT:
  summarize expects an array of { id, text, parties?, legislativeReference? }

ENVIRONMENT:
  Configuration is loaded from .env file
    - PIPELINE_TAXONOMY_PATH   Taxonomy file (default: bundled taxonomy)
    - PIPELINE_TIE_EPSILON     Overrides the taxonomy's tie window
    - BATCH_CONCURRENCY, OUTPUT_DIR, LOG_LEVEL, LOG_DIR
`);
}

/**
 * Main CLI entry point
 */
async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === 'help') {
    printHelp();
    return;
  }

  const command = args[0];
  const target = args[1];
  const flags = args.slice(2);

  try {
    switch (command) {
      case 'summarize':
        if (!target) {
          console.error('Error: Input file is required');
          console.error('Usage: decision-facts summarize <input.json> [--concurrency N] [--out DIR]');
          process.exit(1);
        }
        await summarizeFile(target, flags);
        break;

      case 'classify':
        if (!target) {
          console.error('Error: Text file is required');
          console.error('Usage: decision-facts classify <file.txt>');
          process.exit(1);
        }
        await classifyFile(target);
        break;

      case 'version':
        printVersion();
        break;

      default:
        console.error(`Unknown command: ${command}`);
        console.error(`Valid commands: ${COMMANDS.join(', ')}`);
        printHelp();
        process.exit(1);
    }
  } catch (error) {
    logger.error('Command failed', { error: errorMessage(error) });
    console.error('\n❌ Command failed:', errorMessage(error));
    process.exit(1);
  }
}

// Run CLI
main().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(1);
});
