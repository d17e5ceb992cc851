import './env.js';
import { loadTaxonomy } from '../taxonomy/loader.js';
import type { Taxonomy } from '../taxonomy/types.js';

/**
 * Pipeline Configuration
 *
 * Everything here comes from the environment (or .env). The taxonomy file
 * itself carries the extraction rules; the environment only chooses which
 * file to load and overrides a few tunables. LOG_LEVEL and LOG_DIR are read
 * by the logger module.
 */
export interface PipelineConfig {
  /** Taxonomy file; undefined means the bundled taxonomy */
  taxonomyPath?: string;
  /** Overrides the taxonomy's tieEpsilon when set */
  tieEpsilon?: number;
  concurrency: number;
  outputDir: string;
}

export const DEFAULT_CONCURRENCY = 8;
export const DEFAULT_OUTPUT_DIR = 'output';

function parseNumber(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}

export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const concurrency = parseNumber('BATCH_CONCURRENCY', env.BATCH_CONCURRENCY) ?? DEFAULT_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`BATCH_CONCURRENCY must be a positive integer, got ${concurrency}`);
  }

  return {
    taxonomyPath: env.PIPELINE_TAXONOMY_PATH || undefined,
    tieEpsilon: parseNumber('PIPELINE_TIE_EPSILON', env.PIPELINE_TIE_EPSILON),
    concurrency,
    outputDir: env.OUTPUT_DIR || DEFAULT_OUTPUT_DIR,
  };
}

/**
 * Loads the taxonomy named by the config, with its overrides folded in.
 */
export function loadConfiguredTaxonomy(config: PipelineConfig): Taxonomy {
  return loadTaxonomy({
    path: config.taxonomyPath,
    overrides: { tieEpsilon: config.tieEpsilon },
  });
}
