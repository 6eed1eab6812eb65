/**
 * Minifier Configuration
 *
 * Directories and limits of a minifier instance, plus the pipeline
 * configuration the whitespace stages run with.
 */

import path from 'path';
import { DEFAULT_MAX_NESTING_DEPTH } from './code/php-comment-stripper.js';
import { createPipelineConfig, type DebugTapConfig, type PipelineConfig, type StageToggles } from './pipeline/pipeline-config.js';
import type { ProtectedTag } from './utils/regions.js';

export interface MinifierConfig {
  /** Application root; cache paths are relative to it */
  rootDir: string;
  /** Where minified copies are written; relative paths resolve against `rootDir` */
  generatedDir: string;
  maxNestingDepth: number;
  pipeline: PipelineConfig;
}

export interface MinifierConfigOptions {
  rootDir?: string;
  generatedDir?: string;
  maxNestingDepth?: number;
  inlineTags?: readonly string[];
  protectedTags?: readonly ProtectedTag[];
  stages?: Partial<StageToggles>;
  debugTap?: Partial<DebugTapConfig>;
}

export const DEFAULT_GENERATED_DIR = 'var/view_preprocessed';

export const DEFAULT_MINIFIER_CONFIG: MinifierConfig = {
  rootDir: '.',
  generatedDir: DEFAULT_GENERATED_DIR,
  maxNestingDepth: DEFAULT_MAX_NESTING_DEPTH,
  pipeline: createPipelineConfig(),
};

export function createMinifierConfig(options: MinifierConfigOptions = {}): MinifierConfig {
  const {
    rootDir = DEFAULT_MINIFIER_CONFIG.rootDir,
    generatedDir = DEFAULT_MINIFIER_CONFIG.generatedDir,
    maxNestingDepth = DEFAULT_MINIFIER_CONFIG.maxNestingDepth,
    ...pipeline
  } = options;

  if (!Number.isInteger(maxNestingDepth) || maxNestingDepth < 1) {
    throw new Error(`maxNestingDepth must be a positive integer, got ${maxNestingDepth}`);
  }

  return {
    rootDir,
    generatedDir,
    maxNestingDepth,
    pipeline: createPipelineConfig(pipeline),
  };
}

/**
 * Absolute generated directory of a configuration
 */
export const resolveGeneratedDir = (config: MinifierConfig): string => path.resolve(config.rootDir, config.generatedDir);
