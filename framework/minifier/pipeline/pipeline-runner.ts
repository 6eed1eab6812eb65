/**
 * Pipeline Runner
 *
 * Runs the whitespace stages with support for:
 * - Stage toggles (enable/disable individual stages)
 * - Debug tap (write the text after each stage)
 */

import * as fs from 'fs';
import * as path from 'path';
import type { PipelineConfig, StageName } from './pipeline-config.js';
import { getEnabledStages } from './pipeline-config.js';
import { STAGES, type PipelineStage } from '../stages/index.js';
import { logger } from '../utils/logger.js';

const RUNNER_NAME = 'pipeline-runner';

// ============================================================================
// Types
// ============================================================================

/**
 * Output of a single stage.
 */
export interface StageStep {
  stage: StageName;
  inputHash: string;
  outputHash: string;
  content: string;
}

export type StepListener = (step: StageStep) => void;

// ============================================================================
// Hashing
// ============================================================================

/**
 * Simple hash function for comparing stage output.
 */
export function simpleHash(str: string): string {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) - hash + str.charCodeAt(i)) | 0;
  }
  return Math.abs(hash).toString(16).padStart(8, '0');
}

// ============================================================================
// Pipeline Runner
// ============================================================================

/**
 * Get the stages that will run, in execution order.
 */
export function getActiveStages(config: PipelineConfig): PipelineStage[] {
  return getEnabledStages(config).map((name) => STAGES[name]);
}

/**
 * Run a single stage on its own.
 */
export function runStage(name: StageName, content: string, config: PipelineConfig): string {
  return STAGES[name].transform(content, config);
}

/**
 * Run every enabled stage in order; each stage consumes the previous stage's output.
 * `onStep` is called after every stage, changed or not.
 */
export function runWhitespacePipeline(content: string, config: PipelineConfig, onStep?: StepListener): string {
  let current = content;

  for (const stage of getActiveStages(config)) {
    const input = current;
    current = stage.transform(input, config);

    if (onStep) {
      onStep({
        stage: stage.name,
        inputHash: simpleHash(input),
        outputHash: simpleHash(current),
        content: current,
      });
    }
  }

  return current;
}

// ============================================================================
// Debug Tap
// ============================================================================

/**
 * Write the output of every tapped stage that changed the text.
 * Files are named `{step}-{stage}-{filename}{ext}`, with step 00 holding the input.
 */
export async function writeDebugTap(config: PipelineConfig, filePath: string, input: string, steps: readonly StageStep[]): Promise<string[]> {
  if (!config.debugTap.enabled) return [];

  const { outputDir, stages } = config.debugTap;
  const fileName = path.basename(filePath, path.extname(filePath));
  const ext = path.extname(filePath);
  const written: string[] = [];

  await fs.promises.mkdir(outputDir, { recursive: true });

  const write = async (step: number, label: string, content: string): Promise<void> => {
    const outputPath = path.join(outputDir, `${String(step).padStart(2, '0')}-${label}-${fileName}${ext}`);
    await fs.promises.writeFile(outputPath, content, 'utf-8');
    written.push(outputPath);
  };

  await write(0, 'original', input);

  let stepIndex = 1;
  for (const step of steps) {
    const shouldTap = stages.length === 0 || stages.includes(step.stage);

    if (shouldTap && step.inputHash !== step.outputHash) {
      await write(stepIndex, step.stage, step.content);
      logger.info(RUNNER_NAME, `[debug-tap] ${step.stage}: ${fileName}`, `${step.inputHash} → ${step.outputHash}`);
      stepIndex++;
    }
  }

  return written;
}
