/**
 * Pipeline Configuration and Runner Tests
 *
 * Tests for the whitespace pipeline infrastructure.
 */

import { describe, test, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import {
  createPipelineConfig,
  getEnabledStages,
  isStageName,
  runStage,
  runWhitespacePipeline,
  simpleHash,
  writeDebugTap,
  DEFAULT_STAGE_TOGGLES,
  INLINE_HTML_TAGS,
  STAGE_ORDER,
  type StageStep,
} from '../pipeline/index.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const TEST_OUTPUT_DIR = path.join(__dirname, '.pipeline-test-output');

describe('Pipeline Configuration', () => {
  test('creates config with all stages enabled', () => {
    const config = createPipelineConfig();

    expect(config.stages).toEqual(DEFAULT_STAGE_TOGGLES);
    expect(config.protectedTags).toEqual(['textarea', 'pre', 'script']);
    expect(config.debugTap.enabled).toBe(false);
  });

  test('uses the inline element list with the code closer last', () => {
    const config = createPipelineConfig();

    expect(config.inlineTags).toBe(INLINE_HTML_TAGS);
    expect(config.inlineTags.length).toBe(31);
    expect(config.inlineTags[config.inlineTags.length - 1]).toBe('?');
  });

  test('allows custom stage overrides', () => {
    const config = createPipelineConfig({
      stages: { whitespace: false, emptyTagSpaces: false },
    });

    expect(config.stages.whitespace).toBe(false);
    expect(config.stages.emptyTagSpaces).toBe(false);
    expect(config.stages.closingTagWhitespace).toBe(true);
  });

  test('configures debug tap correctly', () => {
    const config = createPipelineConfig({
      debugTap: {
        enabled: true,
        outputDir: './custom-debug',
        stages: ['whitespace', 'closingTagWhitespace'],
      },
    });

    expect(config.debugTap.enabled).toBe(true);
    expect(config.debugTap.outputDir).toBe('./custom-debug');
    expect(config.debugTap.stages).toContain('whitespace');
    expect(config.debugTap.stages).toContain('closingTagWhitespace');
  });

  test('keeps debug tap defaults for fields not given', () => {
    const config = createPipelineConfig({ debugTap: { enabled: true } });

    expect(config.debugTap.outputDir).toBe('./debug-output');
    expect(config.debugTap.stages).toEqual([]);
  });
});

describe('Stage Order', () => {
  test('lists the stages in execution order', () => {
    expect(STAGE_ORDER).toEqual(['scriptCodeComments', 'scriptLineComments', 'whitespace', 'emptyTagSpaces', 'codeTrailingSpace', 'closingTagWhitespace']);
  });

  test('filters disabled stages and keeps the order', () => {
    const config = createPipelineConfig({
      stages: { scriptCodeComments: false, codeTrailingSpace: false },
    });

    expect(getEnabledStages(config)).toEqual(['scriptLineComments', 'whitespace', 'emptyTagSpaces', 'closingTagWhitespace']);
  });

  test('recognizes stage names', () => {
    expect(isStageName('whitespace')).toBe(true);
    expect(isStageName('minify')).toBe(false);
  });
});

describe('Pipeline Runner', () => {
  test('runs every enabled stage on the previous output', () => {
    const config = createPipelineConfig();
    expect(runWhitespacePipeline('<div>  hello   </div>', config)).toBe('<div> hello</div>');
  });

  test('skips disabled stages', () => {
    const config = createPipelineConfig({ stages: { whitespace: false } });
    expect(runWhitespacePipeline('<div>  hello   </div>', config)).toBe('<div>  hello</div>');
  });

  test('runs a single stage', () => {
    const config = createPipelineConfig();
    expect(runStage('whitespace', '<div>  hello   </div>', config)).toBe('<div> hello </div>');
  });

  test('reports every stage with before and after hashes', () => {
    const config = createPipelineConfig();
    const steps: StageStep[] = [];

    runWhitespacePipeline('<div>  hello   </div>', config, (step) => steps.push(step));

    expect(steps.map((step) => step.stage)).toEqual([...STAGE_ORDER]);

    const changed = steps.filter((step) => step.inputHash !== step.outputHash).map((step) => step.stage);
    expect(changed).toEqual(['whitespace', 'closingTagWhitespace']);
    expect(steps[steps.length - 1].content).toBe('<div> hello</div>');
  });

  test('simpleHash is stable and padded', () => {
    expect(simpleHash('')).toBe('00000000');
    expect(simpleHash('abc')).toBe(simpleHash('abc'));
    expect(simpleHash('abc')).not.toBe(simpleHash('abd'));
  });
});

describe('Debug Tap', () => {
  beforeAll(async () => {
    await fs.promises.mkdir(TEST_OUTPUT_DIR, { recursive: true });
  });

  afterAll(async () => {
    await fs.promises.rm(TEST_OUTPUT_DIR, { recursive: true, force: true });
  });

  const tap = async (outputDir: string, stages: StageStep['stage'][] = []): Promise<string[]> => {
    const config = createPipelineConfig({ debugTap: { enabled: true, outputDir, stages } });
    const input = '<div>  hello   </div>';
    const steps: StageStep[] = [];
    runWhitespacePipeline(input, config, (step) => steps.push(step));
    return writeDebugTap(config, '/templates/page.phtml', input, steps);
  };

  test('writes the input and every stage that changed the text', async () => {
    const outputDir = path.join(TEST_OUTPUT_DIR, 'all');
    const written = await tap(outputDir);

    expect(written.map((file) => path.basename(file))).toEqual(['00-original-page.phtml', '01-whitespace-page.phtml', '02-closingTagWhitespace-page.phtml']);
    expect(await fs.promises.readFile(path.join(outputDir, '01-whitespace-page.phtml'), 'utf8')).toBe('<div> hello </div>');
  });

  test('only taps the selected stages', async () => {
    const outputDir = path.join(TEST_OUTPUT_DIR, 'selected');
    const written = await tap(outputDir, ['closingTagWhitespace']);

    expect(written.map((file) => path.basename(file))).toEqual(['00-original-page.phtml', '01-closingTagWhitespace-page.phtml']);
  });

  test('writes nothing when disabled', async () => {
    const config = createPipelineConfig();
    expect(await writeDebugTap(config, 'page.phtml', '', [])).toEqual([]);
  });
});
