import { describe, test, expect } from 'vitest';
import { createMinifierConfig, DEFAULT_MINIFIER_CONFIG } from '../config.js';
import { DEFAULT_MAX_NESTING_DEPTH } from '../code/php-comment-stripper.js';

describe('Minifier Configuration', () => {
  test('uses the defaults', () => {
    const config = createMinifierConfig();

    expect(config.rootDir).toBe('.');
    expect(config.generatedDir).toBe('var/view_preprocessed');
    expect(config.maxNestingDepth).toBe(DEFAULT_MAX_NESTING_DEPTH);
    expect(config.pipeline).toEqual(DEFAULT_MINIFIER_CONFIG.pipeline);
  });

  test('passes pipeline options through', () => {
    const config = createMinifierConfig({
      rootDir: '/srv/shop',
      inlineTags: ['span'],
      protectedTags: ['pre'],
      stages: { codeTrailingSpace: false },
      debugTap: { enabled: true },
    });

    expect(config.rootDir).toBe('/srv/shop');
    expect(config.pipeline.inlineTags).toEqual(['span']);
    expect(config.pipeline.protectedTags).toEqual(['pre']);
    expect(config.pipeline.stages.codeTrailingSpace).toBe(false);
    expect(config.pipeline.stages.whitespace).toBe(true);
    expect(config.pipeline.debugTap.enabled).toBe(true);
  });

  test('rejects a nesting depth below one', () => {
    expect(() => createMinifierConfig({ maxNestingDepth: 0 })).toThrow('maxNestingDepth must be a positive integer, got 0');
  });
});
