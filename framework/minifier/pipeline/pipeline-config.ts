/**
 * Pipeline Configuration
 *
 * Configuration schema for the whitespace pipeline: which stages run,
 * the tag lists they are parameterized with, and the debug tap.
 */

import type { ProtectedTag } from '../utils/regions.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Individual stage toggles.
 * A disabled stage is skipped; the others still run in STAGE_ORDER.
 */
export interface StageToggles {
  /** Remove `//` comments wrapping a one-line `<?php ... ?>` block inside <script> */
  scriptCodeComments: boolean;
  /** Remove `//` line comments inside <script> */
  scriptLineComments: boolean;
  /** Collapse whitespace runs outside <textarea>, <pre> and <script> */
  whitespace: boolean;
  /** Turn `> <` into `><` unless an inline element precedes it */
  emptyTagSpaces: boolean;
  /** Collapse whitespace after `?>` of plain code blocks to one space */
  codeTrailingSpace: boolean;
  /** Remove whitespace before closing tags */
  closingTagWhitespace: boolean;
}

export type StageName = keyof StageToggles;

/**
 * Debug tap configuration for intermediate output.
 */
export interface DebugTapConfig {
  /** Whether to write the text after each stage */
  enabled: boolean;
  /** Directory for tap files */
  outputDir: string;
  /** Stages to tap (if empty, taps all enabled stages) */
  stages: StageName[];
}

export interface PipelineConfig {
  stages: StageToggles;
  /** Element names after which `> <` keeps its space; `?` stands for `?>` */
  inlineTags: readonly string[];
  /** Elements whose body whitespace is never collapsed */
  protectedTags: readonly ProtectedTag[];
  debugTap: DebugTapConfig;
}

// ============================================================================
// Defaults
// ============================================================================

/**
 * Inline HTML elements. Order matters only for readability.
 */
export const INLINE_HTML_TAGS: readonly string[] = [
  'b',
  'big',
  'i',
  'small',
  'tt',
  'abbr',
  'acronym',
  'cite',
  'code',
  'dfn',
  'em',
  'kbd',
  'strong',
  'samp',
  'var',
  'a',
  'bdo',
  'br',
  'img',
  'map',
  'object',
  'q',
  'span',
  'sub',
  'sup',
  'button',
  'input',
  'label',
  'select',
  'textarea',
  '?',
];

export const PROTECTED_TAGS: readonly ProtectedTag[] = ['textarea', 'pre', 'script'];

export const DEFAULT_STAGE_TOGGLES: StageToggles = {
  scriptCodeComments: true,
  scriptLineComments: true,
  whitespace: true,
  emptyTagSpaces: true,
  codeTrailingSpace: true,
  closingTagWhitespace: true,
};

export const DEFAULT_DEBUG_TAP: DebugTapConfig = {
  enabled: false,
  outputDir: './debug-output',
  stages: [],
};

/**
 * Create a pipeline configuration, overriding the defaults.
 */
export function createPipelineConfig(
  options: {
    stages?: Partial<StageToggles>;
    inlineTags?: readonly string[];
    protectedTags?: readonly ProtectedTag[];
    debugTap?: Partial<DebugTapConfig>;
  } = {},
): PipelineConfig {
  const { stages = {}, inlineTags = INLINE_HTML_TAGS, protectedTags = PROTECTED_TAGS, debugTap = {} } = options;

  return {
    stages: {
      ...DEFAULT_STAGE_TOGGLES,
      ...stages,
    },
    inlineTags,
    protectedTags,
    debugTap: {
      ...DEFAULT_DEBUG_TAP,
      ...debugTap,
    },
  };
}

// ============================================================================
// Stage Order
// ============================================================================

/**
 * Canonical stage execution order.
 * Each stage consumes the previous stage's output, so this never changes with the toggles.
 */
export const STAGE_ORDER: readonly StageName[] = [
  'scriptCodeComments',
  'scriptLineComments',
  'whitespace',
  'emptyTagSpaces',
  'codeTrailingSpace',
  'closingTagWhitespace',
];

export const isStageName = (name: string): name is StageName => (STAGE_ORDER as readonly string[]).includes(name);

/**
 * Get the list of enabled stages in execution order.
 */
export function getEnabledStages(config: PipelineConfig): StageName[] {
  return STAGE_ORDER.filter((stage) => config.stages[stage]);
}
