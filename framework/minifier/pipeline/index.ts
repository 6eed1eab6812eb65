/**
 * Pipeline Index
 *
 * Exports for the whitespace pipeline.
 */

export {
  type PipelineConfig,
  type StageToggles,
  type StageName,
  type DebugTapConfig,
  DEFAULT_STAGE_TOGGLES,
  DEFAULT_DEBUG_TAP,
  INLINE_HTML_TAGS,
  PROTECTED_TAGS,
  STAGE_ORDER,
  createPipelineConfig,
  getEnabledStages,
  isStageName,
} from './pipeline-config.js';

export {
  type StageStep,
  type StepListener,
  simpleHash,
  getActiveStages,
  runStage,
  runWhitespacePipeline,
  writeDebugTap,
} from './pipeline-runner.js';
