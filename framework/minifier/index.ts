export { PhtmlMinifier, createMinifier, type MinifierDependencies } from './minifier.js';
export { createMinifierConfig, resolveGeneratedDir, DEFAULT_GENERATED_DIR, DEFAULT_MINIFIER_CONFIG, type MinifierConfig, type MinifierConfigOptions } from './config.js';
export { PhpCommentStripper, DEFAULT_MAX_NESTING_DEPTH, type PhpCommentStripperOptions } from './code/php-comment-stripper.js';
export { MinifiedCacheStore } from './storage/cache-store.js';
export { FsGeneratedDirectory, FsRootDirectory, FsTemplateReader } from './storage/fs-directories.js';
export { STAGES, type PipelineStage, type StageTransform } from './stages/index.js';
export * from './pipeline/index.js';
export { RawBlockStash, extractRawBlocks, restoreRawBlocks, DEFAULT_PLACEHOLDER_MARKER } from './utils/raw-blocks.js';
export { RegionIndex, type ProtectedTag, type Region } from './utils/regions.js';
export { logger } from './utils/logger.js';
export type * from './types.js';
