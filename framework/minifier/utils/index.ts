/**
 * Shared utilities for the minifier
 */

export { consoleColors, type ConsoleColor } from './colors.js';
export { logger, type LogLevel } from './logger.js';
export { safeReadFile, pathExists } from './file-utils.js';
export { applyEdits, removal, type SourceEdit } from './source-editor.js';
export { RawBlockStash, DEFAULT_PLACEHOLDER_MARKER, extractRawBlocks, restoreRawBlocks } from './raw-blocks.js';
export { RegionIndex, matchTagAt, type ProtectedTag, type Region, type TagMatch } from './regions.js';
export { isWhitespace, isLineBreak, skipWhitespace, trimEnd } from './whitespace.js';
