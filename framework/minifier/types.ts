// ============================================================================
// Shared Minifier Types
// ============================================================================

import type { RawBlockStash } from './utils/raw-blocks.js';

/**
 * Why the code comment transformer gave up on a template
 */
export type TransformFailureReason = 'unparseable' | 'nesting-too-deep';

/**
 * Result of stripping comments from the embedded code of a template.
 * On success, `delayed` holds the raw blocks still represented by placeholders in `content`.
 */
export type CommentStripResult =
  | { ok: true; content: string; delayed: RawBlockStash }
  | { ok: false; reason: TransformFailureReason; message: string };

/**
 * Removes single-line comments from the embedded code of a template.
 * Must never throw for malformed input; it reports a failure instead.
 */
export interface CodeCommentTransformer {
  transform(content: string): CommentStripResult;
}

/**
 * Reads template sources
 */
export interface TemplateReader {
  /** Returns null when the file cannot be read */
  readFile(directory: string, fileName: string): Promise<string | null>;
}

/**
 * The directory minified copies are materialized in
 */
export interface GeneratedDirectory {
  /** Whether `relativePath` (or the directory itself, when omitted) exists */
  exists(relativePath?: string): Promise<boolean>;
  create(): Promise<void>;
  /** Write the whole file; readers never observe a partial write */
  writeFile(relativePath: string, content: string): Promise<void>;
  getAbsolutePath(relativePath: string): string;
  /** Canonical path of a source file */
  getRealPath(filePath: string): Promise<string>;
}

/**
 * The application root that cache keys are relative to
 */
export interface RootDirectory {
  getRelativePath(filePath: string): string;
}

/**
 * Public contract of the template minifier
 */
export interface TemplateMinifier {
  /** Path to the minified copy of `file`, creating it when it does not exist yet */
  getMinified(file: string): Promise<string>;
  /** Path the minified copy of `file` lives at */
  getPathToMinified(file: string): string;
  /** Minify `file` and write the result to its cache path */
  minify(file: string): Promise<void>;
}
