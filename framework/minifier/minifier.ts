/**
 * Template Minifier
 *
 * Minifies a `.phtml` template (HTML with embedded PHP) and caches the result
 * under the generated directory.
 *
 * ## Flow
 *
 * 1. Strip single-line comments from the embedded code. Heredocs found on the
 *    way are swapped for placeholders.
 * 2. If the code cannot be followed, keep the text as read and swap every
 *    `<<<ID ... ID;` block for a placeholder instead.
 * 3. Run the whitespace stages in order.
 * 4. Restore the placeholders and trim the end.
 *
 * @example
 * const minifier = createMinifier(createMinifierConfig({ rootDir: '/srv/shop' }));
 * const cached = await minifier.getMinified('/srv/shop/app/design/page.phtml');
 * // '/srv/shop/var/view_preprocessed/app/design/page.phtml'
 */

import path from 'path';
import { PhpCommentStripper } from './code/php-comment-stripper.js';
import { createMinifierConfig, resolveGeneratedDir, type MinifierConfig } from './config.js';
import { runWhitespacePipeline, writeDebugTap, type StageStep, type StepListener } from './pipeline/pipeline-runner.js';
import { MinifiedCacheStore } from './storage/cache-store.js';
import { FsGeneratedDirectory, FsRootDirectory, FsTemplateReader } from './storage/fs-directories.js';
import type { CodeCommentTransformer, GeneratedDirectory, RootDirectory, TemplateMinifier, TemplateReader } from './types.js';
import { logger } from './utils/logger.js';
import { extractRawBlocks } from './utils/raw-blocks.js';
import { trimEnd } from './utils/whitespace.js';

const NAME = 'minifier';

export interface MinifierDependencies {
  reader: TemplateReader;
  generated: GeneratedDirectory;
  root: RootDirectory;
  /** Defaults to a PhpCommentStripper limited to `config.maxNestingDepth` */
  transformer?: CodeCommentTransformer;
  config?: MinifierConfig;
}

export class PhtmlMinifier implements TemplateMinifier {
  readonly config: MinifierConfig;
  private readonly reader: TemplateReader;
  private readonly transformer: CodeCommentTransformer;
  private readonly store: MinifiedCacheStore;

  constructor({ reader, generated, root, transformer, config = createMinifierConfig() }: MinifierDependencies) {
    this.config = config;
    this.reader = reader;
    this.transformer = transformer ?? new PhpCommentStripper({ maxNestingDepth: config.maxNestingDepth });
    this.store = new MinifiedCacheStore(root, generated);
  }

  /**
   * Minify template text. `onStep` receives the text after every whitespace stage.
   */
  minifyContent(content: string, onStep?: StepListener): string {
    const stripped = this.transformer.transform(content);

    let prepared: string;
    let restore: (text: string) => string;

    if (stripped.ok) {
      prepared = stripped.content;
      restore = (text) => stripped.delayed.restore(text);
    } else {
      logger.warn(NAME, `Comment stripping skipped (${stripped.reason})`, stripped.message);
      const extracted = extractRawBlocks(content);
      prepared = extracted.content;
      restore = (text) => extracted.stash.restore(text);
    }

    const collapsed = runWhitespacePipeline(prepared, this.config.pipeline, onStep);
    return trimEnd(restore(collapsed));
  }

  async minify(file: string): Promise<void> {
    const source = (await this.reader.readFile(path.dirname(file), path.basename(file))) ?? '';

    const steps: StageStep[] = [];
    const tapping = this.config.pipeline.debugTap.enabled;
    const minified = this.minifyContent(source, tapping ? (step) => steps.push(step) : undefined);

    if (tapping) {
      await writeDebugTap(this.config.pipeline, file, source, steps);
    }

    await this.store.write(file, minified);

    const saved = Buffer.byteLength(source) - Buffer.byteLength(minified);
    logger.info(NAME, `Minified ${this.store.relativePathFor(file)}`, `saved ${saved} bytes`);
  }

  async getMinified(file: string): Promise<string> {
    const realPath = await this.store.realPath(file);

    if (!(await this.store.has(realPath))) {
      await this.minify(realPath);
    }

    return this.store.pathFor(realPath);
  }

  getPathToMinified(file: string): string {
    return this.store.pathFor(file);
  }
}

/**
 * Minifier reading and writing through the file system
 */
export const createMinifier = (config: MinifierConfig = createMinifierConfig()): PhtmlMinifier =>
  new PhtmlMinifier({
    reader: new FsTemplateReader(),
    generated: new FsGeneratedDirectory(resolveGeneratedDir(config)),
    root: new FsRootDirectory(config.rootDir),
    config,
  });
