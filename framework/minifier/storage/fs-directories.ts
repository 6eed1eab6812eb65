// ============================================================================
// Node.js file system collaborators
// ============================================================================

import fs from 'fs';
import path from 'path';
import type { GeneratedDirectory, RootDirectory, TemplateReader } from '../types.js';
import { pathExists, safeReadFile } from '../utils/file-utils.js';

export class FsTemplateReader implements TemplateReader {
  readFile(directory: string, fileName: string): Promise<string | null> {
    return safeReadFile(path.join(directory, fileName));
  }
}

export class FsRootDirectory implements RootDirectory {
  readonly path: string;

  constructor(rootDir: string) {
    this.path = path.resolve(rootDir);
  }

  /**
   * Path of `filePath` relative to the root.
   * A file outside the root keeps its absolute path, minus the leading separator.
   */
  getRelativePath(filePath: string): string {
    const absolute = path.resolve(filePath);
    const relative = path.relative(this.path, absolute);

    if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      return absolute.substring(path.parse(absolute).root.length);
    }
    return relative;
  }
}

export class FsGeneratedDirectory implements GeneratedDirectory {
  readonly path: string;
  private writes = 0;

  constructor(generatedDir: string) {
    this.path = path.resolve(generatedDir);
  }

  exists(relativePath?: string): Promise<boolean> {
    return pathExists(relativePath === undefined ? this.path : this.getAbsolutePath(relativePath));
  }

  async create(): Promise<void> {
    await fs.promises.mkdir(this.path, { recursive: true });
  }

  /**
   * Write through a temporary sibling file and rename it over the target,
   * so a concurrent reader sees either the old file or the new one.
   */
  async writeFile(relativePath: string, content: string): Promise<void> {
    const target = this.getAbsolutePath(relativePath);
    const temporary = `${target}.${process.pid}.${++this.writes}.tmp`;

    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    try {
      await fs.promises.writeFile(temporary, content, 'utf8');
      await fs.promises.rename(temporary, target);
    } catch (err) {
      await fs.promises.rm(temporary, { force: true });
      throw err;
    }
  }

  getAbsolutePath(relativePath: string): string {
    return path.join(this.path, relativePath);
  }

  async getRealPath(filePath: string): Promise<string> {
    try {
      return await fs.promises.realpath(filePath);
    } catch {
      // Not on disk (yet): normalize without resolving links
      return path.resolve(filePath);
    }
  }
}
