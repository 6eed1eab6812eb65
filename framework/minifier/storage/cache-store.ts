/**
 * Minified Cache Store
 *
 * Maps a source template to its minified copy: the copy lives in the
 * generated directory at the source's root-relative path.
 *
 * @example
 * // root: /srv/shop, generated: /srv/shop/var/view_preprocessed
 * store.pathFor('/srv/shop/app/design/page.phtml');
 * // '/srv/shop/var/view_preprocessed/app/design/page.phtml'
 */

import type { GeneratedDirectory, RootDirectory } from '../types.js';
import { logger } from '../utils/logger.js';

const NAME = 'cache-store';

export class MinifiedCacheStore {
  constructor(
    private readonly root: RootDirectory,
    private readonly generated: GeneratedDirectory,
  ) {}

  relativePathFor(file: string): string {
    return this.root.getRelativePath(file);
  }

  pathFor(file: string): string {
    return this.generated.getAbsolutePath(this.relativePathFor(file));
  }

  has(file: string): Promise<boolean> {
    return this.generated.exists(this.relativePathFor(file));
  }

  realPath(file: string): Promise<string> {
    return this.generated.getRealPath(file);
  }

  async write(file: string, content: string): Promise<void> {
    const relativePath = this.relativePathFor(file);

    try {
      if (!(await this.generated.exists())) {
        await this.generated.create();
      }
      await this.generated.writeFile(relativePath, content);
    } catch (err) {
      logger.error(NAME, `Error writing ${relativePath}`, err);
      throw err;
    }
  }
}
