/**
 * Stage 3: collapse whitespace runs to one space outside protected bodies.
 * A run is left alone when it is already a single space, or when it ends
 * inside a <textarea>, <pre> or <script> body.
 */

import type { PipelineConfig } from '../pipeline/pipeline-config.js';
import { RegionIndex } from '../utils/regions.js';
import { applyEdits, type SourceEdit } from '../utils/source-editor.js';
import { isWhitespace, skipWhitespace } from '../utils/whitespace.js';

export const collapseWhitespace = (content: string, config: PipelineConfig): string => {
  const regions = new RegionIndex(content, config.protectedTags);
  const edits: SourceEdit[] = [];

  let i = 0;
  while (i < content.length) {
    if (!isWhitespace(content[i])) {
      i++;
      continue;
    }

    const end = skipWhitespace(content, i);
    const singleSpace = end - i === 1 && content[i] === ' ';

    if (!singleSpace && !regions.isProtected(end)) {
      edits.push({ start: i, end, replacement: ' ' });
    }
    i = end;
  }

  return applyEdits(content, edits);
};
