/**
 * Stage 4: `> <` becomes `><`.
 *
 * The space is kept when the text before `>` ends with an inline element name
 * (`</span> <b>`), since it separates rendered inline content.
 * Names compare case-insensitively, as HTML element names do. There is no
 * word boundary check: `</data> <` keeps its space because of "a".
 * Spaces inside <textarea>, <pre> and <script> bodies are left alone.
 */

import type { PipelineConfig } from '../pipeline/pipeline-config.js';
import { RegionIndex } from '../utils/regions.js';
import { applyEdits, removal, type SourceEdit } from '../utils/source-editor.js';

const BOUNDARY = '> <';

const endsWithInlineTag = (content: string, gtIndex: number, inlineTags: readonly string[]): boolean =>
  inlineTags.some((tag) => tag.length <= gtIndex && content.substring(gtIndex - tag.length, gtIndex).toLowerCase() === tag.toLowerCase());

export const removeEmptyTagSpaces = (content: string, config: PipelineConfig): string => {
  const regions = new RegionIndex(content, config.protectedTags);
  const edits: SourceEdit[] = [];

  let gt = content.indexOf(BOUNDARY);
  while (gt !== -1) {
    if (!regions.isProtected(gt + 1) && !endsWithInlineTag(content, gt, config.inlineTags)) {
      edits.push(removal(gt + 1, gt + 2));
    }
    gt = content.indexOf(BOUNDARY, gt + BOUNDARY.length);
  }

  return applyEdits(content, edits);
};
