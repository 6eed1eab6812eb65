/**
 * Stage 5: whitespace after `?>` of plain code blocks becomes one space.
 *
 * Only `<?php` blocks that contain no other `?` qualify, and only when the
 * code does not start with an output or conditional keyword: whitespace after
 * `<?php echo $a ?>` or `<?php if ($b): ?>` is kept as it is.
 *
 * The keyword is looked for after the whole whitespace run that follows
 * `<?php`, so `<?php\n  echo $a ?>` counts as an output block. A pattern
 * that backtracks into that run would collapse it; this stage deliberately
 * does not.
 *
 * Blocks inside <textarea>, <pre> and <script> bodies are left alone.
 */

import type { PipelineConfig } from '../pipeline/pipeline-config.js';
import { RegionIndex } from '../utils/regions.js';
import { applyEdits, type SourceEdit } from '../utils/source-editor.js';
import { skipWhitespace, startsWithIgnoreCase } from '../utils/whitespace.js';

const CODE_OPEN = '<?php';
const CODE_CLOSE = '?>';

const KEEP_TRAILING_AFTER = ['echo', 'print', 'if', 'elseif', 'else'];

const nextOpener = (content: string, from: number): number => {
  let i = content.indexOf('<?', from);
  while (i !== -1 && !startsWithIgnoreCase(content, CODE_OPEN, i)) {
    i = content.indexOf('<?', i + 1);
  }
  return i;
};

/**
 * Position right after the `?>` of a qualifying block opened at `open`, or -1
 */
const qualifyingCloseEnd = (content: string, open: number): number => {
  const bodyStart = open + CODE_OPEN.length;
  const codeStart = skipWhitespace(content, bodyStart);

  if (codeStart === bodyStart) return -1;
  if (KEEP_TRAILING_AFTER.some((keyword) => startsWithIgnoreCase(content, keyword, codeStart))) return -1;

  const question = content.indexOf('?', codeStart);
  if (question === -1 || !content.startsWith(CODE_CLOSE, question)) return -1;

  return question + CODE_CLOSE.length;
};

export const collapseCodeTrailingSpace = (content: string, config: PipelineConfig): string => {
  const regions = new RegionIndex(content, config.protectedTags);
  const edits: SourceEdit[] = [];

  let open = nextOpener(content, 0);
  while (open !== -1) {
    const close = qualifyingCloseEnd(content, open);
    const trailingEnd = close === -1 ? -1 : skipWhitespace(content, close);

    if (close !== -1 && trailingEnd > close && !regions.isProtected(close)) {
      edits.push({ start: close, end: trailingEnd, replacement: ' ' });
      open = nextOpener(content, trailingEnd);
    } else {
      open = nextOpener(content, open + 1);
    }
  }

  return applyEdits(content, edits);
};
