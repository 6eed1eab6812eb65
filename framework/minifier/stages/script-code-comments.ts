/**
 * Stage 1: commented-out code blocks inside <script>
 *
 * Removes `// ... <?php ... ?> ...` when the whole embedded block sits on the
 * commented line, e.g. `// var debug = <?= $block->getDebug() ?>;`.
 * The embedded block goes with the comment.
 *
 * A `//` preceded by `:` (URL scheme) or `\` (escape) is not a comment.
 */

import { RegionIndex, type ProtectedTag } from '../utils/regions.js';
import { applyEdits, removal, type SourceEdit } from '../utils/source-editor.js';
import { isLineBreak, isWhitespace, lineEndFrom } from '../utils/whitespace.js';

const SCRIPT: readonly ProtectedTag[] = ['script'];

const CODE_OPENERS = ['<?php', '<?='];

/**
 * First embedded-code opener in [from, to), as the index after it
 */
const findOpenerEnd = (content: string, from: number, to: number): number => {
  for (let i = from; i < to; i++) {
    if (content[i] !== '<') continue;
    for (const opener of CODE_OPENERS) {
      if (i + opener.length <= to && content.substring(i, i + opener.length).toLowerCase() === opener) {
        return i + opener.length;
      }
    }
  }
  return -1;
};

/**
 * Whether a whitespace character followed by `?>` fits in [from, to)
 */
const hasCodeCloser = (content: string, from: number, to: number): boolean => {
  for (let i = from; i + 3 <= to; i++) {
    if (isWhitespace(content[i]) && !isLineBreak(content[i]) && content[i + 1] === '?' && content[i + 2] === '>') {
      return true;
    }
  }
  return false;
};

/**
 * End of the commented code block starting at `start`, or -1
 */
const matchAt = (content: string, start: number, regions: RegionIndex): number => {
  const before = content[start - 1];
  if (before === ':' || before === '\\') return -1;

  // The removal may only reach as far as the script body does on this line
  const end = regions.lastProtectedIn(start + 2, lineEndFrom(content, start + 2));
  if (end === -1) return -1;

  const openerEnd = findOpenerEnd(content, start + 2, end);
  if (openerEnd === -1 || !hasCodeCloser(content, openerEnd, end)) return -1;

  return end;
};

export const stripScriptCodeComments = (content: string): string => {
  let start = content.indexOf('//');
  if (start === -1) return content;

  const regions = new RegionIndex(content, SCRIPT);
  const edits: SourceEdit[] = [];

  while (start !== -1) {
    const end = matchAt(content, start, regions);
    if (end === -1) {
      start = content.indexOf('//', start + 1);
    } else {
      edits.push(removal(start, end));
      start = content.indexOf('//', end);
    }
  }

  return applyEdits(content, edits);
};
