/**
 * Stage 2: line comments inside <script>
 *
 * Removes `// ...` up to the end of the line, or up to `</script>` when the
 * body closes on the same line. Skipped when the `//`:
 * - follows `:` `\` `'` `"` or `/` (URL, escape, string or regex literal, `///`)
 * - is followed by another `/`
 * - guards a CDATA section (`//<![CDATA[` and `//]]>`)
 *
 * These are heuristics, not a JavaScript lexer: a `//` in the middle of a
 * string that starts on an earlier character is still treated as a comment.
 */

import { RegionIndex, type ProtectedTag } from '../utils/regions.js';
import { applyEdits, removal, type SourceEdit } from '../utils/source-editor.js';
import { lineEndFrom, skipWhitespace } from '../utils/whitespace.js';

const SCRIPT: readonly ProtectedTag[] = ['script'];

const NOT_AFTER = new Set([':', '\\', "'", '"', '/']);

const CDATA_OPEN = '<![';
const CDATA_CLOSE = ']]>';

const matchAt = (content: string, start: number, regions: RegionIndex): number => {
  if (NOT_AFTER.has(content[start - 1])) return -1;
  if (content[start + 2] === '/') return -1;

  const afterMarker = skipWhitespace(content, start + 2);
  if (content.startsWith(CDATA_OPEN, afterMarker) || content.startsWith(CDATA_CLOSE, afterMarker)) return -1;

  return regions.lastProtectedIn(start + 2, lineEndFrom(content, start + 2));
};

export const stripScriptLineComments = (content: string): string => {
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
