/**
 * Stage 6: remove whitespace directly before a closing tag.
 *
 * - After a CDATA close (`]]>  </script>`) the first whitespace character stays.
 * - Inside a <textarea> or <pre> body nothing is removed; that includes the
 *   whitespace right before `</textarea>` and `</pre>` themselves.
 */

import type { PipelineConfig } from '../pipeline/pipeline-config.js';
import { RegionIndex } from '../utils/regions.js';
import { applyEdits, removal, type SourceEdit } from '../utils/source-editor.js';
import { isWhitespace, skipWhitespace } from '../utils/whitespace.js';

const CDATA_CLOSE = ']]>';

export const removeClosingTagWhitespace = (content: string, config: PipelineConfig): string => {
  // <script> bodies are not exempt here: whitespace before </script> goes too
  const bodyTags = config.protectedTags.filter((tag) => tag !== 'script');
  const regions = new RegionIndex(content, bodyTags);
  const edits: SourceEdit[] = [];

  let i = 0;
  while (i < content.length) {
    if (!isWhitespace(content[i])) {
      i++;
      continue;
    }

    const end = skipWhitespace(content, i);

    if (content.startsWith('</', end) && !regions.isProtected(end)) {
      const afterCdata = i >= CDATA_CLOSE.length && content.startsWith(CDATA_CLOSE, i - CDATA_CLOSE.length);
      const start = afterCdata ? i + 1 : i;
      if (end > start) edits.push(removal(start, end));
    }
    i = end;
  }

  return applyEdits(content, edits);
};
