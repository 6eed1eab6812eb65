/**
 * Whitespace Pipeline Stages
 *
 * Listed in execution order. See STAGE_ORDER in pipeline-config.ts.
 */

import type { PipelineConfig, StageName } from '../pipeline/pipeline-config.js';
import { stripScriptCodeComments } from './script-code-comments.js';
import { stripScriptLineComments } from './script-line-comments.js';
import { collapseWhitespace } from './whitespace-collapser.js';
import { removeEmptyTagSpaces } from './empty-tag-spaces.js';
import { collapseCodeTrailingSpace } from './code-trailing-space.js';
import { removeClosingTagWhitespace } from './closing-tag-whitespace.js';

export { stripScriptCodeComments, stripScriptLineComments, collapseWhitespace, removeEmptyTagSpaces, collapseCodeTrailingSpace, removeClosingTagWhitespace };

/**
 * A pure text-to-text stage
 */
export type StageTransform = (content: string, config: PipelineConfig) => string;

export interface PipelineStage {
  name: StageName;
  description: string;
  transform: StageTransform;
}

export const STAGES: Record<StageName, PipelineStage> = {
  // 1. Commented-out one-line code blocks in <script>
  scriptCodeComments: {
    name: 'scriptCodeComments',
    description: 'remove commented-out embedded code in <script>',
    transform: stripScriptCodeComments,
  },
  // 2. Line comments in <script>
  scriptLineComments: {
    name: 'scriptLineComments',
    description: 'remove line comments in <script>',
    transform: stripScriptLineComments,
  },
  // 3. Whitespace runs outside protected bodies
  whitespace: {
    name: 'whitespace',
    description: 'collapse whitespace outside <textarea>, <pre> and <script>',
    transform: collapseWhitespace,
  },
  // 4. Spaces between block-level tags
  emptyTagSpaces: {
    name: 'emptyTagSpaces',
    description: 'remove the space in "> <" after non-inline elements',
    transform: removeEmptyTagSpaces,
  },
  // 5. Whitespace after plain code blocks
  codeTrailingSpace: {
    name: 'codeTrailingSpace',
    description: 'collapse whitespace after plain <?php ?> blocks',
    transform: collapseCodeTrailingSpace,
  },
  // 6. Whitespace before closing tags
  closingTagWhitespace: {
    name: 'closingTagWhitespace',
    description: 'remove whitespace before closing tags',
    transform: removeClosingTagWhitespace,
  },
};
