// ============================================================================
// Source Text Editor Utilities
// ============================================================================

/**
 * Replace the text between `start` and `end` with `replacement`
 */
export interface SourceEdit {
  start: number;
  end: number;
  replacement: string;
}

/**
 * Apply non-overlapping edits to a string in one pass.
 * Edits are computed against the original text; they may be given in any order.
 *
 * @example
 * applyEdits('a  b  c', [
 *   { start: 1, end: 3, replacement: ' ' },
 *   { start: 4, end: 6, replacement: ' ' },
 * ]); // 'a b c'
 */
export const applyEdits = (source: string, edits: readonly SourceEdit[]): string => {
  if (edits.length === 0) return source;

  const sorted = [...edits].sort((a, b) => a.start - b.start);
  const parts: string[] = [];
  let cursor = 0;

  for (const edit of sorted) {
    if (edit.start < cursor) {
      throw new Error(`Overlapping edit at ${edit.start} (previous edit ended at ${cursor})`);
    }
    parts.push(source.substring(cursor, edit.start), edit.replacement);
    cursor = edit.end;
  }

  parts.push(source.substring(cursor));
  return parts.join('');
};

/**
 * Delete the text between `start` and `end`
 */
export const removal = (start: number, end: number): SourceEdit => ({ start, end, replacement: '' });
