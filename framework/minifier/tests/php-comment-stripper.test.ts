/**
 * PHP Comment Stripper Tests
 *
 * Comment removal in embedded code, delayed heredocs and failure reporting.
 */

import { describe, test, expect } from 'vitest';
import { PhpCommentStripper } from '../code/php-comment-stripper.js';
import type { CommentStripResult } from '../types.js';

const stripper = new PhpCommentStripper();

const strippedContent = (result: CommentStripResult): string => {
  if (!result.ok) throw new Error(`Expected success, got ${result.reason}: ${result.message}`);
  return result.content;
};

// ============================================================================
// Comment Removal
// ============================================================================

describe('Comment Removal', () => {
  test('removes // comments up to the line break', () => {
    expect(strippedContent(stripper.transform('<?php // comment\n$a = 1; ?>'))).toBe('<?php \n$a = 1; ?>');
  });

  test('removes # comments', () => {
    expect(strippedContent(stripper.transform('<?php # x\n?>'))).toBe('<?php \n?>');
  });

  test('stops at the end of the code block', () => {
    expect(strippedContent(stripper.transform('<?php $a = 1; // set ?><p>'))).toBe('<?php $a = 1; ?><p>');
  });

  test('handles short echo tags and upper case openers', () => {
    expect(strippedContent(stripper.transform('<?= $a // x\n?>'))).toBe('<?= $a \n?>');
    expect(strippedContent(stripper.transform('<?PHP // x\n?>'))).toBe('<?PHP \n?>');
  });

  test('keeps attributes', () => {
    const source = '<?php #[Attr] class A {} ?>';
    expect(strippedContent(stripper.transform(source))).toBe(source);
  });

  test('keeps block comments', () => {
    const source = '<?php /* a // b */ $x = 1; ?>';
    expect(strippedContent(stripper.transform(source))).toBe(source);
  });

  test('keeps comment markers inside strings', () => {
    const source = `<?php $u = "http://x"; $v = 'a // b'; ?>`;
    expect(strippedContent(stripper.transform(source))).toBe(source);
  });

  test('steps over interpolation in double-quoted strings', () => {
    const source = `<?php echo "a {$b['//']} c"; // x\n?>`;
    expect(strippedContent(stripper.transform(source))).toBe(`<?php echo "a {$b['//']} c"; \n?>`);
  });

  test('leaves markup alone', () => {
    const source = '<p>// not code</p>';
    expect(strippedContent(stripper.transform(source))).toBe(source);
  });

  test('does not treat an XML declaration as code', () => {
    const source = '<?xml version="1.0"?>\n<?php // c\n?>';
    expect(strippedContent(stripper.transform(source))).toBe('<?xml version="1.0"?>\n<?php \n?>');
  });

  test('matches brackets across code blocks', () => {
    const source = '<?php if ($a) { ?>\n<p>x</p>\n<?php } ?>';
    expect(strippedContent(stripper.transform(source))).toBe(source);
  });
});

// ============================================================================
// Heredocs
// ============================================================================

describe('Heredocs', () => {
  test('delays a heredoc behind a placeholder', () => {
    const result = stripper.transform('<?php $h = <<<EOT\n  a // b\nEOT;\n?>');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.content).toBe('<?php $h = __MINIFIED_HEREDOC__0;\n?>');
    expect(result.delayed.entries).toEqual(['<<<EOT\n  a // b\nEOT']);
  });

  test('delays nowdocs and indented closers', () => {
    const result = stripper.transform("<?php $n = <<<'TXT'\n    # raw\n    TXT;\n?>");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.content).toBe('<?php $n = __MINIFIED_HEREDOC__0;\n?>');
    expect(result.delayed.restore(result.content)).toBe("<?php $n = <<<'TXT'\n    # raw\n    TXT;\n?>");
  });

  test('does not end a heredoc at a longer identifier', () => {
    const result = stripper.transform('<?php $h = <<<EOT\nEOTX\nEOT;\n?>');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.delayed.entries).toEqual(['<<<EOT\nEOTX\nEOT']);
  });
});

// ============================================================================
// Failures
// ============================================================================

describe('Failures', () => {
  test('reports an unterminated string', () => {
    expect(stripper.transform("<?php $a = 'x; ?>")).toEqual({
      ok: false,
      reason: 'unparseable',
      message: 'Unterminated string on line 1',
    });
  });

  test('reports an unterminated heredoc', () => {
    expect(stripper.transform('<p>\n<?php $a = <<<EOT\nno end\n?>')).toEqual({
      ok: false,
      reason: 'unparseable',
      message: "Unterminated heredoc 'EOT' on line 2",
    });
  });

  test('reports a mismatched bracket', () => {
    expect(stripper.transform('<?php foo(]; ?>')).toEqual({
      ok: false,
      reason: 'unparseable',
      message: "Unexpected ']' on line 1",
    });
  });

  test('reports a bracket left open', () => {
    expect(stripper.transform('<?php if ($a) { ?><p>x</p>')).toEqual({
      ok: false,
      reason: 'unparseable',
      message: "Unclosed '{' on line 1",
    });
  });

  test('reports nesting deeper than the limit', () => {
    const shallow = new PhpCommentStripper({ maxNestingDepth: 2 });

    expect(shallow.transform('<?php f(g(h())); ?>')).toEqual({
      ok: false,
      reason: 'nesting-too-deep',
      message: 'Nesting deeper than 2 levels on line 1',
    });
    expect(shallow.transform('<?php f(g()); ?>').ok).toBe(true);
  });
});
