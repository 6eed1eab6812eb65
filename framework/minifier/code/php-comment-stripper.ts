/**
 * PHP Comment Stripper
 *
 * Default CodeCommentTransformer. Walks a template character by character,
 * copying markup verbatim and scanning the embedded `<?php ... ?>` /
 * `<?= ... ?>` code with a small state machine:
 *
 * - `// ...` and `# ...` comments are removed up to the line break, or up to
 *   the `?>` that closes the block. `#[` starts an attribute, not a comment.
 * - Block comments, strings and `{$...}` interpolations are copied as they are.
 * - Heredocs and nowdocs are delayed: each is stashed and replaced by its
 *   placeholder, to be restored after the whitespace stages have run.
 * - Brackets are matched across code blocks (`<?php if ($a) { ?> ... <?php } ?>`).
 *
 * A template it cannot follow (unterminated string, comment or heredoc,
 * mismatched brackets, nesting deeper than `maxNestingDepth`) is reported as
 * a failure result; the minifier then falls back to line-based stripping.
 */

import type { CodeCommentTransformer, CommentStripResult, TransformFailureReason } from '../types.js';
import { RawBlockStash } from '../utils/raw-blocks.js';
import { isLineBreak, isWhitespace, startsWithIgnoreCase } from '../utils/whitespace.js';

export const DEFAULT_MAX_NESTING_DEPTH = 256;

export interface PhpCommentStripperOptions {
  maxNestingDepth?: number;
}

const OPENING_BRACKETS = new Map([
  ['(', ')'],
  ['[', ']'],
  ['{', '}'],
]);
const CLOSING_BRACKETS = new Set([')', ']', '}']);

// <<< [spaces] ["|'] IDENTIFIER ["|'] line break
const HEREDOC_START = /<<<[ \t]*(["']?)([A-Za-z_\u0080-\uffff][A-Za-z0-9_\u0080-\uffff]*)\1\r?\n/y;

const isIdentifierChar = (char: string | undefined): boolean => char !== undefined && /^[A-Za-z0-9_\u0080-\uffff]$/.test(char);

class StripFailure extends Error {
  constructor(
    readonly reason: TransformFailureReason,
    message: string,
  ) {
    super(message);
    this.name = 'StripFailure';
  }
}

/**
 * Line number (1-based) of a position, for failure messages
 */
const lineOf = (text: string, position: number): number => {
  let line = 1;
  for (let i = 0; i < position && i < text.length; i++) {
    if (text[i] === '\n') line++;
  }
  return line;
};

/**
 * Length of the code opener at `position` (`<?php` + whitespace, or `<?=`), or 0
 */
const openerLength = (text: string, position: number): number => {
  if (text.startsWith('<?=', position)) return 3;
  if (startsWithIgnoreCase(text, '<?php', position)) {
    const next = text[position + 5];
    if (next === undefined || isWhitespace(next)) return 5;
  }
  return 0;
};

class TemplateScanner {
  private pos = 0;
  private readonly out: string[] = [];
  private readonly brackets: { char: string; position: number }[] = [];

  constructor(
    private readonly src: string,
    private readonly stash: RawBlockStash,
    private readonly maxNestingDepth: number,
  ) {}

  run(): string {
    while (this.pos < this.src.length) {
      this.copyMarkup();
      this.scanCode();
    }

    const unclosed = this.brackets[this.brackets.length - 1];
    if (unclosed) {
      this.fail('unparseable', `Unclosed '${unclosed.char}'`, unclosed.position);
    }

    return this.out.join('');
  }

  private fail(reason: TransformFailureReason, message: string, position: number): never {
    throw new StripFailure(reason, `${message} on line ${lineOf(this.src, position)}`);
  }

  /**
   * Copy markup up to and including the next code opener
   */
  private copyMarkup(): void {
    const { src } = this;
    let candidate = src.indexOf('<?', this.pos);

    while (candidate !== -1) {
      const length = openerLength(src, candidate);
      if (length > 0) {
        this.out.push(src.substring(this.pos, candidate + length));
        this.pos = candidate + length;
        return;
      }
      candidate = src.indexOf('<?', candidate + 2);
    }

    this.out.push(src.substring(this.pos));
    this.pos = src.length;
  }

  /**
   * Scan code up to and including `?>`, or to the end of the template
   */
  private scanCode(): void {
    const { src } = this;

    while (this.pos < src.length) {
      const char = src[this.pos];
      const next = src[this.pos + 1];

      if (char === '?' && next === '>') {
        this.out.push('?>');
        this.pos += 2;
        return;
      }

      if ((char === '/' && next === '/') || (char === '#' && next !== '[')) {
        this.skipLineComment();
      } else if (char === '/' && next === '*') {
        this.copyUntil(this.blockCommentEnd(this.pos));
      } else if (char === "'") {
        this.copyUntil(this.quotedEnd(this.pos, "'"));
      } else if (char === '"' || char === '`') {
        this.copyUntil(this.interpolatedEnd(this.pos, char));
      } else if (char === '<' && src.startsWith('<<<', this.pos)) {
        this.delayHeredoc();
      } else {
        this.trackBracket(char);
        this.out.push(char);
        this.pos++;
      }
    }
  }

  private copyUntil(end: number): void {
    this.out.push(this.src.substring(this.pos, end));
    this.pos = end;
  }

  private skipLineComment(): void {
    const { src } = this;
    let end = this.pos;
    while (end < src.length && !isLineBreak(src[end]) && !src.startsWith('?>', end)) {
      end++;
    }
    this.pos = end;
  }

  private trackBracket(char: string): void {
    if (OPENING_BRACKETS.has(char)) {
      this.brackets.push({ char, position: this.pos });
      if (this.brackets.length > this.maxNestingDepth) {
        this.fail('nesting-too-deep', `Nesting deeper than ${this.maxNestingDepth} levels`, this.pos);
      }
      return;
    }

    if (CLOSING_BRACKETS.has(char)) {
      const open = this.brackets.pop();
      if (!open || OPENING_BRACKETS.get(open.char) !== char) {
        this.fail('unparseable', `Unexpected '${char}'`, this.pos);
      }
    }
  }

  private blockCommentEnd(start: number): number {
    const close = this.src.indexOf('*/', start + 2);
    if (close === -1) this.fail('unparseable', 'Unterminated comment', start);
    return close + 2;
  }

  /**
   * End (exclusive) of a string without interpolation
   */
  private quotedEnd(start: number, quote: string): number {
    const { src } = this;
    let i = start + 1;
    while (i < src.length) {
      if (src[i] === '\\') {
        i += 2;
      } else if (src[i] === quote) {
        return i + 1;
      } else {
        i++;
      }
    }
    return this.fail('unparseable', 'Unterminated string', start);
  }

  /**
   * End (exclusive) of a double-quoted or backtick string, stepping over `{$...}`
   */
  private interpolatedEnd(start: number, quote: string): number {
    const { src } = this;
    let i = start + 1;
    while (i < src.length) {
      if (src[i] === '\\') {
        i += 2;
      } else if (src[i] === quote) {
        return i + 1;
      } else if (src[i] === '{' && src[i + 1] === '$') {
        i = this.interpolationEnd(i);
      } else {
        i++;
      }
    }
    return this.fail('unparseable', 'Unterminated string', start);
  }

  private interpolationEnd(start: number): number {
    const { src } = this;
    let depth = 0;
    let i = start;
    while (i < src.length) {
      const char = src[i];
      if (char === "'") {
        i = this.quotedEnd(i, "'");
        continue;
      }
      if (char === '"') {
        i = this.interpolatedEnd(i, '"');
        continue;
      }
      if (char === '{') depth++;
      if (char === '}' && --depth === 0) return i + 1;
      i++;
    }
    return this.fail('unparseable', 'Unterminated interpolation', start);
  }

  /**
   * Replace a heredoc or nowdoc with a placeholder; `<<<` that opens none is copied
   */
  private delayHeredoc(): void {
    const { src } = this;
    HEREDOC_START.lastIndex = this.pos;
    const match = HEREDOC_START.exec(src);

    if (!match) {
      this.out.push('<');
      this.pos++;
      return;
    }

    const identifier = match[2];
    let lineStart = this.pos + match[0].length;

    while (lineStart <= src.length) {
      let indentEnd = lineStart;
      while (src[indentEnd] === ' ' || src[indentEnd] === '\t') indentEnd++;

      const end = indentEnd + identifier.length;
      if (src.startsWith(identifier, indentEnd) && !isIdentifierChar(src[end])) {
        this.out.push(this.stash.stash(src.substring(this.pos, end)));
        this.pos = end;
        return;
      }

      const lineBreak = src.indexOf('\n', lineStart);
      if (lineBreak === -1) break;
      lineStart = lineBreak + 1;
    }

    this.fail('unparseable', `Unterminated heredoc '${identifier}'`, this.pos);
  }
}

export class PhpCommentStripper implements CodeCommentTransformer {
  private readonly maxNestingDepth: number;

  constructor(options: PhpCommentStripperOptions = {}) {
    this.maxNestingDepth = options.maxNestingDepth ?? DEFAULT_MAX_NESTING_DEPTH;
  }

  transform(content: string): CommentStripResult {
    const delayed = RawBlockStash.for(content);

    try {
      const stripped = new TemplateScanner(content, delayed, this.maxNestingDepth).run();
      return { ok: true, content: stripped, delayed };
    } catch (err) {
      if (err instanceof StripFailure) {
        return { ok: false, reason: err.reason, message: err.message };
      }
      throw err;
    }
  }
}
