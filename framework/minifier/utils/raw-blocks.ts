/**
 * Raw Block Stash
 *
 * Heredoc-style blocks (`<<<EOT ... EOT;`) hold literal text that no stage may
 * touch. They are swapped for placeholders before the stages run and spliced
 * back verbatim afterwards.
 *
 * The same stash is used by the fallback path (`extractRawBlocks`) and by the
 * code comment transformer, which delays the heredocs it finds, so placeholder
 * numbering is always discovery order whichever path produced it.
 *
 * @example
 * const { content, stash } = extractRawBlocks("<?php $a = <<<EOT\n  x\nEOT;\n?>");
 * // content: "<?php $a = __MINIFIED_HEREDOC__0\n?>"
 * restoreRawBlocks(content, stash); // original text
 */

export const DEFAULT_PLACEHOLDER_MARKER = '__MINIFIED_HEREDOC__';

// `<<<` + letters-only identifier, up to the first reappearance of that
// identifier followed by optional whitespace and `;`
const RAW_BLOCK_PATTERN = /<<<([A-Za-z]+)[\s\S]*?\1[ \t\n\r\f\v]*;/gi;

const DIGITS = /^\d+/;

export class RawBlockStash {
  private readonly blocks: string[] = [];

  constructor(readonly marker: string = DEFAULT_PLACEHOLDER_MARKER) {}

  /**
   * Create a stash whose marker does not occur anywhere in `source`
   */
  static for(source: string): RawBlockStash {
    let marker = DEFAULT_PLACEHOLDER_MARKER;
    while (source.includes(marker)) {
      marker = `_${marker}_`;
    }
    return new RawBlockStash(marker);
  }

  get size(): number {
    return this.blocks.length;
  }

  get entries(): readonly string[] {
    return this.blocks;
  }

  /**
   * Store a block and return its placeholder
   */
  stash(block: string): string {
    this.blocks.push(block);
    return this.placeholder(this.blocks.length - 1);
  }

  placeholder(index: number): string {
    return `${this.marker}${index}`;
  }

  /**
   * Replace every placeholder in `text` with its block.
   * Placeholders with an unknown index are left as they are.
   */
  restore(text: string): string {
    if (this.blocks.length === 0) return text;

    const parts: string[] = [];
    let cursor = 0;
    let found = text.indexOf(this.marker);

    while (found !== -1) {
      const digits = DIGITS.exec(text.substring(found + this.marker.length));
      const index = digits ? Number(digits[0]) : -1;

      if (digits && index < this.blocks.length) {
        parts.push(text.substring(cursor, found), this.blocks[index]);
        cursor = found + this.marker.length + digits[0].length;
        found = text.indexOf(this.marker, cursor);
      } else {
        found = text.indexOf(this.marker, found + 1);
      }
    }

    parts.push(text.substring(cursor));
    return parts.join('');
  }
}

/**
 * Replace every raw block in `content` with a placeholder.
 * A block with no closing identifier is left in place.
 */
export const extractRawBlocks = (content: string, stash: RawBlockStash = RawBlockStash.for(content)): { content: string; stash: RawBlockStash } => {
  const replaced = content.replace(RAW_BLOCK_PATTERN, (block) => stash.stash(block));
  return { content: replaced, stash };
};

export const restoreRawBlocks = (content: string, stash: RawBlockStash): string => stash.restore(content);
