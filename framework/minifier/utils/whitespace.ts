// ============================================================================
// Whitespace helpers
// ============================================================================
//
// Only ASCII whitespace counts. U+00A0 and the other Unicode spaces are
// rendered content in a template, so `\s` (which matches them) is never used.

const WHITESPACE = new Set([' ', '\t', '\n', '\r', '\f', '\v']);

// Characters removed by a right trim
const TRAILING = new Set([' ', '\t', '\n', '\r', '\0', '\v']);

export const isWhitespace = (char: string | undefined): boolean => char !== undefined && WHITESPACE.has(char);

export const isLineBreak = (char: string | undefined): boolean => char === '\n' || char === '\r';

export const isWordChar = (char: string | undefined): boolean => char !== undefined && /^[A-Za-z0-9_]$/.test(char);

/**
 * ASCII case-insensitive `startsWith`; `word` must be lowercase
 */
export const startsWithIgnoreCase = (text: string, word: string, at: number): boolean =>
  text.substring(at, at + word.length).toLowerCase() === word;

/**
 * Index just past the whitespace run starting at `from`
 */
export const skipWhitespace = (text: string, from: number): number => {
  let i = from;
  while (i < text.length && WHITESPACE.has(text[i])) i++;
  return i;
};

/**
 * Index of the next line break at or after `from`, or the end of text
 */
export const lineEndFrom = (text: string, from: number): number => {
  let i = from;
  while (i < text.length && !isLineBreak(text[i])) i++;
  return i;
};

/**
 * Remove trailing whitespace and NUL bytes
 */
export const trimEnd = (text: string): string => {
  let end = text.length;
  while (end > 0 && TRAILING.has(text[end - 1])) end--;
  return text.substring(0, end);
};
