/**
 * Protected Region Index
 *
 * Answers "is this position inside a <pre>, <textarea> or <script> body?" for
 * every position of a string.
 *
 * A position is inside tag `t` when the nearest tag at or after it, counting
 * only `<t` and `</t` for the tracked tags, is the closing `</t`. When that
 * nearest tag is an opener, or there is none, the position is outside.
 * The index is built with one backward pass, so every query is O(1).
 *
 * The three element types are not expected to nest, so no depth is kept:
 * `<pre>a</textarea>` leaves `a` inside a `textarea` region.
 */

import { isWordChar } from './whitespace.js';

export type ProtectedTag = 'textarea' | 'pre' | 'script';

export type Region = 'outside' | ProtectedTag;

export interface TagMatch {
  name: ProtectedTag;
  closing: boolean;
  /** Position after the tag name */
  end: number;
}

/**
 * Match `<name` or `</name` at `position`, where `name` is one of `tags`
 * (case-insensitive) followed by a non-word character or the end of text.
 */
export const matchTagAt = (text: string, position: number, tags: readonly ProtectedTag[]): TagMatch | null => {
  if (text[position] !== '<') return null;

  const closing = text[position + 1] === '/';
  const nameStart = position + (closing ? 2 : 1);

  for (const name of tags) {
    const end = nameStart + name.length;
    if (text.substring(nameStart, end).toLowerCase() === name && !isWordChar(text[end])) {
      return { name, closing, end };
    }
  }

  return null;
};

export class RegionIndex {
  // 0 = outside, n = inside tags[n - 1]
  private readonly states: Uint8Array;

  constructor(
    text: string,
    private readonly tags: readonly ProtectedTag[],
  ) {
    this.states = new Uint8Array(text.length + 1);

    let current = 0;
    for (let i = text.length - 1; i >= 0; i--) {
      if (text[i] === '<') {
        const tag = matchTagAt(text, i, tags);
        if (tag) {
          current = tag.closing ? tags.indexOf(tag.name) + 1 : 0;
        }
      }
      this.states[i] = current;
    }
  }

  regionAt(position: number): Region {
    const clamped = Math.min(Math.max(position, 0), this.states.length - 1);
    const state = this.states[clamped];
    return state === 0 ? 'outside' : this.tags[state - 1];
  }

  isProtected(position: number): boolean {
    return this.regionAt(position) !== 'outside';
  }

  /**
   * Last protected position in [from, to], or -1 when there is none
   */
  lastProtectedIn(from: number, to: number): number {
    for (let i = to; i >= from; i--) {
      if (this.isProtected(i)) return i;
    }
    return -1;
  }
}
