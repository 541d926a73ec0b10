/**
 * Positional helpers that count unicode codepoints, not UTF-16 code units,
 * so that a field holding `'é'` or an emoji still occupies one position.
 */

/** Split a string into its codepoints. */
export function codepoints(text: string): string[] {
  return Array.from(text);
}

/** Number of codepoints in `text`. */
export function width(text: string): number {
  return codepoints(text).length;
}

/** Codepoints `[start, start + length)` joined back into a string. Out-of-range positions read as empty. */
export function sliceCodepoints(chars: readonly string[], start: number, length: number): string {
  return chars.slice(start, start + length).join('');
}
