// Kangxi radicals rather than the everyday ideographs they resemble
// (U+2F8F, not U+884C), so ordinary Japanese or Chinese text never contains them.
export const STATUS_OPEN = '\u2f4c';
export const STATUS_CLOSE = '\u2f8f';

/** `\uXXXX` source escape for a BMP character. */
export function escapeForSource(char: string): string {
  return '\\u' + char.charCodeAt(0).toString(16).padStart(4, '0');
}
