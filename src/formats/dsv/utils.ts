/**
 * DSV text normalization helpers
 */

/**
 * Remove a leading UTF-8 byte order mark
 */
export function removeBOM(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Normalize line endings to Unix format (LF)
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}
