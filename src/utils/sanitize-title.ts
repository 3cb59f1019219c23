/**
 * Title sanitization for filenames
 */

export const MAX_TITLE_LENGTH = 100;
// UTF-8 bytes; leaves room for the identifier prefix, extension and temp
// suffix under the 255-byte file name limit
export const MAX_TITLE_BYTES = 200;
export const FALLBACK_TITLE = "untitled";

/**
 * Convert a comic title into a filesystem-safe token
 * Keeps letters, digits, hyphens and underscores; everything else becomes a
 * separator. Runs of separators collapse and the result is capped at
 * MAX_TITLE_LENGTH code points and MAX_TITLE_BYTES bytes of UTF-8.
 *
 * @example
 * sanitizeTitle("Barrel - Part 1") // "Barrel_-_Part_1"
 * sanitizeTitle("Don't Panic!") // "Don_t_Panic"
 * sanitizeTitle("???") // "untitled"
 */
export function sanitizeTitle(title: string): string {
  const cleaned = title
    .normalize("NFC")
    .replace(/[^\p{L}\p{N} _-]/gu, " ") // Unsafe characters become spaces
    .replace(/[\s_]+/g, "_") // Spaces and underscores collapse to one underscore
    .replace(/-{2,}/g, "-")
    .replace(/^[_-]+|[_-]+$/g, "");

  // Cut by code point so a surrogate pair is never split
  let capped = "";
  let bytes = 0;
  for (const char of Array.from(cleaned).slice(0, MAX_TITLE_LENGTH)) {
    bytes += Buffer.byteLength(char, "utf8");
    if (bytes > MAX_TITLE_BYTES) break;
    capped += char;
  }
  capped = capped.replace(/[_-]+$/, "");

  return capped || FALLBACK_TITLE;
}
