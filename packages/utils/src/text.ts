/**
 * Text processing utilities
 */

const SE_NAME_ALLOWED = /[a-z0-9 _-]/;

/**
 * Build a URL-friendly name ("SE name") from display text.
 *
 * Accented letters are reduced to their base letter; every other character
 * outside `a-z 0-9 space _ -` is dropped. Spaces become dashes and runs of
 * dashes or underscores collapse to one.
 */
export function getSeName(name: string | undefined | null): string {
  if (!name) {
    return '';
  }

  const decomposed = name.trim().toLowerCase().normalize('NFKD');

  let result = '';
  for (const ch of decomposed) {
    if (SE_NAME_ALLOWED.test(ch)) {
      result += ch;
    }
  }

  return result
    .replace(/ /g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/_{2,}/g, '_');
}

/**
 * Cut a string to at most `maxLength` characters.
 */
export function ensureMaximumLength(value: string, maxLength: number): string {
  if (value.length <= maxLength) {
    return value;
  }
  return value.substring(0, maxLength);
}

/**
 * Left-pad a non-negative integer with zeros, e.g. `padId(42, 7)` is `0000042`.
 */
export function padId(id: number, width: number): string {
  return String(id).padStart(width, '0');
}
