const INCH_MARK = /"/g;
const STRIPPED_CHARS = /['`()[\]/\\]/g;
const WHITESPACE = /\s+/g;

/**
 * Display-safe cleanup of vendor/model/hostname strings.
 *
 * `"` (inches) becomes `-inch`, quotes, parentheses, brackets and slashes become spaces, whitespace runs collapse.
 * Case is preserved. The function is idempotent.
 */
export function normalizeText(raw: unknown): string {
  if (typeof raw !== 'string') return '';
  return raw.replace(INCH_MARK, '-inch').replace(STRIPPED_CHARS, ' ').replace(WHITESPACE, ' ').trim();
}

/** `normalizeText` plus case folding; used for every keyword comparison. */
export function normalizeForMatch(raw: unknown): string {
  return normalizeText(raw).toLowerCase();
}
