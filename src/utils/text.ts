/**
 * Text helpers shared by the normalizer, deduplicator and reference set
 */

// Emoji, pictographs, flags, keycaps, variation selectors and joiners
const DECORATIVE_GLYPHS = /[\p{Extended_Pictographic}\p{Regional_Indicator}\u200d\ufe0e\ufe0f\u20e3]/gu;

export function stripDecorativeGlyphs(value: string): string {
  return value.replace(DECORATIVE_GLYPHS, '');
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Display form: glyphs removed, whitespace collapsed, case preserved
 */
export function cleanDisplayText(value: string): string {
  return collapseWhitespace(stripDecorativeGlyphs(value));
}

/**
 * Comparison form used for identity keys
 */
export function normalizeForKey(value: string): string {
  return cleanDisplayText(value).toLowerCase();
}
