/**
 * Name and identity helpers shared by the validator and the image resolver.
 */

/** Trim and collapse internal whitespace. */
export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function capitalizeWord(word: string): string {
  // Keep hyphen and apostrophe parts capitalized: "o'neil-smith" → "O'Neil-Smith"
  return word
    .toLowerCase()
    .replace(/(^|[-'’])(\p{L})/gu, (_m, sep: string, ch: string) => sep + ch.toUpperCase());
}

/**
 * Normalize a display name. Names typed entirely in one case are re-cased;
 * mixed-case names are trusted as written ("Ada McLovelace").
 */
export function normalizeDisplayName(raw: string): string {
  const name = collapseWhitespace(raw);
  const isSingleCase = name === name.toLowerCase() || name === name.toUpperCase();
  if (!isSingleCase) return name;
  return name.split(' ').map(capitalizeWord).join(' ');
}

/**
 * Stable member key: lowercase, accents dropped, punctuation stripped,
 * whitespace runs joined with underscores. "A Lee" → "a_lee".
 */
export function deriveIdentity(displayName: string): string {
  return displayName
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .join('_');
}
