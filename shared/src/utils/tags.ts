/**
 * Tag normalization
 *
 * Marketplace tags are free text entered by artists, so the same genre or place
 * shows up with different casing and spelling. Comparisons always go through
 * normalizeTag.
 */

const TAG_VARIATIONS: Readonly<Record<string, string>> = {
  uk: 'united kingdom',
  'u.k.': 'united kingdom',
  usa: 'united states',
  'u.s.a.': 'united states',
};

export function normalizeTag(tag: string): string {
  const normalized = tag.trim().toLowerCase();
  return TAG_VARIATIONS[normalized] ?? normalized;
}

/**
 * Normalize a tag list into a set, dropping empty tags
 */
export function normalizeTagSet(tags: Iterable<string>): Set<string> {
  const result = new Set<string>();
  for (const tag of tags) {
    const normalized = normalizeTag(tag);
    if (normalized) {
      result.add(normalized);
    }
  }
  return result;
}

/**
 * De-duplicate raw tags by their normalized form, keeping the first spelling
 * seen
 */
export function uniqueTags(tags: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const tag of tags) {
    const trimmed = tag.trim();
    const normalized = normalizeTag(trimmed);
    if (!normalized || seen.has(normalized)) continue;
    seen.add(normalized);
    result.push(trimmed);
  }
  return result;
}
