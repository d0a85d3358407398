import type { Collection, Item, SeedItem } from '@crate-digger/shared';
import { normalizeItemUrl } from '@crate-digger/shared';
import type { OccurrenceEntry } from './base-strategy';

/**
 * Count, per item id, how many collections contain the item.
 *
 * An item listed twice in one collection counts once. Items matching the seed
 * are skipped. The returned map iterates in first-seen order.
 */
export function countOccurrences(
  collections: Iterable<Collection>,
  seed?: SeedItem
): Map<string, OccurrenceEntry> {
  const occurrences = new Map<string, OccurrenceEntry>();
  const seedUrl = seed ? normalizeItemUrl(seed.url) : undefined;
  const isSeed = (item: Item): boolean =>
    seed !== undefined &&
    ((seed.id !== null && item.id === seed.id) ||
      normalizeItemUrl(item.url) === seedUrl);

  for (const collection of collections) {
    const seen = new Set<string>();
    for (const item of collection) {
      if (seen.has(item.id) || isSeed(item)) continue;
      seen.add(item.id);

      const entry = occurrences.get(item.id);
      if (entry) {
        entry.count += 1;
      } else {
        occurrences.set(item.id, {
          item,
          count: 1,
          firstSeen: occurrences.size,
        });
      }
    }
  }

  return occurrences;
}
