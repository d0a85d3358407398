import { z } from 'zod';

export const UNKNOWN_TITLE = 'Unknown Title';
export const UNKNOWN_ARTIST = 'Unknown Artist';

/**
 * Item Schema
 *
 * A purchasable marketplace item (album or track) as seen in a supporter's
 * collection. `id` is the marketplace item id when known, otherwise the url.
 */
export const ItemSchema = z.object({
  id: z.string().min(1),
  url: z.string().min(1),
  title: z.string().default(UNKNOWN_TITLE),
  artist: z.string().default(UNKNOWN_ARTIST),
  tags: z.array(z.string()).default([]),
});

export type Item = Readonly<z.infer<typeof ItemSchema>>;

/**
 * The item recommendations are computed for
 */
export interface SeedItem {
  url: string;
  id: string | null;
}

export type Supporter = string;

export type Collection = readonly Item[];
