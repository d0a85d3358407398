/**
 * Marketplace page parsing
 *
 * Pure functions over raw HTML. Item pages carry their supporters in the
 * `#collectors-data` blob and their id in `#pagedata`; fan pages carry the
 * first page of a collection in `#pagedata` (`item_cache` + `sequence`).
 */

import * as cheerio from 'cheerio';
import { z } from 'zod';
import {
  CollectionKind,
  FetchFailure,
  FetchFailureReason,
  UNKNOWN_ARTIST,
  UNKNOWN_TITLE,
  fallbackItemUrl,
  uniqueTags,
  type Item,
  type Supporter,
} from '@crate-digger/shared';

/**
 * Profile paths that look like usernames but are not supporters
 */
const NON_SUPPORTER_PATHS = new Set([
  'artists',
  'music',
  'merch',
  'community',
  'partner',
  'sign',
  'log',
  'help',
  'settings',
  'compliments',
  'album',
  'track',
  'discover',
  'EmbeddedPlayer',
]);

const IdSchema = z.union([z.number(), z.string().min(1)]).transform(String);

const CollectorsBlobSchema = z
  .object({
    thumbs: z
      .array(z.object({ username: z.string().nullish() }).passthrough())
      .nullish(),
  })
  .passthrough();

const TralbumRefSchema = z
  .object({ tralbum_id: IdSchema.nullish() })
  .passthrough();

const ItemPageDataSchema = z
  .object({
    tralbum_data: TralbumRefSchema.nullish(),
    fan_tralbum_data: TralbumRefSchema.nullish(),
    album_id: IdSchema.nullish(),
  })
  .passthrough();

export const CollectionItemSchema = z
  .object({
    tralbum_id: IdSchema.nullish(),
    item_title: z.string().nullish(),
    band_name: z.string().nullish(),
    item_url: z.string().nullish(),
  })
  .passthrough();

export type RawCollectionItem = z.infer<typeof CollectionItemSchema>;

const CollectionSectionSchema = z
  .object({
    sequence: z.array(IdSchema).nullish(),
    pending_sequence: z.array(IdSchema).nullish(),
    last_token: z.string().nullish(),
    item_count: z.number().nullish(),
  })
  .passthrough();

const FanPageDataSchema = z
  .object({
    fan_data: z
      .object({ fan_id: z.number().nullish() })
      .passthrough()
      .nullish(),
    collection_data: CollectionSectionSchema.nullish(),
    wishlist_data: CollectionSectionSchema.nullish(),
    item_cache: z
      .object({
        collection: z.record(CollectionItemSchema).nullish(),
        wishlist: z.record(CollectionItemSchema).nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const CollectionItemsResponseSchema = z
  .object({
    items: z.array(CollectionItemSchema).nullish(),
    more_available: z.boolean().nullish(),
    last_token: z.string().nullish(),
  })
  .passthrough();

export interface FanPage {
  fanId: number | null;
  firstPage: RawCollectionItem[];
  lastToken: string | null;
  itemCount: number;
}

/**
 * JSON blob stored in an element's data-blob attribute, or null when absent
 */
function readBlob(
  $: cheerio.CheerioAPI,
  selector: string,
  target: string
): unknown {
  const raw = $(selector).first().attr('data-blob');
  if (!raw) return null;
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new FetchFailure(
      target,
      FetchFailureReason.PARSE,
      `Malformed ${selector} blob`,
      { cause: error }
    );
  }
}

function usernameFromHref(
  href: string | undefined,
  baseUrl: string
): string | null {
  if (!href) return null;
  try {
    const segments = new URL(href, baseUrl).pathname.split('/');
    const segment = segments.filter(Boolean)[0];
    return segment && !NON_SUPPORTER_PATHS.has(segment) ? segment : null;
  } catch {
    return null;
  }
}

function dedupe(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

/**
 * Supporter usernames in page order, without duplicates.
 * Falls back to fan picture links when the collectors blob is missing or empty.
 */
export function parseSupporters(
  html: string,
  target: string,
  baseUrl: string
): Supporter[] {
  const $ = cheerio.load(html);
  const supporters: string[] = [];

  const blob = readBlob($, '#collectors-data', target);
  if (blob !== null) {
    const parsed = CollectorsBlobSchema.safeParse(blob);
    if (!parsed.success) {
      throw new FetchFailure(
        target,
        FetchFailureReason.PARSE,
        'Unexpected collectors blob shape',
        { cause: parsed.error }
      );
    }
    for (const thumb of parsed.data.thumbs ?? []) {
      if (thumb.username && !NON_SUPPORTER_PATHS.has(thumb.username)) {
        supporters.push(thumb.username);
      }
    }
  }

  if (supporters.length === 0) {
    $('a').each((_, element) => {
      const link = $(element);
      const className = link.attr('class') ?? '';
      const wrapsThumbnail = link.find('img[alt$="thumbnail"]').length > 0;
      if (!/fan.*pic|pic.*fan/.test(className) && !wrapsThumbnail) return;

      const username = usernameFromHref(link.attr('href'), baseUrl);
      if (username) supporters.push(username);
    });
  }

  return dedupe(supporters);
}

/**
 * Marketplace id of the item a page describes, or null when the page does not
 * say
 */
export function parseItemId(html: string, target: string): string | null {
  const $ = cheerio.load(html);
  const blob = readBlob($, '#pagedata', target);
  if (blob === null) return null;

  const parsed = ItemPageDataSchema.safeParse(blob);
  if (!parsed.success) return null;

  const data = parsed.data;
  return (
    data.tralbum_data?.tralbum_id ??
    data.fan_tralbum_data?.tralbum_id ??
    data.album_id ??
    null
  );
}

/**
 * Tag link texts, first spelling kept per normalized tag
 */
export function parseTags(html: string): string[] {
  const $ = cheerio.load(html);
  const texts: string[] = [];
  $('a[class*="tag"]').each((_, element) => {
    texts.push($(element).text());
  });
  return uniqueTags(texts);
}

export function parseFanPage(
  html: string,
  kind: CollectionKind,
  target: string
): FanPage {
  const $ = cheerio.load(html);
  const blob = readBlob($, '#pagedata', target);
  if (blob === null) {
    throw new FetchFailure(
      target,
      FetchFailureReason.PARSE,
      'Fan page has no page data'
    );
  }

  const parsed = FanPageDataSchema.safeParse(blob);
  if (!parsed.success) {
    throw new FetchFailure(
      target,
      FetchFailureReason.PARSE,
      'Unexpected fan page data shape',
      { cause: parsed.error }
    );
  }

  const data = parsed.data;
  const wishlist = kind === CollectionKind.WISHLIST;
  const section = wishlist ? data.wishlist_data : data.collection_data;
  const cache =
    (wishlist ? data.item_cache?.wishlist : data.item_cache?.collection) ?? {};
  const keys = [
    ...(section?.sequence ?? []),
    ...(section?.pending_sequence ?? []),
  ];

  const firstPage: RawCollectionItem[] = [];
  for (const key of keys) {
    const entry = cache[key];
    if (entry) firstPage.push(entry);
  }

  return {
    fanId: data.fan_data?.fan_id ?? null,
    firstPage,
    lastToken: section?.last_token || null,
    itemCount: section?.item_count ?? 0,
  };
}

/**
 * Item from a collection entry; entries without an id are dropped
 */
export function toItem(raw: RawCollectionItem, baseUrl: string): Item | null {
  if (!raw.tralbum_id) return null;
  return {
    id: raw.tralbum_id,
    url: raw.item_url || fallbackItemUrl(baseUrl, raw.tralbum_id),
    title: raw.item_title || UNKNOWN_TITLE,
    artist: raw.band_name || UNKNOWN_ARTIST,
    tags: [],
  };
}
