/**
 * HTML builders for marketplace pages
 */

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;');
}

export function blobDiv(id: string, data: unknown): string {
  return `<div id="${id}" data-blob="${escapeAttribute(JSON.stringify(data))}"></div>`;
}

export function itemPage(options: {
  supporters?: string[];
  itemId?: number;
  tags?: string[];
  extra?: string;
}): string {
  const parts: string[] = ['<html><body>'];
  if (options.supporters) {
    parts.push(blobDiv('collectors-data', { thumbs: options.supporters.map((username) => ({ username })) }));
  }
  if (options.itemId !== undefined) {
    parts.push(blobDiv('pagedata', { tralbum_data: { tralbum_id: options.itemId } }));
  }
  for (const tag of options.tags ?? []) {
    parts.push(`<a class="tag" href="https://bandcamp.com/discover/${tag}">${tag}</a>`);
  }
  parts.push(options.extra ?? '', '</body></html>');
  return parts.join('\n');
}

export interface FanItem {
  id: number;
  title?: string;
  artist?: string;
  url?: string;
}

function rawItem(item: FanItem) {
  return {
    tralbum_id: item.id,
    item_title: item.title ?? `Title ${item.id}`,
    band_name: item.artist ?? `Artist ${item.id}`,
    item_url: item.url ?? `https://label.example.com/album/${item.id}`,
  };
}

export function apiItems(items: FanItem[]) {
  return { items: items.map(rawItem), more_available: false };
}

export function fanPage(options: {
  fanId?: number;
  collection?: FanItem[];
  wishlist?: FanItem[];
  itemCount?: number;
  lastToken?: string;
}): string {
  const section = (items: FanItem[]) => ({
    sequence: items.map((item) => `a${item.id}`),
    pending_sequence: [],
    last_token: options.lastToken ?? null,
    item_count: options.itemCount ?? items.length,
  });
  const cache = (items: FanItem[]) =>
    Object.fromEntries(items.map((item) => [`a${item.id}`, rawItem(item)]));

  return `<html><body>${blobDiv('pagedata', {
    fan_data: { fan_id: options.fanId ?? 1001 },
    collection_data: section(options.collection ?? []),
    wishlist_data: section(options.wishlist ?? []),
    item_cache: {
      collection: cache(options.collection ?? []),
      wishlist: cache(options.wishlist ?? []),
    },
  })}</body></html>`;
}
