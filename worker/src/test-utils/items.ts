import type { Collection, Item } from '@crate-digger/shared';

export function makeItem(id: string, tags: string[] = []): Item {
  return {
    id,
    url: `https://label.example.com/album/${id}`,
    title: `Title ${id}`,
    artist: `Artist ${id}`,
    tags,
  };
}

export function collectionOf(...ids: string[]): Collection {
  return ids.map((id) => makeItem(id));
}
