import type { CollectionKind } from '../enums';
import type { Collection, Supporter } from '../schema/item';

/**
 * What the recommendation core needs from the marketplace.
 * Every method may reject with FetchFailure.
 */
export interface MarketplaceCollaborators {
  /** Usernames of the supporters listed on an item page, in page order */
  listSupporters(itemUrl: string): Promise<Supporter[]>;

  /** Marketplace id of the item behind a url, or null when the page has none */
  resolveItemId(itemUrl: string): Promise<string | null>;

  /** A supporter's purchases or wishlist; empty for private collections */
  fetchCollection(
    supporter: Supporter,
    kind: CollectionKind
  ): Promise<Collection>;

  /** Tags shown on an item page */
  fetchTags(itemUrl: string): Promise<string[]>;
}
