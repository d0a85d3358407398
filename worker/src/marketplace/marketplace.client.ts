import { Logger } from '@nestjs/common';
import axios, { type AxiosInstance } from 'axios';
import {
  CollectionKind,
  FetchFailure,
  FetchFailureReason,
  type Collection,
  type Item,
  type MarketplaceCollaborators,
  type Supporter,
} from '@crate-digger/shared';
import { RequestMemo } from '../task-recommendations/utils/request-memo';
import {
  CollectionItemsResponseSchema,
  parseFanPage,
  parseItemId,
  parseSupporters,
  parseTags,
  toItem,
  type RawCollectionItem,
} from './page-parsers';

/**
 * The part of axios the client needs; tests hand in a stub
 */
export type HttpTransport = Pick<AxiosInstance, 'get' | 'post'>;

export interface MarketplaceClientOptions {
  baseUrl: string;
  /**
   * `count` sent to the collection API for the items past the first page
   */
  collectionPageSize: number;
  signal?: AbortSignal;
}

const COLLECTION_ENDPOINTS: Record<CollectionKind, string> = {
  [CollectionKind.PURCHASES]: 'api/fancollection/1/collection_items',
  [CollectionKind.WISHLIST]: 'api/fancollection/1/wishlist_items',
};

/**
 * Marketplace client over HTTP + HTML scraping
 *
 * Every failure comes out as a FetchFailure. Page HTML is memoized, so the
 * seed page serves supporters, id and tags from one request.
 */
export class MarketplaceClient implements MarketplaceCollaborators {
  private readonly logger = new Logger(MarketplaceClient.name);
  private readonly baseUrl: string;

  constructor(
    private readonly http: HttpTransport,
    private readonly options: MarketplaceClientOptions,
    private readonly pages = new RequestMemo<string>({ forgetFailures: true })
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async listSupporters(itemUrl: string): Promise<Supporter[]> {
    const html = await this.fetchPage(itemUrl);
    const supporters = parseSupporters(html, itemUrl, this.baseUrl);
    this.logger.debug(`Found ${supporters.length} supporters on ${itemUrl}`);
    return supporters;
  }

  async resolveItemId(itemUrl: string): Promise<string | null> {
    return parseItemId(await this.fetchPage(itemUrl), itemUrl);
  }

  async fetchTags(itemUrl: string): Promise<string[]> {
    return parseTags(await this.fetchPage(itemUrl));
  }

  async fetchCollection(
    supporter: Supporter,
    kind: CollectionKind
  ): Promise<Collection> {
    const pageUrl =
      kind === CollectionKind.WISHLIST
        ? `${this.baseUrl}/${encodeURIComponent(supporter)}/wishlist`
        : `${this.baseUrl}/${encodeURIComponent(supporter)}`;

    const page = parseFanPage(await this.fetchPage(pageUrl), kind, pageUrl);
    const raw: RawCollectionItem[] = [...page.firstPage];

    const truncated = page.firstPage.length < page.itemCount;
    if (page.fanId !== null && page.lastToken && truncated) {
      const rest = await this.fetchRemaining(
        page.fanId,
        page.lastToken,
        kind,
        pageUrl
      );
      raw.push(...rest);
    }

    const items: Item[] = [];
    for (const entry of raw) {
      const item = toItem(entry, this.baseUrl);
      if (item) items.push(item);
    }
    this.logger.debug(`Fetched ${items.length} ${kind} items for ${supporter}`);
    return items;
  }

  private async fetchRemaining(
    fanId: number,
    lastToken: string,
    kind: CollectionKind,
    refererUrl: string
  ): Promise<RawCollectionItem[]> {
    const endpoint = `${this.baseUrl}/${COLLECTION_ENDPOINTS[kind]}`;
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(
        endpoint,
        {
          fan_id: fanId,
          older_than_token: lastToken,
          count: this.options.collectionPageSize,
        },
        { signal: this.options.signal, headers: { Referer: refererUrl } }
      );
      data = response.data;
    } catch (error) {
      throw this.toFetchFailure(endpoint, error);
    }

    const parsed = CollectionItemsResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new FetchFailure(
        endpoint,
        FetchFailureReason.PARSE,
        'Unexpected collection response',
        { cause: parsed.error }
      );
    }
    return parsed.data.items ?? [];
  }

  private fetchPage(url: string): Promise<string> {
    return this.pages.getOrCompute(url, async () => {
      try {
        const response = await this.http.get<unknown>(url, {
          responseType: 'text',
          signal: this.options.signal,
        });
        if (typeof response.data !== 'string') {
          throw new FetchFailure(
            url,
            FetchFailureReason.PARSE,
            'Expected an HTML body'
          );
        }
        return response.data;
      } catch (error) {
        throw this.toFetchFailure(url, error);
      }
    });
  }

  private toFetchFailure(target: string, error: unknown): FetchFailure {
    if (error instanceof FetchFailure) return error;
    if (axios.isCancel(error)) {
      return new FetchFailure(
        target,
        FetchFailureReason.ABORTED,
        'Request aborted',
        { cause: error }
      );
    }
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      const reason =
        status === 401 || status === 403
          ? FetchFailureReason.AUTH
          : FetchFailureReason.NETWORK;
      const message = status !== undefined ? `HTTP ${status}` : error.message;
      return new FetchFailure(target, reason, message, {
        cause: error,
        context: { status },
      });
    }
    return FetchFailure.fromError(error, { target });
  }
}
