import { Inject, Injectable, Logger } from '@nestjs/common';
import axios from 'axios';
import type {
  Collection,
  MarketplaceCollaborators,
} from '@crate-digger/shared';
import { RecommenderConfigService } from '../config/recommender.config';
import { RequestMemo } from '../task-recommendations/utils/request-memo';
import { MarketplaceClient } from './marketplace.client';

/**
 * One recommendation request's view of the marketplace.
 *
 * Owns the collaborators, the per-request memo stores and an AbortController.
 * close() aborts whatever is still in flight and drops the memoized values.
 */
export class MarketplaceSession {
  readonly collaborators: MarketplaceCollaborators;
  readonly collections = new RequestMemo<Collection>();
  readonly tags = new RequestMemo<string[]>();
  private readonly controller = new AbortController();

  constructor(
    createCollaborators: (signal: AbortSignal) => MarketplaceCollaborators
  ) {
    this.collaborators = createCollaborators(this.controller.signal);
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  close(): void {
    if (this.closed) return;
    this.controller.abort();
    this.collections.clear();
    this.tags.clear();
  }
}

export interface MarketplaceSessionProvider {
  open(): MarketplaceSession;
}

/**
 * Run `work` inside a fresh session; the session is closed on every exit path
 */
export async function withSession<T>(
  provider: MarketplaceSessionProvider,
  work: (session: MarketplaceSession) => Promise<T>
): Promise<T> {
  const session = provider.open();
  try {
    return await work(session);
  } finally {
    session.close();
  }
}

/**
 * Opens sessions backed by the HTTP MarketplaceClient
 */
@Injectable()
export class MarketplaceSessionFactory implements MarketplaceSessionProvider {
  private readonly logger = new Logger(MarketplaceSessionFactory.name);

  constructor(
    @Inject(RecommenderConfigService)
    private readonly config: RecommenderConfigService
  ) {}

  open(): MarketplaceSession {
    const headers: Record<string, string> = {
      Accept: 'text/html,application/json;q=0.9,*/*;q=0.8',
    };
    const userAgent = this.config.userAgent;
    if (userAgent) headers['User-Agent'] = userAgent;
    const cookie = this.config.marketplaceCookie;
    if (cookie) headers.Cookie = cookie;

    const http = axios.create({ timeout: this.config.fetchTimeoutMs, headers });
    this.logger.debug(
      `Opening marketplace session against ${this.config.marketplaceBaseUrl}`
    );

    return new MarketplaceSession(
      (signal) =>
        new MarketplaceClient(http, {
          baseUrl: this.config.marketplaceBaseUrl,
          collectionPageSize: this.config.collectionPageSize,
          signal,
        })
    );
  }
}
