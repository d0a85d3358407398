import { Inject, Injectable, Logger } from '@nestjs/common';
import { ZodError, type ZodIssue, type ZodType, type ZodTypeDef } from 'zod';
import {
  CollectionKind,
  InvalidArgument,
  NOOP_PROGRESS,
  OverlapOptionsSchema,
  RandomItemsOptionsSchema,
  RecommendationMode,
  SeedUrlSchema,
  TagSimilarityOptionsSchema,
  isFetchFailure,
  normalizeItemUrl,
  sampleWithoutReplacement,
  type Collection,
  type Item,
  type OverlapOptionsInput,
  type OverlapRecommendation,
  type ProgressReporter,
  type RandomItem,
  type RandomItemsOptionsInput,
  type RandomPickResult,
  type RandomSource,
  type SeedItem,
  type SimilarRecommendation,
  type Supporter,
  type TagSimilarityOptionsInput,
} from '@crate-digger/shared';
import { RecommenderConfigService } from '../config/recommender.config';
import { MARKETPLACE_SESSIONS } from '../marketplace/marketplace.constants';
import {
  withSession,
  type MarketplaceSession,
  type MarketplaceSessionProvider,
} from '../marketplace/marketplace.session';
import { RANDOM_SOURCE } from './recommendations.constants';
import {
  RandomSampleStrategy,
  SupporterOverlapStrategy,
  TagSimilarityStrategy,
  buildDocumentFrequency,
  buildOverlapPool,
  countOccurrences,
} from './strategies';
import {
  ProgressTracker,
  runPool,
  toOverlapView,
  toRandomView,
  toSimilarView,
} from './utils';

const SEED_TAG_ATTEMPTS = 2;

/**
 * Recommendation entry points
 *
 * Each call validates its arguments, opens a marketplace session, fetches
 * through the bounded pool and hands the collected data to a strategy.
 * Fetch failures for a single supporter or item are logged and skipped.
 */
@Injectable()
export class RecommendationsService {
  private readonly logger = new Logger(RecommendationsService.name);
  private readonly overlapStrategy = new SupporterOverlapStrategy();
  private readonly similarityStrategy = new TagSimilarityStrategy();
  private readonly sampleStrategy: RandomSampleStrategy;

  constructor(
    @Inject(MARKETPLACE_SESSIONS)
    private readonly sessions: MarketplaceSessionProvider,
    @Inject(RecommenderConfigService)
    private readonly config: RecommenderConfigService,
    @Inject(RANDOM_SOURCE) private readonly random: RandomSource
  ) {
    this.sampleStrategy = new RandomSampleStrategy(random);
  }

  /**
   * Items bought by several supporters of the seed
   */
  async getRecommendations(
    seedUrl: string,
    options: OverlapOptionsInput = {},
    progress: ProgressReporter = NOOP_PROGRESS,
    signal?: AbortSignal
  ): Promise<OverlapRecommendation[]> {
    const request = this.parseRequest(
      'getRecommendations',
      seedUrl,
      OverlapOptionsSchema,
      options
    );
    const opts = request.options;

    return withSession(this.sessions, async (session) => {
      const tracker = new ProgressTracker(progress);
      const supporters = await this.loadSupporters(
        session,
        request.seedUrl,
        tracker
      );
      if (supporters.length === 0) {
        tracker.status('No supporters found.');
        return [];
      }

      const seed = await this.resolveSeed(session, request.seedUrl);
      const collections = await this.fetchCollections(
        session,
        supporters,
        CollectionKind.PURCHASES,
        tracker,
        signal
      );

      tracker.status('Counting purchases...');
      const results = this.overlapStrategy.rankByOverlap(
        seed,
        supporters,
        (supporter) => collections.get(supporter) ?? [],
        opts.minSupporters,
        opts.maxRecommendations
      );

      const tags = opts.includeTags
        ? await this.fetchTags(
            session,
            results.map((result) => result.item),
            tracker,
            signal
          )
        : undefined;

      tracker.finish(`Found ${results.length} recommendations.`);
      this.logger.log(
        `Overlap recommendations for ${request.seedUrl}: ` +
          `${results.length}/${opts.maxRecommendations}`
      );
      return results.map((result) =>
        toOverlapView(result, tags ? tags.get(result.item.id) ?? [] : undefined)
      );
    });
  }

  /**
   * Supporters' purchases ranked by tag similarity to the seed
   */
  async getTagSimilarRecommendations(
    seedUrl: string,
    options: TagSimilarityOptionsInput = {},
    progress: ProgressReporter = NOOP_PROGRESS,
    signal?: AbortSignal
  ): Promise<SimilarRecommendation[]> {
    const request = this.parseRequest(
      'getTagSimilarRecommendations',
      seedUrl,
      TagSimilarityOptionsSchema,
      options
    );
    const opts = request.options;

    return withSession(this.sessions, async (session) => {
      const tracker = new ProgressTracker(progress);

      tracker.status('Fetching seed tags...');
      const seedTags = await this.fetchSeedTags(session, request.seedUrl);
      if (seedTags.length === 0) {
        tracker.status('No tags found for the seed item.');
        return [];
      }

      let supporters = await this.loadSupporters(
        session,
        request.seedUrl,
        tracker
      );
      if (supporters.length === 0) {
        tracker.status('No supporters found.');
        return [];
      }
      const { maxSupporters } = opts;
      if (maxSupporters !== undefined && supporters.length > maxSupporters) {
        supporters = sampleWithoutReplacement(
          supporters,
          maxSupporters,
          this.random
        );
        tracker.status(`Sampled ${supporters.length} supporters.`);
      }

      const seed = await this.resolveSeed(session, request.seedUrl);
      const collections = await this.fetchCollections(
        session,
        supporters,
        CollectionKind.PURCHASES,
        tracker,
        signal
      );

      const occurrences = countOccurrences(
        supporters.map((supporter) => collections.get(supporter) ?? []),
        seed
      );
      const candidates = [...occurrences.values()].map((entry) => entry.item);
      const tags = await this.fetchTags(session, candidates, tracker, signal);
      // Items without a tag entry failed to fetch and stay out of the corpus
      const tagged: Item[] = candidates.flatMap((item) => {
        const itemTags = tags.get(item.id);
        return itemTags ? [{ ...item, tags: itemTags }] : [];
      });

      tracker.status('Scoring tag similarity...');
      const results = this.similarityStrategy.rankByTagSimilarity(
        seedTags,
        tagged,
        buildDocumentFrequency(tagged),
        opts.minSimilarity,
        opts.maxRecommendations,
        {
          seed,
          supportersCountOf: (item) => occurrences.get(item.id)?.count ?? 0,
        }
      );

      tracker.finish(`Found ${results.length} similar items.`);
      this.logger.log(
        `Tag-similar recommendations for ${request.seedUrl}: ` +
          `${results.length}/${opts.maxRecommendations}`
      );
      return results.map((result) => toSimilarView(result));
    });
  }

  /**
   * Random picks among items shared by the seed's supporters
   */
  async getRandomItems(
    seedUrl: string,
    options: RandomItemsOptionsInput,
    progress: ProgressReporter = NOOP_PROGRESS,
    signal?: AbortSignal
  ): Promise<RandomItem[]> {
    const request = this.parseRequest(
      'getRandomItems',
      seedUrl,
      RandomItemsOptionsSchema,
      options
    );
    const opts = request.options;

    return withSession(this.sessions, async (session) => {
      const tracker = new ProgressTracker(progress);
      const supporters = await this.loadSupporters(
        session,
        request.seedUrl,
        tracker
      );
      if (supporters.length === 0) {
        tracker.status('No supporters found.');
        return [];
      }

      const selected =
        supporters.length > opts.numSupporters
          ? sampleWithoutReplacement(
              supporters,
              opts.numSupporters,
              this.random
            )
          : supporters;
      const kind = opts.useWishlist
        ? CollectionKind.WISHLIST
        : CollectionKind.PURCHASES;

      const seed = await this.resolveSeed(session, request.seedUrl);
      const collections = await this.fetchCollections(
        session,
        selected,
        kind,
        tracker,
        signal
      );
      const occurrences = countOccurrences(
        selected.map((supporter) => collections.get(supporter) ?? []),
        seed
      );
      if (occurrences.size === 0) {
        tracker.status('No items found in supporter collections.');
        return [];
      }

      const outcome = this.sampleStrategy.sampleWithFallback(
        buildOverlapPool(occurrences),
        opts.numItems,
        opts.minOverlap ?? 1,
        opts.useFallback
      );
      for (const attempt of outcome.attempts.slice(0, -1)) {
        tracker.status(
          `Only ${attempt.poolSize} items with overlap >= ${attempt.threshold}, ` +
            `lowering to ${attempt.threshold - 1}.`
        );
      }

      const picks: RandomPickResult[] = outcome.items.map((entry) => ({
        kind: RecommendationMode.RANDOM,
        item: entry.item,
        overlapCount: entry.count,
        ...(opts.minOverlap !== undefined
          ? { finalOverlap: outcome.finalOverlap }
          : {}),
      }));

      const tags = opts.includeTags
        ? await this.fetchTags(
            session,
            picks.map((pick) => pick.item),
            tracker,
            signal
          )
        : undefined;

      tracker.finish(`Picked ${picks.length} items.`);
      this.logger.log(
        `Random items for ${request.seedUrl}: ${picks.length}/${opts.numItems}`
      );
      return picks.map((pick) =>
        toRandomView(pick, tags?.get(pick.item.id) ?? [])
      );
    });
  }

  private parseRequest<T>(
    operation: string,
    seedUrl: unknown,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: unknown
  ): { seedUrl: string; options: T } {
    const url = SeedUrlSchema.safeParse(seedUrl);
    const opts = schema.safeParse(options);
    if (url.success && opts.success) {
      return { seedUrl: url.data, options: opts.data };
    }

    const issues: ZodIssue[] = [];
    if (!url.success) {
      issues.push(
        ...url.error.issues.map((issue) => ({
          ...issue,
          path: ['seedUrl', ...issue.path],
        }))
      );
    }
    if (!opts.success) {
      issues.push(...opts.error.issues);
    }
    throw InvalidArgument.fromZodError(operation, new ZodError(issues));
  }

  private async loadSupporters(
    session: MarketplaceSession,
    seedUrl: string,
    tracker: ProgressTracker
  ): Promise<Supporter[]> {
    tracker.status('Fetching supporters...');
    try {
      const supporters = await session.collaborators.listSupporters(seedUrl);
      this.logger.debug(`Found ${supporters.length} supporters for ${seedUrl}`);
      return supporters;
    } catch (error) {
      this.absorbFetchFailure(error, `listing supporters of ${seedUrl}`);
      return [];
    }
  }

  /**
   * Seed with its marketplace id, or id null when the page does not resolve
   */
  private async resolveSeed(
    session: MarketplaceSession,
    seedUrl: string
  ): Promise<SeedItem> {
    try {
      const id = await session.collaborators.resolveItemId(seedUrl);
      return { url: seedUrl, id };
    } catch (error) {
      this.absorbFetchFailure(error, `resolving the id of ${seedUrl}`);
      return { url: seedUrl, id: null };
    }
  }

  /**
   * Seed tags, fetched a second time when the first attempt fails with a
   * retryable (network) failure
   */
  private async fetchSeedTags(
    session: MarketplaceSession,
    seedUrl: string
  ): Promise<string[]> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await session.collaborators.fetchTags(seedUrl);
      } catch (error) {
        const retryable = isFetchFailure(error) && error.retryable;
        if (retryable && attempt < SEED_TAG_ATTEMPTS) {
          this.logger.debug(
            `Retrying tags of ${seedUrl} after a network failure`
          );
          continue;
        }
        this.absorbFetchFailure(error, `fetching tags of ${seedUrl}`);
        return [];
      }
    }
  }

  /**
   * Collections by supporter; supporters whose fetch failed are missing from
   * the map
   */
  private async fetchCollections(
    session: MarketplaceSession,
    supporters: readonly Supporter[],
    kind: CollectionKind,
    tracker: ProgressTracker,
    signal?: AbortSignal
  ): Promise<Map<Supporter, Collection>> {
    const label =
      kind === CollectionKind.WISHLIST ? 'wishlist items' : 'purchases';
    tracker.start(
      supporters.length,
      `Fetching ${label} from ${supporters.length} supporters...`
    );

    const outcomes = await runPool(
      supporters,
      (supporter) =>
        session.collections.getOrCompute(`${kind}:${supporter}`, () =>
          session.collaborators.fetchCollection(supporter, kind)
        ),
      {
        concurrency: this.concurrencyFor(supporters.length),
        signal,
        onSettled: (outcome, index, settled) => {
          const count =
            outcome.status === 'fulfilled' ? outcome.value.length : 0;
          tracker.advance(
            `Fetched ${count} ${label} from ${supporters[index]} ` +
              `(${settled}/${supporters.length})`
          );
        },
      }
    );

    const collections = new Map<Supporter, Collection>();
    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        collections.set(supporters[index], outcome.value);
      } else if (outcome.status === 'rejected') {
        this.absorbFetchFailure(
          outcome.reason,
          `fetching ${label} of ${supporters[index]}`
        );
      }
    });

    this.logger.debug(
      `Fetched ${collections.size}/${supporters.length} ${label} collections`
    );
    return collections;
  }

  /**
   * Tags by item id; items whose fetch failed get no entry
   */
  private async fetchTags(
    session: MarketplaceSession,
    items: readonly Item[],
    tracker: ProgressTracker,
    signal?: AbortSignal
  ): Promise<Map<string, string[]>> {
    const tags = new Map<string, string[]>();
    if (items.length === 0) return tags;

    tracker.start(items.length, `Fetching tags for ${items.length} items...`);
    const outcomes = await runPool(
      items,
      (item) =>
        session.tags.getOrCompute(normalizeItemUrl(item.url), () =>
          session.collaborators.fetchTags(item.url)
        ),
      {
        concurrency: this.concurrencyFor(items.length),
        signal,
        onSettled: (_outcome, _index, settled) =>
          tracker.advance(`Fetched tags (${settled}/${items.length})`),
      }
    );

    outcomes.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        tags.set(items[index].id, outcome.value);
      } else if (outcome.status === 'rejected') {
        this.absorbFetchFailure(
          outcome.reason,
          `fetching tags of ${items[index].url}`
        );
      }
    });
    return tags;
  }

  private concurrencyFor(tasks: number): number {
    return Math.max(1, Math.min(this.config.maxWorkers, tasks));
  }

  /**
   * Fetch failures cost one supporter or item; anything else is a bug and
   * propagates
   */
  private absorbFetchFailure(error: unknown, action: string): void {
    if (!isFetchFailure(error)) {
      throw error;
    }
    this.logger.warn(`Skipped ${action}: ${error.message}`);
  }
}
