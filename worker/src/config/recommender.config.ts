import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export interface RedisSettings {
  host: string;
  port: number;
  password?: string;
}

/**
 * Typed access to the recommender settings loaded by configuration()
 */
@Injectable()
export class RecommenderConfigService {
  constructor(
    @Inject(ConfigService) private readonly configService: ConfigService
  ) {}

  get port(): number {
    return this.configService.get<number>('port', 3001);
  }

  get redis(): RedisSettings {
    return {
      host: this.configService.get<string>('redis.host', 'localhost'),
      port: this.configService.get<number>('redis.port', 6379),
      password: this.configService.get<string>('redis.password'),
    };
  }

  get marketplaceBaseUrl(): string {
    return this.configService.get<string>(
      'marketplace.baseUrl',
      'https://bandcamp.com'
    );
  }

  get marketplaceCookie(): string | undefined {
    return this.configService.get<string>('marketplace.cookie') || undefined;
  }

  get userAgent(): string | undefined {
    return this.configService.get<string>('marketplace.userAgent');
  }

  get fetchTimeoutMs(): number {
    return this.configService.get<number>('fetch.timeoutMs', 30000);
  }

  /**
   * Upper bound on concurrent marketplace fetches per request
   */
  get maxWorkers(): number {
    return this.configService.get<number>('fetch.maxWorkers', 15);
  }

  get collectionPageSize(): number {
    return this.configService.get<number>('fetch.collectionPageSize', 10000);
  }

  get queueConcurrency(): number {
    return this.configService.get<number>('queue.concurrency', 2);
  }

  get randomSeed(): number | undefined {
    const seed = this.configService.get<number>('random.seed');
    return typeof seed === 'number' && Number.isFinite(seed) ? seed : undefined;
  }
}
