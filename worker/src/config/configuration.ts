export default () => ({
  port: parseInt(process.env.PORT || '3001', 10),

  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: parseInt(process.env.REDIS_PORT || '6379', 10),
    password: process.env.REDIS_PASSWORD,
  },

  marketplace: {
    baseUrl: process.env.MARKETPLACE_BASE_URL || 'https://bandcamp.com',
    cookie: process.env.MARKETPLACE_COOKIE,
    userAgent:
      process.env.MARKETPLACE_USER_AGENT ||
      'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
  },

  fetch: {
    timeoutMs: parseInt(process.env.FETCH_TIMEOUT_MS || '30000', 10),
    maxWorkers: parseInt(process.env.FETCH_MAX_WORKERS || '15', 10),
    collectionPageSize: parseInt(
      process.env.COLLECTION_PAGE_SIZE || '10000',
      10
    ),
  },

  queue: {
    concurrency: parseInt(
      process.env.RECOMMENDATIONS_QUEUE_CONCURRENCY || '2',
      10
    ),
  },

  random: {
    seed: process.env.RANDOM_SEED
      ? parseInt(process.env.RANDOM_SEED, 10)
      : undefined,
  },
});
