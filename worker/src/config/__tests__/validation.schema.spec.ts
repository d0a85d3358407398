import { describe, it, expect } from 'vitest';
import { validateEnv } from '../validation.schema';

describe('validateEnv', () => {
  it('should apply defaults to an empty environment', () => {
    const env = validateEnv({});

    expect(env.PORT).toBe(3001);
    expect(env.REDIS_HOST).toBe('localhost');
    expect(env.MARKETPLACE_BASE_URL).toBe('https://bandcamp.com');
    expect(env.FETCH_MAX_WORKERS).toBe(15);
    expect(env.RANDOM_SEED).toBeUndefined();
  });

  it('should coerce numeric strings', () => {
    const env = validateEnv({ FETCH_TIMEOUT_MS: '5000', RANDOM_SEED: '42' });

    expect(env.FETCH_TIMEOUT_MS).toBe(5000);
    expect(env.RANDOM_SEED).toBe(42);
  });

  it('should keep unrelated variables', () => {
    expect(validateEnv({ HOME: '/root' }).HOME).toBe('/root');
  });

  it('should list every invalid variable', () => {
    expect(() => validateEnv({ FETCH_MAX_WORKERS: '0', MARKETPLACE_BASE_URL: 'not a url' })).toThrow(
      /MARKETPLACE_BASE_URL.*FETCH_MAX_WORKERS|FETCH_MAX_WORKERS.*MARKETPLACE_BASE_URL/
    );
  });
});
