/**
 * Environment parsing
 */

import { describe, it, expect } from 'vitest';

import { loadConfig, RATE_LIMIT_DEFAULTS, SEARCH_DEFAULTS } from '@/lib/config.js';

const REQUIRED_ENV = {
  TOKEN_SIGNING_SECRET: 'test-secret',
  SUPABASE_URL: 'https://project.supabase.test',
  SUPABASE_SERVICE_KEY: 'test-service-key',
};

describe('loadConfig', () => {
  it('should apply defaults for everything optional', () => {
    const config = loadConfig(REQUIRED_ENV);

    expect(config.env).toBe('development');
    expect(config.port).toBe(3000);
    expect(config.logLevel).toBe('info');
    expect(config.allowedOrigins).toEqual(['http://localhost:3000']);
    expect(config.tokens).toEqual({ signingSecret: 'test-secret' });
    expect(config.redis).toBeNull();
    expect(config.embeddings).toEqual({
      apiKey: null,
      model: 'text-embedding-3-small',
    });
    expect(config.search).toEqual({
      textWeight: SEARCH_DEFAULTS.textWeight,
      vectorWeight: SEARCH_DEFAULTS.vectorWeight,
      cacheTtlSeconds: SEARCH_DEFAULTS.cacheTtlSeconds,
    });
    expect(config.rateLimit).toEqual({
      requests: RATE_LIMIT_DEFAULTS.requests,
      windowSeconds: RATE_LIMIT_DEFAULTS.windowSeconds,
    });
    expect(config.outboundTimeoutMs).toBe(5000);
  });

  it('should coerce numbers and split origins', () => {
    const config = loadConfig({
      ...REQUIRED_ENV,
      PORT: '8080',
      ALLOWED_ORIGINS: 'https://a.example.test, https://b.example.test,',
      SEARCH_TEXT_WEIGHT: '0.7',
      SEARCH_VECTOR_WEIGHT: '0.3',
      RATE_LIMIT_REQUESTS: '5',
    });

    expect(config.port).toBe(8080);
    expect(config.allowedOrigins).toEqual([
      'https://a.example.test',
      'https://b.example.test',
    ]);
    expect(config.search.textWeight).toBe(0.7);
    expect(config.search.vectorWeight).toBe(0.3);
    expect(config.rateLimit.requests).toBe(5);
  });

  it('should configure redis only when both url and token are set', () => {
    const partial = loadConfig({
      ...REQUIRED_ENV,
      UPSTASH_REDIS_URL: 'https://redis.example.test',
    });
    const complete = loadConfig({
      ...REQUIRED_ENV,
      UPSTASH_REDIS_URL: 'https://redis.example.test',
      UPSTASH_REDIS_TOKEN: 'test-token',
    });

    expect(partial.redis).toBeNull();
    expect(complete.redis).toEqual({
      url: 'https://redis.example.test',
      token: 'test-token',
    });
  });

  it('should treat an empty embedding key as unset', () => {
    const config = loadConfig({ ...REQUIRED_ENV, OPENROUTER_API_KEY: '' });
    expect(config.embeddings.apiKey).toBeNull();
  });

  it('should name every invalid key in the error', () => {
    expect(() =>
      loadConfig({ SUPABASE_URL: 'not-a-url', SUPABASE_SERVICE_KEY: 'key' })
    ).toThrow(/TOKEN_SIGNING_SECRET.*SUPABASE_URL|SUPABASE_URL.*TOKEN_SIGNING_SECRET/);
  });

  it('should reject a weight outside [0, 1]', () => {
    expect(() => loadConfig({ ...REQUIRED_ENV, SEARCH_TEXT_WEIGHT: '1.5' })).toThrow(
      /SEARCH_TEXT_WEIGHT/
    );
  });
});
