import { loadConfig } from '../config/config.js';
import { ConfigurationError } from '../utils/errors.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.ledger).toEqual({ driver: 'sqlite', path: 'data/ledger.db' });
    expect(config.coordinator).toEqual({ maxParallelStages: 0, failFast: false });
    expect(config.stages).toEqual({ defaultTimeoutMs: 30 * 60 * 1000, retryBaseDelayMs: 1000, retryMaxDelayMs: 30_000 });
    expect(config.healthCheck).toEqual({ intervalMs: 5000, maxAttempts: 24, successThreshold: 2 });
    expect(config.cors.origin).toBe(true);
    expect(config.metrics.url).toBeUndefined();
    expect(config.http).toEqual({ timeoutMs: 10_000 });
  });

  it('parses numbers, flags and lists from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      MAX_PARALLEL_STAGES: '4',
      FAIL_FAST: 'true',
      HEALTH_SUCCESS_THRESHOLD: '3',
      CORS_ORIGIN: 'https://ops.example.com, https://ci.example.com',
      METRICS_URL: 'http://metrics.test:9091'
    });

    expect(config.port).toBe(8080);
    expect(config.coordinator).toEqual({ maxParallelStages: 4, failFast: true });
    expect(config.healthCheck.successThreshold).toBe(3);
    expect(config.cors.origin).toEqual(['https://ops.example.com', 'https://ci.example.com']);
    expect(config.metrics.url).toBe('http://metrics.test:9091');
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ HEALTH_INTERVAL_MS: '0' })).toThrow('Invalid configuration: HEALTH_INTERVAL_MS');
    expect(() => loadConfig({ LEDGER_DRIVER: 'postgres' })).toThrow(ConfigurationError);
  });

  it('rejects a retry cap below the base delay', () => {
    expect(() => loadConfig({ RETRY_BASE_DELAY_MS: '5000', RETRY_MAX_DELAY_MS: '1000' }))
      .toThrow('RETRY_MAX_DELAY_MS must not be smaller than RETRY_BASE_DELAY_MS');
  });

  it('requires a JWT secret in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow('JWT_SECRET must be set in production');
    expect(loadConfig({ NODE_ENV: 'production', JWT_SECRET: 'test-secret' }).jwt.secret).toBe('test-secret');
  });
});
