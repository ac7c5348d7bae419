import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

dotenv.config();

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  JWT_SECRET: z.string().min(1).optional(),
  CORS_ORIGIN: z.string().optional(),
  PIPELINES_FILE: z.string().default('pipelines.json'),
  LEDGER_DRIVER: z.enum(['sqlite', 'memory']).default('sqlite'),
  LEDGER_PATH: z.string().default('data/ledger.db'),
  RUN_STORAGE_DIR: z.string().default('data/runs'),
  REGISTRY_URL: z.string().url().default('http://localhost:5000'),
  PLATFORM_URL: z.string().url().default('http://localhost:6443'),
  METRICS_URL: z.string().url().optional(),
  REQUEST_TIMEOUT_MS: positiveInt.default(10000),
  MAX_PARALLEL_STAGES: z.coerce.number().int().nonnegative().default(0),
  FAIL_FAST: z.enum(['true', 'false']).default('false').transform(value => value === 'true'),
  DEFAULT_STAGE_TIMEOUT_MS: positiveInt.default(30 * 60 * 1000),
  RETRY_BASE_DELAY_MS: positiveInt.default(1000),
  RETRY_MAX_DELAY_MS: positiveInt.default(30000),
  HEALTH_INTERVAL_MS: positiveInt.default(5000),
  HEALTH_MAX_ATTEMPTS: positiveInt.default(24),
  HEALTH_SUCCESS_THRESHOLD: positiveInt.default(2)
});

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  jwt: {
    secret: string;
    expiresInSeconds: number;
  };
  cors: {
    origin: string[] | boolean;
    methods: string[];
    allowedHeaders: string[];
  };
  pipelines: {
    file: string;
  };
  ledger: {
    driver: 'sqlite' | 'memory';
    path: string;
  };
  runStorage: {
    dir: string;
  };
  registry: {
    url: string;
  };
  platform: {
    url: string;
  };
  metrics: {
    url?: string;
  };
  http: {
    /** Timeout of each registry and platform request. */
    timeoutMs: number;
  };
  coordinator: {
    maxParallelStages: number;
    failFast: boolean;
  };
  stages: {
    defaultTimeoutMs: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
  };
  healthCheck: {
    intervalMs: number;
    maxAttempts: number;
    successThreshold: number;
  };
}

/**
 * Builds the service configuration from environment variables. Throws
 * ConfigurationError naming the first offending variable.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid configuration: ${issue.path.join('.')}: ${issue.message}`);
  }
  const env = parsed.data;

  if (!env.JWT_SECRET && env.NODE_ENV === 'production') {
    throw new ConfigurationError('JWT_SECRET must be set in production');
  }
  if (env.RETRY_MAX_DELAY_MS < env.RETRY_BASE_DELAY_MS) {
    throw new ConfigurationError('RETRY_MAX_DELAY_MS must not be smaller than RETRY_BASE_DELAY_MS');
  }

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    jwt: {
      secret: env.JWT_SECRET || 'development-secret',
      expiresInSeconds: 24 * 60 * 60
    },
    cors: {
      origin: env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',').map(origin => origin.trim()) : true,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Accept', 'Authorization']
    },
    pipelines: { file: env.PIPELINES_FILE },
    ledger: { driver: env.LEDGER_DRIVER, path: env.LEDGER_PATH },
    runStorage: { dir: env.RUN_STORAGE_DIR },
    registry: { url: env.REGISTRY_URL },
    platform: { url: env.PLATFORM_URL },
    metrics: { url: env.METRICS_URL },
    http: { timeoutMs: env.REQUEST_TIMEOUT_MS },
    coordinator: {
      maxParallelStages: env.MAX_PARALLEL_STAGES,
      failFast: env.FAIL_FAST
    },
    stages: {
      defaultTimeoutMs: env.DEFAULT_STAGE_TIMEOUT_MS,
      retryBaseDelayMs: env.RETRY_BASE_DELAY_MS,
      retryMaxDelayMs: env.RETRY_MAX_DELAY_MS
    },
    healthCheck: {
      intervalMs: env.HEALTH_INTERVAL_MS,
      maxAttempts: env.HEALTH_MAX_ATTEMPTS,
      successThreshold: env.HEALTH_SUCCESS_THRESHOLD
    }
  };
}
