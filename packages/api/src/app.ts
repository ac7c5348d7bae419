import express from 'express';
import type { ErrorRequestHandler, Express } from 'express';
import cors from 'cors';
import { AppConfig } from './config/config.js';
import { authenticate } from './middleware/auth.middleware.js';
import { createPipelineRouter } from './routes/pipelines.js';
import { createRunRouter } from './routes/runs.js';
import { Services } from './services/index.js';
import {
  AmbiguousArtifactError,
  AuthenticationError,
  DefinitionInvalidError,
  LedgerConflictError,
  NotFoundError,
  ValidationError
} from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('Api');

const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof ValidationError || err instanceof DefinitionInvalidError) {
    res.status(400).json({ error: err.message, code: err.code });
    return;
  }
  if (err instanceof AuthenticationError) {
    res.status(401).json({ error: err.message, code: err.code });
    return;
  }
  if (err instanceof NotFoundError) {
    res.status(404).json({ error: err.message, code: err.code });
    return;
  }
  if (err instanceof LedgerConflictError || err instanceof AmbiguousArtifactError) {
    res.status(409).json({ error: err.message, code: err.code });
    return;
  }
  // malformed JSON rejected by express.json()
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Malformed JSON body', code: 'VALIDATION_ERROR' });
    return;
  }

  logger.error(`Unhandled error on ${req.method} ${req.originalUrl}`, err);
  res.status(500).json({ error: 'Internal server error' });
};

export function createApp(config: AppConfig, services: Services): Express {
  const app = express();

  app.use(cors({ origin: config.cors.origin, methods: config.cors.methods, allowedHeaders: config.cors.allowedHeaders }));
  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', activeRuns: services.coordinator.listActiveRuns().length });
  });

  app.use('/api', authenticate(config.jwt.secret));
  app.use('/api/pipelines', createPipelineRouter(services));
  app.use('/api/runs', createRunRouter(services));

  app.use(errorHandler);
  return app;
}
