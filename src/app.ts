import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { rateLimit } from 'express-rate-limit';
import { errorMiddleware } from './middleware/error.middleware.js';
import { createDataSourceRouter } from './modules/datasource/datasource.routes.js';
import { createQueryRouter } from './modules/query/query.routes.js';
import { QueryService } from './modules/query/query.service.js';
import { createValidationRouter } from './modules/validation/validation.routes.js';
import type { ValidatorRegistry } from './modules/validation/validator-registry.js';

export interface AppOptions {
  registry: ValidatorRegistry;
  corsOrigin: string;
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
}

export function createApp(options: AppOptions): Express {
  const app = express();
  const queryService = new QueryService(options.registry);

  // 1. Security headers
  app.use(helmet());

  // 2. CORS
  app.use(cors({
    origin: options.corsOrigin,
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: true
  }));

  app.use(express.json());

  // 3. Every API route shares one limiter
  app.use('/api', rateLimit({
    windowMs: options.rateLimit.windowMs,
    limit: options.rateLimit.maxRequests,
    standardHeaders: 'draft-7',
    legacyHeaders: false,
    message: { success: false, error: 'Too many requests', details: 'Rate limit exceeded, try again later' }
  }));

  // Routes
  app.use('/api/datasources', createDataSourceRouter(options.registry));
  app.use('/api/validation', createValidationRouter(options.registry));
  app.use('/api/query', createQueryRouter(queryService));

  // Error middleware MUST be the last one added
  app.use(errorMiddleware);

  return app;
}
