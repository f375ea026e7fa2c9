import { Router } from 'express';
import { authenticate } from '../../middleware/auth.middleware.js';
import type { ValidatorRegistry } from '../validation/validator-registry.js';
import { createListDataSources } from './datasource.controller.js';

export function createDataSourceRouter(registry: ValidatorRegistry): Router {
  const router = Router();

  // GET /api/datasources
  router.get('/', authenticate, createListDataSources(registry));

  return router;
}
