import { Router } from 'express';
import { authenticate } from '../../middleware/auth.middleware.js';
import { createQueryController } from './query.controller.js';
import type { QueryService } from './query.service.js';

export function createQueryRouter(queryService: QueryService): Router {
  const router = Router();
  const { runUserQuery, getSchema } = createQueryController(queryService);

  // Endpoint: POST /api/query/execute
  // Purpose: Validates, then runs SQL against the chosen data source
  router.post('/execute', authenticate, runUserQuery);

  // Endpoint: GET /api/query/schema?dataSource=<id>
  // Purpose: Reflected table metadata for the data source
  router.get('/schema', authenticate, getSchema);

  return router;
}
