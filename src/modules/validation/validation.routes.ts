import { Router } from 'express';
import { authenticate } from '../../middleware/auth.middleware.js';
import { createValidationController } from './validation.controller.js';
import type { ValidatorRegistry } from './validator-registry.js';

export function createValidationRouter(registry: ValidatorRegistry): Router {
  const router = Router();
  const controller = createValidationController(registry);

  /**
   * POST /api/validation/validate
   * Run Safety, Semantic and Execution checks on a SQL string.
   */
  router.post('/validate', authenticate, controller.validate);

  /**
   * POST /api/validation/refresh
   * Re-reflect a data source's schema.
   */
  router.post('/refresh', authenticate, controller.refresh);

  /**
   * GET /api/validation/stats
   * Validator cache metrics.
   */
  router.get('/stats', authenticate, controller.getStats);

  return router;
}
