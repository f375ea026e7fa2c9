import type { Response } from 'express';
import { z } from 'zod';
import {
  getUserId,
  logControllerError,
  sendInvalidRequest,
  sendServiceError,
  sendUnauthorized
} from '../../core/controller-helpers.js';
import type { AuthRequest } from '../../middleware/auth.middleware.js';
import type { ValidatorRegistry } from './validator-registry.js';

const ValidateSqlSchema = z.object({
  dataSource: z.string().min(1, 'dataSource is required'),
  // Empty SQL is a Safety failure, reported as a verdict rather than a 400.
  sql: z.string()
});

const RefreshSchema = z.object({
  dataSource: z.string().min(1, 'dataSource is required')
});

type Handler = (req: AuthRequest, res: Response) => Promise<Response | void>;

export interface ValidationController {
  validate: Handler;
  refresh: Handler;
  getStats: Handler;
}

export function createValidationController(registry: ValidatorRegistry): ValidationController {
  /**
   * POST /api/validation/validate
   */
  const validate: Handler = async (req, res) => {
    const userId = getUserId(req);
    if (!userId) return sendUnauthorized(res);

    const validation = ValidateSqlSchema.safeParse(req.body);
    if (!validation.success) return sendInvalidRequest(res, validation.error);

    try {
      const { dataSource, sql } = validation.data;
      const validator = await registry.getValidator(dataSource);
      const verdict = await validator.validate(sql);
      return res.json({ success: true, data: verdict });
    } catch (error) {
      logControllerError('VALIDATION-CONTROLLER', userId, 'validate', error);
      return sendServiceError(res, error, 'Validation failed');
    }
  };

  /**
   * POST /api/validation/refresh
   */
  const refresh: Handler = async (req, res) => {
    const userId = getUserId(req);
    if (!userId) return sendUnauthorized(res);

    const validation = RefreshSchema.safeParse(req.body);
    if (!validation.success) return sendInvalidRequest(res, validation.error);

    try {
      const validator = await registry.refresh(validation.data.dataSource);
      return res.json({
        success: true,
        data: {
          dataSource: validation.data.dataSource,
          tablesCount: validator.catalog.tables.size,
          columnsCount: validator.catalog.columns.size,
          reflectedAt: validator.catalog.reflectedAt.toISOString()
        }
      });
    } catch (error) {
      logControllerError('VALIDATION-CONTROLLER', userId, 'refresh', error);
      return sendServiceError(res, error, 'Schema refresh failed');
    }
  };

  /**
   * GET /api/validation/stats
   */
  const getStats: Handler = async (req, res) => {
    const userId = getUserId(req);
    if (!userId) return sendUnauthorized(res);

    return res.json({ success: true, data: registry.getCacheStats() });
  };

  return { validate, refresh, getStats };
}
