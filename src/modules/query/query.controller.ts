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
import type { QueryService } from './query.service.js';

const ExecuteQuerySchema = z.object({
  dataSource: z.string().min(1, 'dataSource is required'),
  sql: z.string().trim().min(1, 'SQL query cannot be empty'),
  format: z.enum(['table', 'json']).default('table')
});

const SchemaQuerySchema = z.object({
  dataSource: z.string().min(1, 'dataSource query parameter is required')
});

export function createQueryController(queryService: QueryService) {
  /**
   * Executes SQL against a data source once it has passed validation.
   */
  const runUserQuery = async (req: AuthRequest, res: Response): Promise<Response> => {
    const userId = getUserId(req);
    if (!userId) return sendUnauthorized(res);

    const validation = ExecuteQuerySchema.safeParse(req.body);
    if (!validation.success) return sendInvalidRequest(res, validation.error);

    try {
      const { dataSource, sql, format } = validation.data;
      const results = await queryService.executeQuery(dataSource, sql, format);
      return res.json({ success: true, data: results });
    } catch (error) {
      logControllerError('QUERY-CONTROLLER', userId, 'execute', error);
      return sendServiceError(res, error, 'Query execution failed');
    }
  };

  /**
   * Reflected tables and columns for a data source.
   */
  const getSchema = async (req: AuthRequest, res: Response): Promise<Response> => {
    const userId = getUserId(req);
    if (!userId) return sendUnauthorized(res);

    const validation = SchemaQuerySchema.safeParse(req.query);
    if (!validation.success) return sendInvalidRequest(res, validation.error);

    try {
      const schema = await queryService.getSchema(validation.data.dataSource);
      return res.json({ success: true, data: schema });
    } catch (error) {
      logControllerError('QUERY-CONTROLLER', userId, 'schema', error);
      return sendServiceError(res, error, 'Schema fetch failed');
    }
  };

  return { runUserQuery, getSchema };
}
