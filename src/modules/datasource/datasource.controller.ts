import type { Response } from 'express';
import { getUserId, sendUnauthorized } from '../../core/controller-helpers.js';
import type { AuthRequest } from '../../middleware/auth.middleware.js';
import type { DataSourceSummary } from '../../types/index.js';
import type { ValidatorRegistry } from '../validation/validator-registry.js';

export function createListDataSources(registry: ValidatorRegistry) {
  /**
   * GET /api/datasources
   * Connection urls never leave the server.
   */
  return async (req: AuthRequest, res: Response): Promise<Response> => {
    const userId = getUserId(req);
    if (!userId) return sendUnauthorized(res);

    const dataSources: DataSourceSummary[] = registry.listDataSources().map((dataSource) => ({
      id: dataSource.id,
      label: dataSource.label ?? dataSource.id,
      dialect: dataSource.dialect,
      ...(dataSource.description !== undefined && { description: dataSource.description })
    }));

    return res.json({ success: true, data: dataSources });
  };
}
