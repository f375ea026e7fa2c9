import type { QueryRows } from '../../core/stores/store.types.js';
import type { QueryResult, ResultFormat } from '../../types/index.js';
import type { TableMetadata } from '../validation/types/validation.types.js';
import { QueryRejectedError } from '../validation/validation.errors.js';
import type { ValidatorRegistry } from '../validation/validator-registry.js';

export interface SchemaResponse {
  dataSource: string;
  tables: readonly TableMetadata[];
  reflectedAt: string;
}

function formatResult(result: QueryRows, format: ResultFormat): QueryResult {
  if (format === 'json') {
    return { type: 'json', data: result.rows, rowCount: result.rowCount };
  }

  const columns = result.fields.length ? result.fields.map((field) => field.name) : Object.keys(result.rows[0] ?? {});
  return {
    type: 'table',
    columns,
    rows: result.rows.map((row) => columns.map((column) => row[column] ?? null)),
    rowCount: result.rowCount
  };
}

/**
 * Runs SQL against a data source only after the validator has passed it.
 */
export class QueryService {
  constructor(private readonly registry: ValidatorRegistry) {}

  async executeQuery(dataSourceId: string, sql: string, format: ResultFormat = 'table'): Promise<QueryResult> {
    const validator = await this.registry.getValidator(dataSourceId);
    const verdict = await validator.validate(sql);
    if (!verdict.passed) {
      throw new QueryRejectedError(verdict);
    }

    const result = await this.registry.getPool(dataSourceId).query(sql);
    return formatResult(result, format);
  }

  async getSchema(dataSourceId: string): Promise<SchemaResponse> {
    const validator = await this.registry.getValidator(dataSourceId);
    return {
      dataSource: dataSourceId,
      tables: validator.tables,
      reflectedAt: validator.catalog.reflectedAt.toISOString()
    };
  }
}
