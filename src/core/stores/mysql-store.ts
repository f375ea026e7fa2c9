import type { QueryRows, RollbackOptions, StoreClient, StorePool } from './store.types.js';
import { isRow } from './store.types.js';

type MysqlQueryResult = [unknown, Array<{ name: string }> | undefined];

export interface MysqlConnectionLike {
  query(sql: string): Promise<MysqlQueryResult>;
  release(): void;
  destroy(): void;
}

/**
 * The slice of a mysql2/promise `Pool` the store relies on.
 */
export interface MysqlPoolLike {
  query(sql: string): Promise<MysqlQueryResult>;
  getConnection(): Promise<MysqlConnectionLike>;
  end(): Promise<void>;
}

// SELECTs return row arrays; other statements return a ResultSetHeader.
function toQueryRows([result, fields]: MysqlQueryResult): QueryRows {
  if (Array.isArray(result)) {
    const rows = result.filter(isRow);
    return { rows, fields: (fields ?? []).map((field) => ({ name: field.name })), rowCount: rows.length };
  }

  const affectedRows = isRow(result) && typeof result.affectedRows === 'number' ? result.affectedRows : 0;
  return { rows: [], fields: [], rowCount: affectedRows };
}

export class MysqlStore implements StorePool {
  readonly dialect = 'mysql' as const;

  constructor(
    private readonly pool: MysqlPoolLike,
    private readonly label = 'mysql'
  ) {}

  async query(sql: string): Promise<QueryRows> {
    return toQueryRows(await this.pool.query(sql));
  }

  async withRollback<T>(work: (client: StoreClient) => Promise<T>, options: RollbackOptions = {}): Promise<T> {
    const connection = await this.pool.getConnection();
    const timeoutMs = options.statementTimeoutMs && options.statementTimeoutMs > 0 ? Math.trunc(options.statementTimeoutMs) : 0;
    try {
      if (timeoutMs) {
        await connection.query(`SET SESSION max_execution_time = ${timeoutMs}`);
      }
      await connection.query('START TRANSACTION');
      return await work({ query: async (sql) => toQueryRows(await connection.query(sql)) });
    } finally {
      await this.rollbackAndRelease(connection, timeoutMs > 0);
    }
  }

  async end(): Promise<void> {
    await this.pool.end();
  }

  /**
   * The session timeout is reset before the connection goes back to the pool,
   * so it never applies to ordinary queries.
   */
  private async rollbackAndRelease(connection: MysqlConnectionLike, resetTimeout: boolean): Promise<void> {
    try {
      await connection.query('ROLLBACK');
      if (resetTimeout) {
        await connection.query('SET SESSION max_execution_time = DEFAULT');
      }
      connection.release();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`MySQL rollback failed for ${this.label}; discarding connection:`, message);
      connection.destroy();
    }
  }
}
