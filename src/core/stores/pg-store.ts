import type { QueryRows, RollbackOptions, StoreClient, StorePool } from './store.types.js';
import { isRow } from './store.types.js';

interface PgQueryResult {
  rows: unknown[];
  fields?: Array<{ name: string }>;
  rowCount: number | null;
}

export interface PgClientLike {
  query(text: string): Promise<PgQueryResult>;
  release(err?: Error | boolean): void;
}

/**
 * The slice of `pg.Pool` the store relies on.
 */
export interface PgPoolLike {
  connect(): Promise<PgClientLike>;
  query(text: string): Promise<PgQueryResult>;
  end(): Promise<void>;
}

function toQueryRows(result: PgQueryResult): QueryRows {
  const rows = result.rows.filter(isRow);
  return {
    rows,
    fields: (result.fields ?? []).map((field) => ({ name: field.name })),
    rowCount: result.rowCount ?? rows.length
  };
}

export class PgStore implements StorePool {
  readonly dialect = 'postgres' as const;

  constructor(
    private readonly pool: PgPoolLike,
    private readonly label = 'postgres'
  ) {}

  async query(sql: string): Promise<QueryRows> {
    return toQueryRows(await this.pool.query(sql));
  }

  async withRollback<T>(work: (client: StoreClient) => Promise<T>, options: RollbackOptions = {}): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      if (options.statementTimeoutMs && options.statementTimeoutMs > 0) {
        await client.query(`SET LOCAL statement_timeout = ${Math.trunc(options.statementTimeoutMs)}`);
      }
      return await work({ query: async (sql) => toQueryRows(await client.query(sql)) });
    } finally {
      await this.rollbackAndRelease(client);
    }
  }

  async end(): Promise<void> {
    await this.pool.end();
  }

  private async rollbackAndRelease(client: PgClientLike): Promise<void> {
    try {
      await client.query('ROLLBACK');
      client.release();
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error));
      console.error(`PG rollback failed for ${this.label}; discarding connection:`, failure.message);
      // Passing the error makes pg destroy the connection, which aborts the transaction server-side.
      client.release(failure);
    }
  }
}
