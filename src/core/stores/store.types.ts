import type { Dialect } from '../../modules/validation/types/validation.types.js';

export interface QueryRows {
  rows: Record<string, unknown>[];
  fields: Array<{ name: string }>;
  rowCount: number;
}

export interface StoreClient {
  query(sql: string): Promise<QueryRows>;
}

export interface RollbackOptions {
  /** Per-statement limit inside the transaction, where the store supports one. */
  statementTimeoutMs?: number;
}

/**
 * Connection pool for one data source.
 */
export interface StorePool extends StoreClient {
  readonly dialect: Dialect;
  /**
   * Run `work` inside a transaction that is rolled back on every exit path,
   * then hand the connection back (or destroy it if the rollback failed).
   */
  withRollback<T>(work: (client: StoreClient) => Promise<T>, options?: RollbackOptions): Promise<T>;
  end(): Promise<void>;
}

export function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
