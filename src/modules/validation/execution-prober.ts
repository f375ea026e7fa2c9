import type { StorePool } from '../../core/stores/store.types.js';
import type { CheckResult } from './types/validation.types.js';
import { errorMessage } from './validation.errors.js';

export interface ProbeOptions {
  statementTimeoutMs?: number;
}

/**
 * Run the statement inside a transaction that is always rolled back and
 * report the store's own error text on failure.
 */
export async function checkExecution(sql: string, pool: StorePool, options: ProbeOptions = {}): Promise<CheckResult> {
  try {
    await pool.withRollback((client) => client.query(sql), { statementTimeoutMs: options.statementTimeoutMs });
    return { ok: true, reason: 'Executed successfully' };
  } catch (error) {
    return { ok: false, reason: `Runtime error: ${errorMessage(error)}`, code: 'EXECUTION_ERROR' };
  }
}
