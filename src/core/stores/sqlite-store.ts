import Database from 'better-sqlite3';
import type { QueryRows, StoreClient, StorePool } from './store.types.js';
import { isRow } from './store.types.js';

/**
 * better-sqlite3 is synchronous and a handle holds at most one transaction,
 * so every use of the handle goes through a single in-process lock. SQLite
 * has no per-statement timeout, so `statementTimeoutMs` is not applied here.
 */
export class SqliteStore implements StorePool {
  readonly dialect = 'sqlite' as const;

  private lock: Promise<void> = Promise.resolve();

  constructor(private readonly db: Database.Database) {}

  static open(filename: string): SqliteStore {
    return new SqliteStore(new Database(filename, { fileMustExist: filename !== ':memory:' }));
  }

  async query(sql: string): Promise<QueryRows> {
    return this.exclusive(async () => this.run(sql));
  }

  async withRollback<T>(work: (client: StoreClient) => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      this.db.exec('BEGIN');
      try {
        return await work({ query: async (sql) => this.run(sql) });
      } finally {
        // A failing statement can end the transaction on its own.
        if (this.db.inTransaction) {
          this.db.exec('ROLLBACK');
        }
      }
    });
  }

  async end(): Promise<void> {
    await this.exclusive(async () => {
      this.db.close();
    });
  }

  private run(sql: string): QueryRows {
    const statement = this.db.prepare(sql);
    if (statement.reader) {
      const rows = statement.all().filter(isRow);
      return {
        rows,
        fields: statement.columns().map((column) => ({ name: column.name })),
        rowCount: rows.length
      };
    }

    const info = statement.run();
    return { rows: [], fields: [], rowCount: info.changes };
  }

  private async exclusive<T>(work: () => Promise<T>): Promise<T> {
    const previous = this.lock;
    let unlock: () => void = () => undefined;
    this.lock = new Promise<void>((resolve) => {
      unlock = resolve;
    });

    await previous;
    try {
      return await work();
    } finally {
      unlock();
    }
  }
}
