import pg from 'pg';
import mysql from 'mysql2/promise';
import type { DataSourceConfig } from '../config/datasources.js';
import { MysqlStore } from './stores/mysql-store.js';
import { PgStore } from './stores/pg-store.js';
import { SqliteStore } from './stores/sqlite-store.js';
import type { StorePool } from './stores/store.types.js';

const { Pool: PoolClass } = pg;

export class ConnectionManager {
  private pools: Map<string, StorePool> = new Map();

  getPool(dataSource: DataSourceConfig): StorePool {
    const existing = this.pools.get(dataSource.id);
    if (existing) {
      return existing;
    }

    const pool = this.createPool(dataSource);
    this.pools.set(dataSource.id, pool);
    return pool;
  }

  async closePool(dataSourceId: string): Promise<void> {
    const pool = this.pools.get(dataSourceId);
    if (pool) {
      try {
        await pool.end();
      } catch (err) {
        console.error(`Error closing pool for data source ${dataSourceId}:`, err);
      } finally {
        this.pools.delete(dataSourceId);
      }
    }
  }

  async closeAll(): Promise<void> {
    await Promise.all(Array.from(this.pools.keys()).map((id) => this.closePool(id)));
  }

  private createPool(dataSource: DataSourceConfig): StorePool {
    switch (dataSource.dialect) {
      case 'sqlite':
        return SqliteStore.open(dataSource.url);

      case 'mysql':
        return new MysqlStore(mysql.createPool(dataSource.url), dataSource.id);

      case 'postgres': {
        const pgPool = new PoolClass({
          connectionString: dataSource.url,
          ssl: dataSource.ssl ? { rejectUnauthorized: false } : undefined,
          max: 10,
          idleTimeoutMillis: 30000,
          connectionTimeoutMillis: 5000
        });

        pgPool.on('error', (err) => {
          console.error(`PG Pool Error for data source ${dataSource.id}:`, err.message);
          void this.closePool(dataSource.id);
        });

        return new PgStore(pgPool, dataSource.id);
      }
    }
  }
}
