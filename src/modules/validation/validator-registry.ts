import NodeCache from 'node-cache';
import type { DataSourceConfig, DataSourceMap } from '../../config/datasources.js';
import type { StorePool } from '../../core/stores/store.types.js';
import { SqlValidator } from './sql-validator.js';
import { DataSourceNotFoundError, SchemaUnavailableError, errorMessage } from './validation.errors.js';

export interface PoolProvider {
  getPool(dataSource: DataSourceConfig): StorePool;
}

export interface ValidatorRegistryOptions {
  /** Seconds before a catalog is re-reflected; 0 keeps it until refreshed. */
  cacheTtlSeconds: number;
  statementTimeoutMs?: number;
}

interface RegistryCacheStats {
  cachedValidators: number;
  hits: number;
  misses: number;
  refreshes: number;
}

/**
 * One validator per data source. A validator owns an immutable catalog, so
 * refreshing builds a new validator and swaps the cache entry; validations
 * already holding the old one finish against the old catalog.
 */
export class ValidatorRegistry {
  private readonly cache: NodeCache;
  private readonly pending = new Map<string, Promise<SqlValidator>>();
  private hits = 0;
  private misses = 0;
  private refreshes = 0;

  constructor(
    private readonly dataSources: DataSourceMap,
    private readonly pools: PoolProvider,
    private readonly options: ValidatorRegistryOptions
  ) {
    // Validators hold live pools and must not be cloned.
    this.cache = new NodeCache({ stdTTL: options.cacheTtlSeconds, checkperiod: 300, useClones: false });
  }

  listDataSources(): DataSourceConfig[] {
    return Array.from(this.dataSources.values());
  }

  getDataSource(dataSourceId: string): DataSourceConfig {
    const dataSource = this.dataSources.get(dataSourceId);
    if (!dataSource) {
      throw new DataSourceNotFoundError(dataSourceId);
    }
    return dataSource;
  }

  getPool(dataSourceId: string): StorePool {
    return this.pools.getPool(this.getDataSource(dataSourceId));
  }

  async getValidator(dataSourceId: string): Promise<SqlValidator> {
    const dataSource = this.getDataSource(dataSourceId);
    const cached = this.cache.get<SqlValidator>(this.getCacheKey(dataSourceId));
    if (cached) {
      this.hits += 1;
      return cached;
    }

    this.misses += 1;
    return this.build(dataSource);
  }

  /**
   * Re-reflect the schema for a data source and replace its validator.
   */
  async refresh(dataSourceId: string): Promise<SqlValidator> {
    const dataSource = this.getDataSource(dataSourceId);
    this.refreshes += 1;
    return this.build(dataSource, true);
  }

  getCacheStats(): RegistryCacheStats {
    return {
      cachedValidators: this.cache.keys().length,
      hits: this.hits,
      misses: this.misses,
      refreshes: this.refreshes
    };
  }

  close(): void {
    this.cache.close();
  }

  private async build(dataSource: DataSourceConfig, force = false): Promise<SqlValidator> {
    const inFlight = this.pending.get(dataSource.id);
    if (inFlight && !force) {
      return inFlight;
    }

    const creation = this.createValidator(dataSource);
    this.pending.set(dataSource.id, creation);

    try {
      const validator = await creation;
      // A refresh started meanwhile owns the slot; its newer catalog must stay cached.
      if (this.pending.get(dataSource.id) === creation) {
        this.cache.set(this.getCacheKey(dataSource.id), validator);
      }
      this.log(dataSource.id, 'reflect', 'SUCCESS', `Tables:${validator.catalog.tables.size}`);
      return validator;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown reflection error';
      this.log(dataSource.id, 'reflect', 'ERROR', message);
      throw error;
    } finally {
      if (this.pending.get(dataSource.id) === creation) {
        this.pending.delete(dataSource.id);
      }
    }
  }

  private async createValidator(dataSource: DataSourceConfig): Promise<SqlValidator> {
    let pool: StorePool;
    try {
      pool = this.pools.getPool(dataSource);
    } catch (error) {
      throw new SchemaUnavailableError(errorMessage(error, 'Unable to open data source'));
    }

    return SqlValidator.create(pool, {
      label: dataSource.id,
      dialect: dataSource.dialect,
      statementTimeoutMs: this.options.statementTimeoutMs
    });
  }

  private getCacheKey(dataSourceId: string): string {
    return `validator:${dataSourceId}`;
  }

  private log(dataSourceId: string, operation: string, status: string, details: string): void {
    console.log(`[${new Date().toISOString()}] [VALIDATOR-REGISTRY] [DS-${dataSourceId}] [${operation}] [${status}] ${details}`);
  }
}
