import { z } from 'zod';
import type { StorePool } from '../../core/stores/store.types.js';
import type { ColumnMetadata, Dialect, TableMetadata } from './types/validation.types.js';
import { SchemaUnavailableError, errorMessage } from './validation.errors.js';

const RawColumnRowSchema = z.object({
  table_name: z.string(),
  column_name: z.string(),
  data_type: z.string(),
  is_nullable: z.union([z.string(), z.boolean()])
});

const SqliteTableRowSchema = z.object({ name: z.string() });

const SqlitePragmaRowSchema = z.object({
  name: z.string(),
  type: z.string(),
  notnull: z.number()
});

type RawColumnRow = z.infer<typeof RawColumnRowSchema>;

const INFORMATION_SCHEMA_QUERIES: Record<Exclude<Dialect, 'sqlite'>, string> = {
  postgres: `SELECT c.table_name, c.column_name, c.data_type, c.is_nullable
FROM information_schema.columns c
JOIN information_schema.tables t
  ON t.table_schema = c.table_schema AND t.table_name = c.table_name
WHERE t.table_type = 'BASE TABLE'
  AND t.table_schema NOT IN ('pg_catalog', 'information_schema')
ORDER BY c.table_name, c.ordinal_position`,
  mysql: `SELECT c.TABLE_NAME AS table_name, c.COLUMN_NAME AS column_name, c.DATA_TYPE AS data_type, c.IS_NULLABLE AS is_nullable
FROM information_schema.COLUMNS c
JOIN information_schema.TABLES t
  ON t.TABLE_SCHEMA = c.TABLE_SCHEMA AND t.TABLE_NAME = c.TABLE_NAME
WHERE t.TABLE_TYPE = 'BASE TABLE'
  AND c.TABLE_SCHEMA = DATABASE()
ORDER BY c.TABLE_NAME, c.ORDINAL_POSITION`
};

/**
 * Immutable snapshot of known table and column names. Columns are flattened
 * across tables; lookups ignore case.
 */
export class SchemaCatalog {
  readonly tables: ReadonlySet<string>;
  readonly columns: ReadonlySet<string>;
  readonly reflectedAt: Date;

  private readonly tableKeys: ReadonlySet<string>;
  private readonly columnKeys: ReadonlySet<string>;

  constructor(tables: readonly TableMetadata[], reflectedAt = new Date()) {
    this.tables = new Set(tables.map((table) => table.tableName));
    this.columns = new Set(tables.flatMap((table) => table.columns.map((column) => column.columnName)));
    this.tableKeys = new Set(Array.from(this.tables, foldName));
    this.columnKeys = new Set(Array.from(this.columns, foldName));
    this.reflectedAt = reflectedAt;
    Object.freeze(this);
  }

  hasTable(name: string): boolean {
    return this.tableKeys.has(foldName(name));
  }

  hasColumn(name: string): boolean {
    return this.columnKeys.has(foldName(name));
  }
}

export function foldName(name: string): string {
  return name.toLowerCase();
}

function groupColumns(rows: RawColumnRow[]): TableMetadata[] {
  const tableMap = new Map<string, TableMetadata>();

  for (const row of rows) {
    let table = tableMap.get(row.table_name);
    if (!table) {
      table = { tableName: row.table_name, columns: [] };
      tableMap.set(row.table_name, table);
    }

    const column: ColumnMetadata = {
      columnName: row.column_name,
      dataType: row.data_type,
      isNullable: row.is_nullable === 'YES' || row.is_nullable === true
    };
    table.columns.push(column);
  }

  return Array.from(tableMap.values());
}

function quoteSqliteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

async function reflectSqlite(pool: StorePool): Promise<RawColumnRow[]> {
  const tables = await pool.query(
    "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
  );

  const rows: RawColumnRow[] = [];
  for (const tableRow of z.array(SqliteTableRowSchema).parse(tables.rows)) {
    const info = await pool.query(`PRAGMA table_info(${quoteSqliteIdentifier(tableRow.name)})`);
    for (const column of z.array(SqlitePragmaRowSchema).parse(info.rows)) {
      rows.push({
        table_name: tableRow.name,
        column_name: column.name,
        data_type: column.type,
        is_nullable: column.notnull === 0
      });
    }
  }
  return rows;
}

/**
 * Enumerate every base table and its columns. Any failure is fatal:
 * there is no partial result.
 */
export async function reflectSchema(pool: StorePool): Promise<TableMetadata[]> {
  try {
    if (pool.dialect === 'sqlite') {
      return groupColumns(await reflectSqlite(pool));
    }

    const result = await pool.query(INFORMATION_SCHEMA_QUERIES[pool.dialect]);
    return groupColumns(z.array(RawColumnRowSchema).parse(result.rows));
  } catch (error) {
    throw new SchemaUnavailableError(errorMessage(error, 'Schema reflection failed'));
  }
}
