import { readFileSync } from 'node:fs';
import { z } from 'zod';

const DataSourceSchema = z.object({
  id: z.string().regex(/^[a-zA-Z0-9_-]+$/, 'Data source id may only contain letters, digits, "_" and "-"'),
  label: z.string().min(1).optional(),
  dialect: z.enum(['postgres', 'mysql', 'sqlite']),
  url: z.string().min(1, 'Data source url is required'),
  ssl: z.boolean().default(false),
  description: z.string().optional()
});

const DataSourceFileSchema = z.object({
  dataSources: z.array(DataSourceSchema).min(1, 'At least one data source must be configured')
});

export type DataSourceConfig = z.infer<typeof DataSourceSchema>;

export type DataSourceMap = ReadonlyMap<string, DataSourceConfig>;

/**
 * Validate a parsed data-source document into a map keyed by id.
 */
export function parseDataSources(raw: unknown): DataSourceMap {
  const parsed = DataSourceFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new Error(`Invalid data source configuration: ${details.join(', ')}`);
  }

  const dataSources = new Map<string, DataSourceConfig>();
  for (const dataSource of parsed.data.dataSources) {
    if (dataSources.has(dataSource.id)) {
      throw new Error(`Invalid data source configuration: duplicate id '${dataSource.id}'`);
    }
    dataSources.set(dataSource.id, dataSource);
  }
  return dataSources;
}

export function loadDataSources(filePath: string): DataSourceMap {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to read data source configuration at ${filePath}: ${message}`);
  }
  return parseDataSources(raw);
}
