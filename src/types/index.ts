export type ResultFormat = 'table' | 'json';

export interface QueryResult {
  type: ResultFormat;
  data?: Record<string, unknown>[];      // For JSON format
  columns?: string[]; // For Table format
  rows?: unknown[][];       // For Table format
  rowCount?: number | null;
}

export interface DataSourceSummary {
  id: string;
  label: string;
  dialect: string;
  description?: string;
}

export interface JwtPayload {
  userId: string;
}
