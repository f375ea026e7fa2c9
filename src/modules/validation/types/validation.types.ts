/**
 * SQL dialects the validator can parse and probe.
 */
export type Dialect = 'postgres' | 'mysql' | 'sqlite';

/**
 * Root statement categories produced by the classifier.
 */
export type StatementKind =
  | 'Select'
  | 'Insert'
  | 'Update'
  | 'Delete'
  | 'Create'
  | 'Alter'
  | 'Drop'
  | 'Truncate'
  | 'Rename'
  | 'Other';

/**
 * Statement kinds that alter schema objects.
 */
export type DefinitionKind = 'Create' | 'Alter' | 'Drop' | 'Truncate' | 'Rename';

/**
 * Statement kinds that change stored rows.
 */
export type MutationKind = 'Insert' | 'Update' | 'Delete';

/**
 * Pipeline stages, in the order they run.
 */
export type ValidationStage = 'Safety' | 'Semantic' | 'Execution';

/**
 * Failure taxonomy shared by verdicts and thrown errors.
 */
export type ValidationErrorCode =
  | 'PARSE_ERROR'
  | 'SAFETY_VIOLATION'
  | 'SCHEMA_MISMATCH'
  | 'EXECUTION_ERROR'
  | 'SCHEMA_UNAVAILABLE';

/**
 * Outcome of a single stage check.
 */
export type CheckResult =
  | { ok: true; reason: string }
  | { ok: false; reason: string; code: ValidationErrorCode };

/**
 * Result of one full validation run.
 */
export type Verdict =
  | { passed: true; stage: 'Execution'; message: string }
  | { passed: false; stage: ValidationStage; message: string; code: ValidationErrorCode };

/**
 * Table metadata reflected from the live store.
 */
export interface TableMetadata {
  tableName: string;
  columns: ColumnMetadata[];
}

/**
 * Column-level metadata reflected from the live store.
 */
export interface ColumnMetadata {
  columnName: string;
  dataType: string;
  isNullable: boolean;
}

/**
 * Names a query reads, split by how the query introduced them.
 */
export interface ReferenceSets {
  selectAliases: Set<string>;
  cteNames: Set<string>;
  cteColumns: Set<string>;
  usedTables: Set<string>;
  realColumns: Set<string>;
}
