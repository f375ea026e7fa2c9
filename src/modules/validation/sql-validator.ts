import type { StorePool } from '../../core/stores/store.types.js';
import { checkExecution } from './execution-prober.js';
import { checkSafety } from './safety-checker.js';
import { SchemaCatalog, reflectSchema } from './schema-reflector.js';
import { checkSemantics } from './semantic-checker.js';
import { parseSql } from './sql-parser.js';
import type { CheckResult, Dialect, TableMetadata, ValidationStage, Verdict } from './types/validation.types.js';

export interface SqlValidatorOptions {
  /** Name used in log lines. */
  label?: string;
  /** Parser grammar; defaults to the pool's dialect. */
  dialect?: Dialect;
  statementTimeoutMs?: number;
}

/**
 * Gate for generated SQL: Safety, then Semantic, then Execution. The catalog
 * is reflected once at construction and never changes afterwards.
 */
export class SqlValidator {
  readonly catalog: SchemaCatalog;
  readonly dialect: Dialect;
  private readonly label: string;

  private constructor(
    private readonly pool: StorePool,
    readonly tables: readonly TableMetadata[],
    private readonly options: SqlValidatorOptions
  ) {
    this.catalog = new SchemaCatalog(tables);
    this.dialect = options.dialect ?? pool.dialect;
    this.label = options.label ?? pool.dialect;
  }

  /**
   * Reflect the schema and build a validator. Rejects with
   * SchemaUnavailableError when the store cannot be introspected.
   */
  static async create(pool: StorePool, options: SqlValidatorOptions = {}): Promise<SqlValidator> {
    const tables = await reflectSchema(pool);
    return new SqlValidator(pool, tables, options);
  }

  async validate(sql: string): Promise<Verdict> {
    const startedAt = Date.now();
    const outcome = parseSql(sql, this.dialect);

    const stages: Array<[ValidationStage, () => CheckResult | Promise<CheckResult>]> = [
      ['Safety', () => checkSafety(outcome)],
      ['Semantic', () => checkSemantics(outcome, this.catalog)],
      [
        'Execution',
        () => checkExecution(outcome.ok ? outcome.statement.text : sql, this.pool, {
          statementTimeoutMs: this.options.statementTimeoutMs
        })
      ]
    ];

    for (const [stage, run] of stages) {
      const result = await run();
      if (!result.ok) {
        this.log('FAILED', Date.now() - startedAt, `stage=${stage} ${result.reason}`);
        return { passed: false, stage, message: `${stage} failed: ${result.reason}`, code: result.code };
      }
    }

    this.log('PASSED', Date.now() - startedAt, `kind=${outcome.ok ? outcome.statement.kind : 'unknown'}`);
    return { passed: true, stage: 'Execution', message: 'All validations passed' };
  }

  private log(status: string, durationMs: number, details: string): void {
    console.log(
      `[${new Date().toISOString()}] [SQL-VALIDATOR] [DS-${this.label}] [validate] [${status}] ${durationMs}ms ${details}`
    );
  }
}
