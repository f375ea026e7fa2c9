/**
 * Dialect-aware SQL parsing. node-sql-parser produces a loosely typed JSON
 * tree; it is normalised here into the tagged-variant AST of sql-ast.ts so the
 * checkers never touch parser-specific shapes.
 */

import pkg from 'node-sql-parser';
import type {
  AliasNode,
  CteNode,
  DefinitionNode,
  ExpressionNode,
  SelectNode,
  SqlNode,
  StatementNode,
  TableNode
} from './sql-ast.js';
import { isKind, statementKindOf } from './sql-ast.js';
import type { Dialect, StatementKind } from './types/validation.types.js';

const { Parser } = pkg;
const parser = new Parser();

const PARSER_DATABASE: Record<Dialect, string> = {
  postgres: 'postgresql',
  mysql: 'mysql',
  sqlite: 'sqlite'
};

const STATEMENT_TYPES: Record<string, Exclude<StatementNode['kind'], 'Command' | 'Select'>> = {
  insert: 'Insert',
  replace: 'Insert',
  update: 'Update',
  delete: 'Delete',
  create: 'Create',
  alter: 'Alter',
  drop: 'Drop',
  truncate: 'Truncate',
  rename: 'Rename'
};

export interface ParsedStatement {
  dialect: Dialect;
  /** Input with surrounding whitespace and trailing semicolons removed. */
  text: string;
  root: StatementNode;
  kind: StatementKind;
  statements: StatementNode[];
}

export type SqlParseError = { kind: 'Empty'; sql: string } | { kind: 'Syntax'; sql: string; detail: string };

export type ParseOutcome = { ok: true; statement: ParsedStatement } | { ok: false; error: SqlParseError };

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Identifiers arrive as plain strings or, in newer grammars, wrapped as
 * `{ expr: { type: 'default', value } }` / `{ type: 'default', value }`.
 */
function identifierText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (!isRecord(value)) return null;
  if (typeof value.value === 'string') return value.value;
  if ('expr' in value) return identifierText(value.expr);
  if ('column' in value) return identifierText(value.column);
  return null;
}

function normalizeAll(values: unknown[]): SqlNode[] {
  return values.flatMap((value) => normalize(value));
}

function normalizeFields(record: JsonRecord, skip: readonly string[]): SqlNode[] {
  return normalizeAll(
    Object.entries(record)
      .filter(([key]) => !skip.includes(key))
      .map(([, value]) => value)
  );
}

function normalizeProjection(item: unknown): SqlNode[] {
  if (!isRecord(item) || !('expr' in item)) return normalize(item);

  const alias = identifierText(item.as);
  const expression = normalize(item.expr);
  if (!alias) return expression;

  const node: AliasNode = { kind: 'Alias', name: alias, children: expression };
  return [node];
}

function normalizeCte(item: unknown): CteNode[] {
  if (!isRecord(item)) return [];
  const name = identifierText(item.name);
  if (!name) return [];

  const children = normalize(item.stmt);
  const columns = Array.isArray(item.columns)
    ? item.columns.map((column) => identifierText(column)).filter((column): column is string => column !== null)
    : [];

  return [
    {
      kind: 'Cte',
      name,
      columns,
      body: children.find(isKind('Select')) ?? null,
      children
    }
  ];
}

/**
 * `SELECT ... INTO` writes a table, variable or server file. An absent clause
 * still arrives as `{ position: null }`.
 */
function normalizeInto(value: unknown): DefinitionNode[] {
  if (!isRecord(value)) return [];
  if ((value.type === undefined || value.type === null) && (value.expr === undefined || value.expr === null)) {
    return [];
  }
  return [{ kind: 'Create', children: normalizeFields(value, ['type']) }];
}

function normalizeSelect(record: JsonRecord): SelectNode {
  const ctes = Array.isArray(record.with) ? record.with.flatMap((item) => normalizeCte(item)) : [];
  const projections = Array.isArray(record.columns) ? record.columns.flatMap((item) => normalizeProjection(item)) : [];
  const into = normalizeInto(record.into);
  const rest = normalizeFields(record, ['with', 'columns', 'into']);

  return { kind: 'Select', projections, children: [...ctes, ...projections, ...into, ...rest] };
}

function normalizeTable(record: JsonRecord, name: string): TableNode {
  return {
    kind: 'Table',
    name,
    schema: identifierText(record.db) ?? identifierText(record.schema),
    alias: identifierText(record.as),
    children: normalizeFields(record, ['table', 'db', 'schema', 'as'])
  };
}

function normalize(value: unknown): SqlNode[] {
  if (Array.isArray(value)) return normalizeAll(value);
  if (!isRecord(value)) return [];

  const type = typeof value.type === 'string' ? value.type.toLowerCase() : null;

  if (type === 'select') return [normalizeSelect(value)];

  if (type && Object.hasOwn(STATEMENT_TYPES, type)) {
    const kind = STATEMENT_TYPES[type];
    return [{ kind, children: normalizeFields(value, ['type']) }];
  }

  if (type === 'column_ref') {
    const name = identifierText(value.column);
    if (!name) return [];
    return [{ kind: 'Column', name, table: identifierText(value.table), alias: null, children: [] }];
  }

  const tableName = type === null || type === 'table' ? identifierText(value.table) : null;
  if (tableName) {
    return [normalizeTable(value, tableName)];
  }

  const children = normalizeFields(value, ['type']);
  if (!type) return children;

  const node: ExpressionNode = { kind: 'Expression', type, children };
  return [node];
}

function isStatementNode(node: SqlNode): node is StatementNode {
  switch (node.kind) {
    case 'Select':
    case 'Insert':
    case 'Update':
    case 'Delete':
    case 'Create':
    case 'Alter':
    case 'Drop':
    case 'Truncate':
    case 'Rename':
    case 'Command':
      return true;
    default:
      return false;
  }
}

function toStatement(value: unknown): StatementNode {
  const nodes = normalize(value);
  const [first] = nodes;
  if (nodes.length === 1 && first && isStatementNode(first)) return first;

  const command = isRecord(value) && typeof value.type === 'string' ? value.type.toLowerCase() : 'unknown';
  return { kind: 'Command', command, children: nodes };
}

/**
 * Parse raw SQL for the given dialect. Never throws.
 */
export function parseSql(sql: string, dialect: Dialect): ParseOutcome {
  const text = sql.trim().replace(/;+\s*$/, '').trim();
  if (!text) {
    return { ok: false, error: { kind: 'Empty', sql } };
  }

  let raw: unknown;
  try {
    raw = parser.astify(text, { database: PARSER_DATABASE[dialect] });
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return { ok: false, error: { kind: 'Syntax', sql, detail } };
  }

  const items: unknown[] = Array.isArray(raw) ? raw : [raw];
  const statements = items.filter((item) => item !== null && item !== undefined).map((item) => toStatement(item));
  const [root] = statements;
  if (!root) {
    return { ok: false, error: { kind: 'Empty', sql } };
  }

  return {
    ok: true,
    statement: { dialect, text, root, kind: statementKindOf(root), statements }
  };
}

export function describeParseError(error: SqlParseError): string {
  return error.kind === 'Empty' ? 'empty statement' : error.detail;
}
