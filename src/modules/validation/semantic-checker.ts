import type { SelectNode, StatementNode } from './sql-ast.js';
import { findAll, hasAncestor, isKind } from './sql-ast.js';
import type { ParseOutcome } from './sql-parser.js';
import { describeParseError } from './sql-parser.js';
import type { SchemaCatalog } from './schema-reflector.js';
import { foldName } from './schema-reflector.js';
import type { CheckResult, ReferenceSets } from './types/validation.types.js';

function aliasesOf(select: SelectNode | null): string[] {
  if (!select) return [];
  return select.projections.filter(isKind('Alias')).map((alias) => alias.name);
}

function memberOf(names: Set<string>): (name: string) => boolean {
  const keys = new Set(Array.from(names, foldName));
  return (name) => keys.has(foldName(name));
}

/**
 * Split every identifier in the statement into query-local names (aliases,
 * CTEs and their output columns) and references to stored tables and columns.
 */
export function collectReferences(root: StatementNode): ReferenceSets {
  const cteNames = new Set<string>();
  const cteColumns = new Set<string>();
  for (const { node: cte } of findAll(root, isKind('Cte'))) {
    cteNames.add(cte.name);
    for (const column of [...cte.columns, ...aliasesOf(cte.body)]) {
      cteColumns.add(column);
    }
  }

  const selectAliases = new Set<string>();
  for (const { node: select } of findAll(root, isKind('Select'))) {
    for (const alias of aliasesOf(select)) {
      selectAliases.add(alias);
    }
  }

  const isAlias = memberOf(selectAliases);
  const isCteColumn = memberOf(cteColumns);
  const realColumns = new Set<string>();
  for (const match of findAll(root, isKind('Column'))) {
    const column = match.node;
    if (column.name === '*') continue;
    if (isAlias(column.name) || isCteColumn(column.name)) continue;
    if (column.alias) continue;
    if (hasAncestor(match, 'Alias')) continue;
    realColumns.add(column.name);
  }

  const isCte = memberOf(cteNames);
  const usedTables = new Set<string>();
  for (const { node: table } of findAll(root, isKind('Table'))) {
    if (!isCte(table.name)) {
      usedTables.add(table.name);
    }
  }

  return { selectAliases, cteNames, cteColumns, usedTables, realColumns };
}

/**
 * Every real table and column the statement reads must exist in the catalog.
 */
export function checkSemantics(outcome: ParseOutcome, catalog: SchemaCatalog): CheckResult {
  if (!outcome.ok) {
    if (outcome.error.kind === 'Empty') {
      return { ok: false, reason: 'Semantic: Parse failed', code: 'PARSE_ERROR' };
    }
    return { ok: false, reason: `Semantic error: ${describeParseError(outcome.error)}`, code: 'PARSE_ERROR' };
  }

  const references = outcome.statement.statements.map((statement) => collectReferences(statement));
  const missingTables = new Set<string>();
  const missingColumns = new Set<string>();

  for (const { usedTables, realColumns } of references) {
    for (const table of usedTables) {
      if (!catalog.hasTable(table)) missingTables.add(table);
    }
    for (const column of realColumns) {
      if (!catalog.hasColumn(column)) missingColumns.add(column);
    }
  }

  const problems: string[] = [];
  if (missingTables.size) {
    problems.push(`Missing tables: ${Array.from(missingTables).sort().join(', ')}`);
  }
  if (missingColumns.size) {
    problems.push(`Missing columns: ${Array.from(missingColumns).sort().join(', ')}`);
  }

  if (problems.length) {
    return { ok: false, reason: problems.join('; '), code: 'SCHEMA_MISMATCH' };
  }
  return { ok: true, reason: 'Schema valid' };
}
