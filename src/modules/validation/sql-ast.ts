import type { DefinitionKind, MutationKind, StatementKind } from './types/validation.types.js';

interface NodeBase {
  children: SqlNode[];
}

export interface SelectNode extends NodeBase {
  kind: 'Select';
  /** Select-list items; aliased items are wrapped in an AliasNode. */
  projections: SqlNode[];
}

export interface MutationNode extends NodeBase {
  kind: MutationKind;
}

export interface DefinitionNode extends NodeBase {
  kind: DefinitionKind;
}

/**
 * Any other top-level statement (SHOW, SET, USE, GRANT...).
 */
export interface CommandNode extends NodeBase {
  kind: 'Command';
  command: string;
}

export interface CteNode extends NodeBase {
  kind: 'Cte';
  name: string;
  /** Explicit column list, as in `WITH c(a, b) AS (...)`. */
  columns: string[];
  body: SelectNode | null;
}

export interface AliasNode extends NodeBase {
  kind: 'Alias';
  name: string;
}

export interface ColumnNode extends NodeBase {
  kind: 'Column';
  name: string;
  table: string | null;
  alias: string | null;
}

export interface TableNode extends NodeBase {
  kind: 'Table';
  name: string;
  schema: string | null;
  alias: string | null;
}

export interface ExpressionNode extends NodeBase {
  kind: 'Expression';
  type: string;
}

export type StatementNode = SelectNode | MutationNode | DefinitionNode | CommandNode;

export type SqlNode = StatementNode | CteNode | AliasNode | ColumnNode | TableNode | ExpressionNode;

export type SqlNodeKind = SqlNode['kind'];

export type NodeOfKind<K extends SqlNodeKind> = Extract<SqlNode, { kind: K }>;

export interface NodeMatch<T extends SqlNode> {
  node: T;
  /** Outermost first; empty for the root. */
  ancestors: readonly SqlNode[];
}

const DEFINITION_KINDS: readonly DefinitionKind[] = ['Drop', 'Create', 'Alter', 'Truncate', 'Rename'];
const MUTATION_KINDS: readonly MutationKind[] = ['Delete', 'Insert', 'Update'];

/**
 * Kinds that make a statement unsafe, in the order they are reported.
 */
export const FORBIDDEN_KINDS: readonly (DefinitionKind | MutationKind)[] = [...DEFINITION_KINDS, ...MUTATION_KINDS];

export function isKind<K extends SqlNodeKind>(kind: K): (node: SqlNode) => node is NodeOfKind<K> {
  return (node: SqlNode): node is NodeOfKind<K> => node.kind === kind;
}

/**
 * Visit every node under `root` (root included) in pre-order and return the
 * ones accepted by `predicate`, each with its ancestor chain.
 */
export function findAll<T extends SqlNode>(root: SqlNode, predicate: (node: SqlNode) => node is T): NodeMatch<T>[] {
  const matches: NodeMatch<T>[] = [];
  const stack: Array<{ node: SqlNode; ancestors: readonly SqlNode[] }> = [{ node: root, ancestors: [] }];

  while (stack.length) {
    const entry = stack.pop();
    if (!entry) break;

    if (predicate(entry.node)) {
      matches.push({ node: entry.node, ancestors: entry.ancestors });
    }

    const childAncestors = [...entry.ancestors, entry.node];
    for (let i = entry.node.children.length - 1; i >= 0; i -= 1) {
      stack.push({ node: entry.node.children[i], ancestors: childAncestors });
    }
  }

  return matches;
}

export function hasAncestor(match: NodeMatch<SqlNode>, kind: SqlNodeKind): boolean {
  return match.ancestors.some((ancestor) => ancestor.kind === kind);
}

function isForbidden(node: SqlNode): node is DefinitionNode | MutationNode {
  return FORBIDDEN_KINDS.some((kind) => kind === node.kind);
}

/**
 * Full-tree search for the first DDL or DML node, by reporting order rather
 * than position in the tree.
 */
export function findFirstForbidden(root: SqlNode): DefinitionKind | MutationKind | null {
  const present = new Set(findAll(root, isForbidden).map((match) => match.node.kind));
  return FORBIDDEN_KINDS.find((kind) => present.has(kind)) ?? null;
}

export function statementKindOf(node: StatementNode): StatementKind {
  return node.kind === 'Command' ? 'Other' : node.kind;
}
