import { findFirstForbidden } from './sql-ast.js';
import type { ParseOutcome } from './sql-parser.js';
import type { CheckResult } from './types/validation.types.js';

/**
 * Keywords that reject a statement the parser could not read.
 */
export const HARMFUL_KEYWORDS = ['DROP', 'DELETE', 'INSERT', 'UPDATE', 'CREATE', 'ALTER'] as const;

function unsafe(reason: string): CheckResult {
  return { ok: false, reason: `Unsafe: ${reason}`, code: 'SAFETY_VIOLATION' };
}

/**
 * Case-insensitive substring match, used only when parsing fails.
 */
export function findHarmfulKeyword(sql: string): string | null {
  const upper = sql.toUpperCase();
  return HARMFUL_KEYWORDS.find((keyword) => upper.includes(keyword)) ?? null;
}

/**
 * Allow only a single read-only SELECT.
 */
export function checkSafety(outcome: ParseOutcome): CheckResult {
  if (!outcome.ok) {
    if (outcome.error.kind === 'Empty') {
      return unsafe('Parse failed - empty result');
    }

    // Unparseable input passes this stage only when no harmful keyword shows up.
    if (findHarmfulKeyword(outcome.error.sql)) {
      return unsafe('Harmful keyword detected');
    }
    return { ok: true, reason: 'Safe - Keyword check passed' };
  }

  const { statement } = outcome;
  for (const node of statement.statements) {
    const forbidden = findFirstForbidden(node);
    if (forbidden) {
      return unsafe(`${forbidden} operation detected`);
    }
  }

  if (statement.statements.length > 1) {
    return unsafe('Multiple statements are not allowed');
  }

  if (statement.kind !== 'Select') {
    return unsafe('Non-SELECT statement');
  }

  return { ok: true, reason: 'Safe - SELECT only' };
}
