import test from 'node:test';
import assert from 'node:assert/strict';
import { checkSafety, findHarmfulKeyword } from './safety-checker.js';
import { parseSql } from './sql-parser.js';

function safety(sql: string) {
  return checkSafety(parseSql(sql, 'mysql'));
}

test('accepts a single SELECT', () => {
  assert.deepEqual(safety('SELECT sensor_id FROM readings WHERE temperature > 20'), {
    ok: true,
    reason: 'Safe - SELECT only'
  });
});

test('accepts UNION of selects', () => {
  assert.deepEqual(safety('SELECT id FROM readings UNION SELECT id FROM sensors'), {
    ok: true,
    reason: 'Safe - SELECT only'
  });
});

test('rejects empty input', () => {
  assert.deepEqual(safety('  ;  '), {
    ok: false,
    reason: 'Unsafe: Parse failed - empty result',
    code: 'SAFETY_VIOLATION'
  });
});

test('rejects data definition and manipulation by kind', () => {
  const cases: Array<[string, string]> = [
    ['DROP TABLE readings', 'Unsafe: Drop operation detected'],
    ['CREATE TABLE audit (id INT)', 'Unsafe: Create operation detected'],
    ['ALTER TABLE readings ADD COLUMN humidity INT', 'Unsafe: Alter operation detected'],
    ['TRUNCATE TABLE readings', 'Unsafe: Truncate operation detected'],
    ['DELETE FROM readings WHERE id = 1', 'Unsafe: Delete operation detected'],
    ['INSERT INTO readings (id) VALUES (1)', 'Unsafe: Insert operation detected'],
    ['UPDATE readings SET temperature = 0', 'Unsafe: Update operation detected']
  ];

  for (const [sql, reason] of cases) {
    assert.deepEqual(safety(sql), { ok: false, reason, code: 'SAFETY_VIOLATION' }, sql);
  }
});

test('forbidden kinds win over the multiple statement rule', () => {
  assert.deepEqual(safety('SELECT 1; DROP TABLE readings'), {
    ok: false,
    reason: 'Unsafe: Drop operation detected',
    code: 'SAFETY_VIOLATION'
  });
});

test('rejects several read-only statements', () => {
  assert.deepEqual(safety('SELECT 1; SELECT 2'), {
    ok: false,
    reason: 'Unsafe: Multiple statements are not allowed',
    code: 'SAFETY_VIOLATION'
  });
});

test('rejects other statements', () => {
  assert.deepEqual(safety('SHOW TABLES'), {
    ok: false,
    reason: 'Unsafe: Non-SELECT statement',
    code: 'SAFETY_VIOLATION'
  });
});

test('falls back to a keyword scan when parsing fails', () => {
  assert.deepEqual(safety('THIS IS NOT SQL'), { ok: true, reason: 'Safe - Keyword check passed' });
  assert.deepEqual(safety('THIS IS NOT SQL drop'), {
    ok: false,
    reason: 'Unsafe: Harmful keyword detected',
    code: 'SAFETY_VIOLATION'
  });
});

test('keyword scan ignores case and matches inside words', () => {
  assert.equal(findHarmfulKeyword('select updated_at'), 'UPDATE');
  assert.equal(findHarmfulKeyword('select 1'), null);
});

test('SELECT ... INTO is treated as a write', () => {
  const cases: Array<[string, 'mysql' | 'postgres']> = [
    ["SELECT country FROM readings INTO OUTFILE '/tmp/readings.csv'", 'mysql'],
    ['SELECT * INTO newtab FROM readings', 'postgres']
  ];

  for (const [sql, dialect] of cases) {
    assert.deepEqual(
      checkSafety(parseSql(sql, dialect)),
      { ok: false, reason: 'Unsafe: Create operation detected', code: 'SAFETY_VIOLATION' },
      sql
    );
  }
});

test('rejects a mutation wrapped in a common table expression', () => {
  const outcome = parseSql('WITH d AS (DELETE FROM readings RETURNING *) SELECT * FROM d', 'postgres');
  assert.ok(outcome.ok);
  assert.equal(outcome.statement.kind, 'Select');
  assert.deepEqual(checkSafety(outcome), {
    ok: false,
    reason: 'Unsafe: Delete operation detected',
    code: 'SAFETY_VIOLATION'
  });
});
