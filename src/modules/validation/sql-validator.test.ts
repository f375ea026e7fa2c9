import test from 'node:test';
import assert from 'node:assert/strict';
import Database from 'better-sqlite3';
import { SqliteStore } from '../../core/stores/sqlite-store.js';
import type { StorePool } from '../../core/stores/store.types.js';
import { countRows, createSensorStore } from '../../../tests/fixtures/sensor-db.js';
import { SqlValidator } from './sql-validator.js';
import { SchemaUnavailableError } from './validation.errors.js';

test('passes an aggregate over known columns', async () => {
  const store = createSensorStore();
  const validator = await SqlValidator.create(store, { label: 'sensors' });

  assert.deepEqual(
    await validator.validate('SELECT sensor_id, AVG(temperature) AS avg_temp FROM readings GROUP BY sensor_id'),
    { passed: true, stage: 'Execution', message: 'All validations passed' }
  );
  await store.end();
});

test('fails Semantic for an unknown column', async () => {
  const store = createSensorStore();
  const validator = await SqlValidator.create(store);

  assert.deepEqual(await validator.validate('SELECT bogus_col FROM readings'), {
    passed: false,
    stage: 'Semantic',
    message: 'Semantic failed: Missing columns: bogus_col',
    code: 'SCHEMA_MISMATCH'
  });
  await store.end();
});

test('fails Semantic for an unknown table', async () => {
  const store = createSensorStore();
  const validator = await SqlValidator.create(store);

  assert.deepEqual(await validator.validate('SELECT * FROM ghosts'), {
    passed: false,
    stage: 'Semantic',
    message: 'Semantic failed: Missing tables: ghosts',
    code: 'SCHEMA_MISMATCH'
  });
  await store.end();
});

test('fails Safety for destructive statements and leaves the data alone', async () => {
  const store = createSensorStore();
  const validator = await SqlValidator.create(store);

  for (const sql of ['DROP TABLE readings', "INSERT INTO sensors (id, name) VALUES (3, 'east')"]) {
    const verdict = await validator.validate(sql);
    assert.equal(verdict.passed, false, sql);
    if (!verdict.passed) {
      assert.equal(verdict.stage, 'Safety');
      assert.equal(verdict.code, 'SAFETY_VIOLATION');
      assert.match(verdict.message, /^Safety failed: Unsafe: /);
    }
  }

  assert.equal(await countRows(store, 'readings'), 3);
  assert.equal(await countRows(store, 'sensors'), 2);
  await store.end();
});

test('fails Safety for empty input', async () => {
  const store = createSensorStore();
  const validator = await SqlValidator.create(store);

  assert.deepEqual(await validator.validate('   '), {
    passed: false,
    stage: 'Safety',
    message: 'Safety failed: Unsafe: Parse failed - empty result',
    code: 'SAFETY_VIOLATION'
  });
  await store.end();
});

test('fails Semantic with a parse error for unreadable input', async () => {
  const store = createSensorStore();
  const validator = await SqlValidator.create(store);

  const verdict = await validator.validate('THIS IS NOT SQL');
  assert.equal(verdict.passed, false);
  if (!verdict.passed) {
    assert.equal(verdict.stage, 'Semantic');
    assert.equal(verdict.code, 'PARSE_ERROR');
    assert.match(verdict.message, /^Semantic failed: Semantic error: /);
  }
  await store.end();
});

test('fails Execution when the store rejects the statement', async () => {
  const store = createSensorStore();
  const validator = await SqlValidator.create(store);

  assert.deepEqual(await validator.validate('SELECT nosuchfn(temperature) AS x FROM readings'), {
    passed: false,
    stage: 'Execution',
    message: 'Execution failed: Runtime error: no such function: nosuchfn',
    code: 'EXECUTION_ERROR'
  });
  await store.end();
});

test('validation is repeatable', async () => {
  const store = createSensorStore();
  const validator = await SqlValidator.create(store);
  const sql = 'SELECT name FROM sensors WHERE id = 1';

  const first = await validator.validate(sql);
  const second = await validator.validate(sql);
  assert.deepEqual(first, second);
  assert.equal(first.passed, true);
  await store.end();
});

test('exposes the reflected tables and dialect', async () => {
  const store = createSensorStore();
  const validator = await SqlValidator.create(store);

  assert.equal(validator.dialect, 'sqlite');
  assert.deepEqual(
    validator.tables.map((table) => table.tableName),
    ['readings', 'sensors']
  );
  assert.ok(Object.isFrozen(validator.catalog));
  await store.end();
});

test('create rejects when the schema cannot be reflected', async () => {
  const pool: StorePool = {
    dialect: 'mysql',
    query: async () => {
      throw new Error('access denied');
    },
    withRollback: async () => {
      throw new Error('access denied');
    },
    end: async () => undefined
  };

  await assert.rejects(SqlValidator.create(pool), SchemaUnavailableError);
});

test('country averages over readings(country, value)', async () => {
  const db = new Database(':memory:');
  db.exec(`
    CREATE TABLE readings (country TEXT NOT NULL, value REAL NOT NULL);
    INSERT INTO readings (country, value) VALUES ('NO', 1.5), ('NO', 2.5), ('SE', 4);
  `);
  const store = new SqliteStore(db);
  const validator = await SqlValidator.create(store, { label: 'countries' });

  assert.deepEqual(
    await validator.validate('SELECT country, AVG(value) AS avg_value FROM readings GROUP BY country'),
    { passed: true, stage: 'Execution', message: 'All validations passed' }
  );

  const dropped = await validator.validate('DROP TABLE readings');
  assert.equal(dropped.passed, false);
  if (!dropped.passed) {
    assert.equal(dropped.stage, 'Safety');
  }

  assert.deepEqual(await validator.validate('SELECT bogus_col FROM readings'), {
    passed: false,
    stage: 'Semantic',
    message: 'Semantic failed: Missing columns: bogus_col',
    code: 'SCHEMA_MISMATCH'
  });
  assert.equal(await countRows(store, 'readings'), 3);
  await store.end();
});
