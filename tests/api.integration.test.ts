import test from 'node:test';
import assert from 'node:assert/strict';
import type { AddressInfo } from 'node:net';
import jwt from 'jsonwebtoken';
import { createApp } from '../src/app.js';
import type { DataSourceConfig } from '../src/config/datasources.js';
import { ValidatorRegistry } from '../src/modules/validation/validator-registry.js';
import { countRows, createSensorStore } from './fixtures/sensor-db.js';

process.env.JWT_SECRET = 'test-secret';

const sensors: DataSourceConfig = {
  id: 'sensors',
  label: 'Sensor readings',
  dialect: 'sqlite',
  url: ':memory:',
  ssl: false
};

async function withServer(run: (baseUrl: string, token: string) => Promise<void>): Promise<void> {
  const store = createSensorStore();
  const registry = new ValidatorRegistry(new Map([[sensors.id, sensors]]), { getPool: () => store }, {
    cacheTtlSeconds: 0
  });
  const app = createApp({
    registry,
    corsOrigin: 'http://localhost:5173',
    rateLimit: { windowMs: 60_000, maxRequests: 1000 }
  });

  const server = app.listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address: AddressInfo | string | null = server.address();
  assert.ok(address && typeof address === 'object');

  const token = jwt.sign({ userId: 'integration-user' }, 'test-secret');
  try {
    await run(`http://127.0.0.1:${address.port}`, token);
    assert.equal(await countRows(store, 'readings'), 3);
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    registry.close();
    await store.end();
  }
}

function post(url: string, token: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${token}` },
    body: JSON.stringify(body)
  });
}

test('rejects requests without a token', async () => {
  await withServer(async (baseUrl) => {
    const response = await fetch(`${baseUrl}/api/datasources`);
    assert.equal(response.status, 401);
  });
});

test('rejects tokens signed with another secret', async () => {
  await withServer(async (baseUrl) => {
    const forged = jwt.sign({ userId: 'integration-user' }, 'other-secret');
    const response = await fetch(`${baseUrl}/api/datasources`, { headers: { Authorization: `Bearer ${forged}` } });
    assert.equal(response.status, 403);
  });
});

test('lists data sources without connection urls', async () => {
  await withServer(async (baseUrl, token) => {
    const response = await fetch(`${baseUrl}/api/datasources`, { headers: { Authorization: `Bearer ${token}` } });
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), {
      success: true,
      data: [{ id: 'sensors', label: 'Sensor readings', dialect: 'sqlite' }]
    });
  });
});

test('validates SQL and returns the verdict', async () => {
  await withServer(async (baseUrl, token) => {
    const passing = await post(`${baseUrl}/api/validation/validate`, token, {
      dataSource: 'sensors',
      sql: 'SELECT sensor_id, AVG(temperature) AS avg_temp FROM readings GROUP BY sensor_id'
    });
    assert.equal(passing.status, 200);
    assert.deepEqual(await passing.json(), {
      success: true,
      data: { passed: true, stage: 'Execution', message: 'All validations passed' }
    });

    const failing = await post(`${baseUrl}/api/validation/validate`, token, {
      dataSource: 'sensors',
      sql: 'SELECT humidity FROM readings'
    });
    assert.equal(failing.status, 200);
    assert.deepEqual(await failing.json(), {
      success: true,
      data: {
        passed: false,
        stage: 'Semantic',
        message: 'Semantic failed: Missing columns: humidity',
        code: 'SCHEMA_MISMATCH'
      }
    });
  });
});

test('unknown data sources are 404', async () => {
  await withServer(async (baseUrl, token) => {
    const response = await post(`${baseUrl}/api/validation/validate`, token, { dataSource: 'nope', sql: 'SELECT 1' });
    assert.equal(response.status, 404);
    assert.deepEqual(await response.json(), {
      success: false,
      error: 'Unknown data source',
      details: "Unknown data source 'nope'"
    });
  });
});

test('malformed bodies are 400', async () => {
  await withServer(async (baseUrl, token) => {
    const response = await post(`${baseUrl}/api/validation/validate`, token, { dataSource: 'sensors' });
    assert.equal(response.status, 400);
  });
});

test('executes validated queries', async () => {
  await withServer(async (baseUrl, token) => {
    const response = await post(`${baseUrl}/api/query/execute`, token, {
      dataSource: 'sensors',
      sql: 'SELECT id, name FROM sensors ORDER BY id',
      format: 'json'
    });
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), {
      success: true,
      data: {
        type: 'json',
        data: [
          { id: 1, name: 'north' },
          { id: 2, name: 'south' }
        ],
        rowCount: 2
      }
    });
  });
});

test('rejected queries are 422 with the verdict', async () => {
  await withServer(async (baseUrl, token) => {
    const response = await post(`${baseUrl}/api/query/execute`, token, {
      dataSource: 'sensors',
      sql: 'DELETE FROM readings'
    });
    assert.equal(response.status, 422);

    const body: unknown = await response.json();
    assert.ok(body && typeof body === 'object' && 'data' in body);
    assert.ok(body.data && typeof body.data === 'object' && 'stage' in body.data);
    assert.equal(body.data.stage, 'Safety');
  });
});

test('serves the reflected schema and cache stats', async () => {
  await withServer(async (baseUrl, token) => {
    const headers = { Authorization: `Bearer ${token}` };

    const missing = await fetch(`${baseUrl}/api/query/schema`, { headers });
    assert.equal(missing.status, 400);

    const schema = await fetch(`${baseUrl}/api/query/schema?dataSource=sensors`, { headers });
    assert.equal(schema.status, 200);

    const refreshed = await post(`${baseUrl}/api/validation/refresh`, token, { dataSource: 'sensors' });
    assert.equal(refreshed.status, 200);

    const stats = await fetch(`${baseUrl}/api/validation/stats`, { headers });
    assert.deepEqual(await stats.json(), {
      success: true,
      data: { cachedValidators: 1, hits: 0, misses: 1, refreshes: 1 }
    });
  });
});
