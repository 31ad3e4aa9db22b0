import request from 'supertest';
import type { INestApplication } from '@nestjs/common';
import type { Server } from 'http';
import { PingResponseDto } from '../../src/modules/health/dto/Ping.response.dto';
import { InfoResponseDto } from '../../src/modules/health/dto/Info.response.dto';
import { MongoActionError } from '../../src/lib/errors/MongoActionError';
import { createTestApp } from '../helpers/app';
import type { InMemoryMongodbService } from '../helpers/in-memory-mongo';

function isPingResponseDto(x: unknown): x is PingResponseDto {
  if (typeof x !== 'object' || x === null) return false;
  return (
    'ok' in x &&
    x.ok === true &&
    'timestamp' in x &&
    typeof x.timestamp === 'string' &&
    'epochMs' in x &&
    typeof x.epochMs === 'number' &&
    'uptimeSec' in x &&
    typeof x.uptimeSec === 'number'
  );
}

function isInfoResponseDto(x: unknown): x is InfoResponseDto {
  if (typeof x !== 'object' || x === null) return false;
  return (
    'status' in x &&
    x.status === 'ok' &&
    'pid' in x &&
    typeof x.pid === 'number' &&
    'node' in x &&
    typeof x.node === 'string' &&
    'version' in x &&
    (x.version === null || typeof x.version === 'string')
  );
}

describe('Health and diagnostics (e2e)', () => {
  let app: INestApplication;
  let httpServer: Server;
  let mongo: InMemoryMongodbService;

  beforeAll(async () => {
    ({ app, httpServer, mongo } = await createTestApp());
  });

  afterAll(async () => {
    await app.close();
  });

  it('/ (GET) says the API is running', async () => {
    await request(httpServer)
      .get('/')
      .expect(200)
      .expect({ message: 'Catalog API running' });
  });

  it('/api/health (GET) returns ok', async () => {
    await request(httpServer).get('/api/health').expect(200).expect({ ok: true });
  });

  it('/api/health/ping (GET) returns PingResponseDto', async () => {
    const res = await request(httpServer)
      .get('/api/health/ping')
      .expect(200)
      .expect('Content-Type', /json/);
    expect(isPingResponseDto(res.body)).toBe(true);
  });

  it('/api/health/info (GET) returns InfoResponseDto', async () => {
    const res = await request(httpServer)
      .get('/api/health/info')
      .expect(200)
      .expect('Content-Type', /json/);
    expect(isInfoResponseDto(res.body)).toBe(true);
  });

  it('/test (GET) lists collections', async () => {
    mongo.raw('product');
    const res = await request(httpServer).get('/test').expect(200);
    expect(res.body).toMatchObject({
      backend: 'running',
      database: 'connected',
      connection_status: 'Connected',
      collections: ['product'],
    });
  });

  it('/test (GET) still answers 200 when the store is down', async () => {
    mongo.failWith(new MongoActionError('connect ECONNREFUSED', { operation: 'getDb' }));
    const res = await request(httpServer).get('/test').expect(200);
    expect(res.body).toMatchObject({
      database: 'error: connect ECONNREFUSED',
      connection_status: 'Not Connected',
      collections: [],
    });
  });
});
