import request from 'supertest';
import express from 'express';
import Database from 'better-sqlite3';

const testDb = new Database(':memory:');

jest.mock('../db', () => ({
  getDatabase: () => testDb,
}));

import healthRouter from './health';

const app = express();
app.use('/api/health', healthRouter);

describe('Health Check', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  afterAll(() => {
    testDb.close();
  });

  it('should report a connected database', async () => {
    const response = await request(app).get('/api/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('healthy');
    expect(response.body.database).toBe('connected');
  });

  it('should return 503 when the database query fails', async () => {
    jest.spyOn(testDb, 'prepare').mockImplementationOnce(() => {
      throw new Error('disk I/O error');
    });

    const response = await request(app).get('/api/health');

    expect(response.status).toBe(503);
    expect(response.body.status).toBe('unhealthy');
    expect(response.body.database).toBe('error');
  });
});
