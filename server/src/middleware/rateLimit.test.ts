import express from 'express';
import request from 'supertest';
import { createGlobalRateLimit } from './rateLimit';

function createApp(max: number, nodeEnv = 'test') {
  const app = express();

  app.use(createGlobalRateLimit({ windowMs: 60000, max }, nodeEnv));

  app.get('/api/test', (_req, res) => {
    res.json({ ok: true });
  });

  return app;
}

describe('Rate Limit Middleware', () => {
  it('should allow requests under the limit', async () => {
    const res = await request(createApp(3)).get('/api/test');

    expect(res.status).toBe(200);
    expect(res.body.ok).toBe(true);
  });

  it('should return 429 after exceeding the limit', async () => {
    const app = createApp(2);

    await request(app).get('/api/test');
    await request(app).get('/api/test');
    const res = await request(app).get('/api/test');

    expect(res.status).toBe(429);
    expect(res.body).toEqual({ error: 'Too many requests, please try again later' });
  });

  it('should include RateLimit headers', async () => {
    const res = await request(createApp(5)).get('/api/test');

    expect(res.headers['ratelimit-limit']).toBe('5');
    expect(res.headers['ratelimit-remaining']).toBe('4');
  });

  it('should not limit in development', async () => {
    const app = createApp(1, 'development');

    await request(app).get('/api/test');
    const res = await request(app).get('/api/test');

    expect(res.status).toBe(200);
  });
});
