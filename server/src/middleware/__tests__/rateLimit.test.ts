import { describe, it, expect, beforeAll, afterAll, jest } from '@jest/globals';
import express from 'express';
import { Server } from 'http';

jest.mock('../../config', () => {
  const actual = jest.requireActual<typeof import('../../config')>('../../config');
  return {
    ...actual,
    config: { ...actual.config, RATE_LIMIT_MAX: 1, LOG_LEVEL: 'error' },
  };
});

import { calculationLimiter, generalLimiter } from '../rateLimit';
import { errorHandler } from '../errorHandler';

describe('Rate limiting', () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = express();
    app.get('/general', generalLimiter, (_req, res) => {
      res.json({ ok: true });
    });
    app.post('/calculate', calculationLimiter, (_req, res) => {
      res.json({ ok: true });
    });
    app.use(errorHandler);

    server = app.listen(0, '127.0.0.1');
    await new Promise<void>(resolve => server.once('listening', () => resolve()));

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
  });

  it('should pass the limit on to the error handler as RATE_LIMIT', async () => {
    expect((await fetch(`${baseUrl}/general`)).status).toBe(200);

    const limited = await fetch(`${baseUrl}/general`);

    expect(limited.status).toBe(429);
    expect(await limited.json()).toEqual({
      success: false,
      error: 'RATE_LIMIT',
      message: 'Too many requests, please try again later',
      reference: expect.any(String),
    });
  });

  it('should allow three times as many calculations', async () => {
    for (let i = 0; i < 3; i++) {
      expect((await fetch(`${baseUrl}/calculate`, { method: 'POST' })).status).toBe(200);
    }

    const limited = await fetch(`${baseUrl}/calculate`, { method: 'POST' });

    expect(limited.status).toBe(429);
    expect(await limited.json()).toMatchObject({
      error: 'RATE_LIMIT',
      message: 'Too many calculations, please try again later',
    });
  });
});
