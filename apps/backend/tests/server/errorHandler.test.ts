import express from 'express';
import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { HttpError, errorHandler } from '../../src/middleware/errorHandler.js';

const buildApp = () => {
  const app = express();
  app.use(express.json());
  app.get('/conflict', (_req, _res, next) => next(new HttpError(409, 'Busy.', { details: { owner: 'api' } })));
  app.get('/invalid', () => {
    z.object({ limit: z.number() }).parse({ limit: 'ten' });
  });
  app.get('/crash', () => {
    throw new Error('database exploded');
  });
  app.post('/echo', (req, res) => res.json(req.body));
  app.use(errorHandler);
  return app;
};

describe('errorHandler', () => {
  it('renders HttpError status, message and details', async () => {
    const response = await request(buildApp()).get('/conflict');

    expect(response.status).toBe(409);
    expect(response.body.error).toEqual({ message: 'Busy.', statusCode: 409, details: { owner: 'api' } });
    expect(response.body.meta).toMatchObject({ path: '/conflict', method: 'GET' });
  });

  it('maps validation errors to 400', async () => {
    const response = await request(buildApp()).get('/invalid');

    expect(response.status).toBe(400);
    expect(response.body.error.message).toBe('Validation failed');
    expect(response.body.error.details.fieldErrors.limit).toHaveLength(1);
  });

  it('hides the message of unexpected errors', async () => {
    const response = await request(buildApp()).get('/crash');

    expect(response.status).toBe(500);
    expect(response.body.error).toEqual({ message: 'Internal server error', statusCode: 500 });
  });

  it('keeps the client status of body parser errors', async () => {
    const response = await request(buildApp())
      .post('/echo')
      .set('Content-Type', 'application/json')
      .send('{"broken"');

    expect(response.status).toBe(400);
  });
});
