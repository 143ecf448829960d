import express from 'express';
import request from 'supertest';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { asyncHandler, createErrorHandler, notFoundHandler } from './error.middleware';
import { InvalidTransitionError, NotFoundError } from '../utils/errors';

const buildApp = (exposeStack = false) => {
  const app = express();
  app.use(express.json());

  app.get('/zod', asyncHandler(async () => {
    z.object({ email: z.string().email('Invalid email address') }).parse({ email: 'nope' });
  }));
  app.get('/app-error', asyncHandler(async () => {
    throw new InvalidTransitionError('resolved', 'open');
  }));
  app.get('/missing', asyncHandler(async () => {
    throw new NotFoundError('Issue');
  }));
  app.get('/expired', asyncHandler(async () => {
    throw new jwt.TokenExpiredError('jwt expired', new Date(0));
  }));
  app.get('/bad-token', asyncHandler(async () => {
    throw new jwt.JsonWebTokenError('invalid signature');
  }));
  app.get('/unique', asyncHandler(async () => {
    throw Object.assign(new Error('duplicate key'), { code: '23505' });
  }));
  app.get('/boom', asyncHandler(async () => {
    throw new Error('database exploded');
  }));
  app.post('/echo', (req, res) => res.json(req.body));

  app.use(notFoundHandler);
  app.use(createErrorHandler(exposeStack));
  return app;
};

describe('error middleware', () => {
  const app = buildApp();

  it('maps zod errors to a validation envelope', async () => {
    const res = await request(app).get('/zod');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      success: false,
      message: 'Invalid data',
      error: {
        code: 'VALIDATION_ERROR',
        details: [{ field: 'email', message: 'Invalid email address' }],
      },
    });
  });

  it('uses the status, code and details of an AppError', async () => {
    const res = await request(app).get('/app-error');

    expect(res.status).toBe(409);
    expect(res.body).toEqual({
      success: false,
      message: 'Cannot move issue from resolved to open',
      error: { code: 'INVALID_TRANSITION', details: { from: 'resolved', to: 'open' } },
    });
  });

  it('returns 404 for a missing resource', async () => {
    const res = await request(app).get('/missing');

    expect(res.status).toBe(404);
    expect(res.body.message).toBe('Issue not found');
  });

  it('maps jwt errors to 401', async () => {
    const expired = await request(app).get('/expired');
    const invalid = await request(app).get('/bad-token');

    expect(expired.status).toBe(401);
    expect(expired.body.message).toBe('Token has expired');
    expect(invalid.status).toBe(401);
    expect(invalid.body.message).toBe('Invalid token');
  });

  it('maps unique violations to 409', async () => {
    const res = await request(app).get('/unique');

    expect(res.status).toBe(409);
    expect(res.body.error.code).toBe('CONFLICT');
  });

  it('hides unexpected errors behind a 500', async () => {
    const res = await request(app).get('/boom');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      success: false,
      message: 'Internal server error',
      error: { code: 'INTERNAL_ERROR' },
    });
  });

  it('includes the stack when asked to', async () => {
    const res = await request(buildApp(true)).get('/boom');

    expect(res.status).toBe(500);
    expect(res.body.error.details).toContain('database exploded');
  });

  it('reports malformed JSON bodies as a client error', async () => {
    const res = await request(app)
      .post('/echo')
      .set('Content-Type', 'application/json')
      .send('{"broken":');

    expect(res.status).toBe(400);
    expect(res.body.success).toBe(false);
    expect(res.body.error.code).toBe('BAD_REQUEST');
  });

  it('answers unknown routes with 404', async () => {
    const res = await request(app).get('/nowhere');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      success: false,
      message: 'Route not found',
      error: { code: 'NOT_FOUND' },
    });
  });
});
