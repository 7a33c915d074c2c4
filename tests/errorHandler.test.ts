import request from 'supertest';
import express, { Request, Response, NextFunction } from 'express';
import { errorHandler, notFoundHandler } from '../src/middleware/errorHandler';
import { InvalidCredentialError, ValidationError } from '../src/errors';
import { createLogger } from '../src/logger';
import { MemoryLog } from './helpers';

function buildErrorApp(nextErr: unknown) {
  const log = new MemoryLog();
  const logger = createLogger({ logLevel: 'info', isProduction: false, nodeEnv: 'test' }, log);
  const app = express();
  app.get('/test', (_req: Request, _res: Response, next: NextFunction) => {
    next(nextErr);
  });
  app.use(notFoundHandler);
  app.use(errorHandler(logger));
  return { app, log };
}

describe('errorHandler middleware', () => {
  it('renders HttpError subclasses with their status, code and headers', async () => {
    const { app } = buildErrorApp(new InvalidCredentialError('Could not validate credentials', { 'WWW-Authenticate': 'Bearer' }));

    const res = await request(app).get('/test');

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ detail: 'Could not validate credentials', code: 'invalid_credential' });
    expect(res.headers['www-authenticate']).toBe('Bearer');
  });

  it('includes validation issues', async () => {
    const { app } = buildErrorApp(new ValidationError('Invalid scan request', [{ path: 'code', message: 'Required' }]));

    const res = await request(app).get('/test');

    expect(res.status).toBe(422);
    expect(res.body).toEqual({
      detail: 'Invalid scan request',
      code: 'validation_error',
      issues: [{ path: 'code', message: 'Required' }],
    });
  });

  it('hides the message of unexpected errors and logs it instead', async () => {
    const { app, log } = buildErrorApp(new Error('db password is hunter2'));

    const res = await request(app).get('/test');

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ detail: 'Internal server error', code: 'internal_error' });
    const record = log.records().find((entry) => entry.msg === 'Unhandled error');
    expect(record).toMatchObject({ level: 50, path: '/test', method: 'GET', err: { message: 'db password is hunter2' } });
  });

  it('returns 500 for non-Error thrown values', async () => {
    const { app } = buildErrorApp('just a string error');

    const res = await request(app).get('/test');

    expect(res.status).toBe(500);
    expect(res.body.code).toBe('internal_error');
  });

  it('keeps the status of body-parser style errors', async () => {
    const tooLarge = Object.assign(new Error('request entity too large'), { status: 413, type: 'entity.too.large' });
    const { app } = buildErrorApp(tooLarge);

    const res = await request(app).get('/test');

    expect(res.status).toBe(413);
    expect(res.body).toEqual({ detail: 'request entity too large', code: 'bad_request' });
  });

  it('answers unknown routes with 404', async () => {
    const { app } = buildErrorApp(undefined);

    const res = await request(app).get('/missing');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ detail: 'Not Found', code: 'not_found' });
  });
});
