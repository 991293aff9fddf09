/**
 * Tests for the authentication middleware.
 */
import type { Request, Response, NextFunction } from 'express';
import { authMiddleware, getConfiguredApiKey } from '../src/middleware/auth';

function makeReqRes(headers: Record<string, string> = {}): [Request, Response, NextFunction] {
  const req = { headers } as Request;
  const json = jest.fn().mockReturnThis();
  const status = jest.fn().mockReturnValue({ json });
  const res = { status, json } as unknown as Response;
  const next = jest.fn() as NextFunction;
  return [req, res, next];
}

describe('getConfiguredApiKey', () => {
  afterEach(() => {
    delete process.env.API_KEY;
  });

  test('returns null when env var is not set', () => {
    expect(getConfiguredApiKey()).toBeNull();
  });

  test('returns null when env var is empty', () => {
    process.env.API_KEY = '   ';
    expect(getConfiguredApiKey()).toBeNull();
  });

  test('returns trimmed key when set', () => {
    process.env.API_KEY = '  test-secret  ';
    expect(getConfiguredApiKey()).toBe('test-secret');
  });
});

describe('authMiddleware', () => {
  afterEach(() => {
    delete process.env.API_KEY;
  });

  test('calls next() when no API key is configured', () => {
    const [req, res, next] = makeReqRes();
    authMiddleware(req, res, next);
    expect(next).toHaveBeenCalled();
    expect((res.status as jest.Mock).mock.calls.length).toBe(0);
  });

  test('returns 401 when API key is configured but no key is presented', () => {
    process.env.API_KEY = 'test-secret';
    const [req, res, next] = makeReqRes();
    authMiddleware(req, res, next);
    expect(res.status as jest.Mock).toHaveBeenCalledWith(401);
    const { json } = (res.status as jest.Mock).mock.results[0].value;
    expect(json).toHaveBeenCalledWith({ error: 'Missing API key' });
    expect(next).not.toHaveBeenCalled();
  });

  test('returns 401 when bearer token does not match', () => {
    process.env.API_KEY = 'test-secret';
    const [req, res, next] = makeReqRes({ authorization: 'Bearer wrong' });
    authMiddleware(req, res, next);
    expect(res.status as jest.Mock).toHaveBeenCalledWith(401);
    const { json } = (res.status as jest.Mock).mock.results[0].value;
    expect(json).toHaveBeenCalledWith({ error: 'Invalid API key' });
    expect(next).not.toHaveBeenCalled();
  });

  test('calls next() when bearer token matches', () => {
    process.env.API_KEY = 'test-secret';
    const [req, res, next] = makeReqRes({ authorization: 'Bearer test-secret' });
    authMiddleware(req, res, next);
    expect(next).toHaveBeenCalled();
  });

  test('calls next() when X-API-Key matches', () => {
    process.env.API_KEY = 'test-secret';
    const [req, res, next] = makeReqRes({ 'x-api-key': 'test-secret' });
    authMiddleware(req, res, next);
    expect(next).toHaveBeenCalled();
  });

  test('prefers X-API-Key over Authorization', () => {
    process.env.API_KEY = 'test-secret';
    const [req, res, next] = makeReqRes({ 'x-api-key': 'wrong', authorization: 'Bearer test-secret' });
    authMiddleware(req, res, next);
    expect(res.status as jest.Mock).toHaveBeenCalledWith(401);
    expect(next).not.toHaveBeenCalled();
  });

  test('returns 401 when Authorization header lacks "Bearer " prefix', () => {
    process.env.API_KEY = 'test-secret';
    const [req, res, next] = makeReqRes({ authorization: 'test-secret' });
    authMiddleware(req, res, next);
    expect(res.status as jest.Mock).toHaveBeenCalledWith(401);
  });
});
