import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ROUTE_HINTS } from '../src/utility-routes';
import { fixedClock, startTestApi, type TestApi } from './doubles/test-api';

describe('utility routes', () => {
  let api: TestApi;

  beforeEach(async () => {
    api = await startTestApi({ clock: fixedClock('2026-07-08T09:10:11.123Z') });
  });

  afterEach(async () => {
    await api.close();
  });

  it('serves the banner with route hints', async () => {
    const res = await api.request('GET', '/');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ service: 'users-router', routes: ROUTE_HINTS });
    expect(ROUTE_HINTS).toContain('GET /users/{id}/orders/{orderId}');
  });

  it('reports health', async () => {
    const res = await api.request('GET', '/health');

    expect(res.body).toEqual({ status: 'ok' });
  });

  it('only allows GET on /health', async () => {
    const res = await api.request('POST', '/health', {});

    expect(res.status).toBe(405);
    expect(res.headers.get('allow')).toBe('GET');
  });

  it('reports the current UTC time at second precision', async () => {
    const res = await api.request('GET', '/time');

    expect(res.body).toEqual({ time: '2026-07-08T09:10:11Z' });
  });

  describe('/echo', () => {
    it('echoes the trimmed name', async () => {
      const res = await api.request('GET', '/echo?name=%20Ada%20');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ name: 'Ada' });
    });

    it('uses the first value of a repeated parameter', async () => {
      const res = await api.request('GET', '/echo?name=Ada&name=Grace');

      expect(res.body).toEqual({ name: 'Ada' });
    });

    it('requires a name', async () => {
      const res = await api.request('GET', '/echo?name=%20');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: 'validation_failed',
        message: 'missing required fields',
        details: ['name is required'],
      });
    });
  });

  describe('/sum and /mul', () => {
    it('adds two integers', async () => {
      const res = await api.request('POST', '/sum', { a: 2, b: 40 });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ result: 42 });
    });

    it('multiplies two integers', async () => {
      const res = await api.request('POST', '/mul', { a: -6, b: 7 });

      expect(res.body).toEqual({ result: -42 });
    });

    it('lists only the missing operands', async () => {
      const onlyA = await api.request('POST', '/sum', { a: 1 });
      const none = await api.request('POST', '/mul', {});

      expect(onlyA.status).toBe(400);
      expect(onlyA.body).toEqual({
        error: 'validation_failed',
        message: 'missing required fields',
        details: ['b is required'],
      });
      expect(none.body).toMatchObject({ details: ['a is required', 'b is required'] });
    });

    it('rejects non-integer operands as a body error', async () => {
      const res = await api.request('POST', '/sum', { a: 1.5, b: 1 });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'invalid_json', message: 'a: Expected integer, received float' });
    });

    it('rejects unknown fields', async () => {
      const res = await api.request('POST', '/mul', { a: 1, b: 2, c: 3 });

      expect(res.body).toEqual({ error: 'invalid_json', message: 'unknown field "c"' });
    });

    it('only allows POST', async () => {
      const res = await api.request('GET', '/sum');

      expect(res.status).toBe(405);
      expect(res.headers.get('allow')).toBe('POST');
    });
  });

  it('exposes Prometheus metrics including the user count', async () => {
    await api.request('POST', '/users', { name: 'Ada' });

    const res = await api.request('GET', '/metrics');

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/plain; charset=utf-8');
    expect(res.text.split('\n')).toContain('usersvc_users_total 1');
  });

  it('returns a not_found envelope for unknown paths', async () => {
    const res = await api.request('GET', '/nope');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      error: 'not_found',
      message: 'resource not found',
      details: { path: '/nope' },
    });
  });
});
