import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import app from './app.js';
import { resetState } from './test/helpers.js';

describe('app', () => {
  beforeEach(() => {
    resetState();
  });

  it('points visitors at the docs', async () => {
    const res = await request(app).get('/');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ msg: 'Contacts API. Visit /docs for Swagger UI' });
  });

  it('reports health with the cache backend', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.data.status).toBe('ok');
    expect(res.body.data.cache).toBe('memory');
  });

  it('serves the OpenAPI document built from the route annotations', async () => {
    const res = await request(app).get('/docs.json');
    expect(res.status).toBe(200);
    expect(res.body.openapi).toBe('3.0.0');
    expect(res.body.info.title).toBe('Contacts API');
    expect(Object.keys(res.body.paths)).toEqual(
      expect.arrayContaining(['/auth/login', '/users/me', '/contacts', '/contacts/{id}', '/health']),
    );
  });

  it('documents the root routes against the host root rather than the API prefix', async () => {
    const res = await request(app).get('/docs.json');
    expect(res.body.servers[0].url).toBe('http://localhost:8000');
    expect(res.body.paths['/health'].servers).toEqual([
      { url: '/', description: 'Host root, outside API_PREFIX' },
    ]);
    expect(res.body.paths['/'].servers).toEqual([{ url: '/', description: 'Host root, outside API_PREFIX' }]);
    expect(res.body.paths['/contacts'].servers).toBeUndefined();
  });

  it('answers unknown routes with a 404 envelope', async () => {
    const res = await request(app).get('/nowhere');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      success: false,
      error: { code: 'NOT_FOUND', message: 'Route GET /nowhere not found' },
    });
  });

  it('rejects malformed JSON', async () => {
    const res = await request(app)
      .post('/auth/login')
      .set('Content-Type', 'application/json')
      .send('{"email": ');
    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({ code: 'INVALID_JSON', message: 'Malformed JSON body' });
  });

  it('sets security headers', async () => {
    const res = await request(app).get('/health');
    expect(res.headers['x-content-type-options']).toBe('nosniff');
  });
});
