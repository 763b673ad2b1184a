import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import { createTestApp, type TestApp } from './test-app.js';

vi.mock('../../lib/logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

describe('Register Route', () => {
  let t: TestApp;

  beforeEach(() => {
    t = createTestApp();
  });

  it('issues a working API key', async () => {
    const res = await request(t.app).post('/api/register').send({ username: 'alice' });

    expect(res.status).toBe(201);
    expect(res.body).toEqual({ username: 'alice', role: 'member', api_key: expect.stringMatching(/^[0-9a-f]{64}$/) });

    const me = await request(t.app).get('/api/users/me').set('X-API-Key', res.body.api_key);
    expect(me.status).toBe(200);
    expect(me.body.username).toBe('alice');
  });

  it('registers a viewer with a webhook', async () => {
    const res = await request(t.app)
      .post('/api/register')
      .send({ username: 'vera', role: 'viewer', webhook_url: 'http://hooks.local/vera' });

    expect(res.status).toBe(201);
    expect(t.identities.getByUsername('vera')).toMatchObject({
      role: 'viewer',
      webhookUrl: 'http://hooks.local/vera',
    });
  });

  it('refuses self-registration as admin', async () => {
    const res = await request(t.app).post('/api/register').send({ username: 'mallory', role: 'admin' });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Validation failed');
    expect(t.identities.getByUsername('mallory')).toBeNull();
  });

  it('rejects usernames with disallowed characters', async () => {
    const res = await request(t.app).post('/api/register').send({ username: 'has space' });

    expect(res.status).toBe(400);
  });

  it('returns 409 for a taken username', async () => {
    t.keyFor('alice');

    const res = await request(t.app).post('/api/register').send({ username: 'alice' });

    expect(res.status).toBe(409);
    expect(res.body).toEqual({ error: "Username 'alice' is already taken", code: 'CONFLICT' });
  });

  it('returns 400 for a malformed JSON body', async () => {
    const res = await request(t.app)
      .post('/api/register')
      .set('Content-Type', 'application/json')
      .send('{"username":');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'Invalid JSON body', code: 'VALIDATION_FAILED' });
  });
});
