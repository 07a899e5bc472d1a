import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildTestApp, TEST_SECRET, type TestApp } from '../../__tests__/test-app.js';

const VALID_BODY = {
  email: 'student@example.test',
  task: 'calc-42',
  round: 1,
  nonce: 'nonce-1',
  secret: TEST_SECRET,
  brief: 'Build a calculator',
  evaluation: { url: 'https://callback.example.test/notify' },
};

describe('POST /api-endpoint', () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await buildTestApp();
  });

  afterEach(async () => {
    await ctx.runner.drain();
    await ctx.app.close();
  });

  it('accepts a valid task and hands it to the runner', async () => {
    const response = await ctx.app.inject({ method: 'POST', url: '/api-endpoint', payload: VALID_BODY });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.ok).toBe(true);
    expect(body.data).toMatchObject({ status: 'accepted', task: 'calc-42' });
    expect(typeof body.data.jobId).toBe('string');
    expect(ctx.registry.get(body.data.jobId)?.taskId).toBe('calc-42');

    await ctx.runner.drain();
    expect(ctx.received).toEqual([
      {
        taskId: 'calc-42',
        brief: 'Build a calculator',
        callbackUrl: 'https://callback.example.test/notify',
        email: 'student@example.test',
        round: 1,
        nonce: 'nonce-1',
      },
    ]);
  });

  it('accepts a task without an evaluation URL', async () => {
    const { evaluation: _evaluation, ...withoutCallback } = VALID_BODY;

    const response = await ctx.app.inject({ method: 'POST', url: '/api-endpoint', payload: withoutCallback });

    expect(response.statusCode).toBe(200);
    await ctx.runner.drain();
    expect(ctx.received[0]?.callbackUrl).toBeUndefined();
  });

  it('lists every missing field', async () => {
    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api-endpoint',
      payload: { email: 'student@example.test', brief: '' },
    });

    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.ok).toBe(false);
    expect(body.error.code).toBe('E_VALIDATION');
    expect(body.error.details.missing).toEqual(['task', 'round', 'nonce', 'secret', 'brief']);
  });

  it('rejects a wrong secret with 403', async () => {
    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api-endpoint',
      payload: { ...VALID_BODY, secret: 'not-the-secret' },
    });

    expect(response.statusCode).toBe(403);
    expect(response.json().error.code).toBe('E_FORBIDDEN');
    await ctx.runner.drain();
    expect(ctx.received).toEqual([]);
  });

  it('rejects an invalid repository name', async () => {
    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api-endpoint',
      payload: { ...VALID_BODY, task: 'not a repo/name' },
    });

    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.error.message).toBe('Invalid task submission');
    expect(body.error.details.issues).toEqual([{ path: 'task', message: 'must be a valid repository name' }]);
  });

  it('rejects a callback that is not a URL', async () => {
    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api-endpoint',
      payload: { ...VALID_BODY, evaluation: { url: 'not-a-url' } },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.details.issues[0].path).toBe('evaluation.url');
  });

  it('rejects a body that is not an object', async () => {
    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api-endpoint',
      headers: { 'content-type': 'application/json' },
      payload: '[1, 2]',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.message).toBe('Request body must be a JSON object');
  });

  it('rejects malformed JSON as a validation error', async () => {
    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api-endpoint',
      headers: { 'content-type': 'application/json' },
      payload: '{ not json',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.code).toBe('E_VALIDATION');
  });
});

describe('POST /api-endpoint without a configured secret', () => {
  it('refuses every task', async () => {
    const ctx = await buildTestApp({ sharedSecret: '' });

    const response = await ctx.app.inject({ method: 'POST', url: '/api-endpoint', payload: VALID_BODY });

    expect(response.statusCode).toBe(403);
    await ctx.app.close();
  });
});
