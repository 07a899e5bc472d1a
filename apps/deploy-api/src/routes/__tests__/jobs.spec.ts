import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildTestApp, type TestApp } from '../../__tests__/test-app.js';

describe('job status routes', () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await buildTestApp({ basePath: '/api/v1/' });
  });

  afterEach(async () => {
    await ctx.runner.drain();
    await ctx.app.close();
  });

  it('returns the status of a known job', async () => {
    const { jobId } = ctx.registry.create('calc-42');
    ctx.registry.updateStage(jobId, 'publishing');

    const response = await ctx.app.inject({ method: 'GET', url: `/api/v1/jobs/${jobId}` });

    expect(response.statusCode).toBe(200);
    expect(response.json().data).toMatchObject({ jobId, taskId: 'calc-42', stage: 'publishing' });
  });

  it('returns 404 for an unknown job', async () => {
    const response = await ctx.app.inject({ method: 'GET', url: '/api/v1/jobs/unknown-id' });

    expect(response.statusCode).toBe(404);
    const body = response.json();
    expect(body.ok).toBe(false);
    expect(body.error).toMatchObject({ code: 'E_NOT_FOUND', message: 'Job not found: unknown-id' });
  });

  it('lists jobs with counters', async () => {
    ctx.registry.create('calc-42');

    const response = await ctx.app.inject({ method: 'GET', url: '/api/v1/jobs' });

    expect(response.statusCode).toBe(200);
    const { data } = response.json();
    expect(data.jobs).toHaveLength(1);
    expect(data.stats).toEqual({ size: 1, active: 1, done: 0, failed: 0 });
  });
});
