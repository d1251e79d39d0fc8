/**
 * HTTP API tests, driven through Hono's in-process `app.request`.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createHash } from 'node:crypto';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Hono } from 'hono';
import { z } from 'zod';
import { defineConfig } from '../../src/config/schema.js';
import { isTerminalRunStatus } from '../../src/integrations/orchestration/types.js';
import { createApp } from '../../src/server/app.js';
import { createServices, type Services } from '../../src/services.js';

const CSV = 'date,region,revenue\n2024-01-01,north,120\n2024-01-02,south,95\n';
const CSV_DIGEST = createHash('sha256').update(CSV).digest('hex');

const IdEnvelope = z.object({ data: z.object({ runId: z.string() }) });

describe('HTTP API', () => {
  let dir: string;
  let services: Services;
  let app: Hono;
  let clientSeq = 0;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'insightflow-api-'));
    services = createServices(
      defineConfig({
        storage: { dbPath: ':memory:', datasetDir: dir },
        llm: { provider: 'mock' },
        rateLimit: { maxRequests: 2, windowMs: 60_000 },
      }),
      { sweeper: false },
    );
    app = createApp(services, { requestLogging: false });
  });

  afterEach(async () => {
    await services.close();
    await rm(dir, { recursive: true, force: true });
  });

  async function upload(content = CSV, name = 'sales.csv'): Promise<Response> {
    const form = new FormData();
    form.append('file', new File([content], name, { type: 'text/csv' }));
    return app.request('/api/datasets', { method: 'POST', body: form });
  }

  function submit(body: Record<string, unknown>, clientId = `client-${++clientSeq}`): Response | Promise<Response> {
    return app.request('/api/runs', {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'x-client-id': clientId },
      body: JSON.stringify(body),
    });
  }

  async function runToCompletion(body: Record<string, unknown>): Promise<string> {
    const res = await submit(body);
    expect(res.status).toBe(202);
    const { runId } = IdEnvelope.parse(await res.json()).data;
    await vi.waitFor(() => {
      const status = services.ledger.getRun(runId)?.run.status;
      expect(status !== undefined && isTerminalRunStatus(status)).toBe(true);
    });
    return runId;
  }

  describe('health and catalog', () => {
    it('should report mock mode with the keyword planner', async () => {
      const res = await app.request('/api/health');
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        success: true,
        data: { status: 'ok', mode: 'mock', planner: 'keyword', activeRuns: 0 },
      });
    });

    it('should list the bundled agents', async () => {
      const res = await app.request('/api/agents');
      const body = z.object({ data: z.array(z.object({ id: z.string() })) }).parse(await res.json());
      expect(body.data).toHaveLength(23);
    });

    it('should answer 404 for an unknown agent', async () => {
      const res = await app.request('/api/agents/ghost');
      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ success: false });
    });
  });

  describe('datasets', () => {
    it('should store an upload under its content digest', async () => {
      const res = await upload();
      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({
        success: true,
        data: {
          ref: { id: CSV_DIGEST, fileName: 'sales.csv', sizeBytes: CSV.length },
          summary: { format: 'delimited', rowCount: 2 },
        },
      });
    });

    it('should reject a disallowed extension', async () => {
      const res = await upload('x', 'payload.exe');
      expect(res.status).toBe(400);
    });

    it('should answer 404 for an unknown dataset', async () => {
      const res = await app.request(`/api/datasets/${'0'.repeat(64)}`);
      expect(res.status).toBe(404);
    });

    describe('with a small size cap', () => {
      let small: Services;
      let smallApp: Hono;

      beforeEach(() => {
        small = createServices(
          defineConfig({
            storage: { dbPath: ':memory:', datasetDir: dir },
            llm: { provider: 'mock' },
            upload: { maxFileBytes: 64 },
          }),
          { sweeper: false },
        );
        smallApp = createApp(small, { requestLogging: false });
      });

      afterEach(async () => {
        await small.close();
      });

      function uploadSmall(content: string): Response | Promise<Response> {
        const form = new FormData();
        form.append('file', new File([content], 'big.csv', { type: 'text/csv' }));
        return smallApp.request('/api/datasets', { method: 'POST', body: form });
      }

      it('should refuse a body past the cap before parsing it', async () => {
        const res = await uploadSmall('x'.repeat(20_000));
        expect(res.status).toBe(413);
        expect(await res.json()).toEqual({ success: false, error: 'Upload exceeds 16448 bytes', fields: ['file'] });
      });

      it('should still reject a file over the cap that fits the body allowance', async () => {
        const res = await uploadSmall('x'.repeat(100));
        expect(res.status).toBe(400);
        expect(await res.json()).toMatchObject({ success: false, error: 'File exceeds 64 bytes' });
      });
    });
  });

  describe('planning', () => {
    it('should preview the agents a question would run', async () => {
      await upload();
      const res = await app.request('/api/plan', {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({
          datasetId: CSV_DIGEST,
          question: 'Which customers are likely to churn, and what drives retention?',
        }),
      });
      expect(res.status).toBe(200);
      const body = z
        .object({ data: z.object({ agents: z.array(z.object({ id: z.string() })) }) })
        .parse(await res.json());
      expect(body.data.agents.map((a) => a.id)).toEqual(['churn_prediction', 'cohort_analysis']);
    });
  });

  describe('runs', () => {
    it('should run the selected agents and serve the report', async () => {
      await upload();
      const runId = await runToCompletion({
        datasetId: CSV_DIGEST,
        question: 'How is revenue trending?',
        agents: ['data_cleaning', 'time_series_analysis'],
      });

      const res = await app.request(`/api/runs/${runId}`);
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        success: true,
        data: {
          run: { id: runId, status: 'completed' },
          active: false,
        },
      });
    });

    it('should serve a resubmitted question from the cache', async () => {
      await upload();
      const body = { datasetId: CSV_DIGEST, question: 'How is revenue trending?', agents: ['data_cleaning', 'time_series_analysis'] };
      await runToCompletion(body);
      const second = await runToCompletion({ ...body, question: '  how IS revenue   trending? ' });

      const detail = services.ledger.getRun(second);
      expect(detail?.executions.map((e) => e.status)).toEqual(['cache_hit', 'cache_hit']);

      const stats = await app.request('/api/stats');
      expect(await stats.json()).toMatchObject({
        data: { runs: { completedRuns: 2 }, cache: { entries: 2, totalHits: 2 } },
      });
    });

    it('should filter history by status and validate paging', async () => {
      await upload();
      await runToCompletion({ datasetId: CSV_DIGEST, question: 'Any gaps?', agents: ['data_cleaning'] });

      const completed = z.object({ data: z.array(z.object({ status: z.string() })) }).parse(
        await (await app.request('/api/runs?status=completed')).json(),
      );
      expect(completed.data.map((r) => r.status)).toEqual(['completed']);

      const failed = z.object({ data: z.array(z.unknown()) }).parse(await (await app.request('/api/runs?status=failed')).json());
      expect(failed.data).toEqual([]);

      expect((await app.request('/api/runs?limit=0')).status).toBe(400);
    });

    it('should reject a run for an unknown dataset', async () => {
      const res = await submit({ datasetId: 'f'.repeat(64), question: 'Why?' });
      expect(res.status).toBe(404);
    });

    it('should reject an empty question', async () => {
      await upload();
      const res = await submit({ datasetId: CSV_DIGEST, question: '   ' });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ success: false, error: expect.stringContaining('question') });
    });

    it('should reject unknown preselected agents', async () => {
      await upload();
      const res = await submit({ datasetId: CSV_DIGEST, question: 'Why?', agents: ['ghost'] });
      expect(res.status).toBe(400);
    });

    it('should reject more agents than a run may hold', async () => {
      await upload();
      const agents = services.catalog.list().slice(0, 11).map((a) => a.id);
      const res = await submit({ datasetId: CSV_DIGEST, question: 'Everything?', agents });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        success: false,
        error: 'At most 10 agents per run; 11 were selected',
        fields: ['agents'],
      });
    });

    it('should rate limit submissions per client', async () => {
      await upload();
      const body = { datasetId: CSV_DIGEST, question: 'Any gaps?', agents: ['data_cleaning'] };
      expect((await submit(body, 'same-client')).status).toBe(202);
      expect((await submit(body, 'same-client')).status).toBe(202);

      const limited = await submit(body, 'same-client');
      expect(limited.status).toBe(429);
      const retryAfter = Number(limited.headers.get('Retry-After'));
      expect(retryAfter).toBeGreaterThan(0);
      expect(retryAfter).toBeLessThanOrEqual(60);

      expect((await submit(body, 'other-client')).status).toBe(202);
    });

    it('should refuse to cancel a finished run', async () => {
      await upload();
      const runId = await runToCompletion({ datasetId: CSV_DIGEST, question: 'Any gaps?', agents: ['data_cleaning'] });
      const res = await app.request(`/api/runs/${runId}/cancel`, { method: 'POST' });
      expect(res.status).toBe(409);
    });

    it('should answer 404 when cancelling an unknown run', async () => {
      const res = await app.request('/api/runs/nope/cancel', { method: 'POST' });
      expect(res.status).toBe(404);
    });

    it('should stream a snapshot for a finished run and close', async () => {
      await upload();
      const runId = await runToCompletion({ datasetId: CSV_DIGEST, question: 'Any gaps?', agents: ['data_cleaning'] });
      const res = await app.request(`/api/runs/${runId}/events`);
      expect(res.headers.get('content-type')).toContain('text/event-stream');
      const text = await res.text();
      expect(text).toContain('event: snapshot');
      expect(text).toContain(runId);
    });
  });

  describe('cache maintenance', () => {
    it('should sweep and purge the cache', async () => {
      await upload();
      await runToCompletion({ datasetId: CSV_DIGEST, question: 'Any gaps?', agents: ['data_cleaning'] });

      const sweep = await app.request('/api/cache/sweep', { method: 'POST' });
      expect(await sweep.json()).toMatchObject({ data: { removed: 0, stats: { entries: 1 } } });

      const purge = await app.request('/api/cache', { method: 'DELETE' });
      expect(await purge.json()).toEqual({ success: true, data: { removed: 1 } });
    });
  });

  it('should answer 404 JSON for unknown routes', async () => {
    const res = await app.request('/api/nothing-here');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ success: false, error: 'No route for GET /api/nothing-here' });
  });
});
