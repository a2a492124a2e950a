/**
 * Admin Routes Unit Tests
 */

import type { Hono } from 'hono';
import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';

import { createApp } from '@/api/app.js';
import { createInMemoryTierStore } from '@/services/tier-store.memory.js';

import {
  bytesOfSize,
  createTestEnvironment,
  daysAfter,
  seedFile,
  T0,
  wait,
} from '../../helpers/test-utils.js';
import type { TestEnvironment } from '../../helpers/test-utils.js';
import { createGate, createGatedTierStore } from '../../mocks/index.js';

const runResponseSchema = z.object({
  data: z.object({ runId: z.string(), status: z.string() }),
});

describe('Admin Routes', () => {
  let env: TestEnvironment;
  let app: Hono;

  beforeEach(() => {
    env = createTestEnvironment({ sizeBounds: { minBytes: 1, maxBytes: 1024 } });
    app = createApp({
      services: { fileService: env.fileService, auditService: env.auditService },
      quiet: true,
    });
  });

  function post(path: string, body?: string): Promise<Response> {
    return Promise.resolve(
      app.request(path, {
        method: 'POST',
        body,
        headers: { 'Content-Type': 'application/json', 'X-Request-Id': 'req-a' },
      })
    );
  }

  // ─────────────────────────────────────────────────────────────
  // PROMOTE
  // ─────────────────────────────────────────────────────────────

  describe('POST /api/v1/admin/files/:id/promote', () => {
    it('should move the file one tier toward HOT', async () => {
      await seedFile(env, { id: 'f1', tier: 'COLD' });

      const res = await post('/api/v1/admin/files/f1/promote');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: { fileId: 'f1', tier: 'WARM' },
        meta: { requestId: 'req-a' },
      });
    });

    it('should tag the move with the request id', async () => {
      await seedFile(env, { id: 'f1', tier: 'COLD' });

      await post('/api/v1/admin/files/f1/promote');

      const logs = await env.auditService.queryLogs({
        action: 'tiering:moved',
        limit: 1,
      });
      expect(logs.success && logs.data[0]?.requestId).toBe('req-a');
    });

    it('should return 400 for a HOT file', async () => {
      await seedFile(env, { id: 'f1' });

      const res = await post('/api/v1/admin/files/f1/promote');

      expect(res.status).toBe(400);
    });

    it('should return 404 for an unknown file', async () => {
      const res = await post('/api/v1/admin/files/missing/promote');

      expect(res.status).toBe(404);
    });
  });

  // ─────────────────────────────────────────────────────────────
  // TIERING RUNS
  // ─────────────────────────────────────────────────────────────

  describe('POST /api/v1/admin/tiering/run', () => {
    it('should run synchronously without a body', async () => {
      await seedFile(env, { id: 'f1' });
      env.clock.advanceDays(31);

      const res = await post('/api/v1/admin/tiering/run');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: {
          startedAt: daysAfter(T0, 31).toISOString(),
          finishedAt: daysAfter(T0, 31).toISOString(),
          filesEvaluated: 1,
          filesMoved: 1,
          filesSkipped: 0,
          moves: [
            { fileId: 'f1', fromTier: 'HOT', toTier: 'WARM', reason: 'IDLE_WARM' },
          ],
          skipped: [],
          failures: [],
          cancelled: false,
        },
      });
    });

    it('should start a background run and return 202', async () => {
      const res = await post(
        '/api/v1/admin/tiering/run',
        JSON.stringify({ async: true })
      );

      expect(res.status).toBe(202);
      const body = runResponseSchema.parse(await res.json());
      expect(body.data.status).toBe('running');

      await env.runs.waitFor(body.data.runId);
      const polled = await app.request(
        `/api/v1/admin/tiering/runs/${body.data.runId}`
      );
      expect(polled.status).toBe(200);
      expect(await polled.json()).toMatchObject({
        data: {
          runId: body.data.runId,
          status: 'completed',
          startedAt: T0.toISOString(),
          result: { filesMoved: 0, filesSkipped: 0 },
          error: null,
        },
      });
    });

    it('should reject malformed JSON', async () => {
      const res = await post('/api/v1/admin/tiering/run', '{bad');

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: {
          code: 'VALIDATION_ERROR',
          message: expect.stringMatching(/^Invalid JSON body: /),
        },
      });
    });

    it('should reject unknown or mistyped fields', async () => {
      const mistyped = await post(
        '/api/v1/admin/tiering/run',
        JSON.stringify({ async: 'yes' })
      );
      const unknown = await post(
        '/api/v1/admin/tiering/run',
        JSON.stringify({ dryRun: true })
      );

      expect(mistyped.status).toBe(400);
      expect(unknown.status).toBe(400);
    });
  });

  describe('GET /api/v1/admin/tiering/runs/:id', () => {
    it('should return 404 for an unknown run', async () => {
      const res = await app.request('/api/v1/admin/tiering/runs/run_missing');

      expect(res.status).toBe(404);
    });
  });

  describe('POST /api/v1/admin/tiering/runs/:id/cancel', () => {
    it('should cancel a background run', async () => {
      const gate = createGate();
      env = createTestEnvironment({
        tierStore: createGatedTierStore(createInMemoryTierStore(), gate),
      });
      app = createApp({
        services: {
          fileService: env.fileService,
          auditService: env.auditService,
        },
        quiet: true,
      });
      await seedFile(env, { id: 'f1' });
      env.clock.advanceDays(31);
      const started = await env.runs.start();
      if (!started.success) throw new Error('start failed');

      const pending = post(
        `/api/v1/admin/tiering/runs/${started.data.runId}/cancel`
      );
      await wait(10);
      gate.open();
      const res = await pending;

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: { runId: started.data.runId, status: 'cancelled' },
      });
    });

    it('should return 404 for an unknown run', async () => {
      const res = await post('/api/v1/admin/tiering/runs/run_missing/cancel');

      expect(res.status).toBe(404);
    });
  });

  // ─────────────────────────────────────────────────────────────
  // STATS
  // ─────────────────────────────────────────────────────────────

  describe('GET /api/v1/admin/stats', () => {
    it('should return counts and sizes per tier', async () => {
      await seedFile(env, { id: 'a' }, bytesOfSize(10));
      await seedFile(env, { id: 'b', tier: 'WARM' }, bytesOfSize(30));

      const res = await app.request('/api/v1/admin/stats');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: {
          totalFiles: 2,
          totalSize: 40,
          tiers: {
            HOT: { count: 1, totalSize: 10 },
            WARM: { count: 1, totalSize: 30 },
            COLD: { count: 0, totalSize: 0 },
          },
        },
      });
    });
  });

  // ─────────────────────────────────────────────────────────────
  // AUDIT
  // ─────────────────────────────────────────────────────────────

  describe('GET /api/v1/admin/audit', () => {
    it('should list matching entries newest first', async () => {
      const first = await env.fileService.upload(bytesOfSize(10));
      const second = await env.fileService.upload(bytesOfSize(20));
      if (!first.success || !second.success) throw new Error('upload failed');
      await env.fileService.delete(first.data.fileId);

      const res = await app.request('/api/v1/admin/audit?action=file:uploaded');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: [
          {
            action: 'file:uploaded',
            resourceId: second.data.fileId,
            timestamp: T0.toISOString(),
          },
          { action: 'file:uploaded', resourceId: first.data.fileId },
        ],
      });
    });

    it('should filter by resource type', async () => {
      await env.fileService.upload(bytesOfSize(10));
      await env.auditService.log({
        actorType: 'system',
        action: 'tiering:checked',
        resourceType: 'tiering_run',
        resourceId: 'run_1',
      });

      const res = await app.request('/api/v1/admin/audit?resourceType=tiering_run');

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: [{ resourceType: 'tiering_run', resourceId: 'run_1' }],
      });
    });

    it('should reject an out-of-range limit', async () => {
      const res = await app.request('/api/v1/admin/audit?limit=0');

      expect(res.status).toBe(400);
    });
  });
});
