/**
 * File Routes Unit Tests
 */

import type { Hono } from 'hono';
import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';

import { createApp } from '@/api/app.js';
import { computeChecksum } from '@/lib/checksum.js';

import {
  bytesOfSize,
  createTestEnvironment,
  seedFile,
} from '../../helpers/test-utils.js';
import type { TestEnvironment } from '../../helpers/test-utils.js';

const uploadResponseSchema = z.object({
  data: z.object({ fileId: z.string(), tier: z.string() }),
});

function createTestApp(env: TestEnvironment): Hono {
  return createApp({
    services: { fileService: env.fileService, auditService: env.auditService },
    quiet: true,
  });
}

describe('File Routes', () => {
  let env: TestEnvironment;
  let app: Hono;

  beforeEach(() => {
    env = createTestEnvironment({ sizeBounds: { minBytes: 1, maxBytes: 1024 } });
    app = createTestApp(env);
  });

  // ─────────────────────────────────────────────────────────────
  // POST /files
  // ─────────────────────────────────────────────────────────────

  describe('POST /api/v1/files', () => {
    it('should store the body and return 201 with the file id', async () => {
      const content = bytesOfSize(100);

      const res = await app.request('/api/v1/files?filename=notes.txt', {
        method: 'POST',
        body: content,
        headers: { 'Content-Type': 'text/plain', 'X-Request-Id': 'req-1' },
      });

      expect(res.status).toBe(201);
      expect(res.headers.get('X-Request-Id')).toBe('req-1');
      const body = uploadResponseSchema.parse(await res.json());
      expect(body.data.tier).toBe('HOT');

      const record = await env.catalog.get(body.data.fileId);
      expect(record).toMatchObject({
        filename: 'notes.txt',
        contentType: 'text/plain',
        sizeBytes: 100,
        checksum: computeChecksum(content),
      });
    });

    it('should carry the request id into the audit trail', async () => {
      const res = await app.request('/api/v1/files', {
        method: 'POST',
        body: bytesOfSize(10),
        headers: { 'X-Request-Id': 'req-audit' },
      });

      expect(res.status).toBe(201);
      const logs = await env.auditService.queryLogs({
        action: 'file:uploaded',
        limit: 1,
      });
      expect(logs.success && logs.data[0]?.requestId).toBe('req-audit');
    });

    it('should return 413 for content outside the size bounds', async () => {
      const res = await app.request('/api/v1/files', {
        method: 'POST',
        body: bytesOfSize(2048),
        headers: { 'X-Request-Id': 'req-2' },
      });

      expect(res.status).toBe(413);
      expect(await res.json()).toEqual({
        error: {
          code: 'SIZE_OUT_OF_RANGE',
          message: 'File size 2048 bytes is outside 1 bytes - 1024 bytes',
          details: { sizeBytes: 2048, minBytes: 1, maxBytes: 1024 },
          requestId: 'req-2',
        },
      });
    });

    it('should return 400 for a sizeHint that is not a number', async () => {
      const res = await app.request('/api/v1/files?sizeHint=abc', {
        method: 'POST',
        body: bytesOfSize(10),
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'VALIDATION_ERROR' },
      });
    });

    it('should return 400 when sizeHint disagrees with the body', async () => {
      const res = await app.request('/api/v1/files?sizeHint=11', {
        method: 'POST',
        body: bytesOfSize(10),
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'sizeHint 11 does not match content length 10',
        },
      });
    });
  });

  // ─────────────────────────────────────────────────────────────
  // GET /files/:id
  // ─────────────────────────────────────────────────────────────

  describe('GET /api/v1/files/:id', () => {
    it('should return the raw content with its headers', async () => {
      const content = bytesOfSize(48);
      await seedFile(
        env,
        { id: 'f1', filename: 'notes v1.txt', contentType: 'text/plain' },
        content
      );

      const res = await app.request('/api/v1/files/f1');

      expect(res.status).toBe(200);
      expect(res.headers.get('Content-Type')).toBe('text/plain');
      expect(res.headers.get('Content-Length')).toBe('48');
      expect(res.headers.get('Content-Disposition')).toBe(
        "attachment; filename*=UTF-8''notes%20v1.txt"
      );
      expect(res.headers.get('ETag')).toBe(`"${computeChecksum(content)}"`);
      expect(res.headers.get('X-Storage-Tier')).toBe('HOT');
      expect(new Uint8Array(await res.arrayBuffer())).toEqual(content);
    });

    it('should return 404 for an unknown file', async () => {
      const res = await app.request('/api/v1/files/missing', {
        headers: { 'X-Request-Id': 'req-3' },
      });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: {
          code: 'NOT_FOUND',
          message: 'File missing not found',
          requestId: 'req-3',
        },
      });
    });

    it('should report the tier the content was served from', async () => {
      await seedFile(env, { id: 'f1', tier: 'COLD' });

      const res = await app.request('/api/v1/files/f1');

      expect(res.headers.get('X-Storage-Tier')).toBe('COLD');
    });
  });

  // ─────────────────────────────────────────────────────────────
  // GET /files/:id/metadata
  // ─────────────────────────────────────────────────────────────

  describe('GET /api/v1/files/:id/metadata', () => {
    it('should return the file view with ISO dates', async () => {
      const content = bytesOfSize(16);
      await seedFile(env, { id: 'f1', tier: 'WARM' }, content);

      const res = await app.request('/api/v1/files/f1/metadata', {
        headers: { 'X-Request-Id': 'req-4' },
      });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        data: {
          fileId: 'f1',
          filename: 'f1.bin',
          contentType: 'application/octet-stream',
          sizeBytes: 16,
          tier: 'WARM',
          etag: computeChecksum(content),
          createdAt: '2024-01-01T00:00:00.000Z',
          lastAccessedAt: '2024-01-01T00:00:00.000Z',
          accessScore: 0,
        },
        meta: { requestId: 'req-4' },
      });
    });
  });

  // ─────────────────────────────────────────────────────────────
  // DELETE /files/:id
  // ─────────────────────────────────────────────────────────────

  describe('DELETE /api/v1/files/:id', () => {
    it('should return 204 and remove the file', async () => {
      await seedFile(env, { id: 'f1' });

      const res = await app.request('/api/v1/files/f1', { method: 'DELETE' });
      const after = await app.request('/api/v1/files/f1/metadata');

      expect(res.status).toBe(204);
      expect(after.status).toBe(404);
    });

    it('should return 404 for an unknown file', async () => {
      const res = await app.request('/api/v1/files/missing', {
        method: 'DELETE',
      });

      expect(res.status).toBe(404);
    });
  });
});
