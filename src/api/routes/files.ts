/**
 * File Routes
 * Upload, download, metadata and delete. The request body is the raw
 * file content; no multipart parsing.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';

import type { FileService } from '../../services/file.service.js';
import type { FileView } from '../../types/index.js';
import {
  errorResponse,
  successResponse,
  toArrayBuffer,
} from '../utils/response.js';

const uploadQuerySchema = z.object({
  filename: z.string().trim().min(1).max(255).optional(),
  sizeHint: z.coerce.number().int().nonnegative().optional(),
});

/**
 * Helper to get request ID from context
 */
function getRequestId(c: Context): string {
  return c.get('requestId');
}

/**
 * Format file view for the response
 */
export function formatFile(file: FileView): Record<string, unknown> {
  return {
    fileId: file.fileId,
    filename: file.filename,
    contentType: file.contentType,
    sizeBytes: file.sizeBytes,
    tier: file.tier,
    etag: file.etag,
    createdAt: file.createdAt.toISOString(),
    lastAccessedAt: file.lastAccessedAt.toISOString(),
    accessScore: file.accessScore,
  };
}

/**
 * Content-Disposition value safe for any filename
 */
function contentDisposition(filename: string): string {
  return `attachment; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

/**
 * Create file routes
 */
export function createFileRoutes(deps: { fileService: FileService }): Hono {
  const { fileService } = deps;
  const app = new Hono();

  // ─────────────────────────────────────────────────────────────
  // UPLOAD
  // ─────────────────────────────────────────────────────────────

  /**
   * POST /files?filename=<name>
   * Body is the file content; Content-Type is stored with it
   */
  app.post('/files', async (c) => {
    const requestId = getRequestId(c);

    const query = uploadQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: query.error.message },
        requestId
      );
    }

    const bytes = new Uint8Array(await c.req.arrayBuffer());
    const result = await fileService.upload(bytes, {
      filename: query.data.filename,
      sizeHint: query.data.sizeHint,
      contentType: c.req.header('Content-Type'),
      requestId,
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId, 201);
  });

  // ─────────────────────────────────────────────────────────────
  // DOWNLOAD
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /files/:id
   * Returns the raw content
   */
  app.get('/files/:id', async (c) => {
    const requestId = getRequestId(c);
    const result = await fileService.download(c.req.param('id'));

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const file = result.data;
    return c.body(toArrayBuffer(file.bytes), 200, {
      'Content-Type': file.contentType,
      'Content-Length': String(file.bytes.byteLength),
      'Content-Disposition': contentDisposition(file.filename),
      ETag: `"${file.etag}"`,
      'X-Storage-Tier': file.tier,
    });
  });

  /**
   * GET /files/:id/metadata
   */
  app.get('/files/:id/metadata', async (c) => {
    const requestId = getRequestId(c);
    const result = await fileService.getMetadata(c.req.param('id'));

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatFile(result.data), requestId);
  });

  // ─────────────────────────────────────────────────────────────
  // DELETE
  // ─────────────────────────────────────────────────────────────

  /**
   * DELETE /files/:id
   */
  app.delete('/files/:id', async (c) => {
    const requestId = getRequestId(c);
    const result = await fileService.delete(c.req.param('id'), { requestId });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return c.body(null, 204);
  });

  return app;
}
