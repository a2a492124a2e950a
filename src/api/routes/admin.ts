/**
 * Admin Routes
 * Manual promotion, tiering runs, storage statistics and the audit trail
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';

import type {
  AuditLog,
  TieringRunHandle,
  TieringRunResult,
} from '../../types/index.js';
import { errorMessage } from '../../types/index.js';
import type { ApiServices } from '../types.js';
import { errorResponse, successResponse } from '../utils/response.js';

import { formatFile } from './files.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

const runBodySchema = z
  .object({
    async: z.boolean().optional(),
  })
  .strict();

const auditQuerySchema = z.object({
  action: z.string().min(1).optional(),
  resourceType: z.string().min(1).optional(),
  resourceId: z.string().min(1).optional(),
  since: z.coerce.date().optional(),
  limit: z.coerce.number().int().min(1).max(MAX_LIMIT).default(DEFAULT_LIMIT),
});

/**
 * Helper to get request ID from context
 */
function getRequestId(c: Context): string {
  return c.get('requestId');
}

function formatRunResult(result: TieringRunResult): Record<string, unknown> {
  return {
    runId: result.runId,
    startedAt: result.startedAt.toISOString(),
    finishedAt: result.finishedAt.toISOString(),
    filesEvaluated: result.filesEvaluated,
    filesMoved: result.filesMoved,
    filesSkipped: result.skipped.length,
    moves: result.moves,
    skipped: result.skipped,
    failures: result.failures,
    cancelled: result.cancelled,
  };
}

function formatRun(handle: TieringRunHandle): Record<string, unknown> {
  return {
    runId: handle.runId,
    status: handle.status,
    startedAt: handle.startedAt.toISOString(),
    result: handle.result ? formatRunResult(handle.result) : null,
    error: handle.error ?? null,
  };
}

function formatAuditLog(log: AuditLog): Record<string, unknown> {
  return {
    id: log.id,
    timestamp: log.timestamp.toISOString(),
    actorType: log.actorType,
    action: log.action,
    resourceType: log.resourceType,
    resourceId: log.resourceId,
    details: log.details,
    requestId: log.requestId,
  };
}

/**
 * Read an optional JSON body; an empty body is {}
 */
async function readJsonBody(
  c: Context
): Promise<{ ok: true; value: unknown } | { ok: false; message: string }> {
  const text = await c.req.text();
  if (text.trim() === '') {
    return { ok: true, value: {} };
  }
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return {
      ok: false,
      message: `Invalid JSON body: ${errorMessage(error)}`,
    };
  }
}

/**
 * Create admin routes
 */
export function createAdminRoutes(deps: ApiServices): Hono {
  const { fileService, auditService } = deps;
  const app = new Hono();

  // ─────────────────────────────────────────────────────────────
  // ADMIN FILES
  // ─────────────────────────────────────────────────────────────

  /**
   * POST /admin/files/:id/promote
   * Move a file one tier toward HOT
   */
  app.post('/admin/files/:id/promote', async (c) => {
    const requestId = getRequestId(c);
    const result = await fileService.promote(c.req.param('id'), { requestId });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatFile(result.data), requestId);
  });

  // ─────────────────────────────────────────────────────────────
  // ADMIN TIERING
  // ─────────────────────────────────────────────────────────────

  /**
   * POST /admin/tiering/run
   * Body { "async": true } starts a background run and returns 202
   */
  app.post('/admin/tiering/run', async (c) => {
    const requestId = getRequestId(c);

    const body = await readJsonBody(c);
    if (!body.ok) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: body.message },
        requestId
      );
    }
    const parsed = runBodySchema.safeParse(body.value);
    if (!parsed.success) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: parsed.error.message },
        requestId
      );
    }

    const result = await fileService.triggerTiering({
      async: parsed.data.async,
      requestId,
    });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    if (result.data.mode === 'async') {
      return successResponse(c, formatRun(result.data.run), requestId, 202);
    }
    return successResponse(c, formatRunResult(result.data.result), requestId);
  });

  /**
   * GET /admin/tiering/runs/:id
   */
  app.get('/admin/tiering/runs/:id', async (c) => {
    const requestId = getRequestId(c);
    const result = await fileService.getTieringRun(c.req.param('id'));

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatRun(result.data), requestId);
  });

  /**
   * POST /admin/tiering/runs/:id/cancel
   */
  app.post('/admin/tiering/runs/:id/cancel', async (c) => {
    const requestId = getRequestId(c);
    const result = await fileService.cancelTieringRun(c.req.param('id'));

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatRun(result.data), requestId);
  });

  // ─────────────────────────────────────────────────────────────
  // ADMIN STATS
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /admin/stats
   * File count and bytes per tier
   */
  app.get('/admin/stats', async (c) => {
    const requestId = getRequestId(c);
    const result = await fileService.getStats();

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  // ─────────────────────────────────────────────────────────────
  // ADMIN AUDIT
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /admin/audit?action=&resourceType=&resourceId=&since=&limit=
   * Newest entries first
   */
  app.get('/admin/audit', async (c) => {
    const requestId = getRequestId(c);

    const query = auditQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: query.error.message },
        requestId
      );
    }

    const result = await auditService.queryLogs(query.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data.map(formatAuditLog), requestId);
  });

  return app;
}
