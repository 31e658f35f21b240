import { Router, type Response } from 'express';
import { toErrorBody } from '../core/errors.js';
import { FORMAT_CHOICES, FORMAT_LABELS, isFormatChoice } from '../core/formats.js';
import type { DeliverableFile } from '../core/orchestrator.js';
import type { AppContext } from '../types/appContext.js';
import type { FormatChoice, Requester } from '../types/downloads.js';

const MAX_URL_LENGTH = 2048;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function nonEmpty(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

function parseCreateBody(
  body: unknown,
): { ok: true; requester: Requester; url: string } | { ok: false; message: string } {
  if (!isObject(body)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }

  const userId = nonEmpty(body.user_id);
  if (!userId) {
    return { ok: false, message: 'user_id is required and must be a non-empty string' };
  }

  const url = nonEmpty(body.url);
  if (!url) {
    return { ok: false, message: 'url is required and must be a non-empty string' };
  }
  if (url.length > MAX_URL_LENGTH) {
    return { ok: false, message: `url exceeds max length of ${MAX_URL_LENGTH} characters` };
  }

  return {
    ok: true,
    requester: { id: userId, displayName: nonEmpty(body.user_name) ?? userId },
    url,
  };
}

function parseDownloadBody(
  body: unknown,
): { ok: true; userId: string; format: FormatChoice } | { ok: false; message: string } {
  if (!isObject(body)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }

  const userId = nonEmpty(body.user_id);
  if (!userId) {
    return { ok: false, message: 'user_id is required and must be a non-empty string' };
  }

  if (!isFormatChoice(body.format)) {
    return { ok: false, message: `format must be one of: ${FORMAT_CHOICES.join(', ')}` };
  }

  return { ok: true, userId, format: body.format };
}

function validationError(res: Response, message: string): void {
  res.status(400).json({
    error: {
      code: 'VALIDATION_ERROR',
      message,
    },
  });
}

function selectionNotFound(res: Response): void {
  res.status(404).json({
    error: {
      code: 'SELECTION_NOT_FOUND',
      message: 'Selection expired or not found. Please send the link again.',
    },
  });
}

/** Streams the file as the response body; resolves once the last byte is written. */
function sendFile(res: Response, file: DeliverableFile): Promise<void> {
  res.setHeader('x-reelgrab-record-id', String(file.recordId));
  res.setHeader('x-reelgrab-platform', file.platform);
  res.setHeader('x-reelgrab-title', encodeURIComponent(file.title));
  res.setHeader('x-reelgrab-size-bytes', String(file.sizeBytes));

  return new Promise((resolve, reject) => {
    res.download(file.path, file.fileName, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

export function createRequestsRouter(ctx: AppContext): Router {
  const router = Router();

  router.post('/v1/requests', async (req, res) => {
    const parsed = parseCreateBody(req.body);
    if (!parsed.ok) {
      validationError(res, parsed.message);
      return;
    }

    try {
      const admission = await ctx.orchestrator.admit(parsed.requester.id, parsed.url);
      if (!admission.ok) {
        res.status(admission.error.statusCode).json(toErrorBody(admission.error));
        return;
      }

      const selection = ctx.selections.create(parsed.requester, parsed.url, admission.platform);
      res.status(201).json({
        request_id: selection.id,
        platform: selection.platform,
        formats: FORMAT_CHOICES.map((id) => ({ id, label: FORMAT_LABELS[id] })),
        expires_at: selection.expiresAt.toISOString(),
        download_url: `/v1/requests/${selection.id}/download`,
      });
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error('[reelgrab] request intake failed', error);
      res.status(500).json({
        error: {
          code: 'REQUEST_FAILED',
          message: 'Could not accept the request. Please try again later.',
        },
      });
    }
  });

  router.post('/v1/requests/:id/download', async (req, res) => {
    const parsed = parseDownloadBody(req.body);
    if (!parsed.ok) {
      validationError(res, parsed.message);
      return;
    }

    const selection = ctx.selections.take(req.params.id, parsed.userId);
    if (!selection) {
      selectionNotFound(res);
      return;
    }

    const disconnect = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) disconnect.abort();
    });

    try {
      const outcome = await ctx.orchestrator.run(
        { requester: selection.requester, url: selection.url, format: parsed.format },
        (file) => sendFile(res, file),
        disconnect.signal,
      );
      if (outcome.ok) return;

      if (disconnect.signal.aborted) {
        // eslint-disable-next-line no-console
        console.warn(`[reelgrab] client went away request_id=${selection.id} code=${outcome.error.code}`);
        return;
      }

      if (res.headersSent) {
        // eslint-disable-next-line no-console
        console.error(
          `[reelgrab] response already started request_id=${selection.id} code=${outcome.error.code}`,
        );
        return;
      }
      res.status(outcome.error.statusCode).json(toErrorBody(outcome.error));
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error(`[reelgrab] download crashed request_id=${selection.id}`, error);
      if (res.headersSent) return;
      res.status(500).json({
        error: {
          code: 'DOWNLOAD_CRASHED',
          message: 'Download failed. Please try again later.',
        },
      });
    }
  });

  router.delete('/v1/requests/:id', (req, res) => {
    const userId = isObject(req.body) ? nonEmpty(req.body.user_id) : undefined;
    if (!userId) {
      validationError(res, 'user_id is required and must be a non-empty string');
      return;
    }

    if (!ctx.selections.cancel(req.params.id, userId)) {
      selectionNotFound(res);
      return;
    }

    res.json({ request_id: req.params.id, status: 'cancelled', message: 'Download cancelled.' });
  });

  return router;
}
