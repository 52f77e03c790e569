/**
 * POST /v1/discover
 *
 * Run a discovery pass over one origin and return the serialized brief.
 * Body: { url, maxPages?, strict? }
 */

import { Router, Request, Response, NextFunction } from 'express';
import { discover } from '../../core/discovery.js';
import { serializeBrief } from '../../core/brief.js';
import { FetchFailureError, InvalidConfigurationError, InvalidInputError } from '../../types.js';

/** Whole-request timeout for POST /v1/discover */
export const DISCOVER_REQUEST_TIMEOUT_MS = 180_000;

// A run ends before the request timeout answers 504
const RUN_DEADLINE_MS = DISCOVER_REQUEST_TIMEOUT_MS - 5_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function badRequest(req: Request, res: Response, type: string, message: string): void {
  res.status(400).json({
    success: false,
    error: { type, message },
    requestId: req.requestId,
  });
}

export function createDiscoverRouter(): Router {
  const router = Router();

  router.post('/v1/discover', async (req: Request, res: Response, next: NextFunction) => {
    const body: unknown = req.body;
    if (!isRecord(body)) {
      badRequest(req, res, 'invalid_request', 'Request body must be a JSON object');
      return;
    }

    const { url, maxPages, strict } = body;
    if (typeof url !== 'string' || !url.trim()) {
      badRequest(req, res, 'invalid_input', 'Missing required field: url');
      return;
    }
    if (maxPages !== undefined && typeof maxPages !== 'number') {
      badRequest(req, res, 'invalid_configuration', 'maxPages must be a number');
      return;
    }
    if (strict !== undefined && typeof strict !== 'boolean') {
      badRequest(req, res, 'invalid_configuration', 'strict must be a boolean');
      return;
    }

    // Stop fetching when the client goes away
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const brief = await discover(url, { maxPages, strict, deadlineMs: RUN_DEADLINE_MS, signal: controller.signal });
      res.json(serializeBrief(brief));
    } catch (err) {
      if (err instanceof InvalidInputError) {
        badRequest(req, res, 'invalid_input', err.message);
        return;
      }
      if (err instanceof InvalidConfigurationError) {
        badRequest(req, res, 'invalid_configuration', err.message);
        return;
      }
      if (err instanceof FetchFailureError) {
        res.status(502).json({
          success: false,
          error: { type: 'fetch_failure', message: err.message, url: err.url, status: err.status },
          requestId: req.requestId,
        });
        return;
      }
      next(err);
    }
  });

  return router;
}
