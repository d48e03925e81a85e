/**
 * Dashboard API Routes
 *
 * Express router providing JSON endpoints for the topic-share web dashboard.
 * Mounted under /api by the server.
 */

import { Router, Request, Response, NextFunction } from 'express';
import type { Credentials } from '../utils/config';
import {
  handleAnalyze,
  handleBalance,
  handleEstimate,
  handleExportDomains,
  handleExportKeywords,
  handleExportSerp,
  handleKeywords,
  type DashboardDeps,
  type HandlerResult,
} from './handlers';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export const LOGIN_HEADER = 'X-DataForSEO-Login';
export const PASSWORD_HEADER = 'X-DataForSEO-Password';

/** Per-request credentials from headers; never stored. */
export function credentialsFromRequest(req: Request): Credentials | null {
  const login = req.get(LOGIN_HEADER)?.trim();
  const password = req.get(PASSWORD_HEADER)?.trim();
  if (!login || !password) return null;
  return { login, password };
}

function send(res: Response, result: HandlerResult): void {
  if (result.contentType === 'text/csv' && typeof result.body === 'string') {
    res.status(result.status).type('text/csv; charset=utf-8');
    if (result.filename) res.attachment(result.filename);
    res.send(result.body);
    return;
  }
  res.status(result.status).json(result.body);
}

/** Express 4 does not forward rejected promises to the error middleware */
function route(
  fn: (req: Request, res: Response) => Promise<HandlerResult> | HandlerResult,
): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => fn(req, res))
      .then((result) => send(res, result))
      .catch(next);
  };
}

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

export function createDashboardRouter(deps: DashboardDeps): Router {
  const router = Router();

  // GET /balance: remaining DataForSEO credit
  router.get(
    '/balance',
    route((req) => handleBalance(credentialsFromRequest(req), deps)),
  );

  // POST /estimate: pre-flight cost for both stages, no credentials needed
  router.post(
    '/estimate',
    route((req) => handleEstimate(req.body, deps)),
  );

  // POST /keywords: fetch + merge keywords for seed topics
  router.post(
    '/keywords',
    route((req) => handleKeywords(req.body, credentialsFromRequest(req), deps)),
  );

  // POST /analyze: SERP fan-out + domain share for a keyword list
  router.post(
    '/analyze',
    route((req, res) => {
      // Stop issuing SERP requests once the client goes away
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableEnded) controller.abort();
      });
      return handleAnalyze(req.body, credentialsFromRequest(req), deps, {
        signal: controller.signal,
      });
    }),
  );

  // POST /export/keywords, /export/domains, /export/serp: CSV downloads
  router.post(
    '/export/keywords',
    route((req) => handleExportKeywords(req.body)),
  );

  router.post(
    '/export/domains',
    route((req) => handleExportDomains(req.body)),
  );

  router.post(
    '/export/serp',
    route((req) => handleExportSerp(req.body)),
  );

  return router;
}
