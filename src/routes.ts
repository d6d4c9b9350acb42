/**
 * Application Routes
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Logger } from '../framework/telemetry/logger.ts';
import type { PageHandler, PageRequest, PageResponse, Repository } from './handlers.ts';

export function routes(repo: Repository): Map<string, PageHandler> {
  return new Map([
    ['/', repo.home],
    ['/home', repo.home],
    ['/about', repo.about],
  ]);
}

/**
 * Dispatch GET requests by exact path; anything else is a 404
 */
export async function dispatch(
  table: Map<string, PageHandler>,
  req: PageRequest,
  res: PageResponse
): Promise<void> {
  const path = new URL(req.url ?? '/', 'http://localhost').pathname;
  const handler = req.method === 'GET' || req.method === 'HEAD' ? table.get(path) : undefined;

  if (!handler) {
    res.statusCode = 404;
    res.setHeader('Content-Type', 'text/plain; charset=utf-8');
    res.end('Not Found');
    return;
  }

  await handler(req, res);
}

/**
 * Request listener for `http.createServer`
 */
export function createRequestListener(
  repo: Repository,
  logger: Logger
): (req: IncomingMessage, res: ServerResponse) => void {
  const table = routes(repo);
  return (req, res) => {
    dispatch(table, req, res).catch((error: unknown) => {
      logger.error('Unhandled request failure', error, { path: req.url });
    });
  };
}
