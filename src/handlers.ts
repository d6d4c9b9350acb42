/**
 * Page Handlers
 *
 * Each handler renders one page through the shared renderer. A failed render
 * is logged here and answered with a 500; the view layer itself only reports.
 */

import type { IncomingMessage } from 'node:http';
import type { Writable } from 'node:stream';
import { createRequestLogger, getLogger, type Logger } from '../framework/telemetry/logger.ts';
import {
  createTemplateData,
  isViewError,
  writableSink,
  type Renderer,
  type TemplateData,
} from '../framework/view/mod.ts';

export type PageRequest = Pick<IncomingMessage, 'method' | 'url'>;

/**
 * The part of `http.ServerResponse` the handlers use
 */
export interface PageResponse extends Writable {
  statusCode: number;
  readonly headersSent: boolean;
  setHeader(name: string, value: string): unknown;
}

export type PageHandler = (req: PageRequest, res: PageResponse) => Promise<void>;

/**
 * Handlers sharing one renderer
 */
export class Repository {
  private logger: Logger;

  constructor(private renderer: Renderer, logger: Logger = getLogger()) {
    this.logger = logger.child({ component: 'handlers' });
  }

  home: PageHandler = (req, res) => this.page(req, res, 'home', createTemplateData());

  about: PageHandler = (req, res) =>
    this.page(
      req,
      res,
      'about',
      createTemplateData({ stringMap: { test: 'Hello, again' } })
    );

  private async page(
    req: PageRequest,
    res: PageResponse,
    template: string,
    data: TemplateData
  ): Promise<void> {
    const logger = createRequestLogger(this.logger, {
      method: req.method,
      path: req.url,
      template,
    });

    res.setHeader('Content-Type', 'text/html; charset=utf-8');

    try {
      await this.renderer.render(writableSink(res), template, data);
      res.end();
    } catch (error) {
      logger.error('Failed to render page', error, {
        code: isViewError(error) ? error.code : undefined,
      });

      if (res.headersSent) {
        res.destroy();
        return;
      }
      res.statusCode = 500;
      res.setHeader('Content-Type', 'text/plain; charset=utf-8');
      res.end('Internal Server Error');
    }
  }
}
