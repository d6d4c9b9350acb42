/**
 * Renderer
 *
 * Entry point of the view layer. Under the `cache` policy compiled templates
 * are built once per name and reused; under `no-cache` every render rebuilds
 * from source and the store is never touched.
 *
 * Output is executed into memory first and written to the sink only after
 * execution succeeded, so a failed render leaves the sink untouched.
 */

import { getLogger, type Logger } from '../telemetry/logger.ts';
import { withSpan } from '../telemetry/otel.ts';
import {
  ExecutionError,
  SourceNotFoundError,
  TemplateNotFoundError,
  WriteError,
} from './errors.ts';
import type { CompiledTemplate, Loader } from './loader.ts';
import { BufferSink, type RenderSink } from './sink.ts';
import { TemplateStore } from './store.ts';

export type CachePolicy = 'cache' | 'no-cache';

export interface RendererOptions {
  cachePolicy?: CachePolicy;
  store?: TemplateStore;
  logger?: Logger;
}

export class Renderer {
  readonly store: TemplateStore;
  private policy: CachePolicy;
  private logger: Logger;

  constructor(private loader: Loader, options: RendererOptions = {}) {
    this.policy = options.cachePolicy ?? 'cache';
    this.logger = options.logger ?? getLogger();
    this.store = options.store ?? new TemplateStore(this.logger);
  }

  get cachePolicy(): CachePolicy {
    return this.policy;
  }

  /**
   * Switch policy. Any change clears the store so no template compiled under
   * the previous policy is served afterwards.
   */
  setCachePolicy(policy: CachePolicy): void {
    if (policy === this.policy) return;

    this.policy = policy;
    this.store.reset();
    this.logger.info('Template cache policy changed', { policy });
  }

  /**
   * Render `name` against `payload` into `sink`
   */
  async render(sink: RenderSink, name: string, payload?: unknown): Promise<void> {
    await withSpan('view.render', async (span) => {
      span.setAttribute('view.template', name);
      span.setAttribute('view.cache_policy', this.policy);

      const template = await this.compiled(name);

      let output: string;
      try {
        output = template.render(payload);
      } catch (error) {
        throw new ExecutionError(template.name, { cause: error });
      }

      try {
        await sink.write(output);
      } catch (error) {
        throw new WriteError(template.name, { cause: error });
      }
    });
  }

  async renderToString(name: string, payload?: unknown): Promise<string> {
    const sink = new BufferSink();
    await this.render(sink, name, payload);
    return sink.toString();
  }

  /**
   * Build every page the loader knows about. Under `cache` the results are
   * stored; under `no-cache` the pages are only checked to compile.
   */
  async preload(): Promise<string[]> {
    const pages = await this.loader.pages();
    for (const page of pages) {
      await this.compiled(page);
    }
    this.logger.info('Templates preloaded', { count: pages.length, policy: this.policy });
    return pages;
  }

  private async compiled(name: string): Promise<CompiledTemplate> {
    const id = this.loader.resolve(name);

    try {
      if (this.policy === 'cache') {
        return await this.store.populate(id, () => this.loader.load(id));
      }
      return await this.loader.load(id);
    } catch (error) {
      if (error instanceof SourceNotFoundError && error.source === id) {
        throw new TemplateNotFoundError(id, { cause: error });
      }
      throw error;
    }
  }
}
