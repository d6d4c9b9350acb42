/**
 * Template Loader
 *
 * Compiles a page fragment and the shared layout fragments of a source into
 * one executable template. Templates use Handlebars syntax; layouts are
 * registered as partials named after their file, so a page wraps itself in
 * `base.layout.tmpl` like this:
 *
 * ```handlebars
 * {{#> base}}
 *   {{#*inline "content"}}<h1>{{title}}</h1>{{/inline}}
 * {{/base}}
 * ```
 *
 * and the layout pulls the page's blocks in with `{{> content}}`.
 *
 * The loader never caches; every `load` reads and compiles from the source.
 */

import Handlebars from 'handlebars';
import { withSpan } from '../telemetry/otel.ts';
import { SourceNotFoundError, TemplateSyntaxError } from './errors.ts';
import type { TemplateSource } from './source.ts';

export interface CompiledTemplate {
  readonly name: string;
  /** Source identifiers merged into this template, page first */
  readonly fragments: readonly string[];
  render(payload: unknown): string;
}

export interface Loader {
  /** Canonical template name for a requested name */
  resolve(name: string): string;
  load(name: string): Promise<CompiledTemplate>;
  /** Every page the source can build, sorted */
  pages(): Promise<string[]>;
}

export interface LoaderOptions {
  pageSuffix?: string;
  layoutSuffix?: string;
}

type Engine = typeof Handlebars;

const DEFAULT_OPTIONS: Required<LoaderOptions> = {
  pageSuffix: '.page.tmpl',
  layoutSuffix: '.layout.tmpl',
};

// Missing fields throw instead of rendering as empty strings.
const COMPILE_OPTIONS = { strict: true };

export class TemplateLoader implements Loader {
  private options: Required<LoaderOptions>;

  constructor(private source: TemplateSource, options: LoaderOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  resolve(name: string): string {
    return name.endsWith(this.options.pageSuffix) ? name : `${name}${this.options.pageSuffix}`;
  }

  async pages(): Promise<string[]> {
    const ids = await this.source.list();
    return ids.filter((id) => id.endsWith(this.options.pageSuffix));
  }

  async layouts(): Promise<string[]> {
    const ids = await this.source.list();
    return ids.filter((id) => id.endsWith(this.options.layoutSuffix));
  }

  async load(name: string): Promise<CompiledTemplate> {
    const id = this.resolve(name);

    return await withSpan('view.load', async (span) => {
      span.setAttribute('view.template', id);

      const page = await this.source.read(id);
      if (page === undefined) {
        throw new SourceNotFoundError(id);
      }

      // Each template gets its own environment so partials never leak between pages.
      const engine = Handlebars.create();
      const fragments = [id];

      for (const layoutId of await this.layouts()) {
        const layout = await this.source.read(layoutId);
        if (layout === undefined) {
          throw new SourceNotFoundError(layoutId);
        }
        engine.registerPartial(this.partialName(layoutId), this.compile(engine, layoutId, layout));
        fragments.push(layoutId);
      }

      const execute = this.compile(engine, id, page);
      span.setAttribute('view.fragments', fragments.length);

      return {
        name: id,
        fragments,
        render: (payload: unknown) => execute(payload),
      };
    });
  }

  private partialName(layoutId: string): string {
    return layoutId.slice(0, -this.options.layoutSuffix.length);
  }

  /**
   * Parse and generate code eagerly so syntax errors surface at load time
   * rather than on first execution.
   */
  private compile(engine: Engine, id: string, text: string): Handlebars.TemplateDelegate {
    try {
      engine.precompile(text, COMPILE_OPTIONS);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TemplateSyntaxError(id, message, { cause: error });
    }
    return engine.compile(text, COMPILE_OPTIONS);
  }
}
