/**
 * Presentation Layer (View/Template)
 *
 * Turns handler data into HTML through compiled, optionally cached templates.
 *
 * Responsibilities:
 * - Compile page templates together with shared layouts
 * - Reuse compiled templates under the caching policy
 * - Render all-or-nothing into a response
 * - Report failures as typed errors
 */

export {
  ViewError,
  ViewErrorCodes,
  SourceNotFoundError,
  TemplateSyntaxError,
  TemplateNotFoundError,
  ExecutionError,
  WriteError,
  isViewError,
  type ViewErrorCode,
} from './errors.ts';
export { FileSystemSource, MemorySource, type TemplateSource } from './source.ts';
export {
  TemplateLoader,
  type CompiledTemplate,
  type Loader,
  type LoaderOptions,
} from './loader.ts';
export { TemplateStore } from './store.ts';
export { Renderer, type CachePolicy, type RendererOptions } from './renderer.ts';
export { BufferSink, writableSink, type RenderSink } from './sink.ts';
export { createTemplateData, type TemplateData } from './template_data.ts';
