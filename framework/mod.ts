/**
 * View Cache Framework
 *
 * Template compilation, caching and rendering for Node.js web applications.
 *
 * @module view-cache
 */

// Configuration
export { Config, cachePolicyFrom, loadConfig, type ConfigOptions, type ViewOptions } from './config/mod.ts';

// Telemetry
export {
  Logger,
  getLogger,
  setLogger,
  createRequestLogger,
  withSpan,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
} from './telemetry/mod.ts';

// View
export {
  ViewError,
  ViewErrorCodes,
  SourceNotFoundError,
  TemplateSyntaxError,
  TemplateNotFoundError,
  ExecutionError,
  WriteError,
  isViewError,
  FileSystemSource,
  MemorySource,
  TemplateLoader,
  TemplateStore,
  Renderer,
  BufferSink,
  writableSink,
  createTemplateData,
  type ViewErrorCode,
  type TemplateSource,
  type CompiledTemplate,
  type Loader,
  type LoaderOptions,
  type CachePolicy,
  type RendererOptions,
  type RenderSink,
  type TemplateData,
} from './view/mod.ts';
