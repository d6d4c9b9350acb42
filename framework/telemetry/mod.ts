/**
 * Telemetry & Observability
 *
 * Structured logging and OpenTelemetry spans for the view layer.
 */

export {
  Logger,
  getLogger,
  setLogger,
  createRequestLogger,
  serializeError,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
  type RequestLogContext,
  type SerializedError,
} from './logger.ts';

export {
  isOTELEnabled,
  getOTELTracer,
  withSpan,
  SpanKind,
  SpanStatusCode,
  type CreateSpanOptions,
  type Span,
  type Attributes,
} from './otel.ts';
