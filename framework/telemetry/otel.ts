/**
 * OpenTelemetry Integration
 *
 * Spans around view operations. Tracing is opt-in through `OTEL_ENABLED=true`;
 * the host application registers the SDK and exporter, this module only talks
 * to `@opentelemetry/api`.
 *
 * @module
 */

import {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Context,
  type Attributes,
} from '@opentelemetry/api';

/**
 * Check if OpenTelemetry is enabled via the OTEL_ENABLED environment variable
 */
export function isOTELEnabled(): boolean {
  return process.env.OTEL_ENABLED === 'true';
}

let _tracer: Tracer | undefined;

/**
 * Get the tracer for the view layer
 *
 * @param name - Tracer name (default: 'view-cache')
 * @param version - Tracer version (default: '0.1.0')
 */
export function getOTELTracer(name = 'view-cache', version = '0.1.0'): Tracer {
  if (!_tracer) {
    _tracer = trace.getTracer(name, version);
  }
  return _tracer;
}

export interface CreateSpanOptions {
  /** Span kind (default: INTERNAL) */
  kind?: SpanKind;
  /** Initial attributes */
  attributes?: Attributes;
  /** Parent context (uses current context if not provided) */
  parentContext?: Context;
}

/**
 * Create a new span and run a function within its context.
 * The span is ended when the function settles.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  options: CreateSpanOptions = {},
): Promise<T> {
  if (!isOTELEnabled()) {
    const noopSpan = trace.getTracer('noop').startSpan('noop');
    try {
      return await fn(noopSpan);
    } finally {
      noopSpan.end();
    }
  }

  const tracer = getOTELTracer();
  const parentCtx = options.parentContext ?? context.active();

  return tracer.startActiveSpan(
    name,
    {
      kind: options.kind ?? SpanKind.INTERNAL,
      attributes: options.attributes,
    },
    parentCtx,
    async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        const exception = error instanceof Error ? error : new Error(String(error));
        span.recordException(exception);
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: exception.message,
        });
        throw error;
      } finally {
        span.end();
      }
    },
  );
}

export { SpanKind, SpanStatusCode, type Span, type Attributes };
