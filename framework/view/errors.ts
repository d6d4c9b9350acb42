/**
 * View Errors
 *
 * Typed failures of the template pipeline. Every error is returned to the
 * caller of `render`; nothing in the view layer terminates the process.
 */

/**
 * Error codes for view failures
 */
export const ViewErrorCodes = {
  SOURCE_NOT_FOUND: 'SOURCE_NOT_FOUND',
  TEMPLATE_SYNTAX: 'TEMPLATE_SYNTAX',
  TEMPLATE_NOT_FOUND: 'TEMPLATE_NOT_FOUND',
  TEMPLATE_EXECUTION: 'TEMPLATE_EXECUTION',
  SINK_WRITE: 'SINK_WRITE',
} as const;

export type ViewErrorCode = (typeof ViewErrorCodes)[keyof typeof ViewErrorCodes];

/**
 * Base class for all view errors
 */
export class ViewError extends Error {
  constructor(
    message: string,
    public readonly code: ViewErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ViewError';
  }
}

/**
 * A template fragment could not be read from its source
 */
export class SourceNotFoundError extends ViewError {
  constructor(public readonly source: string) {
    super(`Template source not found: ${source}`, ViewErrorCodes.SOURCE_NOT_FOUND);
    this.name = 'SourceNotFoundError';
  }
}

/**
 * A fragment failed to parse or compile
 */
export class TemplateSyntaxError extends ViewError {
  constructor(
    public readonly fragment: string,
    public readonly parserMessage: string,
    options?: { cause?: unknown }
  ) {
    super(`Syntax error in ${fragment}: ${parserMessage}`, ViewErrorCodes.TEMPLATE_SYNTAX, options);
    this.name = 'TemplateSyntaxError';
  }
}

/**
 * The requested template is not registered and its page cannot be resolved
 */
export class TemplateNotFoundError extends ViewError {
  constructor(public readonly template: string, options?: { cause?: unknown }) {
    super(`Template not found: ${template}`, ViewErrorCodes.TEMPLATE_NOT_FOUND, options);
    this.name = 'TemplateNotFoundError';
  }
}

/**
 * Executing the template against the payload failed
 */
export class ExecutionError extends ViewError {
  constructor(public readonly template: string, options?: { cause?: unknown }) {
    super(
      `Failed to execute template ${template}: ${describe(options?.cause)}`,
      ViewErrorCodes.TEMPLATE_EXECUTION,
      options
    );
    this.name = 'ExecutionError';
  }
}

/**
 * The sink rejected the rendered output
 */
export class WriteError extends ViewError {
  constructor(public readonly template: string, options?: { cause?: unknown }) {
    super(
      `Failed to write rendered template ${template}: ${describe(options?.cause)}`,
      ViewErrorCodes.SINK_WRITE,
      options
    );
    this.name = 'WriteError';
  }
}

export function isViewError(value: unknown): value is ViewError {
  return value instanceof ViewError;
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
