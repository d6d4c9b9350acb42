/**
 * Shared test helpers
 */

import { Logger, type LogEntry } from '../framework/telemetry/logger.ts';
import type { CompiledTemplate, Loader } from '../framework/view/loader.ts';

/**
 * Logger that keeps entries in memory instead of printing them
 */
export function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level: 'debug', output: (entry) => entries.push(entry) });
  return { logger, entries };
}

/**
 * Wraps a loader and counts how often templates are built
 */
export class CountingLoader implements Loader {
  loads = 0;

  constructor(private inner: Loader) {}

  resolve(name: string): string {
    return this.inner.resolve(name);
  }

  load(name: string): Promise<CompiledTemplate> {
    this.loads++;
    return this.inner.load(name);
  }

  pages(): Promise<string[]> {
    return this.inner.pages();
  }
}

export class Deferred<T> {
  resolve: (value: T) => void = () => {};
  reject: (reason: unknown) => void = () => {};
  readonly promise = new Promise<T>((resolve, reject) => {
    this.resolve = resolve;
    this.reject = reject;
  });
}

export function fakeTemplate(name: string, output = name): CompiledTemplate {
  return { name, fragments: [name], render: () => output };
}
