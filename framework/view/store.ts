/**
 * Template Store
 *
 * Compiled templates keyed by name. Concurrent `populate` calls for the same
 * absent name share one in-flight build: every caller resolves with the same
 * template, or rejects with the same error. A failed build leaves the store as
 * it was.
 */

import { getLogger, type Logger } from '../telemetry/logger.ts';
import type { CompiledTemplate } from './loader.ts';

export class TemplateStore<T = CompiledTemplate> {
  private entries = new Map<string, T>();
  private pending = new Map<string, Promise<T>>();
  // Bumped by reset() so builds started before it are not stored afterwards.
  private generation = 0;
  private logger: Logger;

  constructor(logger: Logger = getLogger()) {
    this.logger = logger.child({ component: 'template-store' });
  }

  get size(): number {
    return this.entries.size;
  }

  get(name: string): T | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /**
   * Return the stored template for `name`, building and storing it first if absent
   */
  populate(name: string, build: () => Promise<T>): Promise<T> {
    const existing = this.entries.get(name);
    if (existing !== undefined) {
      this.logger.debug('Using cached template', { template: name });
      return Promise.resolve(existing);
    }

    const inFlight = this.pending.get(name);
    if (inFlight) {
      this.logger.debug('Waiting for template build in progress', { template: name });
      return inFlight;
    }

    this.logger.debug('Creating template and adding to cache', { template: name });

    const generation = this.generation;
    const task: Promise<T> = Promise.resolve()
      .then(build)
      .then((template) => {
        if (generation === this.generation) {
          this.entries.set(name, template);
        }
        return template;
      })
      .finally(() => {
        if (this.pending.get(name) === task) {
          this.pending.delete(name);
        }
      });

    this.pending.set(name, task);
    return task;
  }

  /**
   * Drop every entry and forget builds still in flight
   */
  reset(): void {
    this.entries.clear();
    this.pending.clear();
    this.generation++;
  }
}
