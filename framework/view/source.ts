/**
 * Template Sources
 *
 * Backing stores the loader reads raw template text from.
 */

import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';

export interface TemplateSource {
  /**
   * Read a fragment, or `undefined` when it does not exist
   */
  read(id: string): Promise<string | undefined>;

  /**
   * All fragment identifiers, sorted
   */
  list(): Promise<string[]>;
}

/**
 * Templates stored as files directly under a views directory
 */
export class FileSystemSource implements TemplateSource {
  constructor(public readonly root: string) {}

  async read(id: string): Promise<string | undefined> {
    if (!isPlainIdentifier(id)) return undefined;

    try {
      return await readFile(join(this.root, id), 'utf8');
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
  }

  async list(): Promise<string[]> {
    try {
      const entries = await readdir(this.root, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile())
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }
}

/**
 * Templates held in memory, e.g. bundled with the application or built in tests
 */
export class MemorySource implements TemplateSource {
  private fragments: Map<string, string>;

  constructor(entries: Record<string, string> = {}) {
    this.fragments = new Map(Object.entries(entries));
  }

  read(id: string): Promise<string | undefined> {
    return Promise.resolve(this.fragments.get(id));
  }

  list(): Promise<string[]> {
    return Promise.resolve([...this.fragments.keys()].sort());
  }

  set(id: string, text: string): void {
    this.fragments.set(id, text);
  }

  delete(id: string): boolean {
    return this.fragments.delete(id);
  }
}

function isPlainIdentifier(id: string): boolean {
  return id !== '' && !id.includes('/') && !id.includes('\\') && !id.includes('..');
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
