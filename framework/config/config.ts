/**
 * Configuration Management
 *
 * Loads application configuration from a JSON file and the environment.
 * Configuration is read once at startup; the view layer receives plain values
 * derived from it.
 */

import { readFile } from 'node:fs/promises';
import { isLogLevel, type LogLevel } from '../telemetry/logger.ts';
import type { CachePolicy } from '../view/renderer.ts';

export interface ViewOptions {
  viewsPath?: string;
  pageSuffix?: string;
  layoutSuffix?: string;
  useCache?: boolean;
}

export interface ConfigOptions {
  port?: number;
  host?: string;
  env?: string;
  logLevel?: LogLevel;
  view?: ViewOptions;
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

const DEFAULT_CONFIG: ConfigOptions = {
  port: 8080,
  host: '0.0.0.0',
  env: 'development',
  logLevel: 'info',
  view: {
    viewsPath: './templates',
    pageSuffix: '.page.tmpl',
    layoutSuffix: '.layout.tmpl',
    useCache: true,
  },
};

const DEFAULT_PATHS = ['./config/app.json', './config.json'];

/**
 * Configuration manager
 */
export class Config {
  private config: ConfigRecord;

  constructor(options: ConfigOptions = {}) {
    this.config = mergeConfig(structuredClone(DEFAULT_CONFIG), options);
  }

  /**
   * Get a value by dotted path, e.g. `view.useCache`
   */
  get(key: string): unknown {
    return getNestedValue(this.config, key);
  }

  getString(key: string, defaultValue: string): string {
    const value = this.get(key);
    return typeof value === 'string' ? value : defaultValue;
  }

  getNumber(key: string, defaultValue: number): number {
    const value = this.get(key);
    return typeof value === 'number' && Number.isFinite(value) ? value : defaultValue;
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.get(key);
    return typeof value === 'boolean' ? value : defaultValue;
  }

  set(key: string, value: unknown): void {
    setNestedValue(this.config, key, value);
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  all(): ConfigRecord {
    return structuredClone(this.config);
  }

  /**
   * View settings with defaults applied
   */
  view(): Required<ViewOptions> {
    return {
      viewsPath: this.getString('view.viewsPath', './templates'),
      pageSuffix: this.getString('view.pageSuffix', '.page.tmpl'),
      layoutSuffix: this.getString('view.layoutSuffix', '.layout.tmpl'),
      useCache: this.getBoolean('view.useCache', true),
    };
  }

  logLevel(): LogLevel {
    const value = this.get('logLevel');
    return isLogLevel(value) ? value : 'info';
  }
}

/**
 * Map the `view.useCache` flag to the renderer's cache policy
 */
export function cachePolicyFrom(config: Config): CachePolicy {
  return config.view().useCache ? 'cache' : 'no-cache';
}

/**
 * Load configuration from a config file and the environment.
 *
 * Without `configPath` the default locations are tried in order. A missing
 * file means defaults; a file that is not a JSON object is an error.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  let fileConfig: ConfigRecord = {};

  for (const path of configPath ? [configPath] : DEFAULT_PATHS) {
    const content = await readOptionalFile(path);
    if (content === undefined) continue;

    const parsed: unknown = JSON.parse(content);
    if (!isRecord(parsed)) {
      throw new Error(`Configuration file ${path} must contain a JSON object`);
    }
    fileConfig = parsed;
    break;
  }

  const config = new Config(fileConfig);

  const port = env.PORT ? Number.parseInt(env.PORT, 10) : Number.NaN;
  if (Number.isFinite(port)) config.set('port', port);
  if (env.HOST) config.set('host', env.HOST);
  if (env.NODE_ENV) config.set('env', env.NODE_ENV);
  if (isLogLevel(env.LOG_LEVEL)) config.set('logLevel', env.LOG_LEVEL);
  if (env.VIEWS_PATH) config.set('view.viewsPath', env.VIEWS_PATH);
  if (env.USE_TEMPLATE_CACHE === 'true' || env.USE_TEMPLATE_CACHE === 'false') {
    config.set('view.useCache', env.USE_TEMPLATE_CACHE === 'true');
  }

  return config;
}

async function readOptionalFile(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge, skipping undefined overrides
 */
function mergeConfig(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;

    const current = result[key];
    if (isRecord(value)) {
      result[key] = mergeConfig(isRecord(current) ? current : {}, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function getNestedValue(obj: ConfigRecord, path: string): unknown {
  let current: unknown = obj;
  for (const key of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[part] = created;
      current = created;
    }
  }

  current[last] = value;
}
