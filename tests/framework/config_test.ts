/**
 * Config Tests
 *
 * Tests for the configuration management system.
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Config, cachePolicyFrom, loadConfig } from '../../framework/config/config.ts';

async function withConfigFile(
  content: string | undefined,
  fn: (path: string) => Promise<void>
): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), 'config-'));
  const path = join(dir, 'app.json');
  try {
    if (content !== undefined) await writeFile(path, content);
    await fn(path);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

// Config constructor tests

test('Config - uses default values when no options provided', () => {
  const config = new Config();
  assert.equal(config.get('port'), 8080);
  assert.equal(config.get('host'), '0.0.0.0');
  assert.equal(config.get('env'), 'development');
  assert.equal(config.get('logLevel'), 'info');
  assert.equal(config.get('view.useCache'), true);
  assert.equal(config.get('view.viewsPath'), './templates');
});

test('Config - merges provided options with defaults', () => {
  const config = new Config({ port: 3000, env: 'production' });
  assert.equal(config.get('port'), 3000);
  assert.equal(config.get('env'), 'production');
  assert.equal(config.get('host'), '0.0.0.0');
});

test('Config - deep merges nested objects', () => {
  const config = new Config({ view: { useCache: false } });
  assert.equal(config.get('view.useCache'), false);
  assert.equal(config.get('view.pageSuffix'), '.page.tmpl');
});

test('Config - instances do not share defaults', () => {
  const first = new Config();
  first.set('view.useCache', false);

  assert.equal(new Config().get('view.useCache'), true);
});

// get / set / has tests

test('Config.get - returns undefined for missing key', () => {
  const config = new Config();
  assert.equal(config.get('nonexistent'), undefined);
  assert.equal(config.get('view.nonexistent.deeper'), undefined);
});

test('Config.getString - falls back when the value has another type', () => {
  const config = new Config({ title: 42 });
  assert.equal(config.getString('title', 'fallback'), 'fallback');
  assert.equal(config.getNumber('title', 0), 42);
});

test('Config.set - creates nested paths', () => {
  const config = new Config();
  config.set('features.beta.enabled', true);
  assert.equal(config.get('features.beta.enabled'), true);
});

test('Config.has - reports presence', () => {
  const config = new Config();
  assert.equal(config.has('view.layoutSuffix'), true);
  assert.equal(config.has('missing'), false);
});

test('Config.all - returns a copy', () => {
  const config = new Config();
  const all = config.all();
  all.port = 1;

  assert.equal(config.get('port'), 8080);
});

test('Config.view - applies defaults for invalid values', () => {
  const config = new Config({ view: { viewsPath: './views' } });
  config.set('view.useCache', 'yes');

  assert.deepEqual(config.view(), {
    viewsPath: './views',
    pageSuffix: '.page.tmpl',
    layoutSuffix: '.layout.tmpl',
    useCache: true,
  });
});

test('cachePolicyFrom - maps the useCache flag', () => {
  assert.equal(cachePolicyFrom(new Config()), 'cache');
  assert.equal(cachePolicyFrom(new Config({ view: { useCache: false } })), 'no-cache');
});

// loadConfig tests

test('loadConfig - reads the config file', async () => {
  await withConfigFile(JSON.stringify({ port: 9000, view: { useCache: false } }), async (path) => {
    const config = await loadConfig(path, {});

    assert.equal(config.get('port'), 9000);
    assert.equal(config.get('view.useCache'), false);
    assert.equal(config.get('view.viewsPath'), './templates');
  });
});

test('loadConfig - missing file falls back to defaults', async () => {
  await withConfigFile(undefined, async (path) => {
    const config = await loadConfig(path, {});

    assert.deepEqual(config.all(), new Config().all());
  });
});

test('loadConfig - invalid JSON rejects', async () => {
  await withConfigFile('{ port: ', async (path) => {
    await assert.rejects(loadConfig(path, {}), SyntaxError);
  });
});

test('loadConfig - non-object JSON rejects', async () => {
  await withConfigFile('[1, 2]', async (path) => {
    await assert.rejects(loadConfig(path, {}), {
      message: `Configuration file ${path} must contain a JSON object`,
    });
  });
});

test('loadConfig - environment overrides the file', async () => {
  await withConfigFile(JSON.stringify({ port: 9000, logLevel: 'warn' }), async (path) => {
    const config = await loadConfig(path, {
      PORT: '3000',
      HOST: '127.0.0.1',
      NODE_ENV: 'production',
      LOG_LEVEL: 'debug',
      VIEWS_PATH: '/srv/views',
      USE_TEMPLATE_CACHE: 'false',
    });

    assert.equal(config.get('port'), 3000);
    assert.equal(config.get('host'), '127.0.0.1');
    assert.equal(config.get('env'), 'production');
    assert.equal(config.logLevel(), 'debug');
    assert.equal(config.view().viewsPath, '/srv/views');
    assert.equal(cachePolicyFrom(config), 'no-cache');
  });
});

test('loadConfig - ignores malformed environment values', async () => {
  await withConfigFile(undefined, async (path) => {
    const config = await loadConfig(path, {
      PORT: 'abc',
      LOG_LEVEL: 'toString',
      USE_TEMPLATE_CACHE: 'yes',
    });

    assert.equal(config.get('port'), 8080);
    assert.equal(config.logLevel(), 'info');
    assert.equal(config.get('view.useCache'), true);
  });
});
