/**
 * Application Entry Point
 *
 * Boot sequence: configuration, logging, view layer, HTTP server.
 */

import { createServer } from 'node:http';
import { cachePolicyFrom, loadConfig } from './framework/config/mod.ts';
import { Logger, setLogger } from './framework/telemetry/logger.ts';
import { FileSystemSource, Renderer, TemplateLoader } from './framework/view/mod.ts';
import { Repository } from './src/handlers.ts';
import { createRequestListener } from './src/routes.ts';

async function main(): Promise<void> {
  // 1. Load configuration
  const config = await loadConfig();

  // 2. Logging
  const logger = new Logger({
    level: config.logLevel(),
    format: config.getString('env', 'development') === 'production' ? 'json' : 'pretty',
  });
  setLogger(logger);

  // 3. View layer
  const view = config.view();
  const loader = new TemplateLoader(new FileSystemSource(view.viewsPath), {
    pageSuffix: view.pageSuffix,
    layoutSuffix: view.layoutSuffix,
  });
  const renderer = new Renderer(loader, { cachePolicy: cachePolicyFrom(config), logger });

  if (renderer.cachePolicy === 'cache') {
    await renderer.preload();
  }

  // 4. Handlers and server
  const repo = new Repository(renderer, logger);
  const server = createServer(createRequestListener(repo, logger));

  const port = config.getNumber('port', 8080);
  const host = config.getString('host', '0.0.0.0');
  server.listen(port, host, () => {
    logger.info('Server listening', { url: `http://${host}:${port}` });
  });
}

main().catch((error: unknown) => {
  console.error('Failed to start application:', error);
  process.exitCode = 1;
});
