import express, { Application } from 'express';
import { ServerConfig, toPluginOptions } from './config.js';
import { Logger } from './locator.js';
import { docViewer } from './plugin.js';

/**
 * Create and configure the Express application
 */
export function createApp(config: ServerConfig, logger: Logger = console): Application {
  const app = express();
  const options = toPluginOptions(config);

  docViewer(app, { ...options, logger });

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      mount: config.mount,
      roots: options.roots
    });
  });

  app.get('/', (_req, res) => {
    res.redirect(config.mount);
  });

  return app;
}
