#!/usr/bin/env node
import { createApp } from './app.js';
import { loadConfig, parsePort } from './config.js';

function argValue(args: string[], name: string): string | undefined {
  const arg = args.find(a => a.startsWith(`--${name}=`));
  return arg?.slice(name.length + 3);
}

/**
 * Start the server
 */
async function bootstrap(): Promise<void> {
  const args = process.argv.slice(2);
  const config = await loadConfig({ configFile: argValue(args, 'config') });

  const portArg = argValue(args, 'port');
  if (portArg) {
    config.port = parsePort(portArg, '--port');
  }

  console.log(`Serving documentation from: ${config.roots.join(', ')}`);
  const app = createApp(config);

  const server = app.listen(config.port, () => {
    console.log(`Docviewer listening on http://localhost:${config.port}${config.mount}`);
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

bootstrap().catch((err: unknown) => {
  console.error('Failed to start:', err instanceof Error ? err.message : err);
  process.exit(1);
});
