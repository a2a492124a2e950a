/**
 * Application Entry Point
 *
 * Loads configuration, wires all services and starts the Hono application
 * and the tiering timer.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/app.js';
import { createServices } from './bootstrap.js';
import type { AppConfig } from './lib/config.js';
import { ConfigError, loadConfig } from './lib/config.js';
import { errorMessage } from './types/index.js';

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  console.error(error instanceof ConfigError ? error.message : errorMessage(error));
  process.exit(1);
}

const services = createServices(config);
const app = createApp({ services });

console.error(`Server starting on port ${config.port}`);
console.error(
  `Storage backend: ${config.storage.backend}, run store: ${config.runStore.backend}`
);

const server = serve({
  fetch: app.fetch,
  port: config.port,
});

services.worker.start();

function shutdown(signal: string): void {
  console.error(`${signal} received, shutting down`);
  server.close();
  services.worker
    .stop()
    .catch((error: unknown) => {
      console.error('Tiering worker did not stop cleanly:', errorMessage(error));
    })
    .finally(() => {
      process.exit(0);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export { app };
