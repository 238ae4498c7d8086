// Node entry point: serves the fetch handler over HTTP

import { serve } from '@hono/node-server';
import { getConfig } from './config/settings';
import { createApp } from './index';
import { createServices } from './services';
import { apiLogger } from './utils/logger';

const config = getConfig();
const app = createApp(config, createServices(config));

const server = serve({ fetch: (request) => app.fetch(request), port: config.port }, (info) => {
  apiLogger.info(`Listening on http://localhost:${info.port}`, {
    environment: config.environment,
    imageProvider: config.image.provider,
    pipelineEngine: config.pipeline.engine,
  });
});

function shutdown(signal: string): void {
  apiLogger.info(`Received ${signal}; closing server`);
  server.close();
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
