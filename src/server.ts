/**
 * Analysis Engine Server
 *
 * Entry point: load .env, build the app, listen.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './app';
import { getServerConfig } from './lib/config-parser';
import { logger } from './lib/logger';
import { getAnalysisOrchestrator } from './services/analysis';
import { registerGracefulShutdownHandlers } from './server-shutdown';

const { port } = getServerConfig();

// Fail at startup, not on the first request, when the analysis config is inconsistent.
getAnalysisOrchestrator();

const server = serve({ fetch: createApp().fetch, port }, (info) => {
  logger.info(`Analysis engine listening on port ${info.port}`);
});

registerGracefulShutdownHandlers(server);
