/**
 * Flashcard SRS server
 *
 * Serves the review API over Node's HTTP server with an in-memory store, so
 * sessions and cards last as long as the process. To keep them across
 * restarts, embed the app and pass a StudySessionService built on a
 * persistent SessionStore (for example DexieSessionStore over an IndexedDB
 * implementation) to createApp.
 */

import { serve } from '@hono/node-server';
import { loadConfig } from './config';
import { MemorySessionStore } from './db/memory-store';
import { createApp } from './index';
import { createLogger, setLogLevel } from './logger';
import { StudySessionService } from './services/study-session';

const log = createLogger('Server');

const config = loadConfig();
setLogLevel(config.logLevel);

const service = new StudySessionService(new MemorySessionStore(), config.scheduler, config.session);
const app = createApp({ service });

serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
  const displayHost = config.host === '0.0.0.0' ? 'localhost' : config.host;
  log.info(`Flashcard SRS running at http://${displayHost}:${info.port}`);
  log.info(`Health check at http://${displayHost}:${info.port}/api/health`);
});
