import { serve } from '@hono/node-server';
import { createApp } from './index';
import { loadConfig } from './config';
import { createMemoryStore } from './db/store';

const config = loadConfig();
const app = createApp({ store: createMemoryStore(), config });

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log('[Server] Listening', { port: info.port, interval_modifier: config.scheduler.interval_modifier });
});
