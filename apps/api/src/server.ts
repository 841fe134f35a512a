import { serve } from '@hono/node-server';
import app from './index';
import { getConfig } from './services/config';

const port = getConfig().server.port;

console.log(`[Server] Starting on port ${port}...`);

serve({
  fetch: app.fetch,
  port,
});

console.log(`[Server] Running at http://localhost:${port}`);
