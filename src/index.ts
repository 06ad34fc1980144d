// This is the process entrypoint that starts the HTTP server and handles graceful shutdown.

import { loadServerConfig } from './config/env.js';
import { CalendarStore } from './db/database.js';
import { CalendarMessageProcessor } from './mcp/processor.js';
import { createServer } from './server.js';

const config = loadServerConfig();

const store = new CalendarStore(config.dbPath);
const { app, session } = createServer({
  config,
  processor: new CalendarMessageProcessor({ store })
});

// This helper performs graceful shutdown so parked requests drain and SQLite closes cleanly.
async function shutdown(signal: string): Promise<void> {
  app.log.info({ signal }, 'shutdown_started');

  try {
    await app.close();
  } finally {
    store.close();
  }

  app.log.info({ signal }, 'shutdown_completed');
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

app
  .listen({ host: config.host, port: config.port })
  .then(() => {
    app.log.info({ host: config.host, port: config.port, sessionId: session.id }, 'server_started');
  })
  .catch((error: unknown) => {
    app.log.error({ error: error instanceof Error ? error.message : String(error) }, 'server_start_failed');
    process.exit(1);
  });
