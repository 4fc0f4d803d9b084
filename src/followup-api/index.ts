import { createServer } from 'http';
import { API_PREFIX } from '@shared/constants';
import { createDatabase } from '@db/connection';
import { PgCaseStore } from '@db/pg-store';
import { config } from './config';
import { createApp } from './app';

const { db, pool } = createDatabase(config.database.url);

const app = createApp(
  {
    store: new PgCaseStore(db),
    engineOptions: {
      alertCategories: config.engine.alertCategories,
      repeatUrgentAlerts: config.engine.repeatUrgentAlerts,
    },
    processRetryLimit: config.engine.processRetryLimit,
  },
  { clientUrl: config.clientUrl },
);
const server = createServer(app);

function shutdown(signal: string) {
  console.warn(`[SERVER] ${signal} received, shutting down`);
  server.close(() => {
    pool.end().then(
      () => process.exit(0),
      () => process.exit(1),
    );
  });
  setTimeout(() => process.exit(1), 5000).unref();
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

server.listen(config.port, () => {
  console.warn(`[SERVER] Reentry follow-up API on port ${config.port}`);
  console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
});

export { app, server };
