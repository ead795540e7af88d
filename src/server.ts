import { createApp } from './app';
import { config } from './config';
import { getDb } from './db';
import { createIdentificationService } from './services/identification';

const service = createIdentificationService(config, getDb());
const app = createApp({ service });

const server = app.listen(config.port, () => {
  console.log(`Server running on http://localhost:${config.port}`);
  console.log(`Lookup cache: ${config.db.path}`);
});

function shutdown(signal: string) {
  console.log(`${signal} received, shutting down`);
  server.close(() => {
    getDb().close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
