import 'dotenv/config';
import { env } from './config/env';
import { closeDatabase, initializeDatabase } from './database';
import { createApp } from './app';
import { Logger } from './utils/logger';

async function startServer(): Promise<void> {
  await initializeDatabase();
  Logger.info('Database initialized successfully');

  // Repositories are created on first use, so the app is built after the database is ready
  const app = createApp();

  const server = app.listen(env.PORT, () => {
    Logger.info(`Server is running on http://localhost:${env.PORT}`);
    Logger.info(`Swagger documentation available at http://localhost:${env.PORT}/api-docs`);
  });

  const shutdown = (signal: NodeJS.Signals) => {
    Logger.info(`${signal} received, shutting down`);
    server.close(() => {
      closeDatabase()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          Logger.error('Failed to close database', error);
          process.exit(1);
        });
    });
  };

  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

startServer().catch((error: unknown) => {
  Logger.error('Failed to start server', error);
  process.exit(1);
});
