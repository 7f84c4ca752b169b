import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { createApp } from './app';
import { AppConfig } from './config';
import logger from './utils/logger';

const startServer = async () => {
  logger.info('Initializing server...');

  const app = await createApp();
  const config = app.get<ConfigService<AppConfig, true>>(ConfigService);
  const server = config.get('server', { infer: true });

  await app.listen(server.port);
  logger.info(`Server running in ${server.env} mode on port ${server.port}`);

  process.on('unhandledRejection', (err) => {
    logger.error('Unhandled rejection:', err);
  });
};

startServer().catch((error: unknown) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
