import { INestApplication, RequestMethod } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { AppModule } from './app.module';
import { AppConfig } from './config';
import { ErrorHandlerFilter } from './api/middleware/error-handler';
import { requestLogger } from './middleware/request-logger';
import { Logger } from './utils/logger';

export const API_PREFIX = 'api/v1';

/**
 * Apply the HTTP pipeline shared by the server and the integration tests.
 */
export function configureApp(app: INestApplication): INestApplication {
  const config = app.get<ConfigService<AppConfig, true>>(ConfigService);
  const server = config.get('server', { infer: true });

  app.use(helmet());
  app.use(cors(server.corsOrigins.length > 0 ? { origin: server.corsOrigins } : undefined));
  app.use(compression());
  app.use(requestLogger({ slowRequestMs: server.slowRequestMs }));

  app.setGlobalPrefix(API_PREFIX, {
    exclude: [{ path: 'health', method: RequestMethod.GET }],
  });
  app.useGlobalFilters(new ErrorHandlerFilter());

  return app;
}

export async function createApp(): Promise<INestApplication> {
  const app = await NestFactory.create(AppModule, { logger: new Logger('Nest') });
  app.enableShutdownHooks();
  return configureApp(app);
}

export default createApp;
