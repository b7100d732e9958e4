import 'reflect-metadata';
import { BadRequestException, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { json } from 'express';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { validateEnv } from './common/config/env.validation';
import { INVALID_PAYLOAD_MESSAGE } from './common/constants/error-messages.constants';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { buildCorsOptions } from './common/http/cors-policy';
import { requestIdMiddleware } from './common/middleware/request-id.middleware';
import { createLogger, logger } from './common/utils/logger';

export const GLOBAL_PREFIX = 'api';

export function configureApp(app: NestExpressApplication): void {
  app.use(helmet());
  app.use(json({ limit: '100kb' }));
  app.use(requestIdMiddleware);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: () => new BadRequestException(INVALID_PAYLOAD_MESSAGE),
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());
  app.setGlobalPrefix(GLOBAL_PREFIX);
}

async function bootstrap(): Promise<void> {
  logger.boot();

  const validatedEnv = validateEnv(process.env);
  const nestLogLevel = validatedEnv.LOG_LEVEL === 'info' ? 'log' : validatedEnv.LOG_LEVEL;
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: [nestLogLevel, 'warn', 'error'],
    bodyParser: false,
  });

  configureApp(app);
  app.enableCors(buildCorsOptions(validatedEnv));

  createLogger('Bootstrap').info('cors_configuration', {
    event: 'cors_configuration',
    cors_mode: validatedEnv.NODE_ENV === 'production' ? 'strict' : 'permissive',
    allowed_origins_count: validatedEnv.ALLOWED_ORIGINS.length,
  });

  await app.listen(validatedEnv.PORT);

  createLogger('Bootstrap').info(`Carbon estimator listening on port ${validatedEnv.PORT}`);
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    createLogger('Bootstrap').error(
      'Failed to bootstrap carbon estimator',
      error instanceof Error ? error : undefined,
    );
    process.exit(1);
  });
}
