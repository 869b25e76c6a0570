import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { createAppLogger } from './common/logging/create-app-logger';
import { env } from './config/env.validation';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: createAppLogger('bootstrap'),
  });

  app.use(helmet({ contentSecurityPolicy: false }));

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: { enableImplicitConversion: true },
    }),
  );

  app.setGlobalPrefix(env.API_PREFIX.replace(/^\//, ''));
  app.enableShutdownHooks();

  await app.listen(env.PORT, '0.0.0.0');
  const logger = new Logger('bootstrap');
  logger.log(`listening on :${env.PORT}${env.API_PREFIX}`);
}

void bootstrap();
