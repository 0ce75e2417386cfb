import 'reflect-metadata';

import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';

import { AppModule } from './app.module';
import { ProcessConfig } from './config/process.config';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');

  const processConfig = app.get<ProcessConfig>(ProcessConfig);

  app.enableCors({
    origin: processConfig.webOrigin,
  });
  app.setGlobalPrefix('api');
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  SwaggerModule.setup(
    'openapi',
    app,
    SwaggerModule.createDocument(app, new DocumentBuilder().setTitle('relaypush server').build()),
  );

  await app.listen(processConfig.port);
  logger.log(`Listening on port ${processConfig.port}, allowed origins: ${processConfig.webOrigin.join(', ')}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? (error.stack ?? error.message) : String(error));
  process.exit(1);
});
