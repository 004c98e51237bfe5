import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { API_PREFIX, configureApp } from './app.setup';
import { AppConfig } from './configs/app.config';
import { isError } from './common/errors/skyvision.errors';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create<NestExpressApplication>(AppModule);
  configureApp(app);

  // Swagger Configuration
  const config = new DocumentBuilder()
    .setTitle('SkyVision API')
    .setDescription('Text, image and hybrid similarity search over airports and airlines')
    .setVersion('1.0')
    .addTag('search', 'Similarity search endpoints')
    .addTag('media', 'Cached media and image proxy')
    .addTag('health', 'Liveness and readiness probes')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup(`${API_PREFIX}/docs`, app, document);

  app.enableShutdownHooks();

  const { port } = app.get(ConfigService).getOrThrow<AppConfig>('app');
  await app.listen(port);

  logger.log(`Application is running on: http://localhost:${port}`);
  logger.log(`Readiness check: http://localhost:${port}/${API_PREFIX}/readyz`);
  logger.log(`Swagger documentation: http://localhost:${port}/${API_PREFIX}/docs`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start server',
    isError(error) ? error.stack : String(error),
  );
  process.exit(1);
});
