import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import { resolve } from 'path';
import { AppConfig } from './configs/app.config';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';
import { ResponseInterceptor } from './common/interceptors/response.interceptor';

export const API_PREFIX = 'api';

/**
 * Global HTTP setup shared by the server and the end-to-end tests: prefix,
 * validation, envelopes, CORS, JSON body limit and the media directory.
 */
export function configureApp(app: NestExpressApplication): void {
  const appConfig = app.get(ConfigService).getOrThrow<AppConfig>('app');

  // CORS Configuration
  app.enableCors({
    origin: appConfig.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  });

  // Base64 images in hybrid requests exceed the default 100kb
  app.useBodyParser('json', { limit: '8mb' });

  app.setGlobalPrefix(API_PREFIX);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new ResponseInterceptor());

  // Cached images are served as-is; the pipeline may replace them in place
  app.useStaticAssets(resolve(appConfig.mediaDir), {
    prefix: '/media/',
    setHeaders: (res) => {
      res.setHeader('Cache-Control', 'no-cache');
    },
  });
}
