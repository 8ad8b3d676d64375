import {
  ClassSerializerInterceptor,
  ValidationPipe,
  VersioningType,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { useContainer } from 'class-validator';
import helmet from 'helmet';
import { AppModule } from './app.module';
import validationOptions from './utils/validation-options';
import { AllConfigType } from './config/config.type';

// Non-document members of a create body (fields, names, flags)
const JSON_BODY_OVERHEAD = 256 * 1024;

/**
 * HTTP pipeline shared by main.ts and the end-to-end tests
 */
export function setupApp(app: NestExpressApplication): NestExpressApplication {
  useContainer(app.select(AppModule), { fallbackOnErrors: true });
  const configService = app.get(ConfigService<AllConfigType>);

  // Room for a base64 document at the configured size limit, so that
  // oversized uploads reach the 422 check instead of a 413
  const maxFileSizeMb = configService.getOrThrow('policies.maxFileSizeMb', {
    infer: true,
  });
  app.useBodyParser('json', {
    limit: Math.ceil((maxFileSizeMb * 1024 * 1024 * 4) / 3) + JSON_BODY_OVERHEAD,
  });

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          scriptSrc: ["'self'", "'unsafe-inline'", "'unsafe-eval'"], // Swagger UI needs unsafe-eval
          imgSrc: ["'self'", 'data:', 'https:'],
          connectSrc: ["'self'"],
        },
      },
      noSniff: true,
    }),
  );

  app.enableShutdownHooks();
  app.setGlobalPrefix(
    configService.getOrThrow('app.apiPrefix', { infer: true }),
    {
      exclude: ['/'],
    },
  );
  app.enableVersioning({
    type: VersioningType.URI,
  });
  app.useGlobalPipes(new ValidationPipe(validationOptions));
  app.useGlobalInterceptors(
    new ClassSerializerInterceptor(app.get(Reflector)),
  );

  return app;
}
