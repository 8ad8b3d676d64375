import 'dotenv/config';
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { setupApp } from './app.setup';
import { AllConfigType } from './config/config.type';
import { TENANT_SECURITY_SCHEME } from './tenancy/tenant.guard';

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    cors: true,
  });
  setupApp(app);
  const configService = app.get(ConfigService<AllConfigType>);
  const logger = new Logger('Bootstrap');

  // Swagger/OpenAPI documentation (disable with SWAGGER_ENABLED=false)
  const enableSwagger = process.env.SWAGGER_ENABLED !== 'false';

  if (enableSwagger) {
    const tenantHeader = configService.getOrThrow('app.tenantHeader', {
      infer: true,
    });
    const options = new DocumentBuilder()
      .setTitle(configService.getOrThrow('app.name', { infer: true }))
      .setDescription('Tenant-scoped policy analysis records')
      .setVersion('1.0')
      .addApiKey(
        { type: 'apiKey', in: 'header', name: tenantHeader },
        TENANT_SECURITY_SCHEME,
      )
      .build();

    const document = SwaggerModule.createDocument(app, options);
    SwaggerModule.setup('docs', app, document, {
      swaggerOptions: {
        persistAuthorization: true,
      },
    });

    logger.log(
      `Swagger documentation available at http://localhost:${configService.get('app.port', { infer: true })}/docs`,
    );
  }

  await app.listen(configService.getOrThrow('app.port', { infer: true }));
}
void bootstrap();
