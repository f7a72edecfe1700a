import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import type { Env } from './config/env.validation';

async function bootstrap() {
  // rawBody: webhook signatures are computed over the exact bytes received
  const app = await NestFactory.create(AppModule, { rawBody: true });
  app.enableShutdownHooks();
  const config = app.get<ConfigService<Env, true>>(ConfigService);

  const swaggerPath = config.get('SWAGGER_PATH', { infer: true });
  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('docs-deploy API')
      .setDescription('Builds documentation on push and publishes it to a pages branch')
      .setVersion('0.0.1')
      .build(),
  );
  SwaggerModule.setup(swaggerPath, app, document);

  const port = config.get('PORT', { infer: true });
  await app.listen(port);
  Logger.log(`Swagger: http://localhost:${port}/${swaggerPath}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? (err.stack ?? err.message) : String(err), 'Bootstrap');
  process.exit(1);
});
