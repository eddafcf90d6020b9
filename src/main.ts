import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module.js';
import { ConflictExceptionFilter } from './common/filters/conflict-exception.filter.js';
import { runMigrations } from './database/migrate.js';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  if (process.env.DATABASE_URL) {
    try {
      await runMigrations(process.env.DATABASE_URL);
    } catch (error: unknown) {
      logger.error(
        'Failed to run migrations',
        error instanceof Error ? error.stack : String(error),
      );
      process.exit(1);
    }
  }

  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter(),
  );

  app.enableCors();
  app.setGlobalPrefix('api', { exclude: ['health'] });
  app.useGlobalFilters(new ConflictExceptionFilter());

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Clinic Scheduling API')
    .setDescription(
      'Physician appointment booking with conflict detection and slot search',
    )
    .setVersion('1.0')
    .build();

  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('docs', app, document);

  const port = process.env.PORT ?? 3000;
  await app.listen(port, '0.0.0.0');
  logger.log(`Listening on port ${port}`);
}
void bootstrap();
