import { Test } from '@nestjs/testing';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { AppModule } from '../../src/app.module';
import { Clock } from '../../src/common/clock';
import { FixedClock } from './fixed-clock';
import { ConflictExceptionFilter } from '../../src/common/filters/conflict-exception.filter';
import { DATABASE_CONNECTION } from '../../src/database/database.module';
import { NOW } from '../fixtures/appointments';

/**
 * Boots the full application on Fastify with the in-memory store and a
 * clock frozen at {@link NOW}, wired the same way as `main.ts`.
 */
export async function createTestApp(): Promise<NestFastifyApplication> {
  const moduleFixture = await Test.createTestingModule({
    imports: [AppModule],
  })
    .overrideProvider(DATABASE_CONNECTION)
    .useValue(null)
    .overrideProvider(Clock)
    .useValue(new FixedClock(NOW))
    .compile();

  const app = moduleFixture.createNestApplication<NestFastifyApplication>(
    new FastifyAdapter(),
    { logger: false },
  );
  app.setGlobalPrefix('api', { exclude: ['health'] });
  app.useGlobalFilters(new ConflictExceptionFilter());

  await app.init();
  await app.getHttpAdapter().getInstance().ready();
  return app;
}
