import { Module, Global, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { neon } from '@neondatabase/serverless';
import { drizzle, NeonHttpDatabase } from 'drizzle-orm/neon-http';
import * as schema from './schema/index.js';

export const DATABASE_CONNECTION = 'DATABASE_CONNECTION';

export type DatabaseConnection = NeonHttpDatabase<typeof schema>;

/** Resolves to null when no DATABASE_URL is configured. */
@Global()
@Module({
  providers: [
    {
      provide: DATABASE_CONNECTION,
      useFactory: (config: ConfigService): DatabaseConnection | null => {
        const databaseUrl = config.get<string>('DATABASE_URL');
        if (!databaseUrl) {
          new Logger(DatabaseModule.name).log(
            'DATABASE_URL not set, appointments are kept in memory',
          );
          return null;
        }
        const sql = neon(databaseUrl);
        return drizzle({ client: sql, schema });
      },
      inject: [ConfigService],
    },
  ],
  exports: [DATABASE_CONNECTION],
})
export class DatabaseModule {}
