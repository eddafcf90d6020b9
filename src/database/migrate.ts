import { Logger } from '@nestjs/common';
import { neon } from '@neondatabase/serverless';
import * as dotenv from 'dotenv';

// Load env files
dotenv.config({ path: '.env.local' });
dotenv.config({ path: '.env' });

const logger = new Logger('Migrations');

export async function runMigrations(
  databaseUrl = process.env.DATABASE_URL,
): Promise<void> {
  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  logger.log('Checking/creating database schema...');

  const sql = neon(databaseUrl);

  // btree_gist lets the exclusion constraint mix = and && operators
  await sql`CREATE EXTENSION IF NOT EXISTS btree_gist`;

  await sql`
    CREATE TABLE IF NOT EXISTS appointments (
      id UUID PRIMARY KEY,
      physician_id UUID NOT NULL,
      patient_id UUID NOT NULL,
      starts_at TIMESTAMPTZ NOT NULL,
      ends_at TIMESTAMPTZ NOT NULL,
      status VARCHAR(20) NOT NULL DEFAULT 'scheduled'
        CHECK (status IN ('scheduled', 'completed', 'cancelled', 'no_show')),
      reason_for_visit TEXT,
      notes TEXT,
      cancellation_reason TEXT,
      clinical_document_id UUID,
      room_number INT CHECK (room_number BETWEEN 1 AND 999),
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      CHECK (starts_at < ends_at)
    )
  `;

  await sql`
    CREATE TABLE IF NOT EXISTS appointment_audit_log (
      id BIGSERIAL PRIMARY KEY,
      appointment_id UUID NOT NULL,
      action VARCHAR(20) NOT NULL,
      changes JSONB,
      performed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `;

  await sql`CREATE INDEX IF NOT EXISTS idx_appt_physician_time ON appointments(physician_id, starts_at)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_appt_patient ON appointments(patient_id)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_audit_appointment ON appointment_audit_log(appointment_id, performed_at)`;

  // Active appointments of one physician may not overlap
  await sql`
    DO $$
    BEGIN
      IF NOT EXISTS (
        SELECT 1 FROM pg_constraint WHERE conname = 'no_physician_overlap'
      ) THEN
        ALTER TABLE appointments ADD CONSTRAINT no_physician_overlap
        EXCLUDE USING gist (
          physician_id WITH =,
          tstzrange(starts_at, ends_at) WITH &&
        ) WHERE (status <> 'cancelled');
      END IF;
    END $$
  `;

  logger.log('Migration completed successfully');
}

// Run directly if called as script
const isMainModule = process.argv[1]?.includes('migrate');
if (isMainModule) {
  runMigrations()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error(err instanceof Error ? err.stack : String(err));
      process.exit(1);
    });
}
