import { Client } from 'pg';
import * as dotenv from 'dotenv';
import * as path from 'path';

// Load env
dotenv.config({ path: path.resolve(__dirname, '.env') });

const dbUrl = process.env.DATABASE_URL;

if (!dbUrl) {
  console.error("No DATABASE_URL found. Please ensure the Postgres connection URL is available in the environment.");
  process.exit(1);
}

const client = new Client({
  connectionString: dbUrl,
});

async function runPgMigration() {
  console.log("Connecting to PostgreSQL...");
  await client.connect();

  const sqlScript = `
        -- One row per borrower (name + PAN); newer reports replace older ones
        CREATE TABLE IF NOT EXISTS public.credit_reports (
          id BIGSERIAL PRIMARY KEY,
          name TEXT NOT NULL,
          mobile_no TEXT NOT NULL DEFAULT '',
          pan_card TEXT NOT NULL,
          email TEXT NOT NULL DEFAULT '',
          report_date TIMESTAMP NOT NULL,
          score INTEGER NOT NULL DEFAULT 0,
          ckyc TEXT NOT NULL DEFAULT '',
          summary JSONB NOT NULL DEFAULT '{}'::jsonb,
          url TEXT,
          created_at TIMESTAMP WITH TIME ZONE DEFAULT now()
        );

        CREATE INDEX IF NOT EXISTS idx_credit_reports_borrower
          ON public.credit_reports (name, pan_card, report_date DESC);
    `;

  try {
    console.log("Executing credit_reports schema via pg client...");
    await client.query(sqlScript);
    console.log("Schema applied successfully.");
  } catch (e) {
    console.error("Schema execution failed:", e);
    process.exitCode = 1;
  } finally {
    await client.end();
  }
}

runPgMigration().catch(console.error);
