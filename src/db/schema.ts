/**
 * Database schema, embedded so serverless handlers need no file access
 * Every statement is idempotent
 */
export const SCHEMA_SQL = `
CREATE EXTENSION IF NOT EXISTS pgcrypto;

-- Jobs Table
-- One row per application link; repeated runs update the row in place
CREATE TABLE IF NOT EXISTS jobs (
  id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
  company TEXT NOT NULL,
  title TEXT NOT NULL,
  location TEXT NOT NULL DEFAULT 'Not specified',
  link TEXT NOT NULL UNIQUE,
  sponsorship TEXT NOT NULL DEFAULT 'Unclassified',
  source VARCHAR(50) NOT NULL,
  remote BOOLEAN NOT NULL DEFAULT FALSE,
  date_posted TIMESTAMP WITH TIME ZONE,
  description TEXT,
  tags TEXT[] NOT NULL DEFAULT '{}',
  created_at TIMESTAMP WITH TIME ZONE DEFAULT NOW(),
  updated_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
);

-- Indexes for the read queries
CREATE INDEX IF NOT EXISTS idx_jobs_company ON jobs(company);
CREATE INDEX IF NOT EXISTS idx_jobs_source ON jobs(source);
CREATE INDEX IF NOT EXISTS idx_jobs_sponsorship ON jobs(sponsorship);
CREATE INDEX IF NOT EXISTS idx_jobs_remote ON jobs(remote);
CREATE INDEX IF NOT EXISTS idx_jobs_created_at ON jobs(created_at DESC);

CREATE OR REPLACE FUNCTION update_updated_at_column()
RETURNS TRIGGER AS $$
BEGIN
  NEW.updated_at = NOW();
  RETURN NEW;
END;
$$ LANGUAGE plpgsql;

DROP TRIGGER IF EXISTS update_jobs_updated_at ON jobs;
CREATE TRIGGER update_jobs_updated_at
BEFORE UPDATE ON jobs
FOR EACH ROW EXECUTE FUNCTION update_updated_at_column();
`;
