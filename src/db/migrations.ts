/**
 * Schema statements applied by `npm run migrate`
 *
 * Every statement is idempotent, so the list is safe to re-run against a
 * database at any earlier version. Keep in step with ./schema.ts.
 */
export const MIGRATION_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS stories (
    id varchar(26) PRIMARY KEY NOT NULL,
    title varchar(255) NOT NULL,
    session_id varchar(64) NOT NULL,
    theme varchar(100) NOT NULL,
    created_at timestamptz DEFAULT now() NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_stories_session_id ON stories (session_id)`,

  `CREATE TABLE IF NOT EXISTS story_nodes (
    id varchar(26) PRIMARY KEY NOT NULL,
    story_id varchar(26) NOT NULL REFERENCES stories(id) ON DELETE CASCADE,
    content text NOT NULL,
    is_root boolean DEFAULT false NOT NULL,
    is_ending boolean DEFAULT false NOT NULL,
    is_winning_ending boolean DEFAULT false NOT NULL,
    options jsonb DEFAULT '[]'::jsonb NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_story_nodes_story_id ON story_nodes (story_id)`,

  `CREATE TABLE IF NOT EXISTS story_jobs (
    id varchar(26) PRIMARY KEY NOT NULL,
    session_id varchar(64) NOT NULL,
    theme varchar(100) NOT NULL,
    status varchar(20) DEFAULT 'pending' NOT NULL,
    story_id varchar(26),
    error text,
    created_at timestamptz DEFAULT now() NOT NULL,
    completed_at timestamptz
  )`,
  `CREATE INDEX IF NOT EXISTS idx_story_jobs_session_id ON story_jobs (session_id)`,

  // Image columns arrived after the first deployments
  `ALTER TABLE stories ADD COLUMN IF NOT EXISTS main_image TEXT`,
  `ALTER TABLE story_nodes ADD COLUMN IF NOT EXISTS image TEXT`,
];
