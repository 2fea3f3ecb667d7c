import type { Config } from 'drizzle-kit';

/**
 * Drizzle Kit Configuration
 *
 * Environment variables:
 * - DATABASE_URL: PostgreSQL connection string (postgres://...)
 */

export default {
  schema: './src/db/schema.ts',
  out: './drizzle',
  dialect: 'postgresql',
  dbCredentials: {
    url: process.env.DATABASE_URL || 'postgres://localhost:5432/story_forge',
  },
  verbose: true,
  strict: true,
} satisfies Config;
