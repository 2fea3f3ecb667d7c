#!/usr/bin/env tsx
/**
 * Database Migration CLI
 *
 * Creates the story tables when missing and adds columns introduced since,
 * all in one transaction.
 *
 * Usage:
 *   npm run migrate
 *
 * Environment Variables:
 *   DATABASE_URL   PostgreSQL connection URL (required)
 */

import '../src/env.js';
import { closeDb, getDb } from '../src/db/connection.js';
import { MIGRATION_STATEMENTS } from '../src/db/migrations.js';

async function migrate(): Promise<void> {
  try {
    const { client } = await getDb();

    // A failing statement rolls back the whole transaction
    await client.begin(async (tx) => {
      for (const statement of MIGRATION_STATEMENTS) {
        await tx.unsafe(statement);
      }
    });

    console.log('✅ Database migration completed successfully!');
    console.log(`Applied ${MIGRATION_STATEMENTS.length} statements (tables, indexes, image columns)`);
  } catch (error) {
    console.error('❌ Migration failed:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  } finally {
    await closeDb();
  }
}

await migrate();
