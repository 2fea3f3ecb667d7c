import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';

export type Database = PostgresJsDatabase<typeof schema>;

/**
 * Retry options for database connection attempts
 */
export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Initial delay in milliseconds before first retry (default: 1000ms) */
  initialDelayMs?: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number;
  /** Maximum delay between retries in milliseconds (default: 10000ms) */
  maxDelayMs?: number;
  /** Suppress retry warnings (default: false) */
  silent?: boolean;
}

const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 10000,
  silent: false,
};

/**
 * Database connection interface
 */
export interface DatabaseConnection {
  db: Database;
  client: postgres.Sql;
  close: () => Promise<void>;
}

let dbInstance: DatabaseConnection | null = null;

/**
 * Calculate delay for exponential backoff retry
 *
 * @param attempt - The current attempt number (0-indexed)
 */
export function calculateRetryDelay(attempt: number, options: Required<RetryOptions>): number {
  const exponentialDelay = options.initialDelayMs * Math.pow(options.backoffMultiplier, attempt);
  return Math.min(exponentialDelay, options.maxDelayMs);
}

/**
 * Execute a function with exponential backoff retry logic
 *
 * Attempts the operation up to `maxRetries + 1` times, waiting 1s, 2s, 4s...
 * (capped at `maxDelayMs`) between attempts, and throws the last error once
 * every attempt has failed.
 *
 * @example
 * ```ts
 * const result = await withRetry(
 *   async () => connect(),
 *   'database connection',
 *   { maxRetries: 5, initialDelayMs: 2000 }
 * );
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  context: string,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === opts.maxRetries) {
        break;
      }

      const delay = calculateRetryDelay(attempt, opts);

      if (!opts.silent) {
        console.warn(
          `Database ${context} failed (attempt ${attempt + 1}/${opts.maxRetries + 1}): ${lastError.message}. Retrying in ${delay}ms...`
        );
      }

      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw new Error(
    `Failed to ${context} after ${opts.maxRetries + 1} attempts: ${lastError?.message || 'Unknown error'}`
  );
}

/**
 * Load retry options from environment variables
 *
 * - DB_RETRY_MAX: Maximum retry attempts (default: 3)
 * - DB_RETRY_DELAY_MS: Initial delay in milliseconds (default: 1000)
 * - DB_RETRY_BACKOFF: Backoff multiplier (default: 2)
 * - DB_RETRY_MAX_DELAY_MS: Maximum delay in milliseconds (default: 10000)
 * - DB_RETRY_SILENT: Silent mode (true/false, default: false)
 */
export function getRetryOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): RetryOptions {
  const options: RetryOptions = {};

  if (env.DB_RETRY_MAX) {
    const maxRetries = parseInt(env.DB_RETRY_MAX, 10);
    if (!isNaN(maxRetries) && maxRetries >= 0) {
      options.maxRetries = maxRetries;
    }
  }

  if (env.DB_RETRY_DELAY_MS) {
    const delayMs = parseInt(env.DB_RETRY_DELAY_MS, 10);
    if (!isNaN(delayMs) && delayMs >= 0) {
      options.initialDelayMs = delayMs;
    }
  }

  if (env.DB_RETRY_BACKOFF) {
    const multiplier = parseFloat(env.DB_RETRY_BACKOFF);
    if (!isNaN(multiplier) && multiplier > 0) {
      options.backoffMultiplier = multiplier;
    }
  }

  if (env.DB_RETRY_MAX_DELAY_MS) {
    const maxDelay = parseInt(env.DB_RETRY_MAX_DELAY_MS, 10);
    if (!isNaN(maxDelay) && maxDelay >= 0) {
      options.maxDelayMs = maxDelay;
    }
  }

  if (env.DB_RETRY_SILENT === 'true') {
    options.silent = true;
  }

  return options;
}

/**
 * Create PostgreSQL connection with pooling and verify it answers
 */
async function createPostgreSQLConnection(connectionString: string): Promise<DatabaseConnection> {
  const client = postgres(connectionString, {
    max: 10, // Maximum connection pool size
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: () => {}, // IF NOT EXISTS notices
  });

  try {
    await client`SELECT 1`;
  } catch (error) {
    await client.end({ timeout: 1 });
    throw error;
  }

  return {
    db: drizzle(client, { schema }),
    client,
    close: async () => {
      await client.end();
    },
  };
}

/**
 * Get or create the database connection (singleton)
 *
 * Reads DATABASE_URL and retries with exponential backoff as configured by
 * the DB_RETRY_* variables.
 *
 * @throws Error if DATABASE_URL is unset or every attempt fails
 *
 * @example
 * ```ts
 * import { getDb } from './db/connection.js';
 *
 * const { db } = await getDb();
 * ```
 */
export async function getDb(): Promise<DatabaseConnection> {
  if (dbInstance) {
    return dbInstance;
  }

  const connectionString = process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is required for PostgreSQL connection');
  }

  const connection = await withRetry(
    () => createPostgreSQLConnection(connectionString),
    'create postgresql connection',
    getRetryOptionsFromEnv()
  );

  dbInstance = connection;
  return connection;
}

/**
 * Close the database connection on shutdown
 *
 * @example
 * ```ts
 * process.on('SIGTERM', async () => {
 *   await closeDb();
 *   process.exit(0);
 * });
 * ```
 */
export async function closeDb(): Promise<void> {
  if (dbInstance) {
    await dbInstance.close();
    dbInstance = null;
  }
}
