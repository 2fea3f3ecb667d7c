import { getDb } from './connection.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

/**
 * Database health check result
 */
export interface HealthCheckResult {
  status: HealthStatus;
  /** Whether the database answered the probe query */
  connected: boolean;
  responseTimeMs: number;
  error?: string;
}

export interface HealthCheckOptions {
  /** Response time threshold in milliseconds for warnings (default: 1000ms) */
  slowQueryThreshold?: number;
}

/**
 * Runs one trivial query against the database, throwing when it cannot
 */
export type DatabasePing = () => Promise<void>;

const DEFAULT_OPTIONS: Required<HealthCheckOptions> = {
  slowQueryThreshold: 1000,
};

/**
 * Ping the shared PostgreSQL pool with `SELECT 1`
 */
export const pingDatabase: DatabasePing = async () => {
  const { client } = await getDb();
  await client`SELECT 1`;
};

function round(ms: number): number {
  return Math.round(ms * 100) / 100;
}

/**
 * Time a database ping and classify the result
 *
 * Above the slow threshold the database is `degraded`; above twice the
 * threshold, or on error, it is `unhealthy`.
 *
 * @example
 * ```ts
 * const health = await checkHealth(pingDatabase, { slowQueryThreshold: 500 });
 * if (health.status !== 'healthy') {
 *   console.warn(`Database ${health.status}: ${health.responseTimeMs}ms`);
 * }
 * ```
 */
export async function checkHealth(
  ping: DatabasePing = pingDatabase,
  options: HealthCheckOptions = {}
): Promise<HealthCheckResult> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const startTime = performance.now();

  try {
    await ping();
    const responseTime = performance.now() - startTime;

    if (responseTime > opts.slowQueryThreshold) {
      console.warn(
        `Database health check: Slow query detected (${responseTime.toFixed(2)}ms > ${opts.slowQueryThreshold}ms threshold)`
      );
    }

    let status: HealthStatus = 'healthy';
    if (responseTime > opts.slowQueryThreshold * 2) {
      status = 'unhealthy';
    } else if (responseTime > opts.slowQueryThreshold) {
      status = 'degraded';
    }

    return {
      status,
      connected: true,
      responseTimeMs: round(responseTime),
    };
  } catch (error) {
    return {
      status: 'unhealthy',
      connected: false,
      responseTimeMs: round(performance.now() - startTime),
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}
