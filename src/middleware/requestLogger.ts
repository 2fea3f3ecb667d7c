/**
 * Request Logging Middleware
 *
 * Logs every request with method, path, status, and timing as one JSON line.
 */

import type { Context, Next } from 'hono';

export interface RequestLogEntry {
  timestamp: string;
  method: string;
  path: string;
  status: number;
  duration_ms: number;
}

/**
 * @example
 * ```ts
 * app.use('*', requestLoggerMiddleware);
 * ```
 */
export async function requestLoggerMiddleware(c: Context, next: Next): Promise<void> {
  const startTime = performance.now();
  const method = c.req.method;
  const path = c.req.path;

  await next();

  const duration = performance.now() - startTime;

  const logEntry: RequestLogEntry = {
    timestamp: new Date().toISOString(),
    method,
    path,
    status: c.res.status,
    duration_ms: Math.round(duration * 100) / 100, // Round to 2 decimal places
  };

  console.log('Request:', JSON.stringify(logEntry));
}
