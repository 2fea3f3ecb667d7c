/**
 * Job Routes
 *
 * Status of asynchronous story generation.
 */

import { Hono } from 'hono';
import type { StoryStorage } from '../storage/interface.js';
import { toJobResponse } from '../types.js';
import { createNotFoundError } from '../utils/errors.js';

export function createJobRoutes(storage: StoryStorage) {
  const app = new Hono();

  /**
   * GET /jobs/:jobId
   *
   * @example
   * ```bash
   * curl http://localhost:8000/api/jobs/01j9z3k7m2q8x4v6b0n5c1d7fh
   * ```
   */
  app.get('/:jobId', async (c) => {
    const jobId = c.req.param('jobId');

    const job = await storage.getJob(jobId);
    if (!job) {
      throw createNotFoundError('Job', `id ${jobId}`);
    }

    return c.json(toJobResponse(job));
  });

  return app;
}
