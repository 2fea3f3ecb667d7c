/**
 * Story Routes
 *
 * Starts story generation for the caller's session and serves finished
 * stories with every node.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { JobRunner } from '../jobs/runner.js';
import { sessionMiddleware } from '../middleware/session.js';
import { validateBody } from '../middleware/validation.js';
import type { StoryStorage } from '../storage/interface.js';
import { toCompleteStoryResponse, toJobResponse } from '../types.js';
import { createNotFoundError } from '../utils/errors.js';

export const createStorySchema = z.object({
  theme: z.string()
    .trim()
    .min(1, 'Theme is required')
    .max(100, 'Theme must not exceed 100 characters'),
});

export interface StoryRoutesDeps {
  storage: StoryStorage;
  jobs: Pick<JobRunner, 'enqueue'>;
}

export function createStoryRoutes({ storage, jobs }: StoryRoutesDeps) {
  const app = new Hono();

  /**
   * POST /stories/create
   *
   * Queue generation of a story on a theme. Answers with the pending job;
   * poll GET /jobs/:jobId until it completes.
   *
   * @example
   * ```bash
   * curl -X POST http://localhost:8000/api/stories/create \
   *   -H "Content-Type: application/json" \
   *   -d '{ "theme": "haunted lighthouse" }'
   * ```
   */
  app.post('/create', validateBody(createStorySchema), sessionMiddleware, async (c) => {
    const sessionId = c.get('sessionId');
    const { theme } = c.get('validatedBody');

    const job = await jobs.enqueue(sessionId, theme);
    return c.json(toJobResponse(job));
  });

  /**
   * GET /stories/:storyId/complete
   *
   * The whole story: metadata, the root node, and every node by id.
   */
  app.get('/:storyId/complete', async (c) => {
    const storyId = c.req.param('storyId');

    const complete = await storage.getCompleteStory(storyId);
    if (!complete) {
      throw createNotFoundError('Story', `id ${storyId}`);
    }

    return c.json(toCompleteStoryResponse(complete));
  });

  return app;
}
