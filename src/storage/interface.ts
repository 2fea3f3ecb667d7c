import type { StoryRow, StoryNodeRow, StoryJobRow } from '../db/schema.js';

/**
 * A story ready to be written; `createdAt` is assigned by the store
 */
export type StoryDraft = Omit<StoryRow, 'createdAt'>;

/**
 * Fields of a job that change while it runs
 */
export type StoryJobUpdate = Partial<Pick<StoryJobRow, 'status' | 'storyId' | 'error' | 'completedAt'>>;

export interface NewStoryJob {
  id: string;
  sessionId: string;
  theme: string;
}

/**
 * A story with every node, root first
 */
export interface CompleteStory {
  story: StoryRow;
  rootNode: StoryNodeRow;
  nodes: StoryNodeRow[];
}

/**
 * Storage interface for stories and generation jobs
 *
 * Route handlers and the job runner depend on this contract only, so the
 * PostgreSQL implementation can be swapped for another backend.
 *
 * @example
 * ```ts
 * const storage = new DatabaseStoryStorage((await getDb()).db);
 * const job = await storage.getJob('01j9z3k7m2q8x4v6b0n5c1d7fh');
 * ```
 */
export interface StoryStorage {
  /**
   * Insert a new `pending` job
   */
  createJob(job: NewStoryJob): Promise<StoryJobRow>;

  getJob(id: string): Promise<StoryJobRow | null>;

  /**
   * Apply a partial update to a job
   *
   * @returns The updated job, or null if no job has that id
   */
  updateJob(id: string, updates: StoryJobUpdate): Promise<StoryJobRow | null>;

  /**
   * Write a story and all of its nodes atomically
   *
   * Either every row is stored or none is.
   */
  saveStory(story: StoryDraft, nodes: StoryNodeRow[]): Promise<StoryRow>;

  getStory(id: string): Promise<StoryRow | null>;

  /**
   * Load a story with all its nodes
   *
   * @returns null if the story does not exist
   * @throws StoryIntegrityError if the story has no root node
   */
  getCompleteStory(id: string): Promise<CompleteStory | null>;
}
