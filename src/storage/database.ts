import { eq, asc } from 'drizzle-orm';
import type { Database } from '../db/connection.js';
import { stories, storyNodes, storyJobs, type StoryRow, type StoryNodeRow, type StoryJobRow } from '../db/schema.js';
import { StoryIntegrityError } from '../story/errors.js';
import type { CompleteStory, NewStoryJob, StoryDraft, StoryJobUpdate, StoryStorage } from './interface.js';

/**
 * PostgreSQL-backed story storage (drizzle-orm over postgres.js)
 */
export class DatabaseStoryStorage implements StoryStorage {
  constructor(private readonly db: Database) {}

  async createJob(job: NewStoryJob): Promise<StoryJobRow> {
    const [created] = await this.db
      .insert(storyJobs)
      .values({
        id: job.id,
        sessionId: job.sessionId,
        theme: job.theme,
        status: 'pending',
      })
      .returning();

    if (!created) {
      throw new Error(`Failed to create job ${job.id}`);
    }
    return created;
  }

  async getJob(id: string): Promise<StoryJobRow | null> {
    const [job] = await this.db.select().from(storyJobs).where(eq(storyJobs.id, id)).limit(1);
    return job ?? null;
  }

  async updateJob(id: string, updates: StoryJobUpdate): Promise<StoryJobRow | null> {
    const [job] = await this.db
      .update(storyJobs)
      .set(updates)
      .where(eq(storyJobs.id, id))
      .returning();
    return job ?? null;
  }

  async saveStory(story: StoryDraft, nodes: StoryNodeRow[]): Promise<StoryRow> {
    return this.db.transaction(async (tx) => {
      const [created] = await tx.insert(stories).values(story).returning();
      if (!created) {
        throw new Error(`Failed to create story ${story.id}`);
      }

      if (nodes.length > 0) {
        await tx.insert(storyNodes).values(nodes);
      }

      return created;
    });
  }

  async getStory(id: string): Promise<StoryRow | null> {
    const [story] = await this.db.select().from(stories).where(eq(stories.id, id)).limit(1);
    return story ?? null;
  }

  async getCompleteStory(id: string): Promise<CompleteStory | null> {
    const story = await this.getStory(id);
    if (!story) {
      return null;
    }

    // ULIDs are allocated in walk order, so id order is root-first depth-first
    const nodes = await this.db
      .select()
      .from(storyNodes)
      .where(eq(storyNodes.storyId, id))
      .orderBy(asc(storyNodes.id));

    const rootNode = nodes.find((node) => node.isRoot);
    if (!rootNode) {
      throw new StoryIntegrityError(id, 'no root node');
    }

    return { story, rootNode, nodes };
  }
}
