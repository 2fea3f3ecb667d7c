import type { StoryJobRow } from '../db/schema.js';
import type { StoryStorage } from '../storage/interface.js';
import type { StoryGenerator } from '../story/generator.js';
import { generateId } from '../utils/ulid.js';

export interface JobRunnerDeps {
  storage: StoryStorage;
  generator: Pick<StoryGenerator, 'generateStory'>;
  idGenerator?: () => string;
  now?: () => Date;
}

/**
 * Runs story generation in the background of the server process
 *
 * A job goes pending -> processing -> completed | failed. Callers poll the
 * job row; nothing is pushed to them.
 */
export class JobRunner {
  private readonly storage: StoryStorage;
  private readonly generator: Pick<StoryGenerator, 'generateStory'>;
  private readonly nextId: () => string;
  private readonly now: () => Date;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(deps: JobRunnerDeps) {
    this.storage = deps.storage;
    this.generator = deps.generator;
    this.nextId = deps.idGenerator ?? generateId;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Record a pending job and start it without waiting for it
   */
  async enqueue(sessionId: string, theme: string): Promise<StoryJobRow> {
    const job = await this.storage.createJob({ id: this.nextId(), sessionId, theme });

    const running = this.run(job.id).finally(() => {
      this.inFlight.delete(running);
    });
    this.inFlight.add(running);

    return job;
  }

  /**
   * Execute one job to completion; failures end up on the job row
   */
  async run(jobId: string): Promise<void> {
    try {
      const job = await this.storage.updateJob(jobId, { status: 'processing' });
      if (!job) {
        console.error(`Job ${jobId} vanished before it could run`);
        return;
      }

      const story = await this.generator.generateStory(job.sessionId, job.theme);

      await this.storage.updateJob(jobId, {
        status: 'completed',
        storyId: story.id,
        completedAt: this.now(),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Job ${jobId} failed:`, message);
      await this.markFailed(jobId, message);
    }
  }

  /**
   * Resolves once every job started so far has settled
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  get activeJobs(): number {
    return this.inFlight.size;
  }

  private async markFailed(jobId: string, message: string): Promise<void> {
    try {
      await this.storage.updateJob(jobId, {
        status: 'failed',
        error: message,
        completedAt: this.now(),
      });
    } catch (error) {
      console.error(`Could not record failure of job ${jobId}:`, error instanceof Error ? error.message : error);
    }
  }
}
