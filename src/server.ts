import './env.js';
import { serve } from '@hono/node-server';
import { GeminiTextModel } from './ai/textModel.js';
import { createApp } from './app.js';
import { getConfig } from './config.js';
import { closeDb, getDb } from './db/connection.js';
import { pingDatabase } from './db/health.js';
import { createImageGenerator } from './images/index.js';
import { JobRunner } from './jobs/runner.js';
import { DatabaseStoryStorage } from './storage/database.js';
import { StoryGenerator } from './story/generator.js';

async function main(): Promise<void> {
  const config = getConfig();
  const { db } = await getDb();

  const storage = new DatabaseStoryStorage(db);
  const generator = new StoryGenerator({
    textModel: new GeminiTextModel({ apiKey: config.googleApiKey, model: config.textModel }),
    images: createImageGenerator(config),
    storage,
  });
  const jobs = new JobRunner({ storage, generator });

  const app = createApp({ config, storage, jobs, ping: pingDatabase });

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    console.log(`Story Forge listening on http://${info.address}:${info.port}${config.apiPrefix}`);
    console.log(`Text model: ${config.textModel} | Images: ${config.imageProvider} | Debug: ${config.debug}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      console.warn(`Received ${signal} again, exiting without waiting for jobs`);
      process.exit(1);
    }
    shuttingDown = true;

    console.log(`Received ${signal}, shutting down (${jobs.activeJobs} job(s) in flight)...`);
    server.close();
    await jobs.idle();
    await closeDb();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error('Shutdown failed:', error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error instanceof Error ? error.message : error);
  process.exit(1);
});
