import { pgTable, varchar, text, boolean, jsonb, timestamp, index } from 'drizzle-orm/pg-core';

export const JOB_STATUSES = ['pending', 'processing', 'completed', 'failed'] as const;

export type JobStatus = typeof JOB_STATUSES[number];

/**
 * One choice offered by a node, pointing at the node it leads to
 */
export interface StoryOption {
  text: string;
  node_id: string;
}

// Stories table
export const stories = pgTable('stories', {
  id: varchar('id', { length: 26 }).primaryKey(), // lowercase ULID
  title: varchar('title', { length: 255 }).notNull(),
  sessionId: varchar('session_id', { length: 64 }).notNull(),
  theme: varchar('theme', { length: 100 }).notNull(),
  mainImage: text('main_image'),
  createdAt: timestamp('created_at', { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
}, (table) => ({
  sessionIdx: index('idx_stories_session_id').on(table.sessionId),
}));

// Story nodes table (one row per scene)
export const storyNodes = pgTable('story_nodes', {
  id: varchar('id', { length: 26 }).primaryKey(), // lowercase ULID
  storyId: varchar('story_id', { length: 26 }).notNull().references(() => stories.id, { onDelete: 'cascade' }),
  content: text('content').notNull(),
  isRoot: boolean('is_root').notNull().default(false),
  isEnding: boolean('is_ending').notNull().default(false),
  isWinningEnding: boolean('is_winning_ending').notNull().default(false),
  options: jsonb('options').$type<StoryOption[]>().notNull().default([]),
  image: text('image'),
}, (table) => ({
  storyIdx: index('idx_story_nodes_story_id').on(table.storyId),
}));

// Story generation jobs table
export const storyJobs = pgTable('story_jobs', {
  id: varchar('id', { length: 26 }).primaryKey(), // lowercase ULID, exposed as job_id
  sessionId: varchar('session_id', { length: 64 }).notNull(),
  theme: varchar('theme', { length: 100 }).notNull(),
  status: varchar('status', { length: 20, enum: JOB_STATUSES }).notNull().default('pending'),
  storyId: varchar('story_id', { length: 26 }),
  error: text('error'),
  createdAt: timestamp('created_at', { withTimezone: true, mode: 'date' }).defaultNow().notNull(),
  completedAt: timestamp('completed_at', { withTimezone: true, mode: 'date' }),
}, (table) => ({
  sessionIdx: index('idx_story_jobs_session_id').on(table.sessionId),
}));

export type StoryRow = typeof stories.$inferSelect;
export type StoryNodeRow = typeof storyNodes.$inferSelect;
export type StoryJobRow = typeof storyJobs.$inferSelect;
