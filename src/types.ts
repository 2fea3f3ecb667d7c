import type { JobStatus, StoryOption, StoryJobRow, StoryNodeRow } from './db/schema.js';
import type { CompleteStory } from './storage/interface.js';

export interface StoryJobResponse {
  job_id: string;
  status: JobStatus;
  created_at: string;
  story_id: string | null;
  completed_at: string | null;
  error: string | null;
}

export interface CompleteStoryNodeResponse {
  id: string;
  content: string;
  image: string | null;
  is_ending: boolean;
  is_winning_ending: boolean;
  options: StoryOption[];
}

export interface CompleteStoryResponse {
  id: string;
  title: string;
  session_id: string;
  theme: string;
  main_image: string | null;
  created_at: string;
  root_node: CompleteStoryNodeResponse;
  all_nodes: Record<string, CompleteStoryNodeResponse>;
}

export interface HealthResponse {
  status: 'ok' | 'degraded' | 'unhealthy';
  timestamp: string;
  database: {
    connected: boolean;
    status: string;
    responseTimeMs: number;
    error?: string;
  };
}

export function toJobResponse(job: StoryJobRow): StoryJobResponse {
  return {
    job_id: job.id,
    status: job.status,
    created_at: job.createdAt.toISOString(),
    story_id: job.storyId,
    completed_at: job.completedAt ? job.completedAt.toISOString() : null,
    error: job.error,
  };
}

export function toNodeResponse(node: StoryNodeRow): CompleteStoryNodeResponse {
  return {
    id: node.id,
    content: node.content,
    image: node.image,
    is_ending: node.isEnding,
    is_winning_ending: node.isWinningEnding,
    options: node.options,
  };
}

export function toCompleteStoryResponse({ story, rootNode, nodes }: CompleteStory): CompleteStoryResponse {
  const allNodes: Record<string, CompleteStoryNodeResponse> = {};
  for (const node of nodes) {
    allNodes[node.id] = toNodeResponse(node);
  }

  return {
    id: story.id,
    title: story.title,
    session_id: story.sessionId,
    theme: story.theme,
    main_image: story.mainImage,
    created_at: story.createdAt.toISOString(),
    root_node: toNodeResponse(rootNode),
    all_nodes: allNodes,
  };
}
