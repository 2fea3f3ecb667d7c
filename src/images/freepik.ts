/**
 * Freepik Mystic image generation
 *
 * Mystic is asynchronous: a POST starts a task, the task is polled until it
 * completes, and the finished image is downloaded from the returned URL and
 * inlined as a data URL.
 */

import { z } from 'zod';
import { ImageGenerationError, sleep as defaultSleep, toDataUrl, type ImageGenerator } from './types.js';

export const FREEPIK_MYSTIC_URL = 'https://api.freepik.com/v1/ai/mystic';

export interface FreepikImageGeneratorOptions {
  apiKey: string;
  baseUrl?: string;
  /** Pause before each story image request; node images wait 1.5x this (default: 2000) */
  requestDelayMs?: number;
  /** Wait after a 429 before the single retry (default: 30000) */
  rateLimitRetryMs?: number;
  /** Interval between status polls (default: 10000) */
  pollIntervalMs?: number;
  /** Give up polling after this long (default: 600000) */
  maxWaitMs?: number;
  /** Log every poll (default: false) */
  debug?: boolean;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const taskCreatedSchema = z.object({
  data: z.object({
    task_id: z.string().min(1),
  }),
});

const taskStatusSchema = z.object({
  data: z
    .object({
      status: z.string().optional(),
      generated: z.array(z.string()).default([]),
      has_nsfw: z.array(z.unknown()).nullish(),
    })
    .default({}),
});

export type FreepikTaskStatus = z.infer<typeof taskStatusSchema>['data'];

const PENDING_STATUSES = new Set(['CREATED', 'IN_PROGRESS']);

/**
 * Fixed Mystic generation settings; only the prompt varies
 */
export function buildMysticPayload(prompt: string) {
  return {
    prompt: prompt.trim(),
    structure_reference: '',
    structure_strength: 50,
    style_reference: '',
    adherence: 50,
    hdr: 50,
    resolution: '2k',
    aspect_ratio: 'square_1_1',
    model: 'realism',
    creative_detailing: 33,
    engine: 'automatic',
    fixed_generation: false,
    filter_nsfw: true,
    styling: {
      styles: [],
      characters: [],
      colors: [{ color: '#4A90E2', weight: 0.5 }],
    },
  };
}

export function buildStoryImagePrompt(title: string, content: string, theme: string): string {
  return `Create a detailed, cinematic illustration for a ${theme} adventure story titled '${title}'. Scene: ${content.slice(0, 200)}. Style: Book cover quality, atmospheric, mysterious, adventurous. High detail, rich colors, fantasy art style.`;
}

export function buildNodeImagePrompt(content: string, theme: string): string {
  return `Create a detailed, cinematic illustration for a ${theme} story scene. Scene: ${content.slice(0, 200)}. Style: Story illustration, atmospheric, engaging, immersive. High detail, rich colors, fantasy art style.`;
}

/**
 * Normalise a Content-Type header to a bare image MIME type
 */
export function imageMimeType(contentType: string | null): string {
  const mime = (contentType ?? '').split(';')[0].trim().toLowerCase();
  return mime.startsWith('image/') ? mime : 'image/png';
}

export class FreepikImageGenerator implements ImageGenerator {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly requestDelayMs: number;
  private readonly rateLimitRetryMs: number;
  private readonly pollIntervalMs: number;
  private readonly maxWaitMs: number;
  private readonly debug: boolean;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: FreepikImageGeneratorOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? FREEPIK_MYSTIC_URL;
    this.requestDelayMs = options.requestDelayMs ?? 2000;
    this.rateLimitRetryMs = options.rateLimitRetryMs ?? 30000;
    this.pollIntervalMs = options.pollIntervalMs ?? 10000;
    this.maxWaitMs = options.maxWaitMs ?? 600000;
    this.debug = options.debug ?? false;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async generateStoryImage(title: string, openingContent: string, theme: string): Promise<string | null> {
    try {
      await this.sleep(this.requestDelayMs);
      const image = await this.generate(buildStoryImagePrompt(title, openingContent, theme), 'story');
      console.log(`Successfully generated story image for '${title}'`);
      return image;
    } catch (error) {
      console.error('Error generating story image:', error instanceof Error ? error.message : error);
      return null;
    }
  }

  async generateNodeImage(content: string, theme: string): Promise<string | null> {
    try {
      await this.sleep(Math.round(this.requestDelayMs * 1.5));
      return await this.generate(buildNodeImagePrompt(content, theme), 'node');
    } catch (error) {
      console.error('Error generating node image:', error instanceof Error ? error.message : error);
      return null;
    }
  }

  /**
   * Fetch the raw status body of a task
   *
   * @returns The parsed JSON, or null if the request failed
   */
  async checkGenerationStatus(taskId: string): Promise<unknown> {
    try {
      const response = await fetch(`${this.baseUrl}/${taskId}`, {
        headers: { 'x-freepik-api-key': this.apiKey },
      });
      if (!response.ok) {
        throw new ImageGenerationError(`Status request failed: ${response.status}`);
      }
      return await response.json();
    } catch (error) {
      console.error('Error checking generation status:', error instanceof Error ? error.message : error);
      return null;
    }
  }

  private async generate(prompt: string, kind: 'story' | 'node'): Promise<string> {
    const taskId = await this.startTask(buildMysticPayload(prompt));
    console.log(`Started ${kind} image generation: task_id=${taskId}`);

    const completed = await this.pollForCompletion(taskId);
    return this.downloadAsDataUrl(completed.generated[0]);
  }

  private async startTask(payload: ReturnType<typeof buildMysticPayload>): Promise<string> {
    const request = (): Promise<Response> =>
      fetch(this.baseUrl, {
        method: 'POST',
        headers: {
          'x-freepik-api-key': this.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
      });

    let response = await request();

    if (response.status === 429) {
      console.warn(`Rate limited by Freepik API. Waiting ${this.rateLimitRetryMs / 1000} seconds before retry...`);
      await this.sleep(this.rateLimitRetryMs);
      response = await request();
    }

    if (!response.ok) {
      throw new ImageGenerationError(`Freepik API returned ${response.status}: ${await response.text()}`);
    }

    const body: unknown = await response.json();
    const parsed = taskCreatedSchema.safeParse(body);
    if (!parsed.success) {
      throw new ImageGenerationError(`Invalid response from Freepik API: ${JSON.stringify(body)}`);
    }
    return parsed.data.data.task_id;
  }

  private async pollForCompletion(taskId: string): Promise<FreepikTaskStatus> {
    const startTime = this.now();

    while (this.now() - startTime < this.maxWaitMs) {
      const response = await fetch(`${this.baseUrl}/${taskId}`, {
        headers: { 'x-freepik-api-key': this.apiKey },
      });
      if (response.status !== 200) {
        throw new ImageGenerationError(`Failed to check status: ${response.status} - ${await response.text()}`);
      }

      const body: unknown = await response.json();
      const parsed = taskStatusSchema.safeParse(body);
      if (!parsed.success) {
        throw new ImageGenerationError(`Invalid status response from Freepik API: ${JSON.stringify(body)}`);
      }

      const data = parsed.data.data;
      if (this.debug) {
        console.log(`Polling status for task ${taskId}: ${data.status}`);
      }

      if (data.status === 'COMPLETED') {
        if (data.generated.length === 0) {
          throw new ImageGenerationError(`Generation completed but no images generated for task ${taskId}`);
        }
        if (data.has_nsfw?.some(Boolean)) {
          throw new ImageGenerationError('NSFW content detected in generated image(s)');
        }
        return data;
      }

      if (data.status === undefined || !PENDING_STATUSES.has(data.status)) {
        throw new ImageGenerationError(`Generation failed with unexpected status '${data.status}' for task ${taskId}`);
      }

      await this.sleep(this.pollIntervalMs);
    }

    throw new ImageGenerationError(`Generation timed out after ${this.maxWaitMs / 1000} seconds for task ${taskId}`);
  }

  private async downloadAsDataUrl(imageUrl: string): Promise<string> {
    const response = await fetch(imageUrl);
    if (!response.ok) {
      throw new ImageGenerationError(`Failed to download image: ${response.status}`);
    }

    const mimeType = imageMimeType(response.headers.get('content-type'));
    const bytes = Buffer.from(await response.arrayBuffer());
    return toDataUrl(mimeType, bytes.toString('base64'));
  }
}
