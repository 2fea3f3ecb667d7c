import type { ImageGenerator } from './types.js';

/**
 * Used when no image provider is configured
 */
export class NoopImageGenerator implements ImageGenerator {
  async generateStoryImage(): Promise<string | null> {
    return null;
  }

  async generateNodeImage(): Promise<string | null> {
    return null;
  }
}
