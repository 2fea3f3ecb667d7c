/**
 * An illustration service
 *
 * Both methods resolve to a data URL (`data:<mime>;base64,...`) or null when
 * no image could be made. They never reject: a story is still worth
 * telling without pictures.
 */
export interface ImageGenerator {
  generateStoryImage(title: string, openingContent: string, theme: string): Promise<string | null>;
  generateNodeImage(content: string, theme: string): Promise<string | null>;
}

export class ImageGenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImageGenerationError';
  }
}

export function toDataUrl(mimeType: string, base64: string): string {
  return `data:${mimeType};base64,${base64}`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
