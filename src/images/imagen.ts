import { GoogleGenAI } from '@google/genai';
import { toDataUrl, type ImageGenerator } from './types.js';

export interface ImagenImageGeneratorOptions {
  apiKey: string;
  model: string;
}

export function buildImagenStoryPrompt(title: string, content: string, theme: string): string {
  return [
    `Create a detailed, atmospheric image for a ${theme} choose-your-own-adventure story.`,
    `Story Title: ${title}`,
    `Story Opening: ${content.slice(0, 200)}...`,
    'Style: Cinematic, detailed, immersive, suitable for a book cover or game illustration.',
    'Mood: Mysterious, adventurous, engaging.',
  ].join('\n');
}

export function buildImagenNodePrompt(content: string, theme: string): string {
  return [
    `Create a detailed, atmospheric image for a ${theme} story scene.`,
    `Scene: ${content.slice(0, 150)}...`,
    'Style: Cinematic, detailed, immersive, suitable for a story illustration.',
    'Mood: Engaging, atmospheric, matches the story tone.',
  ].join('\n');
}

/**
 * Google Imagen through the Google Gen AI SDK
 *
 * Imagen answers synchronously with base64 bytes, so there is no polling.
 */
export class ImagenImageGenerator implements ImageGenerator {
  private readonly ai: GoogleGenAI;
  private readonly model: string;

  constructor(options: ImagenImageGeneratorOptions) {
    this.ai = new GoogleGenAI({ apiKey: options.apiKey });
    this.model = options.model;
  }

  async generateStoryImage(title: string, openingContent: string, theme: string): Promise<string | null> {
    try {
      return await this.generate(buildImagenStoryPrompt(title, openingContent, theme));
    } catch (error) {
      console.error('Error generating image:', error instanceof Error ? error.message : error);
      return null;
    }
  }

  async generateNodeImage(content: string, theme: string): Promise<string | null> {
    try {
      return await this.generate(buildImagenNodePrompt(content, theme));
    } catch (error) {
      console.error('Error generating node image:', error instanceof Error ? error.message : error);
      return null;
    }
  }

  private async generate(prompt: string): Promise<string | null> {
    const response = await this.ai.models.generateImages({
      model: this.model,
      prompt,
      config: { numberOfImages: 1 },
    });

    const image = response.generatedImages?.[0]?.image;
    if (!image?.imageBytes) {
      return null;
    }
    return toDataUrl(image.mimeType ?? 'image/png', image.imageBytes);
  }
}
