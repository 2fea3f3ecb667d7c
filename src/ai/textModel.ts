import { GoogleGenAI } from '@google/genai';

/**
 * A generative text service: one prompt in, one completion out
 */
export interface TextModel {
  generate(prompt: string): Promise<string>;
}

export interface GeminiTextModelOptions {
  apiKey: string;
  model: string;
}

/**
 * Gemini through the Google Gen AI SDK
 */
export class GeminiTextModel implements TextModel {
  private readonly ai: GoogleGenAI;
  private readonly model: string;

  constructor(options: GeminiTextModelOptions) {
    this.ai = new GoogleGenAI({ apiKey: options.apiKey });
    this.model = options.model;
  }

  async generate(prompt: string): Promise<string> {
    const response = await this.ai.models.generateContent({
      model: this.model,
      contents: prompt,
    });

    const text = response.text;
    if (!text) {
      throw new Error(`Empty response from ${this.model}`);
    }
    return text;
  }
}
