import { describe, it, expect, vi, beforeEach } from 'vitest';

const { generateContent, constructed } = vi.hoisted(() => {
  const constructed: unknown[] = [];
  return { generateContent: vi.fn(), constructed };
});

vi.mock('@google/genai', () => ({
  GoogleGenAI: class {
    models = { generateContent };
    constructor(options: unknown) {
      constructed.push(options);
    }
  },
}));

import { GeminiTextModel } from '../../src/ai/textModel.js';

describe('GeminiTextModel', () => {
  beforeEach(() => {
    generateContent.mockReset();
    constructed.length = 0;
  });

  it('sends the prompt to the configured model', async () => {
    generateContent.mockResolvedValue({ text: '{"title":"T"}' });
    const model = new GeminiTextModel({ apiKey: 'test-google-key', model: 'gemini-test' });

    expect(await model.generate('Write a story')).toBe('{"title":"T"}');
    expect(constructed).toEqual([{ apiKey: 'test-google-key' }]);
    expect(generateContent).toHaveBeenCalledWith({ model: 'gemini-test', contents: 'Write a story' });
  });

  it('rejects an empty response', async () => {
    generateContent.mockResolvedValue({ text: undefined });
    const model = new GeminiTextModel({ apiKey: 'test-google-key', model: 'gemini-test' });

    await expect(model.generate('Write a story')).rejects.toThrow('Empty response from gemini-test');
  });
});
