import { describe, it, expect } from 'vitest';
import { createImageGenerator } from '../../src/images/index.js';
import { FreepikImageGenerator } from '../../src/images/freepik.js';
import { ImagenImageGenerator } from '../../src/images/imagen.js';
import { NoopImageGenerator } from '../../src/images/noop.js';

const base = {
  freepikApiKey: 'test-freepik-key',
  googleApiKey: 'test-google-key',
  imagenModel: 'imagen-test',
  imageRequestDelayMs: 0,
  debug: false,
};

describe('createImageGenerator', () => {
  it('builds the Freepik client', () => {
    expect(createImageGenerator({ ...base, imageProvider: 'freepik' })).toBeInstanceOf(FreepikImageGenerator);
  });

  it('refuses Freepik without a key', () => {
    expect(() => createImageGenerator({ ...base, freepikApiKey: null, imageProvider: 'freepik' })).toThrow(
      'No Freepik API key found. Set FREEPIK_API_KEY in your .env file'
    );
  });

  it('builds the Imagen client', () => {
    expect(createImageGenerator({ ...base, imageProvider: 'imagen' })).toBeInstanceOf(ImagenImageGenerator);
  });

  it('returns a generator that never makes images', async () => {
    const generator = createImageGenerator({ ...base, imageProvider: 'none' });

    expect(generator).toBeInstanceOf(NoopImageGenerator);
    expect(await generator.generateStoryImage('Title', 'Opening', 'fantasy')).toBeNull();
    expect(await generator.generateNodeImage('Scene', 'fantasy')).toBeNull();
  });
});
