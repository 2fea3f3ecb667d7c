import type { AppConfig } from '../config.js';
import { FreepikImageGenerator } from './freepik.js';
import { ImagenImageGenerator } from './imagen.js';
import { NoopImageGenerator } from './noop.js';
import type { ImageGenerator } from './types.js';

export type { ImageGenerator } from './types.js';

/**
 * Pick the image provider named by IMAGE_PROVIDER
 */
export function createImageGenerator(
  config: Pick<AppConfig, 'imageProvider' | 'freepikApiKey' | 'googleApiKey' | 'imagenModel' | 'imageRequestDelayMs' | 'debug'>
): ImageGenerator {
  switch (config.imageProvider) {
    case 'freepik':
      if (!config.freepikApiKey) {
        throw new Error('No Freepik API key found. Set FREEPIK_API_KEY in your .env file');
      }
      return new FreepikImageGenerator({
        apiKey: config.freepikApiKey,
        requestDelayMs: config.imageRequestDelayMs,
        debug: config.debug,
      });
    case 'imagen':
      return new ImagenImageGenerator({
        apiKey: config.googleApiKey,
        model: config.imagenModel,
      });
    case 'none':
      return new NoopImageGenerator();
  }
}
