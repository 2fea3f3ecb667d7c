/**
 * Application Configuration
 *
 * Loads and validates environment-based settings once and caches them.
 * The application refuses to start with missing or malformed values.
 *
 * ENV LOADING:
 * `.env` is loaded by `./env.ts`, which the server entry point imports first.
 */

export type ImageProvider = 'freepik' | 'imagen' | 'none';

const IMAGE_PROVIDERS: readonly ImageProvider[] = ['freepik', 'imagen', 'none'];

export interface AppConfig {
  // Database
  databaseUrl: string;

  // Generative services
  googleApiKey: string;
  freepikApiKey: string | null;
  textModel: string;
  imageProvider: ImageProvider;
  imagenModel: string;
  imageRequestDelayMs: number;

  // HTTP
  apiPrefix: string;
  allowedOrigins: string[];
  debug: boolean;
  port: number;
  host: string;
}

/**
 * Parse CORS origins from a comma-separated list
 *
 * A single '*' (or an empty value) allows every origin.
 */
export function parseAllowedOrigins(value: string | undefined): string[] {
  if (!value || value.trim() === '*') {
    return ['*'];
  }
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

/**
 * Normalise a route prefix to `/segment[/segment...]`
 *
 * '' and '/' both mean "no prefix" and yield ''.
 */
export function normalizeApiPrefix(value: string | undefined): string {
  const raw = value === undefined ? '/api' : value.trim();
  const segments = raw.split('/').filter(Boolean);
  return segments.length === 0 ? '' : `/${segments.join('/')}`;
}

export function parseBoolean(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

function parseNonNegativeInt(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid ${name} value: ${value}. Must be a non-negative integer.`);
  }
  return parsed;
}

function parseImageProvider(value: string | undefined, freepikApiKey: string | null): ImageProvider {
  if (!value) {
    return freepikApiKey ? 'freepik' : 'none';
  }
  const provider = IMAGE_PROVIDERS.find(p => p === value.trim().toLowerCase());
  if (!provider) {
    throw new Error(`Invalid IMAGE_PROVIDER value: ${value}. Must be one of ${IMAGE_PROVIDERS.join(', ')}.`);
  }
  return provider;
}

/**
 * Validate and load application configuration
 *
 * @throws {Error} If required environment variables are missing or invalid
 */
function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const databaseUrl = env.DATABASE_URL;
  const googleApiKey = env.GOOGLE_API_KEY || env.OPENAI_API_KEY;

  const missingVars: string[] = [];
  if (!databaseUrl) missingVars.push('DATABASE_URL');
  if (!googleApiKey) missingVars.push('GOOGLE_API_KEY');

  const freepikApiKey = env.FREEPIK_API_KEY || null;
  const imageProvider = parseImageProvider(env.IMAGE_PROVIDER, freepikApiKey);
  if (imageProvider === 'freepik' && !freepikApiKey) {
    missingVars.push('FREEPIK_API_KEY');
  }

  if (missingVars.length > 0 || !databaseUrl || !googleApiKey) {
    throw new Error(
      `Missing required environment variables: ${missingVars.join(', ')}\n` +
      `Please check your .env file and .env.example`
    );
  }

  const portValue = env.PORT || '8000';
  const port = Number(portValue);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid PORT value: ${portValue}. Must be between 1 and 65535.`);
  }

  return {
    databaseUrl,

    googleApiKey,
    freepikApiKey,
    textModel: env.GEMINI_MODEL || 'gemini-2.0-flash-exp',
    imageProvider,
    imagenModel: env.IMAGEN_MODEL || 'imagen-4.0-generate-001',
    imageRequestDelayMs: parseNonNegativeInt('IMAGE_REQUEST_DELAY_MS', env.IMAGE_REQUEST_DELAY_MS || '2000'),

    apiPrefix: normalizeApiPrefix(env.API_PREFIX),
    allowedOrigins: parseAllowedOrigins(env.ALLOWED_ORIGINS),
    debug: parseBoolean(env.DEBUG),
    port,
    host: env.HOST || '0.0.0.0',
  };
}

let cachedConfig: AppConfig | null = null;

/**
 * Reset cached configuration (useful for testing)
 * @internal
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Get application configuration
 *
 * @example
 * ```ts
 * import { getConfig } from './config.js';
 *
 * console.log(`Routes mounted under ${getConfig().apiPrefix}`);
 * ```
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}

export default getConfig;
