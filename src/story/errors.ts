/**
 * Error types for story generation and retrieval
 */

export class StoryParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoryParseError';
  }
}

export class StoryGenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Failed to generate story: ${message}`, options);
    this.name = 'StoryGenerationError';
  }
}

export class StoryIntegrityError extends Error {
  constructor(storyId: string, problem: string) {
    super(`Story ${storyId} is corrupt: ${problem}`);
    this.name = 'StoryIntegrityError';
  }
}
