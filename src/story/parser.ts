import { z } from 'zod';
import { StoryParseError } from './errors.js';

/**
 * One scene as the text model writes it
 */
export interface StoryNodeLLM {
  content: string;
  isEnding: boolean;
  isWinningEnding: boolean;
  options: StoryOptionLLM[];
}

export interface StoryOptionLLM {
  text: string;
  nextNode: StoryNodeLLM;
}

export interface StoryLLMResponse {
  title: string;
  rootNode: StoryNodeLLM;
}

// Raw shape before defaults are applied
interface StoryNodeInput {
  content: string;
  isEnding: boolean;
  isWinningEnding?: boolean;
  options?: { text: string; nextNode: StoryNodeInput }[] | null;
}

const storyNodeSchema: z.ZodType<StoryNodeLLM, z.ZodTypeDef, StoryNodeInput> = z.lazy(() =>
  z.object({
    content: z.string().trim().min(1, 'Node content is required'),
    isEnding: z.boolean(),
    isWinningEnding: z.boolean().default(false),
    options: z
      .array(
        z.object({
          text: z.string().trim().min(1, 'Option text is required'),
          nextNode: storyNodeSchema,
        })
      )
      .nullish()
      .transform((options) => options ?? []),
  })
);

// Width of stories.title
export const MAX_TITLE_LENGTH = 255;

export const storyResponseSchema = z.object({
  title: z.string()
    .trim()
    .min(1, 'Title is required')
    .transform((title) => title.slice(0, MAX_TITLE_LENGTH).trimEnd()),
  rootNode: storyNodeSchema,
});

const JSON_FENCE = '```json';
const FENCE = '```';

/**
 * Pull the JSON document out of a model reply
 *
 * Prefers a ```json fence, then any fence, then the whole text.
 */
export function extractJson(text: string): string {
  let body = text;
  if (body.includes(JSON_FENCE)) {
    body = body.split(JSON_FENCE)[1].split(FENCE)[0];
  } else if (body.includes(FENCE)) {
    body = body.split(FENCE)[1].split(FENCE)[0];
  }
  return body.trim();
}

/**
 * Make endings and branches consistent
 *
 * Endings lose their options; a non-ending node without options becomes a
 * losing ending; only endings can be winning.
 */
export function normalizeNode(node: StoryNodeLLM): StoryNodeLLM {
  if (node.isEnding || node.options.length === 0) {
    return {
      content: node.content,
      isEnding: true,
      isWinningEnding: node.isEnding && node.isWinningEnding,
      options: [],
    };
  }

  return {
    content: node.content,
    isEnding: false,
    isWinningEnding: false,
    options: node.options.map((option) => ({
      text: option.text,
      nextNode: normalizeNode(option.nextNode),
    })),
  };
}

/**
 * Parse and validate a model reply into a story tree
 *
 * @throws StoryParseError if the reply is not JSON or not a story
 */
export function parseStoryResponse(text: string): StoryLLMResponse {
  let data: unknown;
  try {
    data = JSON.parse(extractJson(text));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StoryParseError(`Failed to parse JSON response from the text model: ${reason}`);
  }

  const result = storyResponseSchema.safeParse(data);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new StoryParseError(`Story response does not match the expected structure: ${problems}`);
  }

  return {
    title: result.data.title,
    rootNode: normalizeNode(result.data.rootNode),
  };
}
