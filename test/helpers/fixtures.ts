import type { TextModel } from '../../src/ai/textModel.js';
import type { ImageGenerator } from '../../src/images/types.js';

/**
 * A small, complete story in the shape the text model is asked for:
 * root -> (left: winning ending, right: scene -> (two losing endings))
 */
export const sampleStory = {
  title: 'The Lantern Keeper',
  rootNode: {
    content: 'You wake in a lighthouse whose lamp has gone dark.',
    isEnding: false,
    isWinningEnding: false,
    options: [
      {
        text: 'Climb the stairs',
        nextNode: {
          content: 'You relight the lamp and a ship finds its way home.',
          isEnding: true,
          isWinningEnding: true,
          options: [],
        },
      },
      {
        text: 'Go down to the cellar',
        nextNode: {
          content: 'The cellar floods with cold sea water.',
          isEnding: false,
          isWinningEnding: false,
          options: [
            {
              text: 'Swim for the door',
              nextNode: {
                content: 'The current drags you under.',
                isEnding: true,
                isWinningEnding: false,
              },
            },
            {
              text: 'Wait for the tide',
              nextNode: {
                content: 'The tide never turns.',
                isEnding: true,
                isWinningEnding: false,
              },
            },
          ],
        },
      },
    ],
  },
};

export function fenced(value: unknown): string {
  return `Here is your story:\n\`\`\`json\n${JSON.stringify(value, null, 2)}\n\`\`\`\nEnjoy!`;
}

/**
 * TextModel that answers every prompt with the same reply and records prompts
 */
export class StubTextModel implements TextModel {
  readonly prompts: string[] = [];

  constructor(private readonly reply: string | Error) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}

/**
 * ImageGenerator returning predictable data URLs and recording calls
 */
export class StubImageGenerator implements ImageGenerator {
  readonly storyCalls: { title: string; content: string; theme: string }[] = [];
  readonly nodeCalls: { content: string; theme: string }[] = [];

  constructor(private readonly mode: 'ok' | 'null' | 'throw' = 'ok') {}

  async generateStoryImage(title: string, openingContent: string, theme: string): Promise<string | null> {
    this.storyCalls.push({ title, content: openingContent, theme });
    return this.answer(`cover-${this.storyCalls.length}`);
  }

  async generateNodeImage(content: string, theme: string): Promise<string | null> {
    this.nodeCalls.push({ content, theme });
    return this.answer(`node-${this.nodeCalls.length}`);
  }

  private answer(label: string): string | null {
    if (this.mode === 'throw') {
      throw new Error('image service down');
    }
    return this.mode === 'null' ? null : `data:image/png;base64,${label}`;
  }
}

/**
 * Sequential ids: id-01, id-02, ... (zero-padded so they sort in order)
 */
export function sequentialIds(prefix: string = 'id'): () => string {
  let next = 0;
  return () => `${prefix}-${String(++next).padStart(2, '0')}`;
}
