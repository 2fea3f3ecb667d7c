import type { TextModel } from '../ai/textModel.js';
import type { StoryNodeRow, StoryRow } from '../db/schema.js';
import type { ImageGenerator } from '../images/types.js';
import type { StoryStorage } from '../storage/interface.js';
import { generateId } from '../utils/ulid.js';
import { StoryGenerationError } from './errors.js';
import { parseStoryResponse, type StoryLLMResponse, type StoryNodeLLM } from './parser.js';
import { buildStoryPrompt, DEFAULT_THEME } from './prompt.js';

export interface StoryGeneratorDeps {
  textModel: TextModel;
  images: ImageGenerator;
  storage: StoryStorage;
  idGenerator?: () => string;
}

/**
 * Turns a theme into a stored, illustrated story tree
 *
 * @example
 * ```ts
 * const generator = new StoryGenerator({ textModel, images, storage });
 * const story = await generator.generateStory(sessionId, 'space pirates');
 * ```
 */
export class StoryGenerator {
  private readonly textModel: TextModel;
  private readonly images: ImageGenerator;
  private readonly storage: StoryStorage;
  private readonly nextId: () => string;

  constructor(deps: StoryGeneratorDeps) {
    this.textModel = deps.textModel;
    this.images = deps.images;
    this.storage = deps.storage;
    this.nextId = deps.idGenerator ?? generateId;
  }

  async generateStory(sessionId: string, theme: string = DEFAULT_THEME): Promise<StoryRow> {
    const structure = await this.requestStructure(theme);
    const storyId = this.nextId();
    const mainImage = await this.safeImage(() =>
      this.images.generateStoryImage(structure.title, structure.rootNode.content, theme)
    );

    const nodes: StoryNodeRow[] = [];
    await this.collectNodes(storyId, structure.rootNode, true, theme, nodes);

    const story = await this.storage.saveStory(
      {
        id: storyId,
        title: structure.title,
        sessionId,
        theme,
        mainImage,
      },
      nodes
    );

    console.log(`Generated story ${story.id} '${story.title}' with ${nodes.length} nodes`);
    return story;
  }

  private async requestStructure(theme: string): Promise<StoryLLMResponse> {
    try {
      const reply = await this.textModel.generate(buildStoryPrompt(theme));
      return parseStoryResponse(reply);
    } catch (error) {
      throw new StoryGenerationError(error instanceof Error ? error.message : String(error), { cause: error });
    }
  }

  /**
   * Depth-first walk: a node's id is allocated before its children's, and
   * its options point at the children's ids.
   */
  private async collectNodes(
    storyId: string,
    node: StoryNodeLLM,
    isRoot: boolean,
    theme: string,
    out: StoryNodeRow[]
  ): Promise<string> {
    const id = this.nextId();
    const row: StoryNodeRow = {
      id,
      storyId,
      content: node.content,
      isRoot,
      isEnding: node.isEnding,
      isWinningEnding: node.isWinningEnding,
      options: [],
      image: await this.safeImage(() => this.images.generateNodeImage(node.content, theme)),
    };
    out.push(row);

    if (!node.isEnding) {
      for (const option of node.options) {
        const childId = await this.collectNodes(storyId, option.nextNode, false, theme, out);
        row.options.push({ text: option.text, node_id: childId });
      }
    }

    return id;
  }

  private async safeImage(make: () => Promise<string | null>): Promise<string | null> {
    try {
      return await make();
    } catch (error) {
      console.error('Image generation failed, continuing without image:', error instanceof Error ? error.message : error);
      return null;
    }
  }
}
