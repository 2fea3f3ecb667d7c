import { describe, it, expect } from 'vitest';
import { extractJson, MAX_TITLE_LENGTH, normalizeNode, parseStoryResponse } from '../../src/story/parser.js';
import { StoryParseError } from '../../src/story/errors.js';
import { buildStoryPrompt } from '../../src/story/prompt.js';
import { fenced, sampleStory } from '../helpers/fixtures.js';

describe('extractJson', () => {
  it('prefers a json fence', () => {
    const text = 'intro\n```json\n{"a": 1}\n```\nafter ```{"b": 2}```';
    expect(extractJson(text)).toBe('{"a": 1}');
  });

  it('falls back to a bare fence', () => {
    expect(extractJson('look:\n```\n{"b": 2}\n```')).toBe('{"b": 2}');
  });

  it('returns the trimmed text when there is no fence', () => {
    expect(extractJson('  {"c": 3}\n')).toBe('{"c": 3}');
  });

  it('takes everything after an unclosed json fence', () => {
    expect(extractJson('```json\n{"d": 4}')).toBe('{"d": 4}');
  });
});

describe('parseStoryResponse', () => {
  it('parses a fenced story', () => {
    const story = parseStoryResponse(fenced(sampleStory));

    expect(story.title).toBe('The Lantern Keeper');
    expect(story.rootNode.options.map((o) => o.text)).toEqual(['Climb the stairs', 'Go down to the cellar']);
    expect(story.rootNode.options[0].nextNode.isWinningEnding).toBe(true);
    expect(story.rootNode.options[1].nextNode.options.map((o) => o.nextNode.content)).toEqual([
      'The current drags you under.',
      'The tide never turns.',
    ]);
  });

  it('cuts an overlong title to the stored width', () => {
    const story = parseStoryResponse(JSON.stringify({ ...sampleStory, title: 'A'.repeat(300) }));

    expect(MAX_TITLE_LENGTH).toBe(255);
    expect(story.title).toBe('A'.repeat(255));
  });

  it('defaults missing options and isWinningEnding', () => {
    const story = parseStoryResponse(JSON.stringify({
      title: 'Short',
      rootNode: {
        content: 'Start',
        isEnding: false,
        options: [{ text: 'Go', nextNode: { content: 'End', isEnding: true } }],
      },
    }));

    expect(story.rootNode.options[0].nextNode).toEqual({
      content: 'End',
      isEnding: true,
      isWinningEnding: false,
      options: [],
    });
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseStoryResponse('Once upon a time')).toThrow(StoryParseError);
    expect(() => parseStoryResponse('Once upon a time')).toThrow(/^Failed to parse JSON response from the text model/);
  });

  it('names the failing path when the structure is wrong', () => {
    const broken = {
      title: 'Broken',
      rootNode: {
        content: 'Start',
        isEnding: false,
        options: [{ text: '', nextNode: { content: 'End', isEnding: true } }],
      },
    };

    expect(() => parseStoryResponse(JSON.stringify(broken))).toThrow(
      'Story response does not match the expected structure: rootNode.options.0.text: Option text is required'
    );
  });

  it('rejects a missing title', () => {
    expect(() => parseStoryResponse(JSON.stringify({ rootNode: sampleStory.rootNode }))).toThrow(/title: Required/);
  });
});

describe('normalizeNode', () => {
  it('drops options from endings', () => {
    const node = normalizeNode({
      content: 'The end',
      isEnding: true,
      isWinningEnding: true,
      options: [{ text: 'More?', nextNode: { content: 'x', isEnding: true, isWinningEnding: false, options: [] } }],
    });

    expect(node).toEqual({ content: 'The end', isEnding: true, isWinningEnding: true, options: [] });
  });

  it('turns a dead end into a losing ending', () => {
    const node = normalizeNode({ content: 'Nowhere to go', isEnding: false, isWinningEnding: true, options: [] });

    expect(node).toEqual({ content: 'Nowhere to go', isEnding: true, isWinningEnding: false, options: [] });
  });

  it('clears isWinningEnding on branching nodes', () => {
    const node = normalizeNode({
      content: 'Fork',
      isEnding: false,
      isWinningEnding: true,
      options: [{ text: 'Left', nextNode: { content: 'Won', isEnding: true, isWinningEnding: true, options: [] } }],
    });

    expect(node.isWinningEnding).toBe(false);
    expect(node.options[0].nextNode.isWinningEnding).toBe(true);
  });
});

describe('buildStoryPrompt', () => {
  it('embeds the theme and asks for JSON only', () => {
    const prompt = buildStoryPrompt('space pirates');

    expect(prompt).toContain('Create the story with this theme: space pirates');
    expect(prompt).toContain("Don't add any text outside of the JSON structure.");
  });
});
