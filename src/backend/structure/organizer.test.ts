import { describe, it, expect } from 'vitest';
import {
  MalformedTokenStreamError,
  formatTableContent,
  getEndIndex,
  organizeMarkdown,
  organizeTokens,
} from './organizer';
import { childrenOf, walkNodes, type DocumentNode } from './nodes';
import type { BlockTokenType, MarkdownToken } from './tokenizer';

function token(type: BlockTokenType, tag = '', content = ''): MarkdownToken {
  return { type, tag, content, info: '', map: null, children: [] };
}

// ── Heading scopes ───────────────────────────────────────────────────────────

describe('organizeMarkdown: headings', () => {
  it('closes deeper heading scopes when a shallower heading arrives', () => {
    const tree = organizeMarkdown('# A\n## B\n### C\n## D');

    expect(tree.elements.map((n) => n.content)).toEqual(['A']);
    const [a] = tree.elements;
    expect(a.elements.map((n) => n.content)).toEqual(['B', 'D']);
    expect(a.elements[0].elements.map((n) => n.content)).toEqual(['C']);
    expect(a.elements[1].elements).toEqual([]);
  });

  it('attaches content to the nearest open heading', () => {
    const tree = organizeMarkdown('# A\n\nIntro.\n\n## B\n\nDetail.\n\n# E\n\nOther.');
    const [a, e] = tree.elements;

    expect(a.elements.map((n) => n.type)).toEqual(['paragraph', 'h2']);
    expect(a.elements[1].elements.map((n) => n.content)).toEqual(['Detail.']);
    expect(e.elements.map((n) => n.content)).toEqual(['Other.']);
  });

  it('keeps content before the first heading on the document', () => {
    const tree = organizeMarkdown('Preamble.\n\n# A');
    expect(tree.elements.map((n) => n.type)).toEqual(['paragraph', 'h1']);
  });

  it('records heading level and 0-based line ranges', () => {
    const tree = organizeMarkdown('Intro.\n\n### Deep');
    const heading = tree.elements[1];

    expect(heading.type).toBe('h3');
    expect(heading.type === 'h3' && heading.level).toBe(3);
    expect(heading.start_line).toBe(2);
    expect(heading.end_line).toBe(3);
  });
});

// ── IDs and sizes ────────────────────────────────────────────────────────────

describe('organizeMarkdown: ids and sizes', () => {
  const source = [
    '# Guide',
    '',
    'Read [the docs](https://example.com/docs) first.',
    '',
    '- one',
    '- two',
    '',
    '## Table',
    '',
    '| H1 | H2 |',
    '| --- | --- |',
    '| A | B |',
    '',
    '> Quoted.',
  ].join('\n');

  it('assigns contiguous ids 1..N in pre-order', () => {
    const tree = organizeMarkdown(source);
    const ids: number[] = [];
    walkNodes(tree, (node) => ids.push(node.id));

    expect(ids).toEqual(Array.from({ length: ids.length }, (_, i) => i + 1));
    expect(tree.id).toBe(1);
  });

  it('numbers a node\'s elements before its list items', () => {
    const tree = organizeMarkdown('- one\n- two');
    const list = tree.elements[0];

    expect(list.type).toBe('list');
    expect(list.id).toBe(2);
    expect(list.type === 'list' && list.items.map((item) => item.id)).toEqual([3, 4]);
  });

  it('makes every size equal content_size plus the children\'s sizes', () => {
    const tree = organizeMarkdown(source);
    const check = (node: DocumentNode): void => {
      const childTotal = childrenOf(node).reduce((sum, child) => sum + child.size, 0);
      expect(node.size).toBe(node.content_size + childTotal);
      expect(node.size).toBeGreaterThanOrEqual(node.content_size);
    };
    walkNodes(tree, check);
  });

  it('uses the whole source as the document content', () => {
    const tree = organizeMarkdown(source);
    expect(tree.type).toBe('document');
    expect(tree.content).toBe(source);
    expect(tree.content_size).toBe(source.length);
  });
});

// ── Block elements ───────────────────────────────────────────────────────────

describe('organizeMarkdown: block elements', () => {
  it('builds rows and markdown content for a table', () => {
    const tree = organizeMarkdown('| H1 | H2 |\n| --- | --- |\n| A | B |');
    const table = tree.elements[0];

    expect(table.type).toBe('table');
    expect(table.type === 'table' && table.rows).toEqual([
      ['H1', 'H2'],
      ['A', 'B'],
    ]);
    expect(table.content).toBe('| H1 | H2 |\n| --- | --- |\n| A | B |\n');
  });

  it('keeps empty table cells as empty strings', () => {
    const tree = organizeMarkdown('| A | B |\n| --- | --- |\n| x |  |');
    const table = tree.elements[0];
    expect(table.type === 'table' && table.rows).toEqual([
      ['A', 'B'],
      ['x', ''],
    ]);
  });

  it('escapes pipes inside cells in the table content', () => {
    const tree = organizeMarkdown('| A | B |\n| --- | --- |\n| a\\|b | c |');
    const table = tree.elements[0];

    expect(table.type === 'table' && table.rows).toEqual([
      ['A', 'B'],
      ['a|b', 'c'],
    ]);
    expect(table.content).toBe('| A | B |\n| --- | --- |\n| a\\|b | c |\n');
  });

  it('flattens nested list items after their parent item', () => {
    const tree = organizeMarkdown('- one\n- two\n  1. nested\n- three');
    const list = tree.elements[0];
    if (list.type !== 'list') throw new Error('expected a list');

    expect(list.list_type).toBe('unordered');
    expect(list.items.map((item) => [item.content, item.list_type])).toEqual([
      ['one', 'unordered'],
      ['two', 'unordered'],
      ['nested', 'ordered'],
      ['three', 'unordered'],
    ]);
    expect(list.content).toBe('one two nested three');
    expect(list.elements).toEqual([]);
  });

  it('turns inline images and links into non-vectorized leaf elements', () => {
    const tree = organizeMarkdown('See [site](https://example.com) and ![logo](logo.png).');
    const paragraph = tree.elements[0];

    expect(paragraph.content).toBe('See site and logo.');
    expect(paragraph.elements.map((n) => [n.type, n.content, n.vectorize])).toEqual([
      ['link', '[site](https://example.com)', false],
      ['image', '![logo](logo.png)', false],
    ]);
    const [link, image] = paragraph.elements;
    expect(link.type === 'link' && link.url).toBe('https://example.com');
    expect(image.type === 'image' && image.src).toBe('logo.png');
  });

  it('keeps fenced code with its language', () => {
    const tree = organizeMarkdown('# A\n\n```js\nconst x = 1;\n```');
    const code = tree.elements[0].elements[0];

    expect(code.type).toBe('code_block');
    expect(code.type === 'code_block' && code.language).toBe('js');
    expect(code.content).toBe('const x = 1;');
  });

  it('adds horizontal rules as non-vectorized "---" nodes', () => {
    const tree = organizeMarkdown('Text.\n\n---\n\nMore.');
    const rule = tree.elements[1];

    expect(rule.type).toBe('hr');
    expect(rule.content).toBe('---');
    expect(rule.vectorize).toBe(false);
  });

  it('organizes blockquotes with their own scope', () => {
    const tree = organizeMarkdown('# A\n\n> Quoted text\n>\n> More\n\nAfter.');
    const [quote, after] = tree.elements[0].elements;

    expect(quote.type).toBe('blockquote');
    expect(quote.elements.map((n) => n.content)).toEqual(['Quoted text', 'More']);
    expect(quote.content).toBe('Quoted text More');
    expect(quote.content_size).toBe(16);
    expect(after.content).toBe('After.');
  });

  it('keeps hard line breaks as newlines', () => {
    const tree = organizeMarkdown('line one  \nline two\\\nline three');
    const paragraph = tree.elements[0];

    expect(paragraph.content).toBe('line one\nline two\nline three');
    expect(paragraph.content_size).toBe(28);
  });

  it('keeps hard line breaks inside list items and emphasis', () => {
    const tree = organizeMarkdown('- *first  \nsecond*');
    const list = tree.elements[0];
    expect(list.type === 'list' && list.items.map((item) => item.content)).toEqual(['first\nsecond']);
  });

  it('counts sizes in characters, not UTF-16 units', () => {
    const tree = organizeMarkdown('😀'.repeat(30));
    const paragraph = tree.elements[0];

    expect(paragraph.content_size).toBe(30);
    expect(tree.size).toBe(60);
  });

  it('gives an empty document no elements', () => {
    const tree = organizeMarkdown('');
    expect(tree.elements).toEqual([]);
    expect(tree.id).toBe(1);
    expect(tree.size).toBe(0);
  });
});

// ── Token streams ────────────────────────────────────────────────────────────

describe('organizeTokens', () => {
  it('rejects a heading without its inline token', () => {
    const tokens = [token('heading_open', 'h1'), token('heading_close', 'h1')];
    expect(() => organizeTokens(tokens, '')).toThrow(MalformedTokenStreamError);
  });

  it('rejects a list with no closing token', () => {
    const tokens = [token('bullet_list_open', 'ul'), token('list_item_open', 'li'), token('list_item_close', 'li')];
    expect(() => organizeTokens(tokens, '')).toThrow('No matching bullet_list_close/ordered_list_close');
  });

  it('skips tokens it does not model', () => {
    const tokens = [token('html_block', '', '<div></div>'), token('paragraph_open', 'p'), token('inline', '', 'Hi'), token('paragraph_close', 'p')];
    const tree = organizeTokens(tokens, 'source');
    expect(tree.elements.map((n) => n.content)).toEqual(['Hi']);
  });
});

describe('getEndIndex', () => {
  it('returns one past the matching close token at the same depth', () => {
    const tokens = [
      token('blockquote_open'),
      token('blockquote_open'),
      token('blockquote_close'),
      token('blockquote_close'),
      token('hr'),
    ];
    expect(getEndIndex(tokens, 0, ['blockquote_open'], ['blockquote_close'])).toBe(4);
    expect(getEndIndex(tokens, 1, ['blockquote_open'], ['blockquote_close'])).toBe(3);
  });
});

describe('formatTableContent', () => {
  it('returns an empty string for no rows', () => {
    expect(formatTableContent([])).toBe('');
  });

  it('escapes pipes in cells', () => {
    expect(formatTableContent([['x|y', 'z']])).toBe('| x\\|y | z |\n| --- | --- |\n');
  });

  it('writes a separator cell per header column', () => {
    expect(formatTableContent([['a', 'b', 'c']])).toBe('| a | b | c |\n| --- | --- | --- |\n');
  });
});
