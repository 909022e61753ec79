/**
 * Document structure node model.
 *
 * Every structural element of a markdown file becomes one DocumentNode.
 * Field names are snake_case because the serialized tree is read by other
 * tooling: id, type, content, content_size, size, elements, vectorize,
 * level, list_type, items, rows, language, alt, src, text, url,
 * start_line, end_line.
 */

import { charLength } from './text-splitter';

// ── Types ────────────────────────────────────────────────────────────────────

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;
export type HeadingType = 'h1' | 'h2' | 'h3' | 'h4' | 'h5' | 'h6';
export type ListType = 'ordered' | 'unordered';

export type NodeType =
  | 'document'
  | HeadingType
  | 'paragraph'
  | 'list'
  | 'list_item'
  | 'table'
  | 'code_block'
  | 'hr'
  | 'blockquote'
  | 'image'
  | 'link';

/** Source line range from the tokenizer: [startLine, endLine), 0-based. */
export type LineMap = readonly [number, number];

interface NodeBase {
  /** Sequential, 1-based, assigned after the tree is built (0 until then) */
  id: number;
  /** The node's own text, descendants excluded */
  content: string;
  /** Length of `content`, fixed at creation */
  content_size: number;
  /** content_size plus the sizes of all descendants (after size propagation) */
  size: number;
  elements: DocumentNode[];
  /** False for elements that are not prose (hr, image, link) */
  vectorize: boolean;
  start_line: number | null;
  end_line: number | null;
}

export interface DocumentRootNode extends NodeBase {
  type: 'document';
}

export interface HeadingNode extends NodeBase {
  type: HeadingType;
  level: HeadingLevel;
}

export interface ParagraphNode extends NodeBase {
  type: 'paragraph';
}

export interface ListNode extends NodeBase {
  type: 'list';
  list_type: ListType;
  /** List children live here; `elements` stays empty on lists */
  items: ListItemNode[];
}

export interface ListItemNode extends NodeBase {
  type: 'list_item';
  list_type: ListType;
}

export interface TableNode extends NodeBase {
  type: 'table';
  /** First row is the header row */
  rows: string[][];
}

export interface CodeBlockNode extends NodeBase {
  type: 'code_block';
  language: string;
}

export interface HorizontalRuleNode extends NodeBase {
  type: 'hr';
}

export interface BlockquoteNode extends NodeBase {
  type: 'blockquote';
}

export interface ImageNode extends NodeBase {
  type: 'image';
  alt: string;
  src: string;
}

export interface LinkNode extends NodeBase {
  type: 'link';
  text: string;
  url: string;
}

export type DocumentNode =
  | DocumentRootNode
  | HeadingNode
  | ParagraphNode
  | ListNode
  | ListItemNode
  | TableNode
  | CodeBlockNode
  | HorizontalRuleNode
  | BlockquoteNode
  | ImageNode
  | LinkNode;

/** Nodes that other nodes can be attached to while organizing. */
export type ContainerNode = DocumentRootNode | HeadingNode | BlockquoteNode;

// ── Factories ────────────────────────────────────────────────────────────────

const HEADING_TYPES: Record<HeadingLevel, HeadingType> = {
  1: 'h1',
  2: 'h2',
  3: 'h3',
  4: 'h4',
  5: 'h5',
  6: 'h6',
};

function base(content: string, map: LineMap | null, vectorize = true): NodeBase {
  return {
    id: 0,
    content,
    content_size: charLength(content),
    size: charLength(content),
    elements: [],
    vectorize,
    start_line: map ? map[0] : null,
    end_line: map ? map[1] : null,
  };
}

export function createDocumentNode(content: string): DocumentRootNode {
  return { ...base(content, null), type: 'document' };
}

export function createHeadingNode(
  level: HeadingLevel,
  content: string,
  map: LineMap | null,
): HeadingNode {
  return { ...base(content, map), type: HEADING_TYPES[level], level };
}

export function createParagraphNode(content: string, map: LineMap | null): ParagraphNode {
  return { ...base(content, map), type: 'paragraph' };
}

/**
 * A list's own content is the space-joined content of its items, so that a
 * list can be chunked as one piece of prose.
 */
export function createListNode(
  listType: ListType,
  items: ListItemNode[],
  map: LineMap | null,
): ListNode {
  const content = items.map((item) => item.content).join(' ');
  return { ...base(content, map), type: 'list', list_type: listType, items };
}

export function createListItemNode(
  content: string,
  listType: ListType,
  map: LineMap | null,
): ListItemNode {
  return { ...base(content, map), type: 'list_item', list_type: listType };
}

export function createTableNode(content: string, rows: string[][], map: LineMap | null): TableNode {
  return { ...base(content, map), type: 'table', rows };
}

export function createCodeNode(content: string, language: string, map: LineMap | null): CodeBlockNode {
  return { ...base(content, map), type: 'code_block', language };
}

export function createHorizontalRuleNode(map: LineMap | null): HorizontalRuleNode {
  return { ...base('---', map, false), type: 'hr' };
}

/** Content is filled in once the quoted children are known. */
export function createBlockquoteNode(map: LineMap | null): BlockquoteNode {
  return { ...base('', map), type: 'blockquote' };
}

export function createImageNode(alt: string, src: string): ImageNode {
  return { ...base(`![${alt}](${src})`, null, false), type: 'image', alt, src };
}

export function createLinkNode(text: string, url: string): LinkNode {
  return { ...base(`[${text}](${url})`, null, false), type: 'link', text, url };
}

export function headingLevelFromTag(tag: string): HeadingLevel | null {
  switch (tag) {
    case 'h1': return 1;
    case 'h2': return 2;
    case 'h3': return 3;
    case 'h4': return 4;
    case 'h5': return 5;
    case 'h6': return 6;
    default: return null;
  }
}

// ── Traversal ────────────────────────────────────────────────────────────────

/** Direct children in traversal order: `elements` first, then list `items`. */
export function childrenOf(node: DocumentNode): DocumentNode[] {
  if (node.type === 'list') {
    return [...node.elements, ...node.items];
  }
  return node.elements;
}

/**
 * Pre-order, depth-first walk over the whole tree, list items included.
 */
export function walkNodes(node: DocumentNode, visit: (node: DocumentNode, depth: number) => void, depth = 0): void {
  visit(node, depth);
  for (const child of childrenOf(node)) {
    walkNodes(child, visit, depth + 1);
  }
}

export function countNodes(root: DocumentNode): number {
  let count = 0;
  walkNodes(root, () => {
    count++;
  });
  return count;
}
