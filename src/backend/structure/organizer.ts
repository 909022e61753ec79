/**
 * Structure organizer: turns a markdown token stream into a nested document tree.
 *
 * Headings open scopes: everything after a heading (paragraphs, lists, tables,
 * deeper headings) becomes its child until a heading of the same or a lower
 * level closes it. Blockquotes are organized recursively with a scope of
 * their own. After the token pass, sizes are aggregated bottom-up and
 * sequential IDs are assigned in document order.
 */

import {
  childrenOf,
  createBlockquoteNode,
  createCodeNode,
  createDocumentNode,
  createHeadingNode,
  createHorizontalRuleNode,
  createImageNode,
  createLinkNode,
  createListItemNode,
  createListNode,
  createParagraphNode,
  createTableNode,
  headingLevelFromTag,
  type BlockquoteNode,
  type ContainerNode,
  type DocumentNode,
  type DocumentRootNode,
  type HeadingLevel,
  type ListItemNode,
  type ListType,
} from './nodes';
import { charLength } from './text-splitter';
import { tokenizeMarkdown, type BlockTokenType, type MarkdownToken, type TokenizeOptions } from './tokenizer';

// ── Errors ───────────────────────────────────────────────────────────────────

/** The token stream is not balanced or not shaped the way the parser emits it. */
export class MalformedTokenStreamError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedTokenStreamError';
  }
}

// ── Organize ─────────────────────────────────────────────────────────────────

/**
 * Parse markdown and organize it into a document tree with sizes and IDs.
 */
export function organizeMarkdown(source: string, options: TokenizeOptions = {}): DocumentRootNode {
  return organizeTokens(tokenizeMarkdown(source, options), source);
}

/**
 * Organize an already-tokenized markdown stream. `source` becomes the
 * document node's own content.
 */
export function organizeTokens(tokens: MarkdownToken[], source: string): DocumentRootNode {
  const document = createDocumentNode(source);
  processTokens(tokens, document);
  propagateSizes(document);
  assignSequentialIds(document);
  return document;
}

const LIST_OPEN: BlockTokenType[] = ['bullet_list_open', 'ordered_list_open'];
const LIST_CLOSE: BlockTokenType[] = ['bullet_list_close', 'ordered_list_close'];

/**
 * Single pass over a token slice, attaching nodes to the top of a parent stack.
 * Heading levels are tracked on a parallel stack so that a heading closes
 * every open heading scope of the same or a deeper level.
 */
function processTokens(tokens: MarkdownToken[], root: ContainerNode): void {
  const parentStack: ContainerNode[] = [root];
  const headerLevelStack: HeadingLevel[] = [];
  const currentParent = (): ContainerNode => parentStack[parentStack.length - 1] ?? root;

  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i];

    switch (token.type) {
      case 'heading_open': {
        const inline = expectInline(tokens, i, 'heading_close');
        const level = headingLevelFromTag(token.tag);
        if (level === null) {
          throw new MalformedTokenStreamError(`Unknown heading tag "${token.tag}" at token ${i}`);
        }
        const heading = createHeadingNode(level, inline.content, token.map);

        while (headerLevelStack.length > 0 && headerLevelStack[headerLevelStack.length - 1] >= level) {
          headerLevelStack.pop();
          parentStack.pop();
        }

        currentParent().elements.push(heading);
        parentStack.push(heading);
        headerLevelStack.push(level);
        i += 3;
        break;
      }

      case 'paragraph_open': {
        const inline = expectInline(tokens, i, 'paragraph_close');
        const paragraph = createParagraphNode(inline.content, token.map);
        paragraph.elements.push(...inlineNodes(inline));
        currentParent().elements.push(paragraph);
        i += 3;
        break;
      }

      case 'bullet_list_open':
      case 'ordered_list_open': {
        const endIdx = getEndIndex(tokens, i, LIST_OPEN, LIST_CLOSE);
        const listType: ListType = token.type === 'ordered_list_open' ? 'ordered' : 'unordered';
        const items = extractListItems(tokens.slice(i + 1, endIdx - 1), listType);
        currentParent().elements.push(createListNode(listType, items, token.map));
        i = endIdx;
        break;
      }

      case 'table_open': {
        const endIdx = getEndIndex(tokens, i, ['table_open'], ['table_close']);
        const rows = extractTableRows(tokens.slice(i + 1, endIdx - 1));
        currentParent().elements.push(createTableNode(formatTableContent(rows), rows, token.map));
        i = endIdx;
        break;
      }

      case 'code_block':
      case 'fence':
        currentParent().elements.push(createCodeNode(token.content, token.info, token.map));
        i += 1;
        break;

      case 'hr':
        currentParent().elements.push(createHorizontalRuleNode(token.map));
        i += 1;
        break;

      case 'blockquote_open': {
        const endIdx = getEndIndex(tokens, i, ['blockquote_open'], ['blockquote_close']);
        const quote = createBlockquoteNode(token.map);
        currentParent().elements.push(quote);
        processTokens(tokens.slice(i + 1, endIdx - 1), quote);
        setBlockquoteContent(quote);
        i = endIdx;
        break;
      }

      default:
        // Inline marks, html, stray closers: not modeled as structure
        i += 1;
        break;
    }
  }
}

/**
 * Depth-balanced scan for the close token matching the open token at `openIdx`.
 * Returns the index one past the matching close token.
 */
export function getEndIndex(
  tokens: MarkdownToken[],
  openIdx: number,
  openTypes: BlockTokenType[],
  closeTypes: BlockTokenType[],
): number {
  let depth = 1;
  let idx = openIdx + 1;
  while (idx < tokens.length && depth > 0) {
    const type = tokens[idx].type;
    if (openTypes.includes(type)) {
      depth++;
    } else if (closeTypes.includes(type)) {
      depth--;
    }
    idx++;
  }
  if (depth > 0) {
    throw new MalformedTokenStreamError(
      `No matching ${closeTypes.join('/')} for ${tokens[openIdx].type} at token ${openIdx}`,
    );
  }
  return idx;
}

/** Open tokens carrying text are always followed by an inline token and their close. */
function expectInline(tokens: MarkdownToken[], openIdx: number, closeType: BlockTokenType): MarkdownToken {
  const inline = tokens[openIdx + 1];
  const close = tokens[openIdx + 2];
  if (!inline || inline.type !== 'inline' || !close || close.type !== closeType) {
    throw new MalformedTokenStreamError(
      `Expected inline and ${closeType} after ${tokens[openIdx].type} at token ${openIdx}`,
    );
  }
  return inline;
}

// ── Inline elements ──────────────────────────────────────────────────────────

/** Image and link leaves found among an inline token's children. */
function inlineNodes(inline: MarkdownToken): DocumentNode[] {
  const nodes: DocumentNode[] = [];
  for (const child of inline.children) {
    if (child.type === 'image') {
      nodes.push(createImageNode(child.content, child.attrs.src ?? ''));
    } else if (child.type === 'link') {
      nodes.push(createLinkNode(child.content, child.attrs.href ?? ''));
    }
  }
  return nodes;
}

// ── Lists ────────────────────────────────────────────────────────────────────

/**
 * Build list items from the tokens between a list's open and close.
 *
 * An item's text is its direct paragraphs joined by a space. Items of lists
 * nested inside an item follow that item in the same flat sequence, each
 * keeping its own list type.
 */
function extractListItems(tokens: MarkdownToken[], listType: ListType): ListItemNode[] {
  const items: ListItemNode[] = [];
  let i = 0;

  while (i < tokens.length) {
    const token = tokens[i];
    if (token.type !== 'list_item_open') {
      i++;
      continue;
    }

    const endIdx = getEndIndex(tokens, i, ['list_item_open'], ['list_item_close']);
    const inner = tokens.slice(i + 1, endIdx - 1);

    const texts: string[] = [];
    const inlineChildren: DocumentNode[] = [];
    const nested: ListItemNode[] = [];

    let j = 0;
    while (j < inner.length) {
      const child = inner[j];
      if (child.type === 'paragraph_open') {
        const inline = expectInline(inner, j, 'paragraph_close');
        texts.push(inline.content);
        inlineChildren.push(...inlineNodes(inline));
        j += 3;
      } else if (LIST_OPEN.includes(child.type)) {
        const nestedEnd = getEndIndex(inner, j, LIST_OPEN, LIST_CLOSE);
        const nestedType: ListType = child.type === 'ordered_list_open' ? 'ordered' : 'unordered';
        nested.push(...extractListItems(inner.slice(j + 1, nestedEnd - 1), nestedType));
        j = nestedEnd;
      } else if (child.type === 'blockquote_open') {
        // Quoted paragraphs inside an item are not item text
        j = getEndIndex(inner, j, ['blockquote_open'], ['blockquote_close']);
      } else {
        j++;
      }
    }

    const item = createListItemNode(texts.join(' '), listType, token.map);
    item.elements.push(...inlineChildren);
    items.push(item, ...nested);
    i = endIdx;
  }

  return items;
}

// ── Tables ───────────────────────────────────────────────────────────────────

/** Rows of cell strings; a cell without an inline token is an empty string. */
function extractTableRows(tokens: MarkdownToken[]): string[][] {
  const rows: string[][] = [];
  let currentRow: string[] = [];

  tokens.forEach((token, idx) => {
    if (token.type === 'tr_open') {
      currentRow = [];
    } else if (token.type === 'tr_close') {
      rows.push(currentRow);
    } else if (token.type === 'th_open' || token.type === 'td_open') {
      const next = tokens[idx + 1];
      currentRow.push(next && next.type === 'inline' ? next.content : '');
    }
  });

  return rows;
}

/**
 * Render rows back to a markdown table for display and chunk text:
 * header row, a --- separator per column, then the data rows. Pipes inside
 * cells are escaped so the column count survives.
 */
export function formatTableContent(rows: string[][]): string {
  if (rows.length === 0) return '';

  const line = (cells: string[]): string => `| ${cells.map(escapeCell).join(' | ')} |\n`;
  const [header, ...body] = rows;

  let result = line(header);
  result += line(header.map(() => '---'));
  for (const row of body) {
    result += line(row);
  }
  return result;
}

function escapeCell(cell: string): string {
  return cell.replace(/\|/g, '\\|');
}

// ── Blockquotes ──────────────────────────────────────────────────────────────

/** A blockquote's own content is its direct children's content, space-joined. */
function setBlockquoteContent(quote: BlockquoteNode): void {
  const content = quote.elements.map((element) => element.content).join(' ');
  quote.content = content;
  quote.content_size = charLength(content);
}

// ── Post-processing ──────────────────────────────────────────────────────────

/**
 * Post-order: each node's size becomes its content_size plus the sizes of
 * all children and list items. Returns the node's new size.
 */
export function propagateSizes(node: DocumentNode): number {
  let total = node.content_size;
  for (const child of childrenOf(node)) {
    total += propagateSizes(child);
  }
  node.size = total;
  return total;
}

/**
 * Pre-order: the root gets `firstId`, then every descendant in traversal
 * order (elements before list items). Returns the next unused id.
 */
export function assignSequentialIds(node: DocumentNode, firstId = 1): number {
  node.id = firstId;
  let nextId = firstId + 1;
  for (const child of childrenOf(node)) {
    nextId = assignSequentialIds(child, nextId);
  }
  return nextId;
}
