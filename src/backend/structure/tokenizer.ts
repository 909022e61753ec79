/**
 * Markdown tokenizer: flattens a remark (mdast) tree into a block token stream.
 *
 * The organizer consumes open/close/inline events in document order, the way a
 * CommonMark token stream reads: heading_open, inline, heading_close, and so
 * on. remark-parse gives us a proper AST (so # inside code fences and other
 * edge cases are handled by a real parser); this module only linearizes it.
 * remark-gfm adds tables.
 */

import { unified } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import { toString } from 'mdast-util-to-string';
import type {
  Code,
  Definition,
  List,
  Nodes,
  PhrasingContent,
  Root,
  RootContent,
  Table,
} from 'mdast';
import type { LineMap } from './nodes';

// ── Types ────────────────────────────────────────────────────────────────────

export type BlockTokenType =
  | 'heading_open' | 'heading_close'
  | 'paragraph_open' | 'paragraph_close'
  | 'inline'
  | 'bullet_list_open' | 'bullet_list_close'
  | 'ordered_list_open' | 'ordered_list_close'
  | 'list_item_open' | 'list_item_close'
  | 'table_open' | 'table_close'
  | 'thead_open' | 'thead_close'
  | 'tbody_open' | 'tbody_close'
  | 'tr_open' | 'tr_close'
  | 'th_open' | 'th_close'
  | 'td_open' | 'td_close'
  | 'blockquote_open' | 'blockquote_close'
  | 'code_block'
  | 'fence'
  | 'hr'
  | 'html_block';

export type InlineTokenType = 'text' | 'code_inline' | 'hardbreak' | 'image' | 'link';

export interface InlineToken {
  type: InlineTokenType;
  /** Text for text/code, alt text for images, link text for links */
  content: string;
  /** `src` on images, `href` on links */
  attrs: Record<string, string>;
}

export interface MarkdownToken {
  type: BlockTokenType;
  /** HTML-ish tag name, e.g. 'h2', 'ul', 'td' */
  tag: string;
  content: string;
  /** Fence info string (language and meta) */
  info: string;
  /** [startLine, endLine), 0-based; null when the parser gave no position */
  map: LineMap | null;
  /** Inline children (only on `inline` tokens) */
  children: InlineToken[];
}

export interface TokenizeOptions {
  /** Added to every line number, e.g. the line count of stripped frontmatter */
  lineOffset?: number;
}

// ── Tokenize ─────────────────────────────────────────────────────────────────

const markdownProcessor = unified().use(remarkParse).use(remarkGfm);

/**
 * Parse markdown source and return its block token stream.
 */
export function tokenizeMarkdown(source: string, options: TokenizeOptions = {}): MarkdownToken[] {
  const tree: Root = markdownProcessor.parse(source);
  const emitter = new TokenEmitter(source, collectDefinitions(tree), options.lineOffset ?? 0);
  for (const node of tree.children) {
    emitter.block(node);
  }
  return emitter.tokens;
}

/**
 * Reference-style links and images point at definitions anywhere in the
 * document; gather them up front keyed by normalized identifier.
 */
function collectDefinitions(tree: Root): Map<string, Definition> {
  const definitions = new Map<string, Definition>();
  const visit = (node: Nodes): void => {
    if (node.type === 'definition') {
      if (!definitions.has(node.identifier)) {
        definitions.set(node.identifier, node);
      }
      return;
    }
    if ('children' in node) {
      for (const child of node.children) visit(child);
    }
  };
  visit(tree);
  return definitions;
}

/**
 * Plain text of inline content. Hard breaks carry no text of their own in
 * mdast, so they are written as newlines.
 */
function phrasingText(children: PhrasingContent[]): string {
  return children
    .map((child) => {
      if (child.type === 'break') return '\n';
      if ('children' in child) {
        const nested: PhrasingContent[] = child.children;
        return phrasingText(nested);
      }
      return toString(child);
    })
    .join('');
}

class TokenEmitter {
  readonly tokens: MarkdownToken[] = [];

  constructor(
    private readonly source: string,
    private readonly definitions: Map<string, Definition>,
    private readonly lineOffset: number,
  ) {}

  block(node: RootContent): void {
    const map = this.mapOf(node);

    switch (node.type) {
      case 'heading':
        this.push('heading_open', `h${node.depth}`, map);
        this.inline(node.children, map);
        this.push('heading_close', `h${node.depth}`, map);
        break;

      case 'paragraph':
        this.push('paragraph_open', 'p', map);
        this.inline(node.children, map);
        this.push('paragraph_close', 'p', map);
        break;

      case 'list':
        this.list(node, map);
        break;

      case 'table':
        this.table(node, map);
        break;

      case 'code':
        this.code(node, map);
        break;

      case 'thematicBreak':
        this.push('hr', 'hr', map);
        break;

      case 'blockquote':
        this.push('blockquote_open', 'blockquote', map);
        for (const child of node.children) this.block(child);
        this.push('blockquote_close', 'blockquote', map);
        break;

      case 'html':
        this.push('html_block', '', map, node.value);
        break;

      default:
        // definitions, footnotes, frontmatter: nothing structural to emit
        break;
    }
  }

  private list(node: List, map: LineMap | null): void {
    const ordered = node.ordered === true;
    const tag = ordered ? 'ol' : 'ul';
    this.push(ordered ? 'ordered_list_open' : 'bullet_list_open', tag, map);
    for (const item of node.children) {
      const itemMap = this.mapOf(item);
      this.push('list_item_open', 'li', itemMap);
      for (const child of item.children) this.block(child);
      this.push('list_item_close', 'li', itemMap);
    }
    this.push(ordered ? 'ordered_list_close' : 'bullet_list_close', tag, map);
  }

  private table(node: Table, map: LineMap | null): void {
    this.push('table_open', 'table', map);
    node.children.forEach((row, rowIndex) => {
      const isHeader = rowIndex === 0;
      if (rowIndex === 0) this.push('thead_open', 'thead', map);
      if (rowIndex === 1) this.push('tbody_open', 'tbody', map);

      const rowMap = this.mapOf(row);
      this.push('tr_open', 'tr', rowMap);
      for (const cell of row.children) {
        const cellTag = isHeader ? 'th' : 'td';
        this.push(isHeader ? 'th_open' : 'td_open', cellTag, rowMap);
        // Empty cells get no inline token at all
        if (cell.children.length > 0) {
          this.inline(cell.children, rowMap);
        }
        this.push(isHeader ? 'th_close' : 'td_close', cellTag, rowMap);
      }
      this.push('tr_close', 'tr', rowMap);

      if (rowIndex === 0) this.push('thead_close', 'thead', map);
    });
    if (node.children.length > 1) this.push('tbody_close', 'tbody', map);
    this.push('table_close', 'table', map);
  }

  private code(node: Code, map: LineMap | null): void {
    const info = [node.lang, node.meta].filter((part): part is string => !!part).join(' ');
    this.push(this.isFenced(node) ? 'fence' : 'code_block', 'code', map, node.value, info);
  }

  /** Indented code has no fence characters at its start. */
  private isFenced(node: Code): boolean {
    const offset = node.position?.start.offset;
    if (offset === undefined) {
      return node.lang !== null && node.lang !== undefined;
    }
    return /^ {0,3}(`{3,}|~{3,})/.test(this.source.slice(offset, offset + 16));
  }

  private inline(children: PhrasingContent[], map: LineMap | null): void {
    const inlineChildren: InlineToken[] = [];
    for (const child of children) this.phrasing(child, inlineChildren);
    this.tokens.push({
      type: 'inline',
      tag: '',
      content: phrasingText(children),
      info: '',
      map,
      children: inlineChildren,
    });
  }

  private phrasing(node: PhrasingContent, out: InlineToken[]): void {
    switch (node.type) {
      case 'text':
        out.push({ type: 'text', content: node.value, attrs: {} });
        break;
      case 'inlineCode':
        out.push({ type: 'code_inline', content: node.value, attrs: {} });
        break;
      case 'break':
        out.push({ type: 'hardbreak', content: '', attrs: {} });
        break;
      case 'image':
        out.push({ type: 'image', content: node.alt ?? '', attrs: { src: node.url } });
        break;
      case 'imageReference': {
        const definition = this.definitions.get(node.identifier);
        out.push({ type: 'image', content: node.alt ?? '', attrs: { src: definition?.url ?? '' } });
        break;
      }
      case 'link':
        out.push({ type: 'link', content: phrasingText(node.children), attrs: { href: node.url } });
        // Images can sit inside link text
        for (const child of node.children) this.phrasing(child, out);
        break;
      case 'linkReference': {
        const definition = this.definitions.get(node.identifier);
        out.push({ type: 'link', content: phrasingText(node.children), attrs: { href: definition?.url ?? '' } });
        for (const child of node.children) this.phrasing(child, out);
        break;
      }
      case 'emphasis':
      case 'strong':
      case 'delete':
        for (const child of node.children) this.phrasing(child, out);
        break;
      default:
        break;
    }
  }

  private push(type: BlockTokenType, tag: string, map: LineMap | null, content = '', info = ''): void {
    this.tokens.push({ type, tag, content, info, map, children: [] });
  }

  private mapOf(node: Nodes): LineMap | null {
    if (!node.position) return null;
    // mdast lines are 1-based inclusive; token maps are 0-based, end-exclusive
    return [node.position.start.line - 1 + this.lineOffset, node.position.end.line + this.lineOffset];
  }
}
