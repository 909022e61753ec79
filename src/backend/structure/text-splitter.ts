/**
 * Recursive character text splitter.
 *
 * Progressive strategy: each separator handles text the previous one couldn't
 * break into small enough pieces:
 *   "\n\n"  paragraphs
 *   "\n"    lines
 *   ". " "? " "! "  sentences
 *   ", "    clauses
 *   " "     words
 *   ""      characters (last resort)
 *
 * Pieces that fit are greedily merged back up to `chunkSize`, carrying up to
 * `chunkOverlap` characters of trailing pieces into the next chunk.
 */

/** Length in code points: a surrogate pair counts as one character. */
export function charLength(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code >= 0xd800 && code <= 0xdbff && i + 1 < text.length) {
      const next = text.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) i++;
    }
    count++;
  }
  return count;
}

/** The first `count` code points of `text`. */
export function sliceChars(text: string, count: number): string {
  return Array.from(text).slice(0, count).join('');
}

export const DEFAULT_SEPARATORS: readonly string[] = ['\n\n', '\n', '. ', '? ', '! ', ', ', ' ', ''];

export interface TextSplitterOptions {
  chunkSize: number;
  chunkOverlap: number;
  separators?: readonly string[];
}

/**
 * Split text into chunks of at most `chunkSize` characters (code points).
 * Chunks are whitespace-trimmed; empty chunks are dropped.
 */
export function splitText(text: string, options: TextSplitterOptions): string[] {
  return splitRecursive(text, options.separators ?? DEFAULT_SEPARATORS, options);
}

function splitRecursive(text: string, separators: readonly string[], options: TextSplitterOptions): string[] {
  const { separator, remaining } = pickSeparator(text, separators);
  const pieces = splitKeepingSeparator(text, separator);

  const chunks: string[] = [];
  let fitting: string[] = [];

  for (const piece of pieces) {
    if (charLength(piece) < options.chunkSize) {
      fitting.push(piece);
      continue;
    }

    if (fitting.length > 0) {
      chunks.push(...mergePieces(fitting, options));
      fitting = [];
    }
    if (remaining.length === 0) {
      chunks.push(piece);
    } else {
      chunks.push(...splitRecursive(piece, remaining, options));
    }
  }

  if (fitting.length > 0) {
    chunks.push(...mergePieces(fitting, options));
  }

  return chunks;
}

/**
 * The first separator present in the text, plus the finer ones after it.
 * The empty separator always matches.
 */
function pickSeparator(
  text: string,
  separators: readonly string[],
): { separator: string; remaining: readonly string[] } {
  for (let i = 0; i < separators.length; i++) {
    const separator = separators[i];
    if (separator === '') {
      return { separator, remaining: [] };
    }
    if (text.includes(separator)) {
      return { separator, remaining: separators.slice(i + 1) };
    }
  }
  return { separator: '', remaining: [] };
}

/**
 * Split on a literal separator, keeping the separator at the head of the
 * piece that follows it. "a. b. c" on ". " gives ["a", ". b", ". c"].
 */
export function splitKeepingSeparator(text: string, separator: string): string[] {
  if (separator === '') {
    return Array.from(text);
  }
  const [first, ...rest] = text.split(separator);
  return [first, ...rest.map((part) => separator + part)].filter((piece) => piece !== '');
}

/**
 * Greedily merge pieces into chunks no longer than `chunkSize`.
 * After each emitted chunk, leading pieces are dropped until what remains
 * fits in `chunkOverlap`; the remainder opens the next chunk.
 */
export function mergePieces(pieces: string[], options: TextSplitterOptions): string[] {
  const { chunkSize, chunkOverlap } = options;
  const chunks: string[] = [];
  let current: string[] = [];
  let total = 0;

  for (const piece of pieces) {
    const size = charLength(piece);
    if (total + size > chunkSize && current.length > 0) {
      pushChunk(chunks, current);
      while (total > chunkOverlap || (total + size > chunkSize && total > 0)) {
        const dropped = current.shift();
        if (dropped === undefined) break;
        total -= charLength(dropped);
      }
    }
    current.push(piece);
    total += size;
  }

  pushChunk(chunks, current);
  return chunks;
}

function pushChunk(chunks: string[], pieces: string[]): void {
  const chunk = pieces.join('').trim();
  if (chunk.length > 0) {
    chunks.push(chunk);
  }
}
