/**
 * Markdown extractor: separates YAML frontmatter from the document body.
 */

import matter from 'gray-matter';
import type { MarkdownExtraction } from '../pipeline-types';

/**
 * Split a markdown file into its body and frontmatter metadata.
 *
 * The body keeps its own line structure (no trimming) so that line numbers
 * reported for it are `metadataLineCount` lines behind the original file.
 */
export function extractMarkdown(content: string): MarkdownExtraction {
  if (!matter.test(content)) {
    return { body: content, metadata: {}, metadataLineCount: 0 };
  }

  const { data, content: body } = matter(content);
  const bodyStart = content.length - body.length;
  const metadataLineCount = bodyStart > 0 ? content.slice(0, bodyStart).split('\n').length - 1 : 0;

  return {
    body,
    metadata: { ...data },
    metadataLineCount,
  };
}
