/**
 * Shared types for the structure → plan → chunks pipeline.
 */

import type { DocumentRootNode } from './structure/nodes';
import type { Chunk, ChunkingPlan } from './structure/planner';

// ── Extraction ───────────────────────────────────────────────────────────────

/**
 * A markdown file with its YAML frontmatter separated out.
 */
export interface MarkdownExtraction {
  /** Markdown body, frontmatter removed */
  body: string;
  /** Parsed frontmatter key-value pairs */
  metadata: Record<string, unknown>;
  /** Number of lines the frontmatter occupies in the original file */
  metadataLineCount: number;
}

// ── Results ──────────────────────────────────────────────────────────────────

export interface StructureResult {
  tree: DocumentRootNode;
  /** Frontmatter of the source file (not part of the tree) */
  metadata: Record<string, unknown>;
}

export interface ChunkResult {
  plan: ChunkingPlan;
  chunks: Chunk[];
}

/** Files written for one source document. */
export interface OutputPaths {
  structure?: string;
  plan?: string;
  chunks?: string;
}
