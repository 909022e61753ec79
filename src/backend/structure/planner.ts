/**
 * Chunk planner: decides, node by node, whether to split, merge or keep.
 *
 * Planning runs in three phases over a finished document tree:
 *   1. planElement: oversized nodes (beyond max + tolerance) are marked `chunk`
 *   2. identifyMergeCandidates: runs of undersized siblings are grouped into merges
 *   3. generateChunks: the plan is materialized into text chunks
 *
 * Merge groups never cross parents: every sibling list is grouped on its own.
 */

import { z } from 'zod';
import { charLength, sliceChars, splitText } from './text-splitter';

// ── Types ────────────────────────────────────────────────────────────────────

/**
 * The slice of a document node the planner reads. Both freshly organized
 * trees and trees loaded back from JSON satisfy it.
 */
export interface PlannableNode {
  id: number;
  content: string;
  content_size: number;
  elements?: PlannableNode[];
  items?: PlannableNode[];
}

export type PlanAction = 'keep_as_is' | 'chunk' | 'merge';

export interface ChunkPreview {
  index: number;
  size: number;
  /** First 50 characters, with "..." when truncated */
  preview: string;
}

export interface ChunkPlanEntry {
  id: number;
  original_size: number;
  action: PlanAction;
  chunks: ChunkPreview[];
  merge_group?: string;
  /** Set while the entry sits in an undecided merge group */
  merge_candidate?: boolean;
  child_elements?: ChunkPlanEntry[];
}

export interface ChunkingPlan {
  document_id: number;
  total_size: number;
  min_chunk_size: number;
  max_chunk_size: number;
  elements: ChunkPlanEntry[];
}

export type Chunk =
  | {
      chunk_id: string;
      source_element: number;
      chunk_type: 'single' | 'split';
      content: string;
      size: number;
    }
  | {
      chunk_id: string;
      source_elements: number[];
      chunk_type: 'merged';
      content: string;
      size: number;
    };

// ── Options ──────────────────────────────────────────────────────────────────

export const chunkerOptionsSchema = z
  .object({
    minChunkSize: z.number().int().positive().default(500),
    maxChunkSize: z.number().int().positive().default(2000),
    chunkOverlap: z.number().int().nonnegative().default(50),
    /** Fraction over maxChunkSize tolerated before splitting, e.g. 0.1 = 10% */
    sizeTolerance: z.number().nonnegative().default(0.1),
    /** Merge a trailing run of two or more undersized siblings even below minChunkSize */
    mergeTrailingGroup: z.boolean().default(true),
  })
  .refine((o) => o.minChunkSize <= o.maxChunkSize, {
    message: 'minChunkSize must not exceed maxChunkSize',
    path: ['minChunkSize'],
  })
  .refine((o) => o.chunkOverlap < o.maxChunkSize, {
    message: 'chunkOverlap must be smaller than maxChunkSize',
    path: ['chunkOverlap'],
  });

export type ChunkerOptions = z.input<typeof chunkerOptionsSchema>;
export type ResolvedChunkerOptions = z.output<typeof chunkerOptionsSchema>;

const PREVIEW_LENGTH = 50;

// ── Chunker ──────────────────────────────────────────────────────────────────

export class DocumentChunker {
  readonly options: ResolvedChunkerOptions;

  constructor(options: ChunkerOptions = {}) {
    this.options = chunkerOptionsSchema.parse(options);
  }

  /** Largest size that is still kept whole (max + tolerance). */
  get sizeLimit(): number {
    return this.options.maxChunkSize * (1 + this.options.sizeTolerance);
  }

  /**
   * Plan and materialize chunks for a whole document in one call.
   */
  processDocument(document: PlannableNode): { plan: ChunkingPlan; chunks: Chunk[] } {
    const plan = this.createChunkingPlan(document);
    return { plan, chunks: this.generateChunks(document, plan) };
  }

  /**
   * Build the chunking plan for the document's children (the root itself is
   * never chunked; its content is the whole file).
   */
  createChunkingPlan(document: PlannableNode): ChunkingPlan {
    const elements = (document.elements ?? []).map((element) => this.planElement(element));
    this.identifyMergeCandidates(elements);
    return {
      document_id: document.id,
      total_size: document.content_size,
      min_chunk_size: this.options.minChunkSize,
      max_chunk_size: this.options.maxChunkSize,
      elements,
    };
  }

  /**
   * Phase 1: per-node decision, recursing into `elements`.
   */
  planElement(element: PlannableNode): ChunkPlanEntry {
    const entry: ChunkPlanEntry = {
      id: element.id,
      original_size: element.content_size,
      action: 'keep_as_is',
      chunks: [],
    };

    if (element.content_size > this.sizeLimit) {
      entry.action = 'chunk';
      entry.chunks = this.split(element.content).map((text, index) => ({
        index,
        size: charLength(text),
        preview: charLength(text) > PREVIEW_LENGTH ? `${sliceChars(text, PREVIEW_LENGTH)}...` : text,
      }));
    }

    const children = element.elements ?? [];
    if (children.length > 0) {
      entry.child_elements = children.map((child) => this.planElement(child));
    }

    return entry;
  }

  /**
   * Phase 2: group runs of undersized siblings into merge groups, then do the
   * same for every entry's children independently. Updates entries in place.
   */
  identifyMergeCandidates(entries: ChunkPlanEntry[], parentPath = ''): void {
    const { minChunkSize } = this.options;
    let groupCount = 0;
    let groupId = '';
    let group: ChunkPlanEntry[] = [];
    let groupSize = 0;

    const reset = (): void => {
      group = [];
      groupSize = 0;
    };

    for (const entry of entries) {
      if (entry.action === 'chunk') {
        this.finalizeGroup(group, groupSize >= minChunkSize, groupId);
        reset();
      } else if (entry.original_size < minChunkSize) {
        if (group.length === 0) {
          groupId = `merge_${parentPath}_${groupCount}`;
          groupCount++;
        }
        group.push(entry);
        groupSize += entry.original_size;
        entry.merge_candidate = true;

        if (groupSize >= minChunkSize) {
          // A group that overshoots the limit is dropped rather than re-split
          this.finalizeGroup(group, groupSize <= this.sizeLimit, groupId);
          reset();
        }
      } else {
        this.finalizeGroup(group, groupSize >= minChunkSize, groupId);
        reset();
      }

      if (entry.child_elements) {
        this.identifyMergeCandidates(
          entry.child_elements,
          parentPath ? `${parentPath}_${entry.id}` : String(entry.id),
        );
      }
    }

    const mergeLeftover = groupSize >= minChunkSize || (this.options.mergeTrailingGroup && group.length > 1);
    this.finalizeGroup(group, mergeLeftover, groupId);
  }

  /** Mark every member as merged under `groupId`, or revert them all. */
  private finalizeGroup(group: ChunkPlanEntry[], merge: boolean, groupId: string): void {
    for (const entry of group) {
      delete entry.merge_candidate;
      if (merge) {
        entry.action = 'merge';
        entry.merge_group = groupId;
      } else {
        entry.action = 'keep_as_is';
        delete entry.merge_group;
      }
    }
  }

  /**
   * Phase 3: turn the plan into chunks. Singles and splits come first in tree
   * order; merged chunks follow, one per group in first-seen order.
   */
  generateChunks(document: PlannableNode, plan: ChunkingPlan): Chunk[] {
    const chunks: Chunk[] = [];

    const emit = (entry: ChunkPlanEntry): void => {
      if (entry.action === 'chunk') {
        this.split(this.contentOf(document, entry.id)).forEach((text, i) => {
          chunks.push({
            chunk_id: `chunk_${entry.id}_${i}`,
            source_element: entry.id,
            chunk_type: 'split',
            content: text,
            size: charLength(text),
          });
        });
      } else if (entry.action === 'keep_as_is' && !entry.merge_candidate) {
        const content = this.contentOf(document, entry.id);
        chunks.push({
          chunk_id: `chunk_${entry.id}`,
          source_element: entry.id,
          chunk_type: 'single',
          content,
          size: charLength(content),
        });
      }
      for (const child of entry.child_elements ?? []) emit(child);
    };
    for (const entry of plan.elements) emit(entry);

    const groups = new Map<string, number[]>();
    const collect = (entry: ChunkPlanEntry): void => {
      if (entry.action === 'merge' && entry.merge_group) {
        const members = groups.get(entry.merge_group) ?? [];
        members.push(entry.id);
        groups.set(entry.merge_group, members);
      }
      for (const child of entry.child_elements ?? []) collect(child);
    };
    for (const entry of plan.elements) collect(entry);

    for (const [groupId, ids] of groups) {
      const content = ids.map((id) => this.contentOf(document, id)).join('\n\n').trimEnd();
      chunks.push({
        chunk_id: `chunk_${groupId}`,
        source_elements: ids,
        chunk_type: 'merged',
        content,
        size: charLength(content),
      });
    }

    return chunks;
  }

  private split(content: string): string[] {
    return splitText(content, {
      chunkSize: this.options.maxChunkSize,
      chunkOverlap: this.options.chunkOverlap,
    });
  }

  private contentOf(document: PlannableNode, id: number): string {
    const node = findNodeById(document, id);
    if (!node) {
      console.warn(`[planner] Element ${id} not found in document ${document.id}; using empty content`);
      return '';
    }
    return node.content;
  }
}

// ── Lookup ───────────────────────────────────────────────────────────────────

/**
 * Depth-first search by id over `elements` and list `items`.
 */
export function findNodeById(node: PlannableNode, id: number): PlannableNode | null {
  if (node.id === id) return node;
  for (const child of [...(node.elements ?? []), ...(node.items ?? [])]) {
    const found = findNodeById(child, id);
    if (found) return found;
  }
  return null;
}
