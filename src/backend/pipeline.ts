/**
 * Structure pipeline: wires extraction, organizing, filtering and chunk planning.
 *
 * The main operations:
 *   structureFile: read file → strip frontmatter → organize into a tree
 *   chunkStructure: plan and materialize chunks for a tree
 *   write*Outputs: persist the tree / plan / chunks as JSON next to each other
 */

import fs from 'node:fs';
import path from 'node:path';
import { extractMarkdown } from './extractors/markdown';
import { organizeMarkdown } from './structure/organizer';
import { prepareStructureForOutput } from './structure/filter';
import { DocumentChunker, type ChunkerOptions, type PlannableNode } from './structure/planner';
import { loadStructureTree } from './structure/schema';
import type { DocumentRootNode } from './structure/nodes';
import type { ChunkResult, OutputPaths, StructureResult } from './pipeline-types';

// ── Structure ────────────────────────────────────────────────────────────────

/**
 * Organize markdown content. Frontmatter is kept out of the tree; line
 * numbers still refer to the original content, shifted by `lineOffset` when
 * the content itself is an excerpt.
 */
export function structureMarkdown(content: string, lineOffset = 0): StructureResult {
  const { body, metadata, metadataLineCount } = extractMarkdown(content);
  const tree = organizeMarkdown(body, { lineOffset: lineOffset + metadataLineCount });
  return { tree, metadata };
}

/**
 * Read a markdown file and organize it.
 * Throws with the file path when the file can't be read.
 */
export function structureFile(filePath: string): StructureResult {
  return structureMarkdown(readText(filePath));
}

// ── Chunks ───────────────────────────────────────────────────────────────────

export function chunkStructure(tree: PlannableNode, options: ChunkerOptions = {}): ChunkResult {
  return new DocumentChunker(options).processDocument(tree);
}

/**
 * Load a structure JSON file written earlier and validate it for planning.
 */
export function loadStructureFile(filePath: string): PlannableNode {
  const raw = readText(filePath);
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid JSON in ${filePath}: ${message}`);
  }
  return loadStructureTree(json, filePath);
}

// ── Output ───────────────────────────────────────────────────────────────────

/**
 * Base name shared by all outputs of one source file: "notes/a.md" → "a".
 */
export function outputStem(sourcePath: string): string {
  const base = path.basename(sourcePath);
  for (const suffix of ['.structure.json', '.json', path.extname(base)]) {
    if (suffix && base.endsWith(suffix)) {
      return base.slice(0, -suffix.length);
    }
  }
  return base;
}

/**
 * Write `<stem>.structure.json`: the tree with empty `elements` dropped and
 * `omitProperties` removed from every node.
 */
export function writeStructureOutputs(
  sourcePath: string,
  tree: DocumentRootNode,
  outputFolder: string,
  omitProperties: readonly string[] = [],
): OutputPaths {
  fs.mkdirSync(outputFolder, { recursive: true });
  const structurePath = path.join(outputFolder, `${outputStem(sourcePath)}.structure.json`);
  writeJson(structurePath, prepareStructureForOutput(tree, omitProperties));
  return { structure: structurePath };
}

/**
 * Write `<stem>.plan.json` and `<stem>.chunks.json`.
 */
export function writeChunkOutputs(sourcePath: string, result: ChunkResult, outputFolder: string): OutputPaths {
  fs.mkdirSync(outputFolder, { recursive: true });
  const stem = outputStem(sourcePath);
  const planPath = path.join(outputFolder, `${stem}.plan.json`);
  const chunksPath = path.join(outputFolder, `${stem}.chunks.json`);
  writeJson(planPath, result.plan);
  writeJson(chunksPath, result.chunks);
  return { plan: planPath, chunks: chunksPath };
}

// ── Helpers ──────────────────────────────────────────────────────────────────

function readText(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot read ${filePath}: ${message}`);
  }
}

function writeJson(filePath: string, value: unknown): void {
  fs.writeFileSync(filePath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
}
