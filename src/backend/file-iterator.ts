/**
 * File discovery: lists the source files a run should process.
 *
 * Either a single named file or a walk of the source folder, filtered by
 * depth, hidden entries, ignore patterns, extension, name, size and
 * modification date, then
 * sorted and cut to a limit.
 */

import fs, { type Stats } from 'node:fs';
import path from 'node:path';
import { createNameFilter, matchesAnyPattern } from './pattern-match';

// ── Types ────────────────────────────────────────────────────────────────────

export type SortBy = 'name' | 'date' | 'size' | 'none';

export interface FileInfo {
  /** Absolute path */
  path: string;
  name: string;
  /** Size in bytes */
  size: number;
  /** Last modification time */
  modified: Date;
  /** Lower-cased extension including the dot, '' when there is none */
  extension: string;
}

export interface ListFilesOptions {
  sourceFolder?: string;
  /** A single file to list instead of walking `sourceFolder` */
  fileName?: string;
  recursive?: boolean;
  /** Deepest directory level walked; 0 is `sourceFolder` itself */
  maxDepth?: number;
  includeHidden?: boolean;
  /** Directory basename patterns to skip */
  ignore?: readonly string[];
  /** File basename patterns to skip */
  ignoreFiles?: readonly string[];
  /** Accepted extensions, e.g. ['.md']; empty accepts every extension */
  extensions?: readonly string[];
  pattern?: string;
  useRegex?: boolean;
  /** Size bounds in bytes, inclusive */
  minSize?: number;
  maxSize?: number;
  /** Modification time bounds, inclusive */
  minDate?: Date;
  maxDate?: Date;
  sortBy?: SortBy;
  sortDesc?: boolean;
  limit?: number;
}

// ── Listing ──────────────────────────────────────────────────────────────────

/**
 * List matching files. A missing folder or file gives an empty list and a
 * warning; an invalid `pattern` regular expression throws.
 */
export function listFiles(options: ListFilesOptions = {}): FileInfo[] {
  const nameFilter = options.pattern ? createNameFilter(options.pattern, options.useRegex) : null;
  const extensions = (options.extensions ?? []).map(normalizeExtension);

  const accept = (info: FileInfo): boolean => {
    if (extensions.length > 0 && !extensions.includes(info.extension)) return false;
    if (nameFilter && !nameFilter(info.name)) return false;
    if (options.minSize !== undefined && info.size < options.minSize) return false;
    if (options.maxSize !== undefined && info.size > options.maxSize) return false;
    if (options.minDate && info.modified < options.minDate) return false;
    if (options.maxDate && info.modified > options.maxDate) return false;
    return true;
  };

  let files: FileInfo[];
  if (options.fileName) {
    const single = statFile(path.resolve(options.sourceFolder ?? '.', options.fileName));
    if (!single) {
      console.warn(`[files] File not found: ${options.fileName}`);
      return [];
    }
    files = accept(single) ? [single] : [];
  } else {
    const root = path.resolve(options.sourceFolder ?? '.');
    if (!isDirectory(root)) {
      console.warn(`[files] Source folder not found: ${root}`);
      return [];
    }
    files = [];
    walkDirectory(root, 0, options, (info) => {
      if (accept(info)) files.push(info);
    });
  }

  sortFiles(files, options.sortBy ?? 'name', options.sortDesc ?? false);
  return options.limit !== undefined ? files.slice(0, options.limit) : files;
}

// ── Walk ─────────────────────────────────────────────────────────────────────

function walkDirectory(
  dir: string,
  depth: number,
  options: ListFilesOptions,
  visit: (info: FileInfo) => void,
): void {
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    if (!options.includeHidden && entry.name.startsWith('.')) continue;
    const fullPath = path.join(dir, entry.name);

    if (entry.isDirectory()) {
      if (options.recursive === false) continue;
      if (options.maxDepth !== undefined && depth >= options.maxDepth) continue;
      if (matchesAnyPattern(entry.name, options.ignore ?? [])) continue;
      walkDirectory(fullPath, depth + 1, options, visit);
    } else if (entry.isFile()) {
      if (matchesAnyPattern(entry.name, options.ignoreFiles ?? [])) continue;
      const info = statFile(fullPath);
      if (info) visit(info);
    }
  }
}

function statFile(filePath: string): FileInfo | null {
  let stat: Stats;
  try {
    stat = fs.statSync(filePath);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
  if (!stat.isFile()) return null;
  const name = path.basename(filePath);
  return {
    path: filePath,
    name,
    size: stat.size,
    modified: stat.mtime,
    extension: path.extname(name).toLowerCase(),
  };
}

function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

// ── Sorting ──────────────────────────────────────────────────────────────────

function sortFiles(files: FileInfo[], sortBy: SortBy, desc: boolean): void {
  if (sortBy === 'none') return;
  const direction = desc ? -1 : 1;
  files.sort((a, b) => {
    switch (sortBy) {
      case 'date':
        return (a.modified.getTime() - b.modified.getTime()) * direction;
      case 'size':
        return (a.size - b.size) * direction;
      default:
        return a.name.localeCompare(b.name) * direction;
    }
  });
}

/** ".MD", "md" → ".md" */
export function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}
