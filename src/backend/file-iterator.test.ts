import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { listFiles, normalizeExtension } from './file-iterator';

let tmpDir: string;

function write(relPath: string, content: string, mtime?: Date): void {
  const fullPath = path.join(tmpDir, relPath);
  fs.mkdirSync(path.dirname(fullPath), { recursive: true });
  fs.writeFileSync(fullPath, content, 'utf-8');
  if (mtime) fs.utimesSync(fullPath, mtime, mtime);
}

function names(options: Parameters<typeof listFiles>[0]): string[] {
  return listFiles({ sourceFolder: tmpDir, ...options }).map((file) => file.name);
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'docindexer-files-'));
  write('a.md', 'aaaaaaaaaa', new Date('2024-01-03T00:00:00Z'));
  write('b.markdown', 'bbbbb', new Date('2024-01-01T00:00:00Z'));
  write('c.txt', 'c', new Date('2024-01-02T00:00:00Z'));
  write('.hidden.md', 'h');
  write('sub/d.md', 'ddd');
  write('sub/deep/e.md', 'ee');
  write('node_modules/x.md', 'x');
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('listFiles', () => {
  it('walks recursively, filtering by extension and ignore patterns', () => {
    expect(names({ extensions: ['.md', '.markdown'], ignore: ['node_modules'] })).toEqual([
      'a.md',
      'b.markdown',
      'd.md',
      'e.md',
    ]);
  });

  it('reports file details', () => {
    const [file] = listFiles({ sourceFolder: tmpDir, fileName: 'a.md' });
    expect(file).toMatchObject({
      path: path.join(tmpDir, 'a.md'),
      name: 'a.md',
      size: 10,
      extension: '.md',
    });
    expect(file.modified.toISOString()).toBe('2024-01-03T00:00:00.000Z');
  });

  it('limits the walk depth', () => {
    const base = { extensions: ['md'], ignore: ['node_modules'] };
    expect(names({ ...base, maxDepth: 0 })).toEqual(['a.md']);
    expect(names({ ...base, maxDepth: 1 })).toEqual(['a.md', 'd.md']);
    expect(names({ ...base, recursive: false })).toEqual(['a.md']);
  });

  it('skips hidden entries unless asked', () => {
    expect(names({ extensions: ['.md'], recursive: false })).not.toContain('.hidden.md');
    expect(names({ extensions: ['.md'], recursive: false, includeHidden: true })).toContain('.hidden.md');
  });

  it('skips files matching ignoreFiles', () => {
    expect(names({ recursive: false, ignoreFiles: ['a*', '*.txt'] })).toEqual(['b.markdown']);
  });

  it('filters by wildcard pattern or regular expression', () => {
    expect(names({ ignore: ['node_modules'], pattern: 'd*' })).toEqual(['d.md']);
    expect(names({ recursive: false, pattern: '^[ab]\\.', useRegex: true })).toEqual(['a.md', 'b.markdown']);
  });

  it('filters by size', () => {
    expect(names({ recursive: false, minSize: 5 })).toEqual(['a.md', 'b.markdown']);
    expect(names({ recursive: false, maxSize: 5 })).toEqual(['b.markdown', 'c.txt']);
  });

  it('filters by modification date, bounds included', () => {
    const day = new Date('2024-01-02T00:00:00Z');
    expect(names({ recursive: false, minDate: day })).toEqual(['a.md', 'c.txt']);
    expect(names({ recursive: false, maxDate: day })).toEqual(['b.markdown', 'c.txt']);
    expect(names({ recursive: false, minDate: day, maxDate: day })).toEqual(['c.txt']);
  });

  it('sorts by size or date and applies the limit', () => {
    expect(names({ recursive: false, sortBy: 'size', sortDesc: true })).toEqual(['a.md', 'b.markdown', 'c.txt']);
    expect(names({ recursive: false, sortBy: 'date' })).toEqual(['b.markdown', 'c.txt', 'a.md']);
    expect(names({ recursive: false, sortBy: 'date', sortDesc: true, limit: 2 })).toEqual(['a.md', 'c.txt']);
  });

  it('warns and returns nothing for a missing folder', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const missing = path.join(tmpDir, 'missing');

    expect(listFiles({ sourceFolder: missing })).toEqual([]);
    expect(warn).toHaveBeenCalledWith(`[files] Source folder not found: ${missing}`);
  });

  it('warns and returns nothing for a missing file', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(listFiles({ sourceFolder: tmpDir, fileName: 'nope.md' })).toEqual([]);
    expect(warn).toHaveBeenCalledWith('[files] File not found: nope.md');
  });
});

describe('normalizeExtension', () => {
  it('lower-cases and adds the leading dot', () => {
    expect(normalizeExtension('MD')).toBe('.md');
    expect(normalizeExtension('.Markdown')).toBe('.markdown');
  });
});
