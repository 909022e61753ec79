/**
 * TOML configuration file parsing and persistence.
 *
 * The config file defines which files a run picks up ([files]), where and
 * how structure trees are written ([structure]) and the chunk planner's size
 * settings ([chunking]). A global file in the home directory and a local one
 * in the working directory are layered over the built-in defaults.
 */

import { parse, stringify } from 'smol-toml';
import { z } from 'zod';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { ListFilesOptions, SortBy } from './file-iterator';
import type { ChunkerOptions } from './structure/planner';

// ── Schema ───────────────────────────────────────────────────────────────────

const DEFAULT_EXTENSIONS = ['.md', '.markdown'];
const DEFAULT_IGNORE = ['.git', 'node_modules', '__pycache__', '.obsidian', 'dist', 'build', '.docindexer'];
const DEFAULT_IGNORE_FILES = ['.DS_Store', 'Thumbs.db'];

const filesSchema = z
  .object({
    source_folder: z.string().min(1).default('.'),
    extensions: z.array(z.string().min(1)).default(() => [...DEFAULT_EXTENSIONS]),
    /** Directory basename patterns skipped during the walk */
    ignore: z.array(z.string()).default(() => [...DEFAULT_IGNORE]),
    /** File basename patterns skipped during the walk */
    ignore_files: z.array(z.string()).default(() => [...DEFAULT_IGNORE_FILES]),
    recursive: z.boolean().default(true),
    max_depth: z.number().int().nonnegative().optional(),
    include_hidden: z.boolean().default(false),
    sort_by: z.enum(['name', 'date', 'size', 'none']).default('name'),
    sort_desc: z.boolean().default(false),
    limit: z.number().int().positive().optional(),
    /** Size bounds in bytes */
    min_size: z.number().int().nonnegative().optional(),
    max_size: z.number().int().nonnegative().optional(),
    /** Modification date bounds: TOML dates or ISO date strings */
    min_date: z.coerce.date().optional(),
    max_date: z.coerce.date().optional(),
  })
  .refine((f) => f.min_size === undefined || f.max_size === undefined || f.min_size <= f.max_size, {
    message: 'min_size must not exceed max_size',
    path: ['min_size'],
  })
  .refine((f) => !f.min_date || !f.max_date || f.min_date <= f.max_date, {
    message: 'min_date must not be after max_date',
    path: ['min_date'],
  });

const structureSchema = z.object({
  output_folder: z.string().min(1).default('./output'),
  /** Node properties removed from written structure files */
  omit_properties: z.array(z.string()).default(() => []),
});

const chunkingSchema = z
  .object({
    min_chunk_size: z.number().int().positive().default(500),
    max_chunk_size: z.number().int().positive().default(2000),
    chunk_overlap: z.number().int().nonnegative().default(50),
    size_tolerance: z.number().nonnegative().default(0.1),
    merge_trailing_group: z.boolean().default(true),
  })
  .refine((c) => c.min_chunk_size <= c.max_chunk_size, {
    message: 'min_chunk_size must not exceed max_chunk_size',
    path: ['min_chunk_size'],
  })
  .refine((c) => c.chunk_overlap < c.max_chunk_size, {
    message: 'chunk_overlap must be smaller than max_chunk_size',
    path: ['chunk_overlap'],
  });

export const configSchema = z.object({
  files: filesSchema.default({}),
  structure: structureSchema.default({}),
  chunking: chunkingSchema.default({}),
});

// ── Config Types ─────────────────────────────────────────────────────────────

export type FilesConfig = z.output<typeof filesSchema>;
export type StructureConfig = z.output<typeof structureSchema>;
export type ChunkingConfig = z.output<typeof chunkingSchema>;
export type DocIndexerConfig = z.output<typeof configSchema>;

const SECTIONS = ['files', 'structure', 'chunking'] as const;
type Section = (typeof SECTIONS)[number];
type RawTable = Record<string, unknown>;
type RawConfig = Partial<Record<Section, RawTable>>;

// ── Load / Save ──────────────────────────────────────────────────────────────

/**
 * Load and parse the TOML configuration file.
 * Returns a typed config object with defaults applied for missing fields.
 */
export function loadConfig(configPath: string): DocIndexerConfig {
  return validateConfig(readRawConfig(configPath), configPath);
}

/**
 * Save the configuration to a TOML file.
 * Creates parent directories if they don't exist.
 */
export function saveConfig(configPath: string, config: DocIndexerConfig): void {
  const dir = path.dirname(configPath);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(configPath, formatConfig(config), 'utf-8');
}

/**
 * Render a configuration as TOML. Unset optional keys are left out.
 */
export function formatConfig(config: DocIndexerConfig): string {
  const tables: Record<string, RawTable> = {};
  for (const section of SECTIONS) {
    const table: RawTable = {};
    for (const [key, value] of Object.entries(config[section])) {
      if (value !== undefined) table[key] = value;
    }
    tables[section] = table;
  }
  return stringify(tables);
}

/**
 * Return a fresh config holding only the built-in defaults.
 */
export function createDefaultConfig(): DocIndexerConfig {
  return configSchema.parse({});
}

/**
 * Check whether a config file exists at the given path.
 */
export function configExists(configPath: string): boolean {
  return fs.existsSync(configPath);
}

// ── Config Paths ─────────────────────────────────────────────────────────────

const CONFIG_DIR = '.docindexer';
const CONFIG_FILE = 'config.toml';

/** `~/.docindexer/config.toml` */
export function getGlobalConfigPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, CONFIG_DIR, CONFIG_FILE);
}

/** `./.docindexer/config.toml` */
export function getLocalConfigPath(cwd: string = process.cwd()): string {
  return path.join(cwd, CONFIG_DIR, CONFIG_FILE);
}

// ── Layering ─────────────────────────────────────────────────────────────────

export interface ConfigLayers {
  globalPath?: string;
  localPath?: string;
}

/**
 * Built-in defaults, then the global file, then the local file. Tables are
 * merged key by key; files that don't exist are skipped. Each file is
 * validated on its own first, so errors name the file that holds the bad key.
 */
export function loadLayeredConfig(layers: ConfigLayers = {}): DocIndexerConfig {
  const merged: RawConfig = {};
  for (const configPath of [layers.globalPath, layers.localPath]) {
    if (!configPath || !configExists(configPath)) continue;
    const raw = readRawConfig(configPath);
    validateConfig(raw, configPath);
    for (const section of SECTIONS) {
      merged[section] = { ...merged[section], ...raw[section] };
    }
  }
  return validateConfig(merged, 'merged configuration');
}

export const CONFIG_SOURCES = ['effective', 'global', 'local', 'all'] as const;
export type ConfigSource = (typeof CONFIG_SOURCES)[number];

/**
 * Render one layer or the merged result as TOML. A layer shows only the keys
 * its file sets; `all` prints each layer, then the merge, under `#` headers.
 */
export function describeConfig(source: ConfigSource, layers: ConfigLayers = {}): string {
  if (source === 'effective') return formatConfig(loadLayeredConfig(layers));
  if (source === 'global') return describeLayer('global', layers.globalPath);
  if (source === 'local') return describeLayer('local', layers.localPath);
  return [
    describeLayer('global', layers.globalPath),
    describeLayer('local', layers.localPath),
    `# effective\n${formatConfig(loadLayeredConfig(layers))}`,
  ].join('\n');
}

function describeLayer(label: string, configPath: string | undefined): string {
  if (!configPath) return `# ${label}: not set\n`;
  if (!configExists(configPath)) return `# ${label}: ${configPath} (not found)\n`;
  const raw = readRawConfig(configPath);
  validateConfig(raw, configPath);
  return `# ${label}: ${configPath}\n${stringify(raw)}`;
}

// ── Resolved Run Options ─────────────────────────────────────────────────────

/** Command-line values; anything left undefined falls back to the config. */
export interface RunOverrides {
  sourceFolder?: string;
  fileName?: string;
  pattern?: string;
  useRegex?: boolean;
  recursive?: boolean;
  maxDepth?: number;
  includeHidden?: boolean;
  sortBy?: SortBy;
  sortDesc?: boolean;
  limit?: number;
  minSize?: number;
  maxSize?: number;
  minDate?: Date;
  maxDate?: Date;
  outputFolder?: string;
  omitProperties?: string[];
  minChunkSize?: number;
  maxChunkSize?: number;
  chunkOverlap?: number;
  sizeTolerance?: number;
}

export interface ResolvedRunOptions {
  files: ListFilesOptions;
  structure: {
    outputFolder: string;
    omitProperties: string[];
  };
  chunking: ChunkerOptions;
}

/**
 * Merge command-line overrides over a loaded configuration.
 */
export function resolveRunOptions(config: DocIndexerConfig, overrides: RunOverrides = {}): ResolvedRunOptions {
  const { files, structure, chunking } = config;
  return {
    files: {
      sourceFolder: overrides.sourceFolder ?? files.source_folder,
      fileName: overrides.fileName,
      pattern: overrides.pattern,
      useRegex: overrides.useRegex ?? false,
      recursive: overrides.recursive ?? files.recursive,
      maxDepth: overrides.maxDepth ?? files.max_depth,
      includeHidden: overrides.includeHidden ?? files.include_hidden,
      ignore: files.ignore,
      ignoreFiles: files.ignore_files,
      extensions: files.extensions,
      sortBy: overrides.sortBy ?? files.sort_by,
      sortDesc: overrides.sortDesc ?? files.sort_desc,
      limit: overrides.limit ?? files.limit,
      minSize: overrides.minSize ?? files.min_size,
      maxSize: overrides.maxSize ?? files.max_size,
      minDate: overrides.minDate ?? files.min_date,
      maxDate: overrides.maxDate ?? files.max_date,
    },
    structure: {
      outputFolder: overrides.outputFolder ?? structure.output_folder,
      omitProperties: overrides.omitProperties ?? structure.omit_properties,
    },
    chunking: {
      minChunkSize: overrides.minChunkSize ?? chunking.min_chunk_size,
      maxChunkSize: overrides.maxChunkSize ?? chunking.max_chunk_size,
      chunkOverlap: overrides.chunkOverlap ?? chunking.chunk_overlap,
      sizeTolerance: overrides.sizeTolerance ?? chunking.size_tolerance,
      mergeTrailingGroup: chunking.merge_trailing_group,
    },
  };
}

// ── Helpers ──────────────────────────────────────────────────────────────────

function readRawConfig(configPath: string): RawConfig {
  const text = fs.readFileSync(configPath, 'utf-8');
  let parsed: RawTable;
  try {
    parsed = parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid TOML in ${configPath}: ${message}`);
  }

  const raw: RawConfig = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!isSection(key)) {
      console.warn(`[config] Ignoring unknown table [${key}] in ${configPath}`);
      continue;
    }
    if (!isTable(value)) {
      throw new Error(`Invalid configuration in ${configPath}: [${key}] must be a table`);
    }
    raw[key] = value;
  }
  return raw;
}

function validateConfig(raw: RawConfig, source: string): DocIndexerConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') : '(root)';
    throw new Error(`Invalid configuration in ${source} at ${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return result.data;
}

function isSection(key: string): key is Section {
  return SECTIONS.some((section) => section === key);
}

function isTable(value: unknown): value is RawTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}
