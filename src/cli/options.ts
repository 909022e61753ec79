import type { Argv, ArgumentsCamelCase } from 'yargs';
import {
  getGlobalConfigPath,
  getLocalConfigPath,
  loadConfig,
  loadLayeredConfig,
  resolveRunOptions,
  type DocIndexerConfig,
  type ResolvedRunOptions,
  type RunOverrides,
} from '../backend/config';

export const SORT_CHOICES = ['name', 'date', 'size', 'none'] as const;

/** Flags shared by every command that discovers files. */
export interface FileArgs {
  config?: string;
  'source-folder'?: string;
  'file-name'?: string;
  pattern?: string;
  regex?: boolean;
  'sort-by'?: (typeof SORT_CHOICES)[number];
  desc?: boolean;
  'max-depth'?: number;
  recursive?: boolean;
  limit?: number;
  'include-hidden'?: boolean;
  'min-size'?: number;
  'max-size'?: number;
  'min-date'?: Date;
  'max-date'?: Date;
}

export function withFileOptions<T>(yargs: Argv<T>) {
  return yargs
    .option('config', {
      type: 'string',
      description: 'Config file (default: ~/.docindexer then ./.docindexer)',
    })
    .option('source-folder', {
      alias: 's',
      type: 'string',
      description: 'Folder to scan for files',
    })
    .option('file-name', {
      alias: 'n',
      type: 'string',
      description: 'Process a single file instead of scanning',
    })
    .option('pattern', {
      alias: 'p',
      type: 'string',
      description: 'Filter file names by wildcard pattern',
    })
    .option('regex', {
      type: 'boolean',
      description: 'Treat --pattern as a regular expression',
    })
    .option('sort-by', {
      choices: SORT_CHOICES,
      description: 'Sort files by name, date or size',
    })
    .option('desc', {
      type: 'boolean',
      description: 'Sort in descending order',
    })
    .option('max-depth', {
      type: 'number',
      description: 'Deepest folder level to scan (0 = source folder only)',
    })
    .option('recursive', {
      type: 'boolean',
      description: 'Scan subfolders (--no-recursive to disable)',
    })
    .option('limit', {
      alias: 'l',
      type: 'number',
      description: 'Maximum number of files',
    })
    .option('include-hidden', {
      type: 'boolean',
      description: 'Include hidden files and folders',
    })
    .option('min-size', {
      type: 'number',
      description: 'Smallest file size in bytes',
    })
    .option('max-size', {
      type: 'number',
      description: 'Largest file size in bytes',
    })
    .option('min-date', {
      type: 'string',
      coerce: parseDateOption,
      description: 'Only files modified on or after this date (ISO 8601)',
    })
    .option('max-date', {
      type: 'string',
      coerce: parseDateOption,
      description: 'Only files modified on or before this date (ISO 8601)',
    });
}

export function parseDateOption(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid date "${value}"`);
  }
  return date;
}

/**
 * The configuration a command runs with: the file named by --config, or the
 * global and local files layered over the defaults.
 */
export function loadCommandConfig(configPath: string | undefined): DocIndexerConfig {
  if (configPath) return loadConfig(configPath);
  return loadLayeredConfig({ globalPath: getGlobalConfigPath(), localPath: getLocalConfigPath() });
}

export function loadRunOptions(argv: ArgumentsCamelCase<FileArgs>, overrides: RunOverrides = {}): ResolvedRunOptions {
  return resolveRunOptions(loadCommandConfig(argv.config), {
    sourceFolder: argv.sourceFolder,
    fileName: argv.fileName,
    pattern: argv.pattern,
    useRegex: argv.regex,
    sortBy: argv.sortBy,
    sortDesc: argv.desc,
    maxDepth: argv.maxDepth,
    recursive: argv.recursive,
    limit: argv.limit,
    includeHidden: argv.includeHidden,
    minSize: argv.minSize,
    maxSize: argv.maxSize,
    minDate: argv.minDate,
    maxDate: argv.maxDate,
    ...overrides,
  });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
