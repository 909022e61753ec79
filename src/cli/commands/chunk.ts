import type { CommandModule } from 'yargs';
import { listFiles } from '../../backend/file-iterator';
import { chunkStructure, loadStructureFile, structureFile, writeChunkOutputs } from '../../backend/pipeline';
import type { ChunkResult } from '../../backend/pipeline-types';
import { errorMessage, loadRunOptions, withFileOptions, type FileArgs } from '../options';

interface ChunkArgs extends FileArgs {
  'output-folder'?: string;
  'from-structure'?: string;
  'min-chunk-size'?: number;
  'max-chunk-size'?: number;
  'chunk-overlap'?: number;
  'size-tolerance'?: number;
}

export const chunkCommand: CommandModule<object, ChunkArgs> = {
  command: 'chunk',
  describe: 'Plan and write chunks for markdown files or a saved structure',
  builder: (yargs) =>
    withFileOptions(yargs)
      .option('output-folder', {
        alias: 'o',
        type: 'string',
        description: 'Folder for <name>.plan.json and <name>.chunks.json',
      })
      .option('from-structure', {
        type: 'string',
        description: 'Plan a saved <name>.structure.json instead of parsing markdown',
      })
      .option('min-chunk-size', {
        type: 'number',
        description: 'Elements below this size are merged with siblings',
      })
      .option('max-chunk-size', {
        type: 'number',
        description: 'Target upper bound for a chunk',
      })
      .option('chunk-overlap', {
        type: 'number',
        description: 'Characters shared between consecutive split chunks',
      })
      .option('size-tolerance', {
        type: 'number',
        description: 'Fraction over the max size tolerated before splitting',
      }),
  handler: (argv) => {
    const run = loadRunOptions(argv, {
      outputFolder: argv.outputFolder,
      minChunkSize: argv.minChunkSize,
      maxChunkSize: argv.maxChunkSize,
      chunkOverlap: argv.chunkOverlap,
      sizeTolerance: argv.sizeTolerance,
    });
    const outputFolder = run.structure.outputFolder;

    if (argv.fromStructure) {
      const result = chunkStructure(loadStructureFile(argv.fromStructure), run.chunking);
      const output = writeChunkOutputs(argv.fromStructure, result, outputFolder);
      report(argv.fromStructure, result, output.chunks);
      return;
    }

    const files = listFiles(run.files);
    if (files.length === 0) {
      console.log('No files found.');
      return;
    }

    let written = 0;
    let failed = 0;
    for (const file of files) {
      try {
        const { tree } = structureFile(file.path);
        const result = chunkStructure(tree, run.chunking);
        const output = writeChunkOutputs(file.path, result, outputFolder);
        report(file.name, result, output.chunks);
        written++;
      } catch (err) {
        console.error(`[chunk] Failed ${file.path}: ${errorMessage(err)}`);
        failed++;
      }
    }

    console.log(`Chunked ${written} file(s), ${failed} failed.`);
    if (failed > 0) process.exitCode = 1;
  },
};

function report(source: string, result: ChunkResult, chunksPath: string | undefined): void {
  const merged = result.chunks.filter((chunk) => chunk.chunk_type === 'merged').length;
  const split = result.chunks.filter((chunk) => chunk.chunk_type === 'split').length;
  console.log(
    `[chunk] ${source}: ${result.chunks.length} chunks (${split} split, ${merged} merged) → ${chunksPath ?? '-'}`,
  );
}
